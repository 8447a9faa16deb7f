export * from './random-sources';
export * from './simulated-gateway.adapter';
