// Interface and type exports
export * from './common.types';
export * from './clock.interface';
export * from './random-source.interface';
export * from './storage.adapter';
export * from './payment-gateway.adapter';
