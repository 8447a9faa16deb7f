export * from './chargeflow';
