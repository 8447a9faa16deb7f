export * from './types';
export * from './transition-rules';
export * from './state-machine';
