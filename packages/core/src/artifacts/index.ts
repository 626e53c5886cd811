export * from './artifact';
export * from './registry';
