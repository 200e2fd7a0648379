export * from './activation-guard';
export * from './action-registry';
export * from './bootloader';
export * from './event-queue';
export * from './hydration-engine';
export * from './initial-state';
export * from './toggle';
