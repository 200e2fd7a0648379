export * from './effect-manager';
