export * from './recomposer';
