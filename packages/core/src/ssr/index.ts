export * from './render-to-string';
