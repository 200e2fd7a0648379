export * from './hamburger-menu';
export * from './disclosure';
