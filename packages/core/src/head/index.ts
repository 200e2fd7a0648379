export { HeadManager } from './head-manager';
export type { HeadManagerOptions } from './head-manager';
