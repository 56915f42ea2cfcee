export * from './drift';
export { Logger } from './core/logger';
export type { LogLevel } from './core/logger';
