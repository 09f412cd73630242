export * from './evolution-engine';
export { ConfigManager } from './shared/config';
export { Config, LogLevel } from './shared/types';
