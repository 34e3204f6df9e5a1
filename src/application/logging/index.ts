export { consoleLogger, createConsoleLogger, silentLogger } from './logger';
export type { ILogger, LogLevel } from './logger';
