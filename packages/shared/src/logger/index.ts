import { ConsoleLogger, NoopLogger, ScopedLogger } from './consoleLogger';
import { JsonlLogger } from './jsonlLogger';
import { MemoryLogger } from './memoryLogger';
export type { Logger, MaybePromise } from './types';
export type { LogLevel } from './consoleLogger';
export type { LoggedMessage } from './memoryLogger';

export const logger = new ConsoleLogger();
export { ConsoleLogger, JsonlLogger, MemoryLogger, NoopLogger, ScopedLogger };
