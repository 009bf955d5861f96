// Main entry point for stache-ts

// Core exports
export * from './shared/types';
export * from './shared/errors';

// Template exports
export * from './template';

// Logging exports
export { StructuredLogger, ConsoleTransport, MemoryTransport } from './helpers/logger';
export type { LogLevel, LogEntry, Transport, StructuredLoggerOptions } from './helpers/logger';

// Configuration exports
export * from './config';
