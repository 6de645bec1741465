export { createLogger, type CreateLoggerOptions, type Logger, type LogLevel } from './schema.js';
export { redactDeep, MAX_LOGGED_TEXT_LENGTH, type RedactionMode } from './redaction.js';
