/**
 * Logger exports
 *
 * Stores create their own instance through createLogger(); nothing here mutates
 * process-wide logging state.
 */

export {
	Logger,
	createLogger,
	redactSensitiveData,
	LOG_LEVELS,
	type LoggerOptions,
	type LogLevel,
	type LogMeta,
} from './logger.js';
