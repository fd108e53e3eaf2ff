import winston from 'winston';
import chalk from 'chalk';
import fs from 'fs';
import path from 'path';
import { getLoggerEnv } from '../env.js';

// ===== 1. Foundation Layer: Winston Configuration =====

const logLevels = {
	error: 0, // Highest priority
	warn: 1,
	info: 2,
	http: 3,
	verbose: 4,
	debug: 5,
	silly: 6, // Lowest priority
};

export type LogLevel = keyof typeof logLevels;

export const LOG_LEVELS: readonly string[] = Object.keys(logLevels);

const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.includes(value);

// ===== 2. Security Layer: Data Redaction =====

const SENSITIVE_KEYS = ['apiKey', 'api_key', 'password', 'secret', 'token', 'credential'];
const MASK_REGEX = new RegExp(
	`(${SENSITIVE_KEYS.join('|')})(["']?\\s*[:=]\\s*)(["']?)([^\\s"',;}&]+)`,
	'gi'
);

export const redactSensitiveData = (message: string, enabled: boolean = true): string => {
	if (!enabled) return message;

	return message.replace(MASK_REGEX, (_match, key: string, separator: string, quote: string) => {
		return `${key}${separator}${quote}***REDACTED***`;
	});
};

// ===== 3. Visual Formatting Layer =====

const levelColorMap: Record<LogLevel, (text: string) => string> = {
	error: chalk.red,
	warn: chalk.yellow,
	info: chalk.blue,
	http: chalk.cyan,
	verbose: chalk.magenta,
	debug: chalk.gray,
	silly: chalk.gray.dim,
};

const maskFormat = (enabled: boolean) =>
	winston.format(info => {
		if (typeof info.message === 'string') {
			info.message = redactSensitiveData(info.message, enabled);
		}
		return info;
	})();

const formatMeta = (meta: Record<string, unknown>): string => {
	const keys = Object.keys(meta).filter(key => meta[key] !== undefined);
	if (keys.length === 0) return '';
	const picked: Record<string, unknown> = {};
	for (const key of keys) picked[key] = meta[key];
	try {
		return ` ${JSON.stringify(picked)}`;
	} catch {
		return ' [unserializable metadata]';
	}
};

const consoleFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
	const colorize = isLogLevel(level) ? levelColorMap[level] : chalk.white;
	return `${chalk.dim(String(timestamp))} ${colorize(level.toUpperCase())}: ${String(message)}${chalk.dim(formatMeta(meta))}`;
});

// File formatting (no colors)
const fileFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
	return `${String(timestamp)} [${level.toUpperCase()}]: ${String(message)}${formatMeta(meta)}`;
});

// ===== 4. Configuration Layer =====

const resolveLogLevel = (requested: string | undefined, fromEnv: string | undefined): LogLevel => {
	for (const candidate of [requested, fromEnv]) {
		const normalized = candidate?.toLowerCase();
		if (normalized && isLogLevel(normalized)) {
			return normalized;
		}
	}
	return 'info'; // Safe default
};

// ===== 5. Logger Options Interface =====

export interface LoggerOptions {
	level?: string;
	silent?: boolean;
	file?: string;
	/** Mask secret-looking values in messages; defaults to REDACT_SECRETS */
	redactSecrets?: boolean;
}

export type LogMeta = Record<string, unknown>;

// ===== 6. Core Logger Class =====

export class Logger {
	private logger: winston.Logger;
	private isSilent: boolean = false;
	private readonly redactSecrets: boolean;

	constructor(options: LoggerOptions = {}) {
		const env = getLoggerEnv();
		const level = resolveLogLevel(options.level, env.DOCSTORE_LOG_LEVEL);
		this.isSilent = options.silent || false;
		this.redactSecrets = options.redactSecrets ?? env.REDACT_SECRETS;

		this.logger = winston.createLogger({
			levels: logLevels,
			level: level,
			format: winston.format.combine(
				winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
				maskFormat(this.redactSecrets)
			),
			transports: this.createTransports(options.file),
			silent: this.isSilent,
		});
	}

	private createTransports(filePath?: string): winston.transport[] {
		const transports: winston.transport[] = [];

		if (filePath) {
			fs.mkdirSync(path.dirname(filePath), { recursive: true });
			transports.push(
				new winston.transports.File({
					filename: filePath,
					format: winston.format.combine(
						winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
						maskFormat(this.redactSecrets),
						fileFormat
					),
				})
			);
		} else {
			transports.push(
				new winston.transports.Console({
					format: winston.format.combine(
						winston.format.timestamp({ format: 'HH:mm:ss' }),
						maskFormat(this.redactSecrets),
						consoleFormat
					),
					stderrLevels: [...LOG_LEVELS], // Redirect all log levels to stderr
				})
			);
		}

		return transports;
	}

	// ===== Core Logging Methods =====

	error(message: string, meta?: LogMeta): void {
		this.logger.error(message, meta);
	}

	warn(message: string, meta?: LogMeta): void {
		this.logger.warn(message, meta);
	}

	info(message: string, meta?: LogMeta): void {
		this.logger.info(message, meta);
	}

	verbose(message: string, meta?: LogMeta): void {
		this.logger.verbose(message, meta);
	}

	debug(message: string, meta?: LogMeta): void {
		this.logger.debug(message, meta);
	}

	silly(message: string, meta?: LogMeta): void {
		this.logger.silly(message, meta);
	}

	// ===== Runtime Configuration Management =====

	setLevel(level: string): void {
		const normalized = level.toLowerCase();
		if (isLogLevel(normalized)) {
			this.logger.level = normalized;
		} else {
			this.error(`Invalid log level: ${level}. Valid levels: ${LOG_LEVELS.join(', ')}`);
		}
	}

	getLevel(): string {
		return this.logger.level;
	}

	isLevelEnabled(level: LogLevel): boolean {
		return this.logger.isLevelEnabled(level);
	}

	isRedactingSecrets(): boolean {
		return this.redactSecrets;
	}

	setSilent(silent: boolean): void {
		this.isSilent = silent;
		this.logger.silent = silent;
	}

	// ===== Utility Methods =====

	createChild(options: LoggerOptions = {}): Logger {
		const childOptions: LoggerOptions = {
			level: options.level || this.getLevel(),
			silent: options.silent !== undefined ? options.silent : this.isSilent,
			redactSecrets: options.redactSecrets ?? this.redactSecrets,
		};

		if (options.file !== undefined) {
			childOptions.file = options.file;
		}

		return new Logger(childOptions);
	}
}

export const createLogger = (options: LoggerOptions = {}): Logger => {
	return new Logger(options);
};
