import * as winston from "winston";

export type LogLevel = "debug" | "verbose" | "info" | "warn" | "error";

export interface LogTarget {
	name: string;
	type: "console" | "file";
	level: LogLevel;
	format?: "string" | "json" | "pretty-json"; // default to "string"
	timestamp?: boolean; // default to true
}

export interface FileTarget extends LogTarget {
	type: "file";
	file: string;
}

type Format = ReturnType<typeof winston.format.json>;

const ALL_LEVELS: LogLevel[] = ["debug", "verbose", "info", "warn", "error"];

function isFileTarget(target: LogTarget): target is FileTarget {
	return target.type === "file" && "file" in target && typeof target.file === "string";
}

function createFormat(target: LogTarget): Format {
	const formats: Format[] = [];
	if (target.timestamp !== false) {
		formats.push(winston.format.timestamp());
	}

	switch (target.format) {
		case "json":
			formats.push(winston.format.json());
			break;
		case "pretty-json":
			formats.push(winston.format.prettyPrint());
			break;
		default:
			formats.push(winston.format.simple());
	}

	return winston.format.combine(...formats);
}

export function createTarget(target: LogTarget) {
	const format = createFormat(target);
	const type: string = target.type;

	switch (target.type) {
		case "console":
			// stdout belongs to the operator prompt
			return new winston.transports.Console({
				level: target.level || "debug",
				format,
				stderrLevels: ALL_LEVELS,
			});

		case "file":
			if (!isFileTarget(target)) {
				throw new Error(`log target ${ target.name } is missing a file`);
			}
			return new winston.transports.File({
				level: target.level || "error",
				filename: target.file,
				format,
			});

		default:
			throw new Error("unsupported log target type: " + type);
	}
}

let logContext: object = {};

/**
 * Merged into the metadata of every entry written by the default logger.
 */
export function setLogContext(context: object) {
	logContext = { ...context };
}

export interface BasicLogger {
	error(message: string, options?: object): void;

	warn(message: string, options?: object): void;

	verbose(message: string, options?: object): void;

	info(message: string, options?: object): void;

	debug(message: string, options?: object): void;
}

let defaultLogger: BasicLogger | undefined;

export function createLogger(...targets: LogTarget[]): BasicLogger {
	const silent = targets.length === 0;
	const winstonLogger = winston.createLogger({
		level: "debug",
		silent,
		transports: silent ? [new winston.transports.Console({ silent })] : targets.map(target => createTarget(target))
	});

	return {
		error: (message: string, options?: object) => {
			winstonLogger.error(message, { ...options, ...logContext });
		},
		warn: (message: string, options?: object) => {
			winstonLogger.warn(message, { ...options, ...logContext });
		},
		verbose: (message: string, options?: object) => {
			winstonLogger.verbose(message, { ...options, ...logContext });
		},
		info: (message: string, options?: object) => {
			winstonLogger.info(message, { ...options, ...logContext });
		},
		debug: (message: string, options?: object) => {
			winstonLogger.debug(message, { ...options, ...logContext });
		}
	};
}

export function initLogger(...targets: LogTarget[]): BasicLogger {
	if (defaultLogger) {
		return defaultLogger;
	}

	defaultLogger = createLogger(...targets);
	return defaultLogger;
}

export function getDefaultLogger(): BasicLogger {
	return initLogger();
}
