import type { Logger as PinoLogger, LoggerOptions as PinoOptions } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

export interface RequestContext {
	requestId?: string;
	/** Identity-provider subject of the caller */
	userId?: string;
	username?: string;
}

export interface ProjectContext {
	projectId?: string;
	slug?: string;
	/** Current provisioning step, when inside the saga */
	step?: string;
}

export interface NodeLoggerOptions {
	/** Service name for all logs */
	service: string;
	/** Log level (default: 'info') */
	level?: LogLevel;
	/** Environment name */
	environment?: string;
	/** Service version */
	version?: string;
	/** Enable pretty printing (default: based on NODE_ENV) */
	pretty?: boolean;
	/** Additional redaction paths */
	redactPaths?: readonly string[];
	/** Base context to include in all logs */
	base?: Record<string, unknown>;
	/** Custom Pino options */
	pinoOptions?: Partial<PinoOptions>;
}

export type Logger = PinoLogger;
