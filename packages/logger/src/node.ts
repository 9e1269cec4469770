import pino, { type DestinationStream } from "pino";
import { mergeRedactPaths } from "./redaction";
import type { Logger, NodeLoggerOptions, ProjectContext, RequestContext } from "./types";

const SEVERITY: Record<string, string> = {
	trace: "DEBUG",
	debug: "DEBUG",
	info: "INFO",
	warn: "WARNING",
	error: "ERROR",
	fatal: "CRITICAL",
};

/**
 * Create a Pino logger for the API server and the admin CLI.
 *
 * Levels are emitted as an uppercase `severity` field, timestamps as ISO
 * strings, and credentials are redacted. Development output goes through
 * pino-pretty; everything else is one JSON object per line.
 *
 * @param destination - Optional stream, used by tests to capture output
 */
export function createNodeLogger(
	options: NodeLoggerOptions,
	destination?: DestinationStream,
): Logger {
	const {
		service,
		level = "info",
		environment = process.env.NODE_ENV || "development",
		version = process.env.npm_package_version,
		pretty = environment === "development" && destination === undefined,
		redactPaths,
		base = {},
		pinoOptions = {},
	} = options;

	const transport = pretty
		? {
				target: "pino-pretty",
				options: {
					colorize: true,
					translateTime: "SYS:standard",
					ignore: "pid,hostname",
					levelFirst: true,
				},
			}
		: undefined;

	return pino(
		{
			level,
			formatters: {
				level(label) {
					return { severity: SEVERITY[label] ?? label.toUpperCase() };
				},
				bindings(bindings) {
					const { pid: _pid, hostname: _hostname, ...rest } = bindings;
					return {
						service,
						environment,
						...(version && { version }),
						...base,
						...rest,
					};
				},
			},
			timestamp: pino.stdTimeFunctions.isoTime,
			redact: {
				paths: [...mergeRedactPaths(redactPaths)],
				censor: "[REDACTED]",
			},
			...(transport && { transport }),
			...pinoOptions,
		},
		destination,
	);
}

/**
 * Create a child logger carrying the HTTP request and caller identity.
 */
export function withRequestContext(logger: Logger, request: RequestContext): Logger {
	return logger.child({
		...(request.requestId && { request_id: request.requestId }),
		...(request.userId && { user_id: request.userId }),
		...(request.username && { username: request.username }),
	});
}

/**
 * Create a child logger scoped to one project, e.g. for a provisioning run.
 */
export function withProjectContext(logger: Logger, project: ProjectContext): Logger {
	return logger.child({
		...(project.projectId && { project_id: project.projectId }),
		...(project.slug && { slug: project.slug }),
		...(project.step && { step: project.step }),
	});
}
