/**
 * Environment variable utilities.
 *
 * Type-safe helpers for reading environment variables with defaults. Only the
 * configuration loaders call these; services receive explicit configuration.
 *
 * @module @folio/common/utils/env
 */

/**
 * Parse an integer from an environment variable.
 *
 * Returns defaultValue if the variable is not set or not a valid number.
 *
 * @example
 * ```ts
 * const port = envNum("PORT", 8000);
 * ```
 */
export function envNum(key: string, defaultValue: number, env: NodeJS.ProcessEnv = process.env): number {
	const val = env[key];
	if (val === undefined) return defaultValue;
	const parsed = Number.parseInt(val, 10);
	return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get a string from an environment variable, or defaultValue when unset or empty.
 */
export function envStr(key: string, defaultValue: string, env: NodeJS.ProcessEnv = process.env): string {
	const val = env[key];
	return val === undefined || val === "" ? defaultValue : val;
}

/**
 * Get an optional string; empty strings count as unset.
 */
export function envOptional(key: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
	const val = env[key];
	return val === undefined || val === "" ? undefined : val;
}

/**
 * Get a required environment variable.
 *
 * @throws Error if the environment variable is not set
 */
export function envRequired(key: string, env: NodeJS.ProcessEnv = process.env): string {
	const val = env[key];
	if (val === undefined || val === "") {
		throw new Error(`Required environment variable ${key} is not set`);
	}
	return val;
}
