/**
 * Pino Redaction Configuration
 *
 * Paths to redact credentials and tokens from logs.
 */

export const DEFAULT_REDACT_PATHS = [
	// Request headers
	"req.headers.authorization",
	"req.headers.cookie",

	// Identity-provider credentials
	"clientSecret",
	"client_secret",
	"*.clientSecret",
	"*.client_secret",
	"accessToken",
	"access_token",
	"*.accessToken",
	"*.access_token",
	"*.refresh_token",
	"*.password",

	// Database
	"postgresUrl",
	"*.postgresUrl",
] as const;

export type RedactPath = (typeof DEFAULT_REDACT_PATHS)[number];

/**
 * Merge custom redaction paths with defaults
 */
export function mergeRedactPaths(customPaths?: readonly string[]): readonly string[] {
	if (!customPaths?.length) {
		return DEFAULT_REDACT_PATHS;
	}
	const combined = new Set<string>([...DEFAULT_REDACT_PATHS, ...customPaths]);
	return Array.from(combined);
}
