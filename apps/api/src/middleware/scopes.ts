import { createMiddleware } from "hono/factory";
import type { ApiEnv } from "./auth";

/**
 * Scope-based access control. Every required scope must have been granted.
 */
export function requireScopes(...requiredScopes: string[]) {
	return createMiddleware<ApiEnv>(async (c, next) => {
		const granted = c.get("auth").scopes;
		const missing = requiredScopes.filter((scope) => !granted.includes(scope));

		if (missing.length > 0) {
			return c.json(
				{
					success: false,
					error: {
						code: "FORBIDDEN",
						message: "Insufficient permissions",
						details: { required: requiredScopes, missing, granted },
					},
				},
				403,
			);
		}

		await next();
	});
}

/**
 * Read and write guards for one application resource.
 */
export function appScopes(appName: string) {
	return {
		read: requireScopes(`${appName}.READ`),
		write: requireScopes(`${appName}.WRITE`),
	};
}
