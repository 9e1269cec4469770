import { IdentityProviderError } from "@folio/common";
import { grantedScopes, type IdentityProvider } from "@folio/keycloak";
import { type Logger, withRequestContext } from "@folio/logger";
import type { Context } from "hono";
import { createMiddleware } from "hono/factory";
import { decodeJwt } from "jose";

/**
 * Identity of the caller, resolved from the bearer token.
 */
export interface AuthContext {
	/** `sub` claim */
	userId: string;
	/** `preferred_username` claim */
	username?: string;
	/** `<resource>.<scope>` strings from the RPT exchange, e.g. `folio.READ` */
	scopes: string[];
}

export type ApiEnv = {
	Variables: {
		auth: AuthContext;
		logger: Logger;
	};
};

export interface AuthOptions {
	idp: IdentityProvider;
	logger: Logger;
}

function unauthorized(c: Context, message: string) {
	return c.json({ success: false, error: { code: "UNAUTHORIZED", message } }, 401);
}

/**
 * Bearer-token authentication.
 *
 * The token is exchanged with the identity provider for its RPT permission
 * list; a rejected exchange means the token is invalid. Identity claims are
 * read from the token itself once the provider has accepted it.
 */
export function auth(options: AuthOptions) {
	const { idp, logger } = options;

	return createMiddleware<ApiEnv>(async (c, next) => {
		const header = c.req.header("Authorization");
		if (!header) {
			return unauthorized(c, "Missing Authorization header");
		}
		if (!header.startsWith("Bearer ")) {
			return unauthorized(c, "Invalid Authorization header format. Use: Bearer <token>");
		}
		const token = header.slice(7);

		let scopes: string[];
		try {
			scopes = grantedScopes(await idp.getPermissions(token, { signal: c.req.raw.signal }));
		} catch (error) {
			if (error instanceof IdentityProviderError && (error.status === 401 || error.status === 403)) {
				return unauthorized(c, "Invalid or expired access token");
			}
			throw error;
		}

		let claims: ReturnType<typeof decodeJwt>;
		try {
			claims = decodeJwt(token);
		} catch (error) {
			logger.debug({ error }, "Access token is not a decodable JWT");
			return unauthorized(c, "Malformed access token");
		}
		if (!claims.sub) {
			return unauthorized(c, "Access token has no subject");
		}

		const context: AuthContext = {
			userId: claims.sub,
			username: typeof claims.preferred_username === "string" ? claims.preferred_username : undefined,
			scopes,
		};
		c.set("auth", context);
		c.set("logger", withRequestContext(logger, context));

		logger.debug({ userId: context.userId, scopes }, "Access token authenticated");
		await next();
	});
}
