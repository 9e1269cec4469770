/**
 * Names of the identity-provider objects that make up a project's
 * authorization graph.
 *
 * @module @folio/keycloak/naming
 */

export const PROJECT_SCOPES = ["READ", "WRITE"] as const;

export interface ProjectAuthzNames {
	resource: string;
	resourceType: string;
	group: string;
	policy: string;
	permission: string;
}

/**
 * @example
 * ```ts
 * projectAuthzNames("folio", "covid-survey").group; // "folio-covid-survey-admin"
 * ```
 */
export function projectAuthzNames(appName: string, slug: string): ProjectAuthzNames {
	return {
		resource: `${appName}.${slug}`,
		resourceType: `urn:${appName}:resources:project`,
		group: `${appName}-${slug}-admin`,
		policy: `${appName}-${slug}-admin-policy`,
		permission: `${appName}.${slug}-admin-permission`,
	};
}

/**
 * Flatten RPT permissions into `<resource>.<scope>` strings, e.g. `folio.READ`.
 */
export function grantedScopes(
	permissions: ReadonlyArray<{ resourceName: string; scopes: readonly string[] }>,
): string[] {
	const granted = new Set<string>();
	for (const permission of permissions) {
		for (const scope of permission.scopes) {
			granted.add(`${permission.resourceName}.${scope}`);
		}
	}
	return [...granted];
}
