import { createTestLogger, type TestLogger } from "@folio/common/testing";
import { InMemoryIdentityProvider } from "@folio/keycloak-mock";
import { createFolioServices, type FolioServices, type FolioServicesOptions } from "../services";
import { InMemoryEntityStore } from "./store";

export interface TestContext {
	store: InMemoryEntityStore;
	idp: InMemoryIdentityProvider;
	services: FolioServices;
	log: TestLogger;
	/** Advance the fake clock */
	tick(ms?: number): Date;
}

export interface TestContextOptions
	extends Partial<Pick<FolioServicesOptions, "appName" | "uniquenessScope" | "retry">> {
	/** Clock start (default: 2024-01-01T00:00:00Z) */
	start?: Date;
}

/**
 * Services over an in-memory store and identity provider, with a manual
 * clock and fast retries. User `u1` (username `alice`) is known to the
 * identity provider.
 */
export function createTestContext(options: TestContextOptions = {}): TestContext {
	let now = options.start ?? new Date("2024-01-01T00:00:00.000Z");
	const clock = () => new Date(now.getTime());

	const store = new InMemoryEntityStore({ clock });
	const idp = new InMemoryIdentityProvider();
	idp.addUser({ id: "u1", username: "alice" });
	idp.addUser({ id: "u2", username: "bob" });

	const log = createTestLogger();
	const services = createFolioServices({
		store,
		idp,
		appName: options.appName ?? "app",
		uniquenessScope: options.uniquenessScope,
		logger: log.logger,
		retry: { initialDelayMs: 1, maxDelayMs: 5, ...options.retry },
		clock,
	});

	return {
		store,
		idp,
		services,
		log,
		tick(ms = 1000) {
			now = new Date(now.getTime() + ms);
			return clock();
		},
	};
}
