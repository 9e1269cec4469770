import type { IdentityProvider } from "@folio/keycloak";
import type { Logger } from "@folio/logger";
import type { EntityStore } from "../repositories";
import type { UniquenessScope } from "../types";
import { AdminService } from "./admin";
import { LifecycleService } from "./lifecycle";
import { MembershipService } from "./membership";
import { PathogenService } from "./pathogens";
import { ProjectService } from "./projects";
import { type Provisioner, ProvisioningService, type RetryPolicy } from "./provisioning";
import { StudyService } from "./studies";

export type { EntityInfo, StateCounts, TableCounts } from "./admin";
export { AdminService } from "./admin";
export type {
	DeleteTarget,
	LifecycleServiceOptions,
	PurgePreview,
	PurgeScope,
	RestoreOptions,
} from "./lifecycle";
export { LifecycleService } from "./lifecycle";
export type { AuthzObjectRef, MembershipServiceOptions } from "./membership";
export { MembershipService } from "./membership";
export type { EntityServiceOptions } from "./pathogens";
export { PathogenService } from "./pathogens";
export { ProjectService } from "./projects";
export type {
	AuthzObject,
	Deprovisioner,
	DeprovisioningResult,
	ProvisioningResult,
	ProvisioningServiceOptions,
	ProvisionOptions,
	Provisioner,
	RetryPolicy,
} from "./provisioning";
export { callWithRetry, DEFAULT_RETRY_POLICY, ProvisioningService } from "./provisioning";
export { StudyService } from "./studies";

export interface FolioServicesOptions {
	store: EntityStore;
	idp: IdentityProvider;
	/** Prefix of identity-provider object names */
	appName: string;
	logger: Logger;
	/** Default: all-rows */
	uniquenessScope?: UniquenessScope;
	retry?: Partial<RetryPolicy>;
	clock?: () => Date;
}

export interface FolioServices {
	pathogens: PathogenService;
	projects: ProjectService;
	studies: StudyService;
	lifecycle: LifecycleService;
	membership: MembershipService;
	admin: AdminService;
	provisioner: Provisioner;
}

/**
 * Wire every service over one store and identity provider.
 */
export function createFolioServices(options: FolioServicesOptions): FolioServices {
	const { store, idp, appName, logger, retry, clock } = options;
	const entityOptions = { uniquenessScope: options.uniquenessScope ?? "all-rows", logger };
	const provisioner = new ProvisioningService({
		idp,
		appName,
		retry,
		logger: logger.child({ component: "provisioning" }),
	});

	return {
		pathogens: new PathogenService(store, entityOptions),
		projects: new ProjectService(store, provisioner, entityOptions),
		studies: new StudyService(store, entityOptions),
		lifecycle: new LifecycleService(store, {
			logger: logger.child({ component: "lifecycle" }),
			clock,
			deprovisioner: provisioner,
		}),
		membership: new MembershipService(store, { idp, appName, logger, retry }),
		admin: new AdminService(store),
		provisioner,
	};
}
