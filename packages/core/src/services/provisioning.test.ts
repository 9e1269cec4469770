import {
	IdentityProviderError,
	ProvisioningFailedError,
	TimeoutError,
} from "@folio/common";
import { createTestLogger } from "@folio/common/testing";
import { InMemoryIdentityProvider } from "@folio/keycloak-mock";
import { describe, expect, it } from "vitest";
import type { Project } from "../types";
import { ProvisioningService, type RetryPolicy } from "./provisioning";

const project: Project = {
	id: "0b3c7f1e-5a1d-4c2e-9f00-1234567890ab",
	slug: "covid-survey",
	name: "Covid Survey",
	description: null,
	organisationId: "org1",
	userId: "u1",
	privacy: "private",
	pathogenId: null,
	createdAt: new Date("2024-01-01T00:00:00.000Z"),
	updatedAt: new Date("2024-01-01T00:00:00.000Z"),
	deletedAt: null,
};

function setup(retry: Partial<RetryPolicy> = {}) {
	const idp = new InMemoryIdentityProvider();
	idp.addUser({ id: "u1", username: "alice" });
	const log = createTestLogger();
	const service = new ProvisioningService({
		idp,
		appName: "app",
		logger: log.logger,
		retry: { initialDelayMs: 1, maxDelayMs: 5, ...retry },
	});
	return { idp, log, service };
}

function rollbackCalls(idp: InMemoryIdentityProvider): string[] {
	return idp.calls
		.map((call) => call.operation)
		.filter((op) => op.startsWith("delete") || op === "removeGroupMember");
}

async function failure(promise: Promise<unknown>): Promise<ProvisioningFailedError> {
	const error = await promise.then(
		() => undefined,
		(e: unknown) => e,
	);
	if (!(error instanceof ProvisioningFailedError)) {
		throw new Error(`expected ProvisioningFailedError, got ${String(error)}`);
	}
	return error;
}

describe("ProvisioningService", () => {
	it("should provision the full authorization graph", async () => {
		const { idp, service, log } = setup();

		const result = await service.provision(project);

		expect(result).toEqual({
			resourceId: "resource-1",
			groupId: "group-2",
			policyId: "policy-3",
			permissionId: "permission-4",
			memberAdded: true,
			created: ["resource", "group", "policy", "permission"],
			removedMembers: [],
			rollback: expect.any(Function),
		});
		expect(idp.findResource("app.covid-survey")).toMatchObject({
			type: "urn:app:resources:project",
			scopes: ["READ", "WRITE"],
			attributes: { project_slug: ["covid-survey"], created_by: ["u1"] },
		});
		expect(idp.findGroup("app-covid-survey-admin")?.attributes).toEqual({
			project_slug: ["covid-survey"],
			group_type: ["project"],
		});
		expect(idp.findGroup("app-covid-survey-admin")?.members.has("u1")).toBe(true);
		expect(idp.findPolicy("app-covid-survey-admin-policy")?.groupId).toBe("group-2");
		expect(idp.findPermission("app.covid-survey-admin-permission")).toMatchObject({
			resourceId: "resource-1",
			policyId: "policy-3",
			scopes: ["READ", "WRITE"],
		});
		expect(log.messages()).toContain("Project authorization provisioned");
	});

	it("should run the steps in order", async () => {
		const { idp, service } = setup();

		await service.provision(project);

		expect(idp.calls.map((call) => call.operation)).toEqual([
			"ensureResource",
			"ensureGroup",
			"addGroupMember",
			"ensureGroupPolicy",
			"ensureScopePermission",
		]);
	});

	it("should roll back created objects newest first when the permission step fails", async () => {
		const { idp, service } = setup();
		idp.failOn("ensureScopePermission", new IdentityProviderError("ensureScopePermission", 403));

		const error = await failure(service.provision(project));

		expect(error.step).toBe("create-permission");
		expect(error.rolledBack).toBe(true);
		expect(error.cause).toBeInstanceOf(IdentityProviderError);
		expect(rollbackCalls(idp)).toEqual(["deletePolicy", "deleteGroup", "deleteResource"]);
		expect(idp.objectCount()).toBe(0);
	});

	it("should not retry non-transient failures", async () => {
		const { idp, service } = setup();
		idp.failOn("ensureGroup", new IdentityProviderError("ensureGroup", 409));

		const error = await failure(service.provision(project));

		expect(error.step).toBe("create-group");
		expect(idp.callsTo("ensureGroup")).toHaveLength(1);
		expect(rollbackCalls(idp)).toEqual(["deleteResource"]);
	});

	it("should retry transient failures and then succeed", async () => {
		const { idp, service, log } = setup();
		idp.failOn("ensureGroup", new IdentityProviderError("ensureGroup", 503), 2);

		await service.provision(project);

		expect(idp.callsTo("ensureGroup")).toHaveLength(3);
		expect(idp.findGroup("app-covid-survey-admin")).toBeDefined();
		expect(log.messages().filter((m) => m === "Retrying identity-provider call")).toHaveLength(2);
	});

	it("should give up after three attempts by default", async () => {
		const { idp, service } = setup();
		idp.failOn("ensureGroupPolicy", new IdentityProviderError("ensureGroupPolicy", 502));

		const error = await failure(service.provision(project));

		expect(error.step).toBe("create-policy");
		expect(idp.callsTo("ensureGroupPolicy")).toHaveLength(3);
		expect(rollbackCalls(idp)).toEqual(["deleteGroup", "deleteResource"]);
	});

	it("should honour a configured attempt count", async () => {
		const { idp, service } = setup({ maxAttempts: 5 });
		idp.failOn("ensureResource", new IdentityProviderError("ensureResource", 500));

		await failure(service.provision(project));

		expect(idp.callsTo("ensureResource")).toHaveLength(5);
		expect(rollbackCalls(idp)).toEqual([]);
	});

	it("should treat timeouts as transient and fail the step when they persist", async () => {
		const { idp, service } = setup();
		idp.stall("addGroupMember");

		const error = await failure(service.provision(project));

		expect(error.step).toBe("add-member");
		expect(error.cause).toBeInstanceOf(TimeoutError);
		expect(idp.callsTo("addGroupMember")).toHaveLength(3);
		expect(rollbackCalls(idp)).toEqual(["deleteGroup", "deleteResource"]);
	});

	it("should roll back when cancelled mid-saga", async () => {
		const { idp, service } = setup();
		const controller = new AbortController();
		idp.onCall("ensureGroupPolicy", () => controller.abort());

		const error = await failure(service.provision(project, { signal: controller.signal }));

		expect(error.step).toBe("create-policy");
		expect(error.rolledBack).toBe(true);
		expect(idp.callsTo("ensureGroupPolicy")).toHaveLength(1);
		expect(idp.objectCount()).toBe(0);
	});

	it("should make no calls when cancelled before starting", async () => {
		const { idp, service } = setup();
		const controller = new AbortController();
		controller.abort();

		const error = await failure(service.provision(project, { signal: controller.signal }));

		expect(error.step).toBe("create-resource");
		expect(idp.calls).toEqual([]);
	});

	it("should keep reused objects and only undo the membership it added", async () => {
		const { idp, service } = setup();
		await idp.ensureGroup({ name: "app-covid-survey-admin", attributes: {} });
		idp.calls.length = 0;
		idp.failOn("ensureScopePermission", new IdentityProviderError("ensureScopePermission", 400));

		const error = await failure(service.provision(project));

		expect(error.rolledBack).toBe(true);
		expect(rollbackCalls(idp)).toEqual(["deletePolicy", "removeGroupMember", "deleteResource"]);
		expect(idp.findGroup("app-covid-survey-admin")?.members.size).toBe(0);
		expect(idp.groups.size).toBe(1);
	});

	it("should roll back an object created by an attempt that timed out", async () => {
		const { idp, service } = setup();
		idp.failOn(
			"ensureResource",
			() => {
				idp.resources.set("resource-late", {
					id: "resource-late",
					name: "app.covid-survey",
					type: "urn:app:resources:project",
					scopes: ["READ", "WRITE"],
					attributes: {},
				});
				return new TimeoutError("ensureResource", 50);
			},
			1,
		);
		idp.failOn("ensureScopePermission", new IdentityProviderError("ensureScopePermission", 403));

		const error = await failure(service.provision(project));

		expect(error.rolledBack).toBe(true);
		expect(idp.callsTo("ensureResource")).toHaveLength(2);
		expect(rollbackCalls(idp)).toEqual(["deletePolicy", "deleteGroup", "deleteResource"]);
		expect(idp.objectCount()).toBe(0);
	});

	it("should undo a membership added by an attempt that timed out", async () => {
		const { idp, service } = setup();
		await idp.ensureGroup({ name: "app-covid-survey-admin", attributes: {} });
		idp.calls.length = 0;
		idp.failOn(
			"addGroupMember",
			() => {
				idp.groups.get("group-1")?.members.add("u1");
				return new TimeoutError("addGroupMember", 50);
			},
			1,
		);
		idp.failOn("ensureScopePermission", new IdentityProviderError("ensureScopePermission", 403));

		const error = await failure(service.provision(project));

		expect(error.rolledBack).toBe(true);
		expect(rollbackCalls(idp)).toEqual(["deletePolicy", "removeGroupMember", "deleteResource"]);
		expect(idp.findGroup("app-covid-survey-admin")?.members.size).toBe(0);
	});

	it("should leave only the owner in a reused admin group", async () => {
		const { idp, service, log } = setup();
		idp.addUser({ id: "u2", username: "bob" });
		const group = await idp.ensureGroup({ name: "app-covid-survey-admin", attributes: {} });
		await idp.addGroupMember(group.id, "u2");

		const result = await service.provision(project);

		expect(result.removedMembers).toEqual(["u2"]);
		expect(result.memberAdded).toBe(true);
		expect([...(idp.findGroup("app-covid-survey-admin")?.members ?? [])]).toEqual(["u1"]);
		expect(log.messages()).toContain("Removed stale members from reused admin group");
	});

	it("should put removed members back when a reused group is rolled back", async () => {
		const { idp, service } = setup();
		idp.addUser({ id: "u2", username: "bob" });
		const group = await idp.ensureGroup({ name: "app-covid-survey-admin", attributes: {} });
		await idp.addGroupMember(group.id, "u2");
		idp.calls.length = 0;
		idp.failOn("ensureScopePermission", new IdentityProviderError("ensureScopePermission", 403));

		const error = await failure(service.provision(project));

		expect(error.rolledBack).toBe(true);
		expect(rollbackCalls(idp)).toEqual([
			"removeGroupMember",
			"deletePolicy",
			"removeGroupMember",
			"deleteResource",
		]);
		expect(idp.callsTo("addGroupMember").map((call) => call.args)).toEqual([
			["group-1", "u1"],
			["group-1", "u2"],
		]);
		expect([...(idp.findGroup("app-covid-survey-admin")?.members ?? [])]).toEqual(["u2"]);
	});

	it("should undo a completed run on request", async () => {
		const { idp, service } = setup();
		const result = await service.provision(project);

		expect(await result.rollback()).toEqual([]);
		expect(rollbackCalls(idp)).toEqual([
			"deletePermission",
			"deletePolicy",
			"deleteGroup",
			"deleteResource",
		]);
		expect(idp.objectCount()).toBe(0);

		expect(await result.rollback()).toEqual([]);
		expect(rollbackCalls(idp)).toHaveLength(4);
	});

	it("should report compensations that fail", async () => {
		const { idp, service } = setup();
		idp.failOn("ensureScopePermission", new IdentityProviderError("ensureScopePermission", 403));
		idp.failOn("deleteGroup", new IdentityProviderError("deleteGroup", 403));

		const error = await failure(service.provision(project));

		expect(error.rolledBack).toBe(false);
		expect(error.compensationFailures).toEqual(["delete-group"]);
		expect(idp.findGroup("app-covid-survey-admin")).toBeDefined();
		expect(idp.findResource("app.covid-survey")).toBeUndefined();
	});

	it("should reuse a complete graph without creating anything", async () => {
		const { idp, service } = setup();
		await service.provision(project);

		const again = await service.provision(project);

		expect(again.created).toEqual([]);
		expect(again.memberAdded).toBe(false);
		expect(idp.objectCount()).toBe(4);
	});

	describe("deprovision", () => {
		it("should delete the whole graph, permission first", async () => {
			const { idp, service } = setup();
			await service.provision(project);
			idp.calls.length = 0;

			const result = await service.deprovision("covid-survey");

			expect(result).toEqual({
				slug: "covid-survey",
				deleted: ["permission", "policy", "group", "resource"],
			});
			expect(rollbackCalls(idp)).toEqual([
				"deletePermission",
				"deletePolicy",
				"deleteGroup",
				"deleteResource",
			]);
			expect(idp.objectCount()).toBe(0);
		});

		it("should skip objects that are already gone", async () => {
			const { idp, service } = setup();
			await idp.ensureGroup({ name: "app-covid-survey-admin", attributes: {} });

			expect((await service.deprovision("covid-survey")).deleted).toEqual(["group"]);
			expect((await service.deprovision("covid-survey")).deleted).toEqual([]);
		});

		it("should retry lookups that fail transiently", async () => {
			const { idp, service } = setup();
			await service.provision(project);
			idp.failOn("findPolicyByName", new IdentityProviderError("findPolicy", 503), 1);

			const result = await service.deprovision("covid-survey");

			expect(result.deleted).toHaveLength(4);
			expect(idp.callsTo("findPolicyByName")).toHaveLength(2);
		});
	});
});
