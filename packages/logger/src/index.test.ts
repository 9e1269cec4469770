import { describe, expect, it } from "vitest";
import { createNodeLogger, DEFAULT_REDACT_PATHS, mergeRedactPaths, withProjectContext, withRequestContext } from "./index";

function capture() {
	const lines: Array<Record<string, unknown>> = [];
	return {
		lines,
		stream: {
			write(line: string) {
				lines.push(JSON.parse(line));
			},
		},
	};
}

describe("Logger Package", () => {
	describe("Redaction", () => {
		it("should return default paths when no custom paths provided", () => {
			expect(mergeRedactPaths()).toEqual(DEFAULT_REDACT_PATHS);
			expect(mergeRedactPaths([])).toEqual(DEFAULT_REDACT_PATHS);
		});

		it("should merge and deduplicate custom paths", () => {
			const paths = mergeRedactPaths(["custom.secret", "client_secret"]);

			expect(paths).toContain("custom.secret");
			expect(paths.filter((p) => p === "client_secret")).toHaveLength(1);
			expect(paths).toHaveLength(DEFAULT_REDACT_PATHS.length + 1);
		});
	});

	describe("Node Logger", () => {
		it("should create a logger with correct base context", () => {
			const logger = createNodeLogger({
				service: "folio-api",
				environment: "test",
				base: { component: "projects" },
			});

			expect(logger.bindings()).toMatchObject({
				service: "folio-api",
				environment: "test",
				component: "projects",
			});
		});

		it("should respect custom log level", () => {
			expect(createNodeLogger({ service: "test", environment: "test" }).level).toBe("info");
			expect(createNodeLogger({ service: "test", environment: "test", level: "debug" }).level).toBe(
				"debug",
			);
		});

		it("should emit uppercase severity and ISO time", () => {
			const { lines, stream } = capture();
			const logger = createNodeLogger({ service: "folio-cli", environment: "test" }, stream);

			logger.warn("Compensation failed");

			expect(lines).toHaveLength(1);
			expect(lines[0]).toMatchObject({
				severity: "WARNING",
				service: "folio-cli",
				msg: "Compensation failed",
			});
			expect(String(lines[0]?.time)).toMatch(/^\d{4}-\d{2}-\d{2}T/);
			expect(lines[0]).not.toHaveProperty("pid");
		});

		it("should redact identity-provider credentials", () => {
			const { lines, stream } = capture();
			const logger = createNodeLogger({ service: "folio-api", environment: "test" }, stream);

			logger.info(
				{ keycloak: { clientId: "folio", clientSecret: "test-secret" }, access_token: "abc" },
				"Config loaded",
			);

			expect(lines[0]?.keycloak).toEqual({ clientId: "folio", clientSecret: "[REDACTED]" });
			expect(lines[0]?.access_token).toBe("[REDACTED]");
		});

		it("should redact custom paths", () => {
			const { lines, stream } = capture();
			const logger = createNodeLogger(
				{ service: "test", environment: "test", redactPaths: ["user.nickname"] },
				stream,
			);

			logger.info({ user: { nickname: "bob", id: "u-1" } }, "x");

			expect(lines[0]?.user).toEqual({ nickname: "[REDACTED]", id: "u-1" });
		});
	});

	describe("Context Helpers", () => {
		it("should add request context", () => {
			const base = createNodeLogger({ service: "test", environment: "test" });
			const child = withRequestContext(base, {
				requestId: "req-1",
				userId: "kc-user-1",
				username: "alice",
			});

			expect(child.bindings()).toMatchObject({
				request_id: "req-1",
				user_id: "kc-user-1",
				username: "alice",
			});
		});

		it("should add project context and skip missing fields", () => {
			const base = createNodeLogger({ service: "test", environment: "test" });
			const child = withProjectContext(base, { slug: "covid-survey", step: "create-group" });

			expect(child.bindings()).toMatchObject({ slug: "covid-survey", step: "create-group" });
			expect(child.bindings()).not.toHaveProperty("project_id");
		});
	});
});
