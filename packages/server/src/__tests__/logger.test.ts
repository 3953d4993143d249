import { HandlerFaultError, UnavailableError } from "@switchyard/core";
import { describe, expect, it } from "vitest";
import { errorFields, Logger, parseLogLevel } from "../logger";
import { createTestLogger } from "./test-helpers";

describe("Logger", () => {
	it("writes one JSON object per entry", () => {
		const { logger, lines } = createTestLogger("info");
		logger.info("listening", { port: 3000 });

		expect(lines).toHaveLength(1);
		expect(lines[0]).toMatchObject({ level: "info", msg: "listening", port: 3000 });
		expect(new Date(lines[0]?.ts ?? "").toISOString()).toBe(lines[0]?.ts);
	});

	it("drops entries below its level", () => {
		const { logger, lines } = createTestLogger("warn");
		logger.debug("route matched");
		logger.info("listening");
		logger.warn("request rejected");
		logger.error("middleware handler failed");

		expect(lines.map((l) => l.level)).toEqual(["warn", "error"]);
	});

	it("reports which levels are enabled", () => {
		const logger = new Logger("info", {}, () => {});

		expect(logger.isEnabled("debug")).toBe(false);
		expect(logger.isEnabled("info")).toBe(true);
		expect(logger.isEnabled("error")).toBe(true);
	});

	describe("child()", () => {
		it("binds context onto every entry", () => {
			const { logger, lines } = createTestLogger("info");
			const child = logger.child({ requestId: "req-1", method: "GET" });
			child.info("no route matched in router", { route: "/users" });

			expect(lines[0]).toMatchObject({
				requestId: "req-1",
				method: "GET",
				route: "/users",
			});
		});

		it("lets the innermost binding win", () => {
			const { logger, lines } = createTestLogger("info");
			logger.child({ component: "server" }).child({ component: "worker-pool" }).info("x");

			expect(lines[0]?.component).toBe("worker-pool");
		});

		it("keeps the parent level", () => {
			const { logger, lines } = createTestLogger("error");
			const child = logger.child({ requestId: "req-2" });
			child.warn("dropped");

			expect(child.level).toBe("error");
			expect(lines).toHaveLength(0);
		});
	});
});

describe("parseLogLevel", () => {
	it("accepts the four levels", () => {
		expect(parseLogLevel("debug")).toBe("debug");
		expect(parseLogLevel("error")).toBe("error");
	});

	it("returns null for anything else", () => {
		expect(parseLogLevel("verbose")).toBeNull();
		expect(parseLogLevel("INFO")).toBeNull();
	});
});

describe("errorFields", () => {
	it("includes code and cause message", () => {
		const fault = new HandlerFaultError("step 1 failed", 1, new Error("boom"));

		expect(errorFields(fault)).toEqual({
			error: "step 1 failed",
			errorName: "HandlerFaultError",
			errorCode: "HANDLER_FAULT",
			cause: "boom",
		});
	});

	it("omits what the error does not carry", () => {
		expect(errorFields(new Error("plain"))).toEqual({ error: "plain", errorName: "Error" });
		expect(errorFields(new UnavailableError("busy"))).toEqual({
			error: "busy",
			errorName: "UnavailableError",
			errorCode: "UNAVAILABLE",
		});
	});
});
