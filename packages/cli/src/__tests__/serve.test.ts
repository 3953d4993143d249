import { createServer } from "node:net";
import { BindError } from "@switchyard/core";
import { Logger, type Server } from "@switchyard/server";
import { afterEach, describe, expect, it } from "vitest";
import { STATUS_MOUNT, startServer } from "../commands/serve";
import type { ServeConfig } from "../config";

const quiet = new Logger("error", {}, () => {});

function config(overrides: Partial<ServeConfig> = {}): ServeConfig {
	return {
		port: 0,
		address: "127.0.0.1",
		workers: 2,
		maxBodyBytes: 1024,
		unsignalled: "continue",
		logLevel: "error",
		...overrides,
	};
}

describe("startServer", () => {
	let server: Server | null = null;

	afterEach(async () => {
		await server?.close();
		server = null;
	});

	it("serves the status routes", async () => {
		server = await startServer(config(), quiet);

		const res = await fetch(`http://127.0.0.1:${server.port}${STATUS_MOUNT}/health`);
		const body: unknown = await res.json();

		expect(res.status).toBe(200);
		expect(body).toMatchObject({ status: "ok", pool: { workers: 2 } });
	});

	it("lists only the status mount", async () => {
		server = await startServer(config(), quiet);

		expect(server.mounts().mounts.map((m) => m.mountPath)).toEqual([STATUS_MOUNT]);
	});

	it("rejects with BindError when the port is taken", async () => {
		const blocker = createServer();
		await new Promise<void>((resolve) => blocker.listen(0, "127.0.0.1", resolve));
		const address = blocker.address();
		const port = address !== null && typeof address === "object" ? address.port : 0;

		try {
			await expect(startServer(config({ port }), quiet)).rejects.toBeInstanceOf(BindError);
		} finally {
			await new Promise<void>((resolve) => blocker.close(() => resolve()));
		}
	});
});
