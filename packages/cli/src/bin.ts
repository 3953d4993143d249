#!/usr/bin/env tsx

import { parseArgs } from "./args";
import { serve } from "./commands/serve";
import { fatal, print } from "./output";

const VERSION = "0.1.0";

const HELP = `switchyard — concurrent HTTP request dispatcher

Usage: switchyard <command> [options]

Commands:
  serve                    Start the dispatcher with the status routes mounted

Serve options:
  --port <n>               Port to listen on (or SWITCHYARD_PORT, default: 3000)
  --address <addr>         Address to bind (or SWITCHYARD_ADDRESS, default: 127.0.0.1)
  --workers <n>            Worker count (or SWITCHYARD_WORKERS, default: 4)
  --max-queue <n>          Queued requests before 503 (or SWITCHYARD_MAX_QUEUE, default: unbounded)
  --timeout <ms>           Per-request deadline (or SWITCHYARD_REQUEST_TIMEOUT_MS, default: none)
  --log-level <level>      debug, info, warn or error (or SWITCHYARD_LOG_LEVEL, default: info)
  --config <file>          JSON file with any of the settings above

General:
  --help, -h               Show this help message
  --version, -v            Show version

Status routes:
  GET /_switchyard/health   Worker pool state
  GET /_switchyard/metrics  Prometheus metrics
  GET /_switchyard/routes   Mounted routers and their routes

Examples:
  switchyard serve
  switchyard serve --port 8080 --workers 8 --max-queue 1000
  SWITCHYARD_LOG_LEVEL=debug switchyard serve --config switchyard.json
`;

async function main(): Promise<void> {
	const { command, flags } = parseArgs(process.argv);

	if (flags.version === "true" || flags.v === "true") {
		print(VERSION);
		return;
	}

	if (flags.help === "true" || flags.h === "true" || command.length === 0) {
		print(HELP);
		return;
	}

	const cmd = command.join(" ");

	switch (cmd) {
		case "serve":
			await serve(flags);
			break;

		case "help":
			print(HELP);
			break;

		case "version":
			print(VERSION);
			break;

		default:
			fatal(`Unknown command: ${cmd}\nRun 'switchyard --help' for usage.`);
	}
}

main().catch((err) => {
	fatal(String(err));
});
