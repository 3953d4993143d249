/** Parsed command-line arguments. */
export interface ParsedArgs {
	/** The command (e.g. ["serve"]) */
	command: string[];
	/** Named flags (e.g. --port 8080 becomes { port: "8080" }) */
	flags: Record<string, string>;
	/** Positional arguments after the command */
	positional: string[];
}

/**
 * Parse process.argv into structured command, flags, and positional args.
 *
 * Supports:
 * - `--flag value` style options
 * - `--flag=value` style options
 * - `-h` style short flags
 * - A command before the flags
 */
export function parseArgs(argv: string[]): ParsedArgs {
	// Skip node binary and script path
	const args = argv.slice(2);

	const command: string[] = [];
	const flags: Record<string, string> = {};
	const positional: string[] = [];

	let i = 0;

	// Consume the first non-flag word as the command
	const first = args[0];
	if (first !== undefined && !first.startsWith("-")) {
		command.push(first);
		i++;
	}

	while (i < args.length) {
		const arg = args[i] ?? "";
		const next = args[i + 1];
		const takesNext = next !== undefined && !isFlag(next);

		if (arg.startsWith("--")) {
			const equalIdx = arg.indexOf("=");
			if (equalIdx !== -1) {
				flags[arg.slice(2, equalIdx)] = arg.slice(equalIdx + 1);
			} else {
				flags[arg.slice(2)] = takesNext ? next : "true";
				if (takesNext) i++;
			}
		} else if (arg.startsWith("-") && arg.length === 2) {
			flags[arg.slice(1)] = takesNext ? next : "true";
			if (takesNext) i++;
		} else {
			positional.push(arg);
		}
		i++;
	}

	return { command, flags, positional };
}

/** A flag, as opposed to a value; `-1` is a value. */
function isFlag(arg: string): boolean {
	return arg.startsWith("-") && !/^-\d/.test(arg);
}
