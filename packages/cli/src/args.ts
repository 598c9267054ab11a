/** Parsed command-line arguments. */
export interface ParsedArgs {
	/** The command path (e.g. ["jobs", "list"]) */
	command: string[];
	/** Named flags (e.g. --state becomes { state: "value" }) */
	flags: Record<string, string>;
	/** Positional arguments after the command */
	positional: string[];
}

/** Commands made of two words. */
const TWO_WORD_COMMANDS = new Set(["jobs list", "jobs show", "jobs requeue"]);

/**
 * Parse process.argv into structured command, flags, and positional args.
 *
 * Supports:
 * - `--flag value` style options
 * - `--flag=value` style options
 * - Commands and subcommands before flags
 * - Positional arguments mixed with flags
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

		const second = args[1];
		if (second !== undefined && TWO_WORD_COMMANDS.has(`${first} ${second}`)) {
			command.push(second);
			i++;
		}
	}

	while (i < args.length) {
		const arg = args[i] ?? "";
		const next = args[i + 1];

		if (arg.startsWith("--")) {
			const equalIdx = arg.indexOf("=");
			if (equalIdx !== -1) {
				flags[arg.slice(2, equalIdx)] = arg.slice(equalIdx + 1);
			} else if (next !== undefined && !next.startsWith("-")) {
				flags[arg.slice(2)] = next;
				i++;
			} else {
				flags[arg.slice(2)] = "true";
			}
		} else if (arg.startsWith("-") && arg.length === 2) {
			// Short flag: -s value
			if (next !== undefined && !next.startsWith("-")) {
				flags[arg.slice(1)] = next;
				i++;
			} else {
				flags[arg.slice(1)] = "true";
			}
		} else {
			positional.push(arg);
		}
		i++;
	}

	return { command, flags, positional };
}
