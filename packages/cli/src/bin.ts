#!/usr/bin/env node

import { parseArgs } from "./args";
import { check } from "./commands/check";
import { jobsList, jobsRequeue, jobsShow } from "./commands/jobs";
import { fatal, print } from "./output";

const HELP = `tracklink: operate the TrackLink sync queue

Usage: tracklink <command> [options]

Commands:
  jobs list                  List sync jobs
    --state <state>          Only jobs in this state
    --limit <n>              At most n jobs (default 100)
  jobs show <objectId>       Show one job as JSON
  jobs requeue <objectId>    Send a failed_terminal job back to pending
  check                      Validate settings and test the Jira login
    --config <file.json>     Read settings from a JSON file instead of TRACKLINK_* variables

Store options:
  --sqlite <path>            SQLite job store (or TRACKLINK_SQLITE_PATH)
  --pg <url>                 PostgreSQL job store (or TRACKLINK_DATABASE_URL)

Options:
  --help, -h                 Show this help message
  --version, -v              Show version
`;

const VERSION = "0.1.0";

export async function main(argv: string[] = process.argv): Promise<void> {
	const { command, flags, positional } = parseArgs(argv);

	if (flags.help === "true" || flags.h === "true") {
		print(HELP);
		return;
	}

	if (flags.version === "true" || flags.v === "true") {
		print(VERSION);
		return;
	}

	const cmd = command.join(" ");

	switch (cmd) {
		case "jobs list":
			await jobsList(flags);
			break;
		case "jobs show":
			await jobsShow(flags, positional);
			break;
		case "jobs requeue":
			await jobsRequeue(flags, positional);
			break;
		case "check":
			await check(flags);
			break;
		case "":
			print(HELP);
			break;
		default:
			fatal(`Unknown command: ${cmd}\nRun "tracklink --help" for usage.`);
	}
}

// Only run when executed directly (not when imported by tests)
const isDirectRun =
	process.argv[1]?.endsWith("/bin.ts") ||
	process.argv[1]?.endsWith("/bin.js") ||
	process.argv[1]?.endsWith("/tracklink");

if (isDirectRun) {
	main().catch((err: unknown) => {
		fatal(err instanceof Error ? err.message : String(err));
	});
}
