import * as p from "@clack/prompts";
import { parseArgs, USAGE } from "./shared/args.js";
import { COMMANDS, type Command } from "./shared/types.js";

const VERSION = "0.1.0";

const isCommand = (value: string): value is Command => COMMANDS.some((c) => c === value);

const main = async (): Promise<void> => {
	const args = parseArgs(process.argv);

	if (args.version) {
		console.log(VERSION);
		return;
	}
	if (args.help) {
		console.log(USAGE);
		return;
	}
	if (args.command !== undefined && !isCommand(args.command)) {
		throw new Error(`Unknown command "${args.command}"\n\n${USAGE}`);
	}

	if (!args.quiet) p.intro(`static-bust v${VERSION}`);

	let command: Command;
	if (args.command !== undefined && isCommand(args.command)) {
		command = args.command;
	} else {
		const { pickCommand } = await import("./shared/cli.js");
		command = await pickCommand();
	}

	if (command === "init") {
		const { runInit } = await import("./init/index.js");
		await runInit(args.projectDir, { yes: args.yes, configPath: args.configPath });
	} else {
		const { runBust } = await import("./bust/index.js");
		await runBust(command, args);
	}

	if (!args.quiet) p.outro("Done!");
};

main().catch((err) => {
	p.log.error(err instanceof Error ? err.message : String(err));
	process.exit(1);
});
