import type { MarkerForm } from "./types.js";

export const USAGE = `Usage: static-bust <command> [projectDir] [options]

Commands:
  init       Write a static-bust.jsonc for the project
  scan       Report references and whether their markers are current
  rewrite    Add markers to references and refresh stale ones
  update     Refresh existing markers only

Options:
  --config <path>     Config file (default: <projectDir>/static-bust.jsonc)
  -n, --dry-run       Show the edits without writing them
  -c, --cascade       Repeat update passes until nothing changes
  -f, --force         Rewrite current markers too; update also converts to the configured form
  --filename          Put the token in the file name (app_cb_TOKEN.js)
  --querystring       Put the token in the query string (app.js?_cb_=TOKEN)
  -y, --yes           Do not ask before writing
  -v, --verbose       List every reference
  -q, --quiet         Only print warnings and errors
  -h, --help          Show this help
  --version           Show the version`;

export interface CliArgs {
	command?: string;
	projectDir?: string;
	configPath?: string;
	dryRun: boolean;
	cascade: boolean;
	force: boolean;
	markerForm?: MarkerForm;
	yes: boolean;
	verbose: boolean;
	quiet: boolean;
	help: boolean;
	version: boolean;
}

export const parseArgs = (argv: string[]): CliArgs => {
	const args: CliArgs = {
		dryRun: false,
		cascade: false,
		force: false,
		yes: false,
		verbose: false,
		quiet: false,
		help: false,
		version: false,
	};
	const positional: string[] = [];
	for (let i = 2; i < argv.length; i++) {
		const arg = argv[i];
		if (arg === undefined) break;
		if (arg === "--config") {
			const value = argv[++i];
			if (value === undefined) throw new Error("--config needs a path");
			args.configPath = value;
		} else if (arg === "--dry-run" || arg === "-n") {
			args.dryRun = true;
		} else if (arg === "--cascade" || arg === "-c") {
			args.cascade = true;
		} else if (arg === "--force" || arg === "-f") {
			args.force = true;
		} else if (arg === "--filename") {
			args.markerForm = "filename";
		} else if (arg === "--querystring") {
			args.markerForm = "querystring";
		} else if (arg === "--yes" || arg === "-y") {
			args.yes = true;
		} else if (arg === "--verbose" || arg === "-v") {
			args.verbose = true;
		} else if (arg === "--quiet" || arg === "-q") {
			args.quiet = true;
		} else if (arg === "--help" || arg === "-h") {
			args.help = true;
		} else if (arg === "--version") {
			args.version = true;
		} else if (arg.startsWith("-")) {
			throw new Error(`Unknown option: ${arg}`);
		} else {
			positional.push(arg);
		}
	}
	args.command = positional[0];
	args.projectDir = positional[1];
	return args;
};
