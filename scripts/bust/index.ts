import { resolve } from "node:path";
import * as p from "@clack/prompts";
import color from "picocolors";
import { loadConfig } from "../shared/config.js";
import { confirmOrExit, renderReport } from "../shared/cli.js";
import { runEngine } from "./engine.js";
import type { BustMode, MarkerForm, RunReport } from "../shared/types.js";

export interface BustOptions {
	projectDir?: string;
	configPath?: string;
	dryRun: boolean;
	cascade: boolean;
	force: boolean;
	markerForm?: MarkerForm;
	yes: boolean;
	verbose: boolean;
	quiet: boolean;
}

/** Load the project config, run the engine and print the report */
export const runBust = async (mode: BustMode, options: BustOptions): Promise<RunReport | null> => {
	const projectDir = resolve(process.cwd(), options.projectDir ?? ".");
	const config = await loadConfig(projectDir, options.configPath, { markerForm: options.markerForm });

	if (!options.quiet) {
		p.log.info(`Using ${color.cyan(config.configPath ?? "defaults")}`);
	}

	if (mode !== "scan" && !options.dryRun && !options.yes) {
		const verb = mode === "rewrite" ? "Add and refresh" : "Refresh";
		const proceed = await confirmOrExit(`${verb} cache-bust markers in ${config.codeDirs.length} code director${config.codeDirs.length === 1 ? "y" : "ies"}?`);
		if (!proceed) {
			p.log.warn("Nothing written.");
			return null;
		}
	}

	// Ctrl-C lets the file being written finish, then stops
	const controller = new AbortController();
	const onInterrupt = (): void => controller.abort();
	process.once("SIGINT", onInterrupt);

	const s = options.quiet ? null : p.spinner();
	s?.start("Indexing static files");
	let report: RunReport;
	try {
		report = await runEngine(config, {
			mode,
			dryRun: options.dryRun,
			cascade: options.cascade,
			force: options.force,
			signal: controller.signal,
			onStage: (message) => s?.message(message),
		});
	} catch (err) {
		s?.stop("Failed");
		throw err;
	} finally {
		process.off("SIGINT", onInterrupt);
	}
	s?.stop(`${mode}${options.dryRun ? " (dry run)" : ""}: ${report.resources} static files, ${report.references.length} references`);

	renderReport(report, { verbose: options.verbose, quiet: options.quiet });
	if (controller.signal.aborted) {
		p.log.warn("Interrupted; remaining files were not written.");
	}
	return report;
};
