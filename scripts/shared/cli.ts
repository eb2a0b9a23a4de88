import * as p from "@clack/prompts";
import color from "picocolors";
import { latin1ToUtf8 } from "../references/scanner.js";
import { renderPreview } from "../rewrite/patcher.js";
import type { BustMode, FileOutcome, ReferenceOutcome, RunReport, RunSummary } from "./types.js";

export interface OutputOptions {
	verbose: boolean;
	quiet: boolean;
}

/** Interactive command picker, used when no command was given */
export const pickCommand = async (): Promise<"init" | BustMode> => {
	const selected = await p.select({
		message: "What would you like to do?",
		options: [
			{ value: "scan" as const, label: "Scan — report references and their bust state" },
			{ value: "rewrite" as const, label: "Rewrite — add or refresh cache-bust markers" },
			{ value: "update" as const, label: "Update — refresh existing markers only" },
			{ value: "init" as const, label: "Init — write a static-bust.jsonc for this project" },
		],
	});

	if (p.isCancel(selected)) {
		p.cancel("Operation cancelled.");
		process.exit(0);
	}

	return selected;
};

/** Yes/no prompt; cancelling exits */
export const confirmOrExit = async (message: string, initialValue = true): Promise<boolean> => {
	const result = await p.confirm({ message, initialValue });

	if (p.isCancel(result)) {
		p.cancel("Operation cancelled.");
		process.exit(0);
	}

	return result;
};

const plural = (n: number, word: string): string => `${n} ${word}${n === 1 ? "" : "s"}`;

/** Summary lines shown at the end of a run */
export const formatSummary = (summary: RunSummary, mode: BustMode, dryRun: boolean): string[] => {
	const lines = [
		`${plural(summary.references, "reference")}: ${summary.matched} unbusted, ${summary.current} current, ` +
			`${summary.stale} stale, ${summary.unmatched} unmatched, ${summary.ambiguous} ambiguous`,
	];
	if (mode !== "scan") {
		const verb = dryRun ? "would change" : "changed";
		lines.push(`${plural(summary.edits, "edit")} ${verb} ${plural(summary.filesChanged, "file")}`);
	}
	if (summary.filesSkipped > 0) {
		lines.push(`${plural(summary.filesSkipped, "file")} skipped`);
	}
	if (summary.inputsSkipped > 0) {
		lines.push(`${plural(summary.inputsSkipped, "input")} not read (unreadable, binary or too large); --verbose lists them`);
	}
	return lines;
};

/** One line describing a reference, e.g. `index.html:3 stale css/app.css?_cb_=1 → css/app.css?_cb_=2` */
export const describeReference = (outcome: ReferenceOutcome): string => {
	const { reference, status, replacement, reason } = outcome;
	const where = color.dim(`${reference.relFile}:${reference.line}`);
	const change = replacement ? ` → ${color.green(latin1ToUtf8(replacement))}` : "";
	const why = reason ? color.dim(` (${reason})`) : "";
	return `${where} ${status} ${latin1ToUtf8(reference.literal)}${change}${why}`;
};

const colorPreviewLine = (line: string): string => {
	if (line.startsWith("- ")) return color.red(line);
	if (line.startsWith("+ ")) return color.green(line);
	return color.dim(line);
};

const reportFile = (outcome: FileOutcome): void => {
	const edits = plural(outcome.edits.length, "edit");
	switch (outcome.status) {
		case "written":
			p.log.success(`Updated ${outcome.relFile} (${edits})`);
			break;
		case "dry-run":
			p.log.info(`${outcome.relFile} (${edits})\n${renderPreview(outcome).map(colorPreviewLine).join("\n")}`);
			break;
		case "concurrent-modification":
			p.log.warn(`Skipped ${outcome.relFile}: ${outcome.error ?? "changed since it was scanned"}`);
			break;
		case "write-error":
			p.log.error(`Could not write ${outcome.relFile}: ${outcome.error ?? "unknown error"}`);
			break;
		case "cancelled":
			p.log.warn(`Skipped ${outcome.relFile}: cancelled`);
			break;
	}
};

/** Print a run report through the prompt logger */
export const renderReport = (report: RunReport, options: OutputOptions): void => {
	const { verbose, quiet } = options;

	if (verbose) {
		for (const skipped of report.skipped) {
			p.log.message(color.dim(`skipped ${skipped.path} (${skipped.reason}${skipped.detail ? `: ${skipped.detail}` : ""})`));
		}
	}

	if (!quiet) {
		// scan lists what rewrite or update would touch; verbose lists everything
		const listed = verbose
			? report.references
			: report.mode === "scan"
				? report.references.filter((r) => r.status === "matched" || r.status === "stale")
				: [];
		if (listed.length > 0) {
			p.log.message(listed.map(describeReference).join("\n"));
		}
	}

	for (const file of report.files) {
		if (quiet && (file.status === "written" || file.status === "dry-run")) continue;
		reportFile(file);
	}

	for (const warning of report.warnings) {
		p.log.warn(`${warning.relFile}:${warning.line} ${warning.literal}: ${warning.message}`);
	}

	if (!quiet) {
		if (report.passes > 1) p.log.info(`Settled after ${report.passes} passes`);
		p.log.info(formatSummary(report.summary, report.mode, report.dryRun).join("\n"));
	}
};
