import { buildResourceIndex, countResources } from "../resources/resource-index.js";
import { tokenForMatch } from "../resources/token.js";
import { compileScanRule, latin1ToUtf8, scanReferences } from "../references/scanner.js";
import { matchReference } from "../resolve/matcher.js";
import { planReference, toEdit } from "../rewrite/planner.js";
import { applyEdits } from "../rewrite/patcher.js";
import type {
	BustMode,
	FileOutcome,
	ReferenceOutcome,
	ResolvedConfig,
	RewriteEdit,
	RunReport,
	RunSummary,
	RunWarning,
	SkippedFile,
} from "../shared/types.js";

/** Upper bound on passes when cascading, so reference cycles terminate */
export const MAX_CASCADE_PASSES = 8;

export interface EngineOptions {
	mode: BustMode;
	dryRun: boolean;
	/** Re-run update passes while a pass still writes files */
	cascade: boolean;
	/** Re-emit current markers too */
	force?: boolean;
	signal?: AbortSignal;
	/** Called as each stage starts, for progress display */
	onStage?: (message: string) => void;
}

interface PassResult {
	resources: number;
	references: ReferenceOutcome[];
	files: FileOutcome[];
	skipped: SkippedFile[];
}

const runPass = async (config: ResolvedConfig, mode: BustMode, options: EngineOptions): Promise<PassResult> => {
	const stage = options.onStage ?? (() => undefined);

	stage("Indexing static files");
	const index = await buildResourceIndex(config.staticDirs, {
		filetypes: config.staticFiletypes,
		ignoreDirs: config.ignoreDirs,
		hashFunction: config.hashFunction,
		concurrency: config.concurrency,
	});

	stage("Scanning code files");
	const rule = compileScanRule({
		delimiters: config.delimiters,
		filetypes: config.staticFiletypes,
		markerToken: config.markerToken,
		placeholders: config.multibust.map((r) => r.placeholder),
	});
	const scan = await scanReferences(config.codeDirs, {
		projectDir: config.projectDir,
		filetypes: config.codeFiletypes,
		ignoreDirs: config.ignoreDirs,
		maxFileSize: config.maxFileSize,
		concurrency: config.concurrency,
		rule,
	});

	const references: ReferenceOutcome[] = [];
	const edits: RewriteEdit[] = [];
	for (const reference of scan.references) {
		const match = matchReference(reference, index, config.multibust, config.markerToken);
		const token = tokenForMatch(match, config);
		const decision = planReference(reference, match, token, {
			mode,
			markerForm: config.markerForm,
			markerToken: config.markerToken,
			force: options.force,
		});
		const edit = toEdit(reference, decision);
		if (edit) edits.push(edit);
		references.push({ reference, match, token, ...decision });
	}

	let files: FileOutcome[] = [];
	if (mode !== "scan" && edits.length > 0) {
		stage(options.dryRun ? "Previewing changes" : "Writing changes");
		files = await applyEdits(edits, { dryRun: options.dryRun, signal: options.signal });
	}

	return {
		resources: countResources(index),
		references,
		files,
		skipped: [...index.skipped, ...scan.skipped],
	};
};

/** Warnings worth surfacing for a set of reference outcomes */
export const collectWarnings = (outcomes: readonly ReferenceOutcome[]): RunWarning[] => {
	const warnings: RunWarning[] = [];
	for (const { reference, match, reason } of outcomes) {
		const at = { relFile: reference.relFile, line: reference.line, literal: latin1ToUtf8(reference.literal) };
		if (match.kind === "ambiguous") {
			warnings.push({ ...at, kind: "ambiguous", message: reason ?? "ambiguous reference" });
		} else if (match.kind === "unmatched" && match.reason === "unconfigured-placeholder") {
			warnings.push({ ...at, kind: "unconfigured-placeholder", message: reason ?? "unconfigured placeholder" });
		} else if (match.kind === "unmatched" && reference.marker) {
			// a marker says this was busted once, so its resource has gone missing
			warnings.push({ ...at, kind: "unmatched", message: `marker present but ${reason ?? "no static resource found"}` });
		} else if (match.kind === "multi" && match.missing.length > 0) {
			warnings.push({
				...at,
				kind: "missing-variant",
				message: `no static resource for ${match.missing.join(", ")}`,
			});
		}
	}
	return warnings;
};

const SKIPPED_STATUSES = new Set<FileOutcome["status"]>(["concurrent-modification", "write-error", "cancelled"]);

export const summarize = (
	references: readonly ReferenceOutcome[],
	files: readonly FileOutcome[],
	skipped: readonly SkippedFile[],
): RunSummary => {
	const count = (status: ReferenceOutcome["status"]): number => references.filter((r) => r.status === status).length;
	const applied = files.filter((f) => f.status === "written" || f.status === "dry-run");
	return {
		references: references.length,
		matched: count("matched"),
		unmatched: count("unmatched"),
		ambiguous: count("ambiguous"),
		current: count("current"),
		stale: count("stale"),
		edits: applied.reduce((sum, f) => sum + f.edits.length, 0),
		filesChanged: new Set(applied.map((f) => f.file)).size,
		filesSkipped: files.filter((f) => SKIPPED_STATUSES.has(f.status)).length,
		inputsSkipped: skipped.length,
	};
};

/**
 * Run one bust operation over the configured project.
 * The first pass runs in the requested mode and its references are what the
 * report describes. With cascade, a live rewrite or update that wrote files is
 * followed by update passes against a fresh index until a pass writes nothing.
 */
export const runEngine = async (config: ResolvedConfig, options: EngineOptions): Promise<RunReport> => {
	const first = await runPass(config, options.mode, options);
	const files = [...first.files];
	let passes = 1;

	const wrote = (pass: PassResult): boolean => pass.files.some((f) => f.status === "written");
	const canCascade = options.cascade && !options.dryRun && options.mode !== "scan";

	let last = first;
	while (canCascade && wrote(last) && passes < MAX_CASCADE_PASSES && !options.signal?.aborted) {
		last = await runPass(config, "update", options);
		passes++;
		files.push(...last.files);
	}

	return {
		mode: options.mode,
		dryRun: options.dryRun,
		passes,
		resources: first.resources,
		references: first.references,
		files,
		skipped: first.skipped,
		warnings: collectWarnings(first.references),
		summary: summarize(first.references, files, first.skipped),
	};
};
