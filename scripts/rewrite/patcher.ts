import { readFile, realpath, rename, stat, unlink, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { latin1ToUtf8 } from "../references/scanner.js";
import type { FileOutcome, PreviewLine, RewriteEdit } from "../shared/types.js";

export interface ApplyOptions {
	/** Compute everything, write nothing */
	dryRun: boolean;
	/** Once aborted, no further file is written */
	signal?: AbortSignal;
}

/** Group edits by file, keeping the order in which files first appear */
export const groupEdits = (edits: readonly RewriteEdit[]): Map<string, RewriteEdit[]> => {
	const groups = new Map<string, RewriteEdit[]>();
	for (const edit of edits) {
		const group = groups.get(edit.file);
		if (group) {
			group.push(edit);
		} else {
			groups.set(edit.file, [edit]);
		}
	}
	return groups;
};

/** Edits sorted by descending start offset; throws if two spans overlap */
export const sortDescending = (edits: readonly RewriteEdit[]): RewriteEdit[] => {
	const sorted = [...edits].sort((a, b) => b.start - a.start);
	for (let i = 1; i < sorted.length; i++) {
		const later = sorted[i - 1];
		const earlier = sorted[i];
		if (later && earlier && earlier.end > later.start) {
			throw new Error(
				`Overlapping edits in ${earlier.file} at offsets ${earlier.start}-${earlier.end} and ${later.start}-${later.end}`,
			);
		}
	}
	return sorted;
};

/** True when every span is in bounds and still holds the literal seen at scan time */
export const spansStillValid = (text: string, edits: readonly RewriteEdit[]): boolean =>
	edits.every(
		(edit) =>
			edit.start >= 0 &&
			edit.end <= text.length &&
			edit.start <= edit.end &&
			text.slice(edit.start, edit.end) === edit.original,
	);

/**
 * Apply edits to latin1-decoded text. Edits go in descending offset order so
 * every span is still measured against untouched text; bytes outside the
 * spans are carried over as they are.
 */
export const applyToText = (text: string, edits: readonly RewriteEdit[]): string => {
	let out = text;
	for (const edit of sortDescending(edits)) {
		out = out.slice(0, edit.start) + edit.replacement + out.slice(edit.end);
	}
	return out;
};

const previewLines = (before: string, after: string, edits: readonly RewriteEdit[]): PreviewLine[] => {
	const oldLines = before.split("\n");
	const newLines = after.split("\n");
	const lines = [...new Set(edits.map((e) => e.line))].sort((a, b) => a - b);
	return lines.map((line) => ({
		line,
		before: latin1ToUtf8((oldLines[line - 1] ?? "").replace(/\r$/, "")),
		after: latin1ToUtf8((newLines[line - 1] ?? "").replace(/\r$/, "")),
	}));
};

/**
 * Write via a temp file in the target's directory and rename it over the
 * target. A symlink is resolved first, so the link stays and its target is written.
 */
export const writeAtomic = async (path: string, data: Buffer): Promise<void> => {
	const target = await realpath(path);
	const info = await stat(target);
	const tempPath = join(dirname(target), `.${basename(target)}.${process.pid}.${Date.now()}.tmp`);
	try {
		await writeFile(tempPath, data, { mode: info.mode });
		await rename(tempPath, target);
	} catch (error) {
		await unlink(tempPath).catch(() => undefined);
		throw error;
	}
};

const patchFile = async (file: string, edits: RewriteEdit[], options: ApplyOptions): Promise<FileOutcome> => {
	const relFile = edits[0]?.relFile ?? file;
	const outcome = (status: FileOutcome["status"], preview: PreviewLine[] = [], error?: string): FileOutcome => ({
		file,
		relFile,
		status,
		edits,
		preview,
		...(error === undefined ? {} : { error }),
	});

	if (!options.dryRun && options.signal?.aborted) return outcome("cancelled");

	let data: Buffer;
	try {
		data = await readFile(file);
	} catch (err) {
		return outcome("concurrent-modification", [], err instanceof Error ? err.message : String(err));
	}

	const text = data.toString("latin1");
	if (!spansStillValid(text, edits)) {
		return outcome("concurrent-modification", [], "file changed since it was scanned");
	}

	const patched = applyToText(text, edits);
	const preview = previewLines(text, patched, edits);
	if (options.dryRun) return outcome("dry-run", preview);

	try {
		await writeAtomic(file, Buffer.from(patched, "latin1"));
	} catch (err) {
		return outcome("write-error", preview, err instanceof Error ? err.message : String(err));
	}
	return outcome("written", preview);
};

/**
 * Apply planned edits, one file at a time and each file at most once.
 * A file whose content no longer matches the scan is skipped whole; other
 * files proceed. Dry-run produces the same outcomes without writing.
 */
export const applyEdits = async (edits: readonly RewriteEdit[], options: ApplyOptions): Promise<FileOutcome[]> => {
	const outcomes: FileOutcome[] = [];
	for (const [file, group] of groupEdits(edits)) {
		outcomes.push(await patchFile(file, group, options));
	}
	return outcomes;
};

/** Diff-style lines for one file: a location line, then "-" and "+" for each changed line */
export const renderPreview = (outcome: FileOutcome): string[] =>
	outcome.preview.flatMap((line) => [
		`${outcome.relFile}:${line.line}`,
		`- ${line.before.trim()}`,
		`+ ${line.after.trim()}`,
	]);
