import { readFile, realpath, stat } from "node:fs/promises";
import { relative, sep } from "node:path";
import { cleanPath, parseLiteral } from "./markers.js";
import { TEMPLATE_PLACEHOLDER_SOURCES } from "./multibust.js";
import { createDirSkipper, createFileFilter, hasFiletype, walkFiles, type WalkedFile } from "../shared/walker.js";
import { mapPool } from "../shared/pool.js";
import type { Reference, RootSpec, SkippedFile, UrlParts } from "../shared/types.js";

/** Bytes inspected for a NUL when deciding whether a file is binary */
const BINARY_SNIFF_BYTES = 8000;

/** `scheme://`, `//` or a scheme that never has an authority */
const EXTERNAL_URL_RE = /^(?:[A-Za-z][A-Za-z0-9+.-]*:\/\/|\/\/|(?:data|blob|javascript|mailto|tel|about):)/i;

/** Read latin1-decoded text back as UTF-8, the encoding directory listings come in */
export const latin1ToUtf8 = (text: string): string => Buffer.from(text, "latin1").toString("utf-8");

const escapeRegExp = (s: string): string => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const escapeClassChars = (chars: string): string => chars.replace(/[\]\\^-]/g, "\\$&");

export interface ScanRuleOptions {
	/** Characters that bound a literal */
	delimiters: string;
	/** Static filetypes (".js", ".png", …) a literal's path must end in */
	filetypes: readonly string[];
	markerToken: string;
	/** Configured multibust placeholders; kept whole even if they contain delimiters */
	placeholders: readonly string[];
}

/** Declarative scanning rule: delimiter set, suffix set and marker grammar, compiled once */
export interface ScanRule extends ScanRuleOptions {
	pattern: RegExp;
}

export const compileScanRule = (options: ScanRuleOptions): ScanRule => {
	const delims = escapeClassChars([...new Set(options.delimiters)].join(""));
	const placeholders = [...options.placeholders]
		.sort((a, b) => b.length - a.length)
		.map(escapeRegExp)
		.concat(TEMPLATE_PLACEHOLDER_SOURCES);
	const ph = `(?:${placeholders.join("|")})`;

	// path stops at "?", "#" and "=", then an optional ?query and #fragment
	const source =
		`(?:${ph}|[^${delims}?#=])+` + `(?:\\?(?:${ph}|[^${delims}#])*)?` + `(?:#(?:${ph}|[^${delims}])*)?`;

	return { ...options, pattern: new RegExp(source, "g") };
};

export interface ScannedLiteral extends UrlParts {
	start: number;
	end: number;
	line: number;
	literal: string;
}

/**
 * Find every resource URL literal in `text`. Pure: offsets are indexes into
 * `text`, which callers decode as latin1 so that they are byte offsets.
 */
export const scanText = (text: string, rule: ScanRule): ScannedLiteral[] => {
	const found: ScannedLiteral[] = [];
	const pattern = new RegExp(rule.pattern.source, "g");
	let line = 1;
	let counted = 0;

	for (const m of text.matchAll(pattern)) {
		const literal = m[0];
		const start = m.index ?? 0;
		if (EXTERNAL_URL_RE.test(literal)) continue;

		const parts = parseLiteral(literal, rule.markerToken);
		if (!hasFiletype(cleanPath(parts.path, rule.markerToken), rule.filetypes)) continue;

		for (let i = counted; i < start; i++) {
			if (text.charCodeAt(i) === 10) line++;
		}
		counted = start;

		found.push({ ...parts, start, end: start + literal.length, line, literal });
	}

	return found;
};

export type FileScan =
	| { ok: true; literals: ScannedLiteral[] }
	| { ok: false; skipped: SkippedFile };

/** True if the buffer looks binary (a NUL byte near the start) */
export const isBinary = (data: Buffer): boolean => data.subarray(0, BINARY_SNIFF_BYTES).includes(0);

/** Scan one file. Oversized, binary and unreadable files come back as skipped. */
export const scanFile = async (path: string, rule: ScanRule, maxFileSize: number): Promise<FileScan> => {
	try {
		const info = await stat(path);
		if (info.size > maxFileSize) {
			return { ok: false, skipped: { path, reason: "too-large", detail: `${info.size} bytes` } };
		}
		const data = await readFile(path);
		if (isBinary(data)) {
			return { ok: false, skipped: { path, reason: "binary" } };
		}
		return { ok: true, literals: scanText(data.toString("latin1"), rule) };
	} catch (err) {
		return {
			ok: false,
			skipped: { path, reason: "unreadable", detail: err instanceof Error ? err.message : String(err) },
		};
	}
};

export interface ScanReferencesOptions {
	projectDir: string;
	filetypes: readonly string[];
	ignoreDirs: readonly string[];
	maxFileSize: number;
	concurrency: number;
	rule: ScanRule;
}

export interface ScanResult {
	references: Reference[];
	/** Absolute paths of every file that was scanned */
	files: string[];
	skipped: SkippedFile[];
}

/** POSIX path of `path` relative to the project directory */
export const toRelFile = (projectDir: string, path: string): string => relative(projectDir, path).split(sep).join("/");

/**
 * Walk the code roots and scan every matching file. A file reached through
 * more than one root or link is scanned once, under the first path found. Every occurrence becomes its own
 * Reference, in file order then offset order.
 */
export const scanReferences = async (roots: readonly RootSpec[], options: ScanReferencesOptions): Promise<ScanResult> => {
	const skipDir = createDirSkipper(options.ignoreDirs);
	const walks = await mapPool(roots, options.concurrency, (root) =>
		walkFiles(root.path, { includeFile: createFileFilter(root, options.filetypes), skipDir }),
	);

	const skipped: SkippedFile[] = [];
	const walked: WalkedFile[] = [];
	for (const walk of walks) {
		skipped.push(...walk.skipped);
		walked.push(...walk.files);
	}

	const realPaths = await mapPool(walked, options.concurrency, (file) =>
		realpath(file.absPath).catch(() => file.absPath),
	);
	const seen = new Set<string>();
	const files: WalkedFile[] = [];
	for (const [i, file] of walked.entries()) {
		const real = realPaths[i] ?? file.absPath;
		if (seen.has(real)) continue;
		seen.add(real);
		files.push(file);
	}

	const scans = await mapPool(files, options.concurrency, (file) =>
		scanFile(file.absPath, options.rule, options.maxFileSize),
	);

	const references: Reference[] = [];
	const scanned: string[] = [];
	for (const [i, scan] of scans.entries()) {
		const file = files[i];
		if (!file) continue;
		if (!scan.ok) {
			skipped.push(scan.skipped);
			continue;
		}
		scanned.push(file.absPath);
		const relFile = toRelFile(options.projectDir, file.absPath);
		for (const literal of scan.literals) {
			references.push({ ...literal, file: file.absPath, relFile });
		}
	}

	return { references, files: scanned, skipped };
};
