/** Operating modes of the bust engine (init is handled by the CLI before the engine runs) */
export const BUST_MODES = ["scan", "rewrite", "update"] as const;

export type BustMode = (typeof BUST_MODES)[number];

/** All CLI commands */
export const COMMANDS = ["init", ...BUST_MODES] as const;

export type Command = (typeof COMMANDS)[number];

/** Where a cache-bust token lives inside a URL */
export const MARKER_FORMS = ["querystring", "filename"] as const;

export type MarkerForm = (typeof MARKER_FORMS)[number];

export const HASH_FUNCTIONS = ["md5", "sha1", "sha256", "sha512"] as const;

export type HashFunction = (typeof HASH_FUNCTIONS)[number];

/** A directory to walk, with optional relative-path globs */
export interface RootSpec {
	/** Absolute path of the directory */
	path: string;
	/** Globs a file's relative path must match. When empty, the filetype list decides. */
	include: string[];
	/** Globs that drop a file even if it was included */
	exclude: string[];
}

export interface MultibustRule {
	placeholder: string;
	values: string[];
}

export interface HashOptions {
	hashFunction: HashFunction;
	hashLength: number;
}

/** Fully resolved configuration; every path is absolute */
export interface ResolvedConfig extends HashOptions {
	projectDir: string;
	configPath: string | null;
	staticDirs: RootSpec[];
	codeDirs: RootSpec[];
	staticFiletypes: string[];
	codeFiletypes: string[];
	ignoreDirs: string[];
	markerForm: MarkerForm;
	markerToken: string;
	multibust: MultibustRule[];
	maxFileSize: number;
	delimiters: string;
	concurrency: number;
}

/** A file under a static root */
export interface StaticResource {
	/** POSIX path relative to its root, e.g. "js/app.js" */
	relPath: string;
	absPath: string;
	/** Absolute path of the static root it was found under */
	root: string;
	size: number;
	/** Whole milliseconds since the epoch */
	mtime: number;
	/** Hex digest of the file bytes */
	digest: string;
}

export interface StaticRootIndex {
	root: string;
	resources: ReadonlyMap<string, StaticResource>;
}

export type SkipReason =
	| "unreadable"
	| "broken-link"
	| "binary"
	| "too-large";

/** An input file the run could not use */
export interface SkippedFile {
	path: string;
	reason: SkipReason;
	detail?: string;
}

export interface ResourceIndex {
	roots: StaticRootIndex[];
	skipped: SkippedFile[];
}

export interface Marker {
	form: MarkerForm;
	token: string;
}

/** A URL literal split into its parts. Rendering the parts gives back the literal unchanged. */
export interface UrlParts {
	path: string;
	/** Query string without the leading "?", null when the literal has no "?" */
	query: string | null;
	/** Fragment without the leading "#", null when the literal has no "#" */
	fragment: string | null;
	marker: Marker | null;
}

/** One occurrence of a resource URL inside a scanned file */
export interface Reference extends UrlParts {
	/** Absolute path of the file containing the literal */
	file: string;
	/** File path relative to the project directory, for reports */
	relFile: string;
	/** Byte offset of the first character of the literal */
	start: number;
	/** Byte offset just past the literal */
	end: number;
	/** 1-based line number of the literal */
	line: number;
	literal: string;
}

export type UnmatchedReason = "not-found" | "unconfigured-placeholder";

export interface MultibustVariant {
	/** Substitution value(s) that produced this variant, joined with "," */
	key: string;
	resource: StaticResource;
}

export type MatchResult =
	| { kind: "unmatched"; reason: UnmatchedReason; candidates: string[]; placeholder?: string }
	| { kind: "single"; resource: StaticResource }
	| { kind: "multi"; variants: MultibustVariant[]; missing: string[] }
	| { kind: "ambiguous"; resources: StaticResource[] };

export type ReferenceStatus = "matched" | "unmatched" | "ambiguous" | "current" | "stale";

export type PlanAction = "insert" | "update" | "convert" | "none";

export interface RewriteEdit {
	file: string;
	relFile: string;
	start: number;
	end: number;
	line: number;
	/** Text expected at [start, end) when the edit is applied */
	original: string;
	replacement: string;
}

export interface ReferenceOutcome {
	reference: Reference;
	match: MatchResult;
	status: ReferenceStatus;
	action: PlanAction;
	/** Token computed for the matched resource(s) */
	token: string | null;
	/** New literal when action is not "none" */
	replacement: string | null;
	/** Why nothing was (or would be) changed */
	reason: string | null;
}

export type FileStatus = "written" | "dry-run" | "concurrent-modification" | "write-error" | "cancelled";

/** One changed line of a file, before and after its edits */
export interface PreviewLine {
	line: number;
	before: string;
	after: string;
}

export interface FileOutcome {
	file: string;
	relFile: string;
	status: FileStatus;
	edits: RewriteEdit[];
	/** Changed lines; present when the edits could be applied (written or dry-run) */
	preview: PreviewLine[];
	error?: string;
}

export type WarningKind = "unmatched" | "ambiguous" | "missing-variant" | "unconfigured-placeholder";

export interface RunWarning {
	kind: WarningKind;
	relFile: string;
	line: number;
	literal: string;
	message: string;
}

export interface RunSummary {
	references: number;
	matched: number;
	unmatched: number;
	ambiguous: number;
	current: number;
	stale: number;
	edits: number;
	filesChanged: number;
	filesSkipped: number;
	/** Static or code files left out of the run: unreadable, binary, too large or a broken link */
	inputsSkipped: number;
}

export interface RunReport {
	mode: BustMode;
	dryRun: boolean;
	/** Number of passes run; more than one only with cascade */
	passes: number;
	resources: number;
	references: ReferenceOutcome[];
	files: FileOutcome[];
	skipped: SkippedFile[];
	warnings: RunWarning[];
	summary: RunSummary;
}
