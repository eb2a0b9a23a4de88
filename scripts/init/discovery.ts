import { posix } from "node:path";
import { cleanPath } from "../references/markers.js";
import { compileScanRule, latin1ToUtf8, scanFile } from "../references/scanner.js";
import { normalizeRefPath } from "../resolve/matcher.js";
import {
	DEFAULT_CODE_FILETYPES,
	DEFAULT_DELIMITERS,
	DEFAULT_IGNORE_DIRS,
	DEFAULT_STATIC_FILETYPES,
	DEFAULTS,
} from "../shared/config.js";
import { mapPool } from "../shared/pool.js";
import { createDirSkipper, hasFiletype, walkFiles } from "../shared/walker.js";

export interface DiscoveryOptions {
	staticFiletypes: readonly string[];
	codeFiletypes: readonly string[];
	ignoreDirs: readonly string[];
	markerToken: string;
	maxFileSize: number;
	concurrency: number;
}

export const DEFAULT_DISCOVERY_OPTIONS: DiscoveryOptions = {
	staticFiletypes: DEFAULT_STATIC_FILETYPES,
	codeFiletypes: DEFAULT_CODE_FILETYPES,
	ignoreDirs: DEFAULT_IGNORE_DIRS,
	markerToken: DEFAULTS.markerToken,
	maxFileSize: DEFAULTS.maxFileSize,
	concurrency: DEFAULTS.concurrency,
};

export interface Discovery {
	/** Directories (relative to the project, "." for the project itself) holding code files that reference static files */
	codeDirs: string[];
	/** Directories of the static files those references point at */
	staticDirs: string[];
	/** Code files with at least one reference */
	codeFiles: string[];
	/** Static files that are referenced */
	staticFiles: string[];
}

const dirOf = (relPath: string): string => posix.dirname(relPath);

const isWithin = (dir: string, ancestor: string): boolean =>
	ancestor === "." || dir === ancestor || dir.startsWith(`${ancestor}/`);

/** Drop every directory that lies inside another one in the list; result is sorted */
export const collapseNested = (dirs: Iterable<string>): string[] => {
	const kept: string[] = [];
	for (const dir of [...new Set(dirs)].sort()) {
		if (!kept.some((ancestor) => isWithin(dir, ancestor))) kept.push(dir);
	}
	return kept;
};

/**
 * Pick the static files a reference most likely means: those whose path ends
 * with the reference's normalized path, or failing that every file of the same name.
 */
const candidatesFor = (refPath: string, byName: ReadonlyMap<string, string[]>): string[] => {
	const normalized = normalizeRefPath(refPath);
	const sameName = byName.get(posix.basename(normalized)) ?? [];
	const bySuffix = sameName.filter((file) => file === normalized || file.endsWith(`/${normalized}`));
	return bySuffix.length > 0 ? bySuffix : sameName;
};

/**
 * Walk the whole project and work out which directories hold code that
 * references static files, and where those static files live.
 */
export const discoverProject = async (
	projectDir: string,
	options: DiscoveryOptions = DEFAULT_DISCOVERY_OPTIONS,
): Promise<Discovery> => {
	const { files } = await walkFiles(projectDir, {
		includeFile: (relPath) =>
			hasFiletype(relPath, options.staticFiletypes) || hasFiletype(relPath, options.codeFiletypes),
		skipDir: createDirSkipper(options.ignoreDirs),
	});

	const byName = new Map<string, string[]>();
	for (const file of files) {
		if (!hasFiletype(file.relPath, options.staticFiletypes)) continue;
		const name = posix.basename(file.relPath);
		byName.set(name, [...(byName.get(name) ?? []), file.relPath]);
	}

	const rule = compileScanRule({
		delimiters: DEFAULT_DELIMITERS,
		filetypes: options.staticFiletypes,
		markerToken: options.markerToken,
		placeholders: [],
	});
	const codeFiles = files.filter((file) => hasFiletype(file.relPath, options.codeFiletypes));
	const scans = await mapPool(codeFiles, options.concurrency, (file) =>
		scanFile(file.absPath, rule, options.maxFileSize),
	);

	const referencing = new Set<string>();
	const referenced = new Set<string>();
	for (const [i, scan] of scans.entries()) {
		const file = codeFiles[i];
		if (!file || !scan.ok) continue;
		for (const literal of scan.literals) {
			const targets = candidatesFor(latin1ToUtf8(cleanPath(literal.path, options.markerToken)), byName);
			if (targets.length === 0) continue;
			referencing.add(file.relPath);
			for (const target of targets) referenced.add(target);
		}
	}

	const codeFileList = [...referencing].sort();
	const staticFileList = [...referenced].sort();
	return {
		codeDirs: collapseNested(codeFileList.map(dirOf)),
		staticDirs: collapseNested(staticFileList.map(dirOf)),
		codeFiles: codeFileList,
		staticFiles: staticFileList,
	};
};

const jsonList = (items: readonly string[]): string => `[${items.map((item) => JSON.stringify(item)).join(", ")}]`;

/** Commented JSONC config for a discovery. Empty lists fall back to the project directory. */
export const renderInitConfig = (discovery: Pick<Discovery, "codeDirs" | "staticDirs">): string => {
	const staticDirs = discovery.staticDirs.length > 0 ? discovery.staticDirs : ["."];
	const codeDirs = discovery.codeDirs.length > 0 ? discovery.codeDirs : ["."];
	return `{
	// paths are relative to the project directory
	"staticDirs": ${jsonList(staticDirs)},
	"codeDirs": ${jsonList(codeDirs)},

	// "markerForm": "querystring",   // or "filename": app_cb_0123abcd.js
	// "markerToken": "_cb_",
	// "hashFunction": "sha1",        // md5, sha256, sha512
	// "hashLength": 8,
	// "ignoreDirs": ${jsonList(DEFAULT_IGNORE_DIRS)},

	// References containing a multibust placeholder are expanded with each
	// value, and one token covers every expanded file. Example:
	//
	//     <img src="/static/i18n_img_{{ lang }}.png?_cb_=0123abcd">
	//
	// A change to /static/i18n_img_en.png or /static/i18n_img_de.png
	// refreshes the token.
	//
	// "multibust": {
	//     "{{ lang }}": ["en", "de"]
	// }
}
`;
};
