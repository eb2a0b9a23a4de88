import { readFile, stat } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import type { ZodIssue } from "zod";
import { configFileSchema, type ConfigFile, type RootEntry } from "./schemas.js";
import type { MarkerForm, ResolvedConfig, RootSpec } from "./types.js";

export const CONFIG_FILENAME = "static-bust.jsonc";

export const DEFAULT_STATIC_FILETYPES = [
	".png", ".gif", ".jpg", ".jpeg", ".ico", ".webp", ".svg", ".avif",
	".js", ".mjs", ".css", ".swf",
	".mov", ".avi", ".mp4", ".webm", ".ogg", ".ogv", ".wav", ".mp3", ".opus",
	".woff", ".woff2", ".ttf", ".eot", ".otf",
	".json", ".map",
];

export const DEFAULT_CODE_FILETYPES = [
	".htm", ".html", ".jade", ".pug", ".erb", ".haml", ".hbs", ".ejs", ".njk", ".twig", ".jinja",
	".txt", ".md",
	".css", ".sass", ".less", ".scss", ".styl",
	".xml", ".json", ".yaml", ".yml", ".cfg", ".ini",
	".js", ".mjs", ".cjs", ".jsx", ".coffee", ".dart", ".ts", ".tsx", ".vue", ".svelte",
	".py", ".rb", ".php", ".java", ".pl", ".cs", ".lua", ".go",
];

export const DEFAULT_IGNORE_DIRS = ["node_modules", ".git", ".hg", ".svn", "__pycache__", ".venv", "lib64"];

/** Whitespace plus the quoting and bracketing characters that usually surround a URL */
export const DEFAULT_DELIMITERS = " \t\r\n\"'`()<>[],;|\\";

export const DEFAULTS = {
	markerForm: "querystring",
	markerToken: "_cb_",
	hashFunction: "sha1",
	hashLength: 8,
	maxFileSize: 1024 * 1024,
	concurrency: 8,
} as const;

/** Malformed or missing configuration. Always fatal, raised before any scanning. */
export class ConfigError extends Error {
	readonly issues: string[];

	constructor(message: string, issues: string[] = []) {
		super(issues.length > 0 ? `${message}\n  ${issues.join("\n  ")}` : message);
		this.name = "ConfigError";
		this.issues = issues;
	}
}

/**
 * Remove `//` and `/* *\/` comments from JSON text. Comment markers inside
 * strings (e.g. "http://cdn.example.com") are kept.
 */
export const stripJsonComments = (raw: string): string => {
	let out = "";
	let inString = false;
	let i = 0;

	while (i < raw.length) {
		const ch = raw.charAt(i);
		const next = raw.charAt(i + 1);

		if (inString) {
			out += ch;
			if (ch === "\\" && i + 1 < raw.length) {
				out += next;
				i += 2;
				continue;
			}
			if (ch === '"') inString = false;
			i++;
			continue;
		}

		if (ch === '"') {
			inString = true;
			out += ch;
			i++;
		} else if (ch === "/" && next === "/") {
			while (i < raw.length && raw[i] !== "\n") i++;
		} else if (ch === "/" && next === "*") {
			const close = raw.indexOf("*/", i + 2);
			// keep line count stable for JSON.parse positions
			const comment = close === -1 ? raw.slice(i) : raw.slice(i, close + 2);
			out += comment.replace(/[^\n]/g, " ");
			i += comment.length;
		} else {
			out += ch;
			i++;
		}
	}

	return out;
};

/** Drop trailing commas before } or ] (the generated config is hand-edited) */
const stripTrailingCommas = (json: string): string => json.replace(/,(\s*[}\]])/g, "$1");

const formatIssue = (issue: ZodIssue): string => {
	const path = issue.path.join(".");
	return path ? `${path}: ${issue.message}` : issue.message;
};

/** Parse and validate config text. `source` names the file in error messages. */
export const parseConfig = (raw: string, source: string): ConfigFile => {
	let data: unknown;
	try {
		data = JSON.parse(stripTrailingCommas(stripJsonComments(raw)));
	} catch (err) {
		throw new ConfigError(`Error parsing ${source}: ${err instanceof Error ? err.message : String(err)}`);
	}

	const result = configFileSchema.safeParse(data);
	if (!result.success) {
		throw new ConfigError(`Invalid configuration in ${source}`, result.error.issues.map(formatIssue));
	}
	return result.data;
};

/** ".png", "png" and "*.png" all become ".png" */
export const normalizeFiletype = (filetype: string): string => {
	const bare = filetype.replace(/^\*?\./, "").toLowerCase();
	return `.${bare}`;
};

const toRootSpec = (projectDir: string, entry: RootEntry): RootSpec => {
	if (typeof entry === "string") {
		return { path: resolve(projectDir, entry), include: [], exclude: [] };
	}
	return {
		path: resolve(projectDir, entry.path),
		include: entry.include ?? [],
		exclude: entry.exclude ?? [],
	};
};

const assertDirectories = async (roots: RootSpec[], label: string): Promise<void> => {
	const missing: string[] = [];
	for (const root of roots) {
		const info = await stat(root.path).catch(() => null);
		if (!info?.isDirectory()) missing.push(root.path);
	}
	if (missing.length > 0) {
		throw new ConfigError(`${label} not found`, missing);
	}
};

export interface ConfigOverrides {
	markerForm?: MarkerForm;
}

/** Apply defaults, resolve paths against projectDir and check every root exists */
export const resolveConfig = async (
	file: ConfigFile,
	projectDir: string,
	configPath: string | null,
	overrides: ConfigOverrides = {},
): Promise<ResolvedConfig> => {
	const absProject = resolve(projectDir);
	const staticDirs = file.staticDirs.map((entry) => toRootSpec(absProject, entry));
	const codeDirs = file.codeDirs.map((entry) => toRootSpec(absProject, entry));

	await assertDirectories(staticDirs, "Static directory");
	await assertDirectories(codeDirs, "Code directory");

	return {
		projectDir: absProject,
		configPath,
		staticDirs,
		codeDirs,
		staticFiletypes: (file.staticFiletypes ?? DEFAULT_STATIC_FILETYPES).map(normalizeFiletype),
		codeFiletypes: (file.codeFiletypes ?? DEFAULT_CODE_FILETYPES).map(normalizeFiletype),
		ignoreDirs: file.ignoreDirs ?? DEFAULT_IGNORE_DIRS,
		markerForm: overrides.markerForm ?? file.markerForm ?? DEFAULTS.markerForm,
		markerToken: file.markerToken ?? DEFAULTS.markerToken,
		multibust: file.multibust ?? [],
		hashFunction: file.hashFunction ?? DEFAULTS.hashFunction,
		hashLength: file.hashLength ?? DEFAULTS.hashLength,
		maxFileSize: file.maxFileSize ?? DEFAULTS.maxFileSize,
		delimiters: file.delimiters ?? DEFAULT_DELIMITERS,
		concurrency: file.concurrency ?? DEFAULTS.concurrency,
	};
};

const fileExists = async (path: string): Promise<boolean> =>
	stat(path).then(
		(s) => s.isFile(),
		() => false,
	);

/**
 * Locate the config file. An explicit path is tried as given (relative to the
 * working directory), then relative to the project directory.
 */
export const findConfigPath = async (projectDir: string, configPath?: string): Promise<string> => {
	if (!configPath) {
		const path = join(projectDir, CONFIG_FILENAME);
		if (await fileExists(path)) return path;
		throw new ConfigError(`No ${CONFIG_FILENAME} in ${projectDir}. Did you mean "static-bust init ${projectDir}"?`);
	}

	const candidates = isAbsolute(configPath) ? [configPath] : [resolve(configPath), join(projectDir, configPath)];
	for (const candidate of candidates) {
		if (await fileExists(candidate)) return candidate;
	}
	throw new ConfigError(`Config file not found: ${configPath}`);
};

/** Find, read, validate and resolve the project configuration */
export const loadConfig = async (
	projectDir: string,
	configPath?: string,
	overrides: ConfigOverrides = {},
): Promise<ResolvedConfig> => {
	const info = await stat(projectDir).catch(() => null);
	if (!info) throw new ConfigError(`No such directory: ${projectDir}`);
	if (!info.isDirectory()) throw new ConfigError(`Not a directory: ${projectDir}`);

	const path = await findConfigPath(projectDir, configPath);
	let raw: string;
	try {
		raw = await readFile(path, "utf-8");
	} catch (err) {
		throw new ConfigError(`Cannot read ${path}: ${err instanceof Error ? err.message : String(err)}`);
	}

	return resolveConfig(parseConfig(raw, path), projectDir, path, overrides);
};
