import { readdir, realpath, stat } from "node:fs/promises";
import { join } from "node:path";
import type { Dirent } from "node:fs";
import picomatch from "picomatch";
import type { RootSpec, SkippedFile } from "./types.js";

export interface WalkFilter {
	/** Whether a file (POSIX path relative to the walk root) is wanted */
	includeFile: (relPath: string) => boolean;
	/** Whether a directory must not be entered */
	skipDir: (name: string, relPath: string) => boolean;
}

export interface WalkedFile {
	absPath: string;
	/** POSIX path relative to the walk root */
	relPath: string;
}

export interface WalkResult {
	files: WalkedFile[];
	skipped: SkippedFile[];
}

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/** True if the path ends in one of the (lowercase, dotted) filetypes */
export const hasFiletype = (path: string, filetypes: readonly string[]): boolean => {
	const lower = path.toLowerCase();
	return filetypes.some((ext) => lower.endsWith(ext) && lower.length > ext.length);
};

/** File filter for one root: its include globs (or the filetype list) minus its exclude globs */
export const createFileFilter = (root: RootSpec, filetypes: readonly string[]): ((relPath: string) => boolean) => {
	const included =
		root.include.length > 0
			? picomatch(root.include, { dot: true })
			: (relPath: string) => hasFiletype(relPath, filetypes);
	const excluded = root.exclude.length > 0 ? picomatch(root.exclude, { dot: true }) : () => false;
	return (relPath) => included(relPath) && !excluded(relPath);
};

/** Directory filter: a directory is skipped when its name or relative path matches an ignore glob */
export const createDirSkipper = (ignoreDirs: readonly string[]): ((name: string, relPath: string) => boolean) => {
	if (ignoreDirs.length === 0) return () => false;
	const isIgnored = picomatch([...ignoreDirs], { dot: true });
	return (name, relPath) => isIgnored(name) || isIgnored(relPath);
};

/**
 * Recursively list the files under root, in name order.
 * Symlinked directories are followed once: every directory is tracked by its
 * real path, so cycles and repeated links are not walked twice.
 * A failure to read the root itself is thrown; anything below it is skipped and reported.
 */
export const walkFiles = async (root: string, filter: WalkFilter): Promise<WalkResult> => {
	const files: WalkedFile[] = [];
	const skipped: SkippedFile[] = [];
	const visited = new Set<string>([await realpath(root)]);

	const walk = async (dir: string, prefix: string): Promise<void> => {
		let entries: Dirent[];
		try {
			entries = await readdir(dir, { withFileTypes: true });
		} catch (err) {
			if (prefix === "") throw err;
			skipped.push({ path: dir, reason: "unreadable", detail: errorMessage(err) });
			return;
		}
		entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

		for (const entry of entries) {
			const fullPath = join(dir, entry.name);
			const relPath = prefix ? `${prefix}/${entry.name}` : entry.name;

			let isDirectory = entry.isDirectory();
			let isFile = entry.isFile();
			if (entry.isSymbolicLink()) {
				const target = await stat(fullPath).catch(() => null);
				if (!target) {
					skipped.push({ path: fullPath, reason: "broken-link" });
					continue;
				}
				isDirectory = target.isDirectory();
				isFile = target.isFile();
			}

			if (isDirectory) {
				if (filter.skipDir(entry.name, relPath)) continue;
				const real = await realpath(fullPath).catch(() => null);
				if (real === null || visited.has(real)) continue;
				visited.add(real);
				await walk(fullPath, relPath);
			} else if (isFile && filter.includeFile(relPath)) {
				files.push({ absPath: fullPath, relPath });
			}
		}
	};

	await walk(root, "");
	return { files, skipped };
};
