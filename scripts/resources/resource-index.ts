import { createHash } from "node:crypto";
import { readFile, stat } from "node:fs/promises";
import { createDirSkipper, createFileFilter, walkFiles, type WalkedFile } from "../shared/walker.js";
import { mapPool } from "../shared/pool.js";
import type {
	HashFunction,
	ResourceIndex,
	RootSpec,
	SkippedFile,
	StaticResource,
	StaticRootIndex,
} from "../shared/types.js";

export interface ResourceIndexOptions {
	filetypes: readonly string[];
	ignoreDirs: readonly string[];
	hashFunction: HashFunction;
	concurrency: number;
}

export const digestBuffer = (data: Buffer | string, hashFunction: HashFunction): string =>
	createHash(hashFunction).update(data).digest("hex");

/** Stat and hash one file. The digest always comes from the bytes read now. */
export const digestFile = async (
	root: string,
	file: WalkedFile,
	hashFunction: HashFunction,
): Promise<StaticResource> => {
	const [info, data] = await Promise.all([stat(file.absPath), readFile(file.absPath)]);
	return {
		relPath: file.relPath,
		absPath: file.absPath,
		root,
		size: data.length,
		mtime: Math.floor(info.mtimeMs),
		digest: digestBuffer(data, hashFunction),
	};
};

type DigestOutcome = { ok: true; resource: StaticResource } | { ok: false; skipped: SkippedFile };

/**
 * Walk every static root and digest its files.
 * Roots keep their configured order; each root's map is keyed by relative path.
 * The returned index is a snapshot: nothing updates it afterwards.
 */
export const buildResourceIndex = async (
	roots: readonly RootSpec[],
	options: ResourceIndexOptions,
): Promise<ResourceIndex> => {
	const skipDir = createDirSkipper(options.ignoreDirs);
	const skipped: SkippedFile[] = [];
	const indexes: StaticRootIndex[] = [];

	const walks = await mapPool(roots, options.concurrency, (root) =>
		walkFiles(root.path, { includeFile: createFileFilter(root, options.filetypes), skipDir }),
	);

	for (const [i, root] of roots.entries()) {
		const walk = walks[i];
		if (!walk) continue;
		skipped.push(...walk.skipped);

		const outcomes = await mapPool(walk.files, options.concurrency, async (file): Promise<DigestOutcome> => {
			try {
				return { ok: true, resource: await digestFile(root.path, file, options.hashFunction) };
			} catch (err) {
				return {
					ok: false,
					skipped: {
						path: file.absPath,
						reason: "unreadable",
						detail: err instanceof Error ? err.message : String(err),
					},
				};
			}
		});

		const resources = new Map<string, StaticResource>();
		for (const outcome of outcomes) {
			if (outcome.ok) {
				resources.set(outcome.resource.relPath, outcome.resource);
			} else {
				skipped.push(outcome.skipped);
			}
		}
		indexes.push({ root: root.path, resources });
	}

	return { roots: indexes, skipped };
};

/** Total number of resources across all roots */
export const countResources = (index: ResourceIndex): number =>
	index.roots.reduce((sum, root) => sum + root.resources.size, 0);
