import { dirname, isAbsolute, relative, resolve, sep } from "node:path";
import { cleanPath } from "../references/markers.js";
import { expandReference } from "../references/multibust.js";
import { latin1ToUtf8 } from "../references/scanner.js";
import type {
	MatchResult,
	MultibustRule,
	MultibustVariant,
	Reference,
	ResourceIndex,
	StaticResource,
} from "../shared/types.js";

/**
 * Reduce a URL path to POSIX segments: drops leading "/", "./" and "../",
 * and folds inner "." and ".." segments. `/static/../img/./a.png` → `img/a.png`.
 */
export const normalizeRefPath = (path: string): string => {
	const out: string[] = [];
	for (const segment of path.split("/")) {
		if (segment === "" || segment === ".") continue;
		if (segment === "..") {
			out.pop();
			continue;
		}
		out.push(segment);
	}
	return out.join("/");
};

export type Lookup =
	| { kind: "none" }
	| { kind: "found"; resource: StaticResource }
	| { kind: "ambiguous"; resources: StaticResource[] };

/**
 * Resolve one clean path against the index.
 * The full path is tried first, then ever shorter suffixes down to the bare
 * file name; the longest suffix that exists under any root wins. When several
 * roots hold that suffix, identical content resolves to the first root in
 * configuration order and differing content is ambiguous.
 */
export const lookup = (path: string, index: ResourceIndex): Lookup => {
	const segments = normalizeRefPath(path).split("/").filter(Boolean);

	for (let drop = 0; drop < segments.length; drop++) {
		const suffix = segments.slice(drop).join("/");
		const hits: StaticResource[] = [];
		for (const root of index.roots) {
			const resource = root.resources.get(suffix);
			if (resource) hits.push(resource);
		}

		const [first] = hits;
		if (!first) continue;
		const digests = new Set(hits.map((r) => r.digest));
		return digests.size === 1 ? { kind: "found", resource: first } : { kind: "ambiguous", resources: hits };
	}

	return { kind: "none" };
};

/**
 * Resolve a relative URL against the directory of the file that contains it.
 * Returns the resource when the target lies inside a static root and is indexed.
 */
export const lookupRelative = (path: string, fromFile: string, index: ResourceIndex): StaticResource | null => {
	if (path.startsWith("/")) return null;
	const target = resolve(dirname(fromFile), path);
	for (const root of index.roots) {
		const rel = relative(root.root, target);
		if (rel === "" || rel.startsWith("..") || isAbsolute(rel)) continue;
		const resource = root.resources.get(rel.split(sep).join("/"));
		if (resource) return resource;
	}
	return null;
};

const resolveCandidate = (path: string, fromFile: string | undefined, index: ResourceIndex): Lookup => {
	const local = fromFile === undefined ? null : lookupRelative(path, fromFile, index);
	return local ? { kind: "found", resource: local } : lookup(path, index);
};

/**
 * Resolve a reference to the resource(s) it denotes.
 * A relative URL that points into a static root from the referencing file's
 * directory wins; otherwise the longest-suffix lookup decides.
 * Plain references give single / ambiguous / unmatched. References with a
 * configured multibust placeholder fan out to one candidate per substitution
 * value and give multi (over the variants that exist) unless a variant is
 * ambiguous or none exists. The path arrives latin1-decoded and is matched
 * as UTF-8.
 */
export const matchReference = (
	reference: Pick<Reference, "path"> & Partial<Pick<Reference, "file">>,
	index: ResourceIndex,
	rules: readonly MultibustRule[],
	markerToken: string,
): MatchResult => {
	const path = latin1ToUtf8(cleanPath(reference.path, markerToken));
	const expansion = expandReference(path, rules);

	if (expansion.kind === "unconfigured") {
		return { kind: "unmatched", reason: "unconfigured-placeholder", candidates: [], placeholder: expansion.placeholder };
	}

	if (expansion.kind === "plain") {
		const found = resolveCandidate(expansion.path, reference.file, index);
		switch (found.kind) {
			case "found":
				return { kind: "single", resource: found.resource };
			case "ambiguous":
				return { kind: "ambiguous", resources: found.resources };
			default:
				return { kind: "unmatched", reason: "not-found", candidates: [expansion.path] };
		}
	}

	const variants: MultibustVariant[] = [];
	const missing: string[] = [];
	const conflicting: StaticResource[] = [];

	for (const candidate of expansion.candidates) {
		const found = resolveCandidate(candidate.path, reference.file, index);
		if (found.kind === "found") {
			variants.push({ key: candidate.key, resource: found.resource });
		} else if (found.kind === "ambiguous") {
			conflicting.push(...found.resources);
		} else {
			missing.push(candidate.key);
		}
	}

	if (conflicting.length > 0) return { kind: "ambiguous", resources: conflicting };
	if (variants.length === 0) {
		return { kind: "unmatched", reason: "not-found", candidates: expansion.candidates.map((c) => c.path) };
	}
	return { kind: "multi", variants, missing };
};
