import { createHash } from "node:crypto";
import type { HashOptions, MatchResult, StaticResource } from "../shared/types.js";

/** Short lowercase hex token for an (mtime, digest) pair */
export const encodeToken = (mtime: number, digest: string, hash: HashOptions): string =>
	createHash(hash.hashFunction).update(`${mtime}:${digest}`).digest("hex").slice(0, hash.hashLength);

export const resourceToken = (resource: StaticResource, hash: HashOptions): string =>
	encodeToken(resource.mtime, resource.digest, hash);

/**
 * Token for a multibust set: newest mtime plus a digest of the sorted member
 * digests. Input order does not matter; a change to any member changes the token.
 */
export const combinedToken = (resources: readonly StaticResource[], hash: HashOptions): string => {
	const newest = Math.max(...resources.map((r) => r.mtime));
	const combined = createHash(hash.hashFunction)
		.update(
			resources
				.map((r) => r.digest)
				.sort()
				.join(""),
		)
		.digest("hex");
	return encodeToken(newest, combined, hash);
};

/** Token for a match, or null when there is nothing to bust */
export const tokenForMatch = (match: MatchResult, hash: HashOptions): string | null => {
	switch (match.kind) {
		case "single":
			return resourceToken(match.resource, hash);
		case "multi":
			return match.variants.length > 0
				? combinedToken(
						match.variants.map((v) => v.resource),
						hash,
					)
				: null;
		default:
			return null;
	}
};
