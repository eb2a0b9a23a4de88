import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import { combinedToken, encodeToken, resourceToken, tokenForMatch } from "../token.js";
import type { HashOptions, StaticResource } from "../../shared/types.js";

const hash: HashOptions = { hashFunction: "sha1", hashLength: 8 };

const sha1 = (s: string): string => createHash("sha1").update(s).digest("hex");

const resource = (relPath: string, mtime: number, digest: string): StaticResource => ({
	relPath,
	absPath: `/p/static/${relPath}`,
	root: "/p/static",
	size: 1,
	mtime,
	digest,
});

describe("encodeToken", () => {
	it("hashes mtime and digest and truncates to hashLength", () => {
		expect(encodeToken(1000, "abc", hash)).toBe(sha1("1000:abc").slice(0, 8));
		expect(encodeToken(1000, "abc", { hashFunction: "sha1", hashLength: 12 })).toBe(sha1("1000:abc").slice(0, 12));
	});

	it("is lowercase hex", () => {
		expect(encodeToken(1, "x", hash)).toMatch(/^[0-9a-f]{8}$/);
	});
});

describe("resourceToken", () => {
	it("changes with mtime and with content", () => {
		const a = resource("a.js", 1000, "d1");
		expect(resourceToken(a, hash)).toBe(encodeToken(1000, "d1", hash));
		expect(resourceToken({ ...a, mtime: 2000 }, hash)).not.toBe(resourceToken(a, hash));
		expect(resourceToken({ ...a, digest: "d2" }, hash)).not.toBe(resourceToken(a, hash));
	});
});

describe("combinedToken", () => {
	const en = resource("flag_en.png", 1000, "bbb");
	const de = resource("flag_de.png", 5000, "aaa");

	it("uses the newest mtime and the sorted member digests", () => {
		expect(combinedToken([en, de], hash)).toBe(encodeToken(5000, sha1("aaabbb"), hash));
	});

	it("does not depend on member order", () => {
		expect(combinedToken([de, en], hash)).toBe(combinedToken([en, de], hash));
	});

	it("changes when any member changes", () => {
		expect(combinedToken([en, { ...de, digest: "ccc" }], hash)).not.toBe(combinedToken([en, de], hash));
	});
});

describe("tokenForMatch", () => {
	const a = resource("a.js", 1000, "d1");

	it("uses the resource token for a single match", () => {
		expect(tokenForMatch({ kind: "single", resource: a }, hash)).toBe(resourceToken(a, hash));
	});

	it("uses the combined token for a multibust match", () => {
		const b = resource("b.js", 2000, "d2");
		expect(
			tokenForMatch(
				{
					kind: "multi",
					variants: [
						{ key: "a", resource: a },
						{ key: "b", resource: b },
					],
					missing: [],
				},
				hash,
			),
		).toBe(combinedToken([a, b], hash));
	});

	it("gives no token for unmatched and ambiguous references", () => {
		expect(tokenForMatch({ kind: "unmatched", reason: "not-found", candidates: ["x.js"] }, hash)).toBeNull();
		expect(tokenForMatch({ kind: "ambiguous", resources: [a, a] }, hash)).toBeNull();
	});
});
