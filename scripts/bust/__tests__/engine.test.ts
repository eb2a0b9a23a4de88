import { describe, it, expect, beforeEach, afterAll } from "vitest";
import { lstat, mkdir, readFile, rm, symlink, utimes, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { tmpdir } from "node:os";
import { runEngine, MAX_CASCADE_PASSES } from "../engine.js";
import { resolveConfig } from "../../shared/config.js";
import { digestBuffer, digestFile } from "../../resources/resource-index.js";
import { combinedToken, encodeToken } from "../../resources/token.js";
import type { ConfigFile } from "../../shared/schemas.js";
import type { HashOptions, ResolvedConfig } from "../../shared/types.js";

const base = join(tmpdir(), "static-bust-test-engine");
const project = join(base, "project");
const hash: HashOptions = { hashFunction: "sha1", hashLength: 8 };
const MTIME_SECONDS = 1_700_000_000;

const put = async (relPath: string, content: string | Buffer, mtimeSeconds = MTIME_SECONDS): Promise<void> => {
	const path = join(project, relPath);
	await mkdir(dirname(path), { recursive: true });
	await writeFile(path, content);
	await utimes(path, mtimeSeconds, mtimeSeconds);
};

const read = (relPath: string): Promise<string> => readFile(join(project, relPath), "utf-8");

/** Token a file with the given content and fixture mtime gets */
const tokenFor = (content: string | Buffer, mtimeSeconds = MTIME_SECONDS): string =>
	encodeToken(mtimeSeconds * 1000, digestBuffer(content, "sha1"), hash);

const configFor = (file: Partial<ConfigFile> = {}): Promise<ResolvedConfig> =>
	resolveConfig({ staticDirs: ["static"], codeDirs: ["templates"], ...file }, project, null);

const APP_JS = "console.log(1)";
const SITE_CSS = "body { background: url(../img/bg.png) }";
const BG_PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00]);
const INDEX_HTML = '<script src="/static/js/app.js"></script>\n<link rel="stylesheet" href="/static/css/site.css">\n';

describe("runEngine", () => {
	beforeEach(async () => {
		await rm(base, { recursive: true, force: true });
		await put("static/js/app.js", APP_JS);
		await put("static/css/site.css", SITE_CSS);
		await put("static/img/bg.png", BG_PNG);
		await put("templates/index.html", INDEX_HTML);
	});

	afterAll(async () => {
		await rm(base, { recursive: true, force: true });
	});

	it("scan reports references and writes nothing", async () => {
		const report = await runEngine(await configFor(), { mode: "scan", dryRun: false, cascade: false });
		expect(report.resources).toBe(3);
		expect(report.references.map((r) => [r.reference.literal, r.status])).toEqual([
			["/static/js/app.js", "matched"],
			["/static/css/site.css", "matched"],
		]);
		expect(report.files).toEqual([]);
		expect(report.summary).toMatchObject({ references: 2, matched: 2, edits: 0, filesChanged: 0 });
		expect(await read("templates/index.html")).toBe(INDEX_HTML);
	});

	it("rewrite adds markers and a second run changes nothing", async () => {
		const config = await configFor();
		const first = await runEngine(config, { mode: "rewrite", dryRun: false, cascade: false });
		expect(first.summary).toMatchObject({ edits: 2, filesChanged: 1 });

		const expected =
			`<script src="/static/js/app.js?_cb_=${tokenFor(APP_JS)}"></script>\n` +
			`<link rel="stylesheet" href="/static/css/site.css?_cb_=${tokenFor(SITE_CSS)}">\n`;
		expect(await read("templates/index.html")).toBe(expected);

		const second = await runEngine(config, { mode: "rewrite", dryRun: false, cascade: false });
		expect(second.files).toEqual([]);
		expect(second.summary).toMatchObject({ current: 2, edits: 0 });
		expect(await read("templates/index.html")).toBe(expected);
	});

	it("uses the filename form when configured", async () => {
		await runEngine(await configFor({ markerForm: "filename" }), { mode: "rewrite", dryRun: false, cascade: false });
		expect(await read("templates/index.html")).toContain(`src="/static/js/app_cb_${tokenFor(APP_JS)}.js"`);
	});

	it("update refreshes only the marker whose resource changed", async () => {
		const config = await configFor();
		await runEngine(config, { mode: "rewrite", dryRun: false, cascade: false });

		await put("static/js/app.js", "console.log(2)", MTIME_SECONDS + 60);
		const report = await runEngine(config, { mode: "update", dryRun: false, cascade: false });

		expect(report.references.map((r) => r.status)).toEqual(["stale", "current"]);
		expect(await read("templates/index.html")).toBe(
			`<script src="/static/js/app.js?_cb_=${tokenFor("console.log(2)", MTIME_SECONDS + 60)}"></script>\n` +
				`<link rel="stylesheet" href="/static/css/site.css?_cb_=${tokenFor(SITE_CSS)}">\n`,
		);
	});

	it("update leaves unmarked references alone", async () => {
		const report = await runEngine(await configFor(), { mode: "update", dryRun: false, cascade: false });
		expect(report.files).toEqual([]);
		expect(report.references.map((r) => r.reason)).toEqual(["no marker to update", "no marker to update"]);
		expect(await read("templates/index.html")).toBe(INDEX_HTML);
	});

	it("dry run reports the same edits without writing", async () => {
		const report = await runEngine(await configFor(), { mode: "rewrite", dryRun: true, cascade: false });
		expect(report.files.map((f) => [f.relFile, f.status, f.edits.length])).toEqual([
			["templates/index.html", "dry-run", 2],
		]);
		expect(report.files[0]?.preview.map((l) => l.after)).toEqual([
			`<script src="/static/js/app.js?_cb_=${tokenFor(APP_JS)}"></script>`,
			`<link rel="stylesheet" href="/static/css/site.css?_cb_=${tokenFor(SITE_CSS)}">`,
		]);
		expect(await read("templates/index.html")).toBe(INDEX_HTML);
	});

	it("warns about ambiguous references and leaves them alone", async () => {
		await put("vendor/js/app.js", "console.log('vendor')");
		const report = await runEngine(await configFor({ staticDirs: ["static", "vendor"] }), {
			mode: "rewrite",
			dryRun: false,
			cascade: false,
		});
		expect(report.references[0]?.status).toBe("ambiguous");
		expect(report.warnings.map((w) => [w.kind, w.relFile, w.line])).toEqual([["ambiguous", "templates/index.html", 1]]);
		expect(await read("templates/index.html")).toContain('src="/static/js/app.js"');
	});

	it("warns about a marked reference whose resource is gone", async () => {
		await put("templates/old.html", '<img src="/static/img/removed.png?_cb_=0123abcd">\n<img src="/static/img/never.png">\n');
		const report = await runEngine(await configFor(), { mode: "rewrite", dryRun: false, cascade: false });
		const warnings = report.warnings.filter((w) => w.relFile === "templates/old.html");
		expect(warnings).toEqual([
			{
				kind: "unmatched",
				relFile: "templates/old.html",
				line: 1,
				literal: "/static/img/removed.png?_cb_=0123abcd",
				message: "marker present but no static resource found",
			},
		]);
		expect(report.summary.unmatched).toBe(2);
		expect(await read("templates/old.html")).toBe(
			'<img src="/static/img/removed.png?_cb_=0123abcd">\n<img src="/static/img/never.png">\n',
		);
	});

	it("busts a multibust reference with one token for all variants", async () => {
		await put("static/img/flag_en.png", "en");
		await put("static/img/flag_de.png", "de", MTIME_SECONDS + 5);
		await put("templates/lang.html", '<img src="/static/img/flag_{{ lang }}.png">\n');
		const config = await configFor({ multibust: [{ placeholder: "{{ lang }}", values: ["en", "de", "fr"] }] });

		const report = await runEngine(config, { mode: "rewrite", dryRun: false, cascade: false });

		const token = combinedToken(
			[
				await digestFile(project, { absPath: join(project, "static/img/flag_en.png"), relPath: "img/flag_en.png" }, "sha1"),
				await digestFile(project, { absPath: join(project, "static/img/flag_de.png"), relPath: "img/flag_de.png" }, "sha1"),
			],
			hash,
		);
		expect(await read("templates/lang.html")).toBe(`<img src="/static/img/flag_{{ lang }}.png?_cb_=${token}">\n`);
		expect(report.warnings.filter((w) => w.kind === "missing-variant").map((w) => w.message)).toEqual([
			"no static resource for fr",
		]);
	});

	it("update gives a multibust reference a new token when one variant changes", async () => {
		await put("static/img/flag_en.png", "en");
		await put("static/img/flag_de.png", "de");
		await put("templates/lang.html", '<img src="/static/img/flag_{{ lang }}.png">\n');
		const config = await configFor({ multibust: [{ placeholder: "{{ lang }}", values: ["en", "de"] }] });
		const flagDigests = () =>
			Promise.all(
				["flag_en.png", "flag_de.png"].map((name) =>
					digestFile(project, { absPath: join(project, "static/img", name), relPath: `img/${name}` }, "sha1"),
				),
			);

		await runEngine(config, { mode: "rewrite", dryRun: false, cascade: false });
		const before = combinedToken(await flagDigests(), hash);
		expect(await read("templates/lang.html")).toBe(`<img src="/static/img/flag_{{ lang }}.png?_cb_=${before}">\n`);

		await put("static/img/flag_de.png", "de, redrawn", MTIME_SECONDS + 120);
		const report = await runEngine(config, { mode: "update", dryRun: false, cascade: false });

		const after = combinedToken(await flagDigests(), hash);
		expect(after).not.toBe(before);
		expect(report.references.filter((r) => r.reference.relFile === "templates/lang.html").map((r) => r.status)).toEqual([
			"stale",
		]);
		expect(await read("templates/lang.html")).toBe(`<img src="/static/img/flag_{{ lang }}.png?_cb_=${after}">\n`);
	});

	it("matches static files with non-ASCII names", async () => {
		await put("static/img/café.png", BG_PNG);
		await put("templates/menu.html", '<img src="/static/img/café.png">\n');
		const report = await runEngine(await configFor(), { mode: "rewrite", dryRun: false, cascade: false });

		expect(report.references.filter((r) => r.reference.relFile === "templates/menu.html").map((r) => r.status)).toEqual([
			"matched",
		]);
		expect(report.warnings).toEqual([]);
		expect(await read("templates/menu.html")).toBe(`<img src="/static/img/café.png?_cb_=${tokenFor(BG_PNG)}">\n`);
	});

	it("edits a symlinked code file once, through its target", async () => {
		const page = '<script src="/static/js/app.js"></script>\n';
		await put("shared/page.html", page);
		await symlink(join(project, "shared/page.html"), join(project, "templates/page.html"));
		const report = await runEngine(await configFor({ codeDirs: ["templates", "shared"] }), {
			mode: "rewrite",
			dryRun: false,
			cascade: false,
		});

		expect(report.files.map((f) => [f.relFile, f.status, f.edits.length])).toEqual([
			["templates/index.html", "written", 2],
			["templates/page.html", "written", 1],
		]);
		expect((await lstat(join(project, "templates/page.html"))).isSymbolicLink()).toBe(true);
		expect(await read("shared/page.html")).toBe(`<script src="/static/js/app.js?_cb_=${tokenFor(APP_JS)}"></script>\n`);
	});

	it("preserves every byte outside the rewritten literals", async () => {
		const original = Buffer.concat([
			Buffer.from("<!-- café -->\r\n", "utf-8"),
			Buffer.from([0xff, 0x0d, 0x0a]),
			Buffer.from('<script src="/static/js/app.js"></script>\r\n', "utf-8"),
		]);
		await put("templates/index.html", original);
		await runEngine(await configFor(), { mode: "rewrite", dryRun: false, cascade: false });
		expect(await readFile(join(project, "templates/index.html"))).toEqual(
			Buffer.concat([
				Buffer.from("<!-- café -->\r\n", "utf-8"),
				Buffer.from([0xff, 0x0d, 0x0a]),
				Buffer.from(`<script src="/static/js/app.js?_cb_=${tokenFor(APP_JS)}"></script>\r\n`, "utf-8"),
			]),
		);
	});

	it("cascade settles references to static files that were rewritten", async () => {
		const config = await configFor({ codeDirs: ["templates", "static/css"] });
		const report = await runEngine(config, { mode: "rewrite", dryRun: false, cascade: true });

		expect(report.passes).toBe(3);
		expect(await read("static/css/site.css")).toBe(
			`body { background: url(../img/bg.png?_cb_=${tokenFor(BG_PNG)}) }`,
		);
		const css = await digestFile(project, { absPath: join(project, "static/css/site.css"), relPath: "css/site.css" }, "sha1");
		expect(await read("templates/index.html")).toContain(
			`href="/static/css/site.css?_cb_=${encodeToken(css.mtime, css.digest, hash)}"`,
		);
	});

	it("cascade gives up on a reference cycle after the pass limit", async () => {
		await put("static/css/a.css", '@import "b.css";\n');
		await put("static/css/b.css", '@import "a.css";\n');
		const report = await runEngine(await configFor({ codeDirs: ["static/css"] }), {
			mode: "rewrite",
			dryRun: false,
			cascade: true,
		});
		expect(report.passes).toBe(MAX_CASCADE_PASSES);
	});

	it("cascade does nothing on a dry run", async () => {
		const config = await configFor({ codeDirs: ["templates", "static/css"] });
		const report = await runEngine(config, { mode: "rewrite", dryRun: true, cascade: true });
		expect(report.passes).toBe(1);
		expect(await read("static/css/site.css")).toBe(SITE_CSS);
	});
});
