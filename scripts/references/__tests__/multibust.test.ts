import { describe, it, expect } from "vitest";
import { expandReference } from "../multibust.js";

const LANG = { placeholder: "{{ lang }}", values: ["en", "de"] };
const THEME = { placeholder: "{{ theme }}", values: ["light", "dark"] };

describe("expandReference", () => {
	it("leaves a path without placeholders alone", () => {
		expect(expandReference("/img/logo.png", [LANG])).toEqual({ kind: "plain", path: "/img/logo.png" });
	});

	it("produces one candidate per value", () => {
		expect(expandReference("/img/flag_{{ lang }}.png", [LANG])).toEqual({
			kind: "expanded",
			candidates: [
				{ key: "en", path: "/img/flag_en.png" },
				{ key: "de", path: "/img/flag_de.png" },
			],
		});
	});

	it("replaces every occurrence of a placeholder", () => {
		expect(expandReference("/{{ lang }}/flag_{{ lang }}.png", [{ placeholder: "{{ lang }}", values: ["fr"] }])).toEqual({
			kind: "expanded",
			candidates: [{ key: "fr", path: "/fr/flag_fr.png" }],
		});
	});

	it("takes the cartesian product of several placeholders in rule order", () => {
		const expansion = expandReference("/{{ theme }}/flag_{{ lang }}.png", [LANG, THEME]);
		expect(expansion).toEqual({
			kind: "expanded",
			candidates: [
				{ key: "en,light", path: "/light/flag_en.png" },
				{ key: "en,dark", path: "/dark/flag_en.png" },
				{ key: "de,light", path: "/light/flag_de.png" },
				{ key: "de,dark", path: "/dark/flag_de.png" },
			],
		});
	});

	it("reports a template placeholder that has no rule", () => {
		expect(expandReference("/img/{{ user.avatar }}.png", [LANG])).toEqual({
			kind: "unconfigured",
			placeholder: "{{ user.avatar }}",
		});
		expect(expandReference("/img/${name}.png", [])).toEqual({ kind: "unconfigured", placeholder: "${name}" });
	});

	it("reports a leftover placeholder after a partial expansion", () => {
		expect(expandReference("/{{ lang }}/<%= skin %>.css", [LANG])).toEqual({
			kind: "unconfigured",
			placeholder: "<%= skin %>",
		});
	});
});
