import type { MultibustRule } from "../shared/types.js";

/** Template placeholder spellings recognised even when not configured: {{ x }}, ${x}, {% x %}, <% x %> */
export const TEMPLATE_PLACEHOLDER_SOURCES = ["\\{\\{.*?\\}\\}", "\\$\\{[^}\\n]*\\}", "\\{%.*?%\\}", "<%.*?%>"];

export const TEMPLATE_PLACEHOLDER_RE = new RegExp(TEMPLATE_PLACEHOLDER_SOURCES.join("|"));

export interface ExpandedCandidate {
	/** Substitution values used, joined with "," in rule order */
	key: string;
	path: string;
}

export type Expansion =
	| { kind: "plain"; path: string }
	| { kind: "expanded"; candidates: ExpandedCandidate[] }
	| { kind: "unconfigured"; placeholder: string };

const replaceAll = (s: string, search: string, replacement: string): string => s.split(search).join(replacement);

/**
 * Expand every configured placeholder found in `path` into its substitution
 * values (a cartesian product when several are present, in rule order).
 * A template placeholder left over after substitution has no rule, and the
 * whole reference is reported as unconfigured rather than guessed at.
 */
export const expandReference = (path: string, rules: readonly MultibustRule[]): Expansion => {
	const present = rules.filter((rule) => path.includes(rule.placeholder));

	if (present.length === 0) {
		const leftover = TEMPLATE_PLACEHOLDER_RE.exec(path);
		return leftover ? { kind: "unconfigured", placeholder: leftover[0] } : { kind: "plain", path };
	}

	let partial: Array<{ keys: string[]; path: string }> = [{ keys: [], path }];
	for (const rule of present) {
		partial = partial.flatMap((candidate) =>
			rule.values.map((value) => ({
				keys: [...candidate.keys, value],
				path: replaceAll(candidate.path, rule.placeholder, value),
			})),
		);
	}

	for (const candidate of partial) {
		const leftover = TEMPLATE_PLACEHOLDER_RE.exec(candidate.path);
		if (leftover) return { kind: "unconfigured", placeholder: leftover[0] };
	}

	return {
		kind: "expanded",
		candidates: partial.map((candidate) => ({ key: candidate.keys.join(","), path: candidate.path })),
	};
};
