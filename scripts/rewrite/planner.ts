import { setMarker } from "../references/markers.js";
import type {
	BustMode,
	MarkerForm,
	MatchResult,
	PlanAction,
	Reference,
	ReferenceStatus,
	RewriteEdit,
	UrlParts,
} from "../shared/types.js";

export interface PlanOptions {
	mode: BustMode;
	/** Form used when a marker is inserted (and, in rewrite mode, converted to) */
	markerForm: MarkerForm;
	markerToken: string;
	/** Re-emit every marked reference, current ones too, in the configured form */
	force?: boolean;
}

export interface PlanDecision {
	status: ReferenceStatus;
	action: PlanAction;
	replacement: string | null;
	reason: string | null;
}

const keep = (status: ReferenceStatus, reason: string | null): PlanDecision => ({
	status,
	action: "none",
	replacement: null,
	reason,
});

const unmatchedReason = (match: Extract<MatchResult, { kind: "unmatched" }>): string =>
	match.reason === "unconfigured-placeholder"
		? `no multibust rule for placeholder ${match.placeholder ?? ""}`.trimEnd()
		: "no static resource found";

/**
 * Decide what happens to one reference.
 *
 * | mode    | no marker      | marker, unmatched | marker, stale | marker, current |
 * |---------|----------------|-------------------|---------------|-----------------|
 * | scan    | report         | report            | report        | report          |
 * | rewrite | insert         | leave + warn      | update        | leave           |
 * | update  | leave          | leave + warn      | update        | leave           |
 *
 * Ambiguous matches are never edited. In rewrite mode a marker in the other
 * form is converted to the configured one; update keeps the form it finds.
 * With `force`, update converts forms as rewrite does, and current markers are
 * rendered again, which drops a stray marker of the other form.
 */
export const planReference = (
	reference: UrlParts & Pick<Reference, "literal">,
	match: MatchResult,
	token: string | null,
	options: PlanOptions,
): PlanDecision => {
	if (match.kind === "ambiguous") {
		const roots = [...new Set(match.resources.map((r) => r.root))].join(", ");
		return keep("ambiguous", `resolves to different files under several static roots (${roots}); reference one explicitly`);
	}
	if (match.kind === "unmatched" || token === null) {
		return keep("unmatched", match.kind === "unmatched" ? unmatchedReason(match) : "no static resource found");
	}

	const bust = token;
	const marker = reference.marker;
	const { mode, markerToken } = options;

	const edit = (action: PlanAction, status: ReferenceStatus, form: MarkerForm): PlanDecision => {
		const replacement = setMarker(reference, form, bust, markerToken);
		if (replacement === reference.literal) return keep(status, null);
		return { status, action, replacement, reason: null };
	};

	if (!marker) {
		if (mode === "rewrite") return edit("insert", "matched", options.markerForm);
		return keep("matched", mode === "update" ? "no marker to update" : null);
	}

	const status: ReferenceStatus = marker.token === bust ? "current" : "stale";
	if (mode === "scan") return keep(status, null);
	const form = mode === "rewrite" || options.force ? options.markerForm : marker.form;
	if (marker.form !== form) return edit("convert", status, form);
	if (status === "stale" || options.force) return edit("update", status, form);
	return keep(status, null);
};

/** The edit that carries out a decision, or null when nothing changes */
export const toEdit = (reference: Reference, decision: PlanDecision): RewriteEdit | null => {
	if (decision.action === "none" || decision.replacement === null) return null;
	return {
		file: reference.file,
		relFile: reference.relFile,
		start: reference.start,
		end: reference.end,
		line: reference.line,
		original: reference.literal,
		replacement: decision.replacement,
	};
};
