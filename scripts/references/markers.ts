/**
 * Cache-bust markers inside URL literals.
 *
 * Two forms are recognised, both built from the marker token (default "_cb_"):
 * - querystring: `/static/app.js?_cb_=0123abcd` or `/static/app.js?v=2&_cb_=0123abcd`
 * - filename:    `/static/app_cb_0123abcd.js`
 */
import type { Marker, MarkerForm, UrlParts } from "../shared/types.js";

const TOKEN_RE = /^[A-Za-z0-9]*$/;

const escapeRegExp = (s: string): string => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const filenameMarkerRe = (markerToken: string): RegExp =>
	new RegExp(`^(.+?)${escapeRegExp(markerToken)}([A-Za-z0-9]*)(\\.[A-Za-z0-9]+)$`);

const splitDir = (path: string): { dir: string; base: string } => {
	const slash = path.lastIndexOf("/");
	return { dir: path.slice(0, slash + 1), base: path.slice(slash + 1) };
};

/** Split a literal into path, query and fragment without interpreting any marker */
export const splitUrl = (literal: string): Omit<UrlParts, "marker"> => {
	const hashAt = literal.indexOf("#");
	const beforeHash = hashAt === -1 ? literal : literal.slice(0, hashAt);
	const fragment = hashAt === -1 ? null : literal.slice(hashAt + 1);
	const queryAt = beforeHash.indexOf("?");
	return {
		path: queryAt === -1 ? beforeHash : beforeHash.slice(0, queryAt),
		query: queryAt === -1 ? null : beforeHash.slice(queryAt + 1),
		fragment,
	};
};

export const renderUrl = (parts: Omit<UrlParts, "marker">): string =>
	parts.path +
	(parts.query === null ? "" : `?${parts.query}`) +
	(parts.fragment === null ? "" : `#${parts.fragment}`);

const queryMarkerValue = (param: string, markerToken: string): string | null => {
	if (param === markerToken) return "";
	if (!param.startsWith(`${markerToken}=`)) return null;
	const value = param.slice(markerToken.length + 1);
	return TOKEN_RE.test(value) ? value : null;
};

/** Find a filename-form marker in the last path segment */
export const findFilenameMarker = (path: string, markerToken: string): string | null => {
	const { base } = splitDir(path);
	const m = filenameMarkerRe(markerToken).exec(base);
	return m ? (m[2] ?? "") : null;
};

/** Find a querystring-form marker among the query parameters */
export const findQueryMarker = (query: string | null, markerToken: string): string | null => {
	if (query === null) return null;
	for (const param of query.split("&")) {
		const value = queryMarkerValue(param, markerToken);
		if (value !== null) return value;
	}
	return null;
};

/** Split a literal and detect its marker. A filename marker wins if both forms are present. */
export const parseLiteral = (literal: string, markerToken: string): UrlParts => {
	const parts = splitUrl(literal);
	const filenameToken = findFilenameMarker(parts.path, markerToken);
	let marker: Marker | null = null;
	if (filenameToken !== null) {
		marker = { form: "filename", token: filenameToken };
	} else {
		const queryToken = findQueryMarker(parts.query, markerToken);
		if (queryToken !== null) marker = { form: "querystring", token: queryToken };
	}
	return { ...parts, marker };
};

/** Path with any filename marker removed: `/js/app_cb_12ab.js` → `/js/app.js` */
export const cleanPath = (path: string, markerToken: string): string => {
	const { dir, base } = splitDir(path);
	const m = filenameMarkerRe(markerToken).exec(base);
	return m ? `${dir}${m[1] ?? ""}${m[3] ?? ""}` : path;
};

/** Query with the marker parameter removed; null when nothing is left */
export const removeQueryMarker = (query: string | null, markerToken: string): string | null => {
	if (query === null) return null;
	const params = query.split("&");
	const kept = params.filter((param) => queryMarkerValue(param, markerToken) === null);
	if (kept.length === params.length) return query;
	const nonEmpty = kept.filter((param) => param !== "");
	return nonEmpty.length > 0 ? nonEmpty.join("&") : null;
};

const insertFilenameMarker = (path: string, token: string, markerToken: string): string => {
	const { dir, base } = splitDir(path);
	const dot = base.lastIndexOf(".");
	if (dot <= 0) return `${path}${markerToken}${token}`;
	return `${dir}${base.slice(0, dot)}${markerToken}${token}${base.slice(dot)}`;
};

const replaceFilenameToken = (path: string, token: string, markerToken: string): string => {
	const { dir, base } = splitDir(path);
	const m = filenameMarkerRe(markerToken).exec(base);
	if (!m) return path;
	return `${dir}${m[1] ?? ""}${markerToken}${token}${m[3] ?? ""}`;
};

/**
 * Render the literal carrying `token` in the given form.
 * A marker already in that form is updated where it stands; a marker in the
 * other form is removed, so the result never mixes forms.
 */
export const setMarker = (parts: UrlParts, form: MarkerForm, token: string, markerToken: string): string => {
	const inPlace = parts.marker?.form === form;

	if (form === "filename") {
		const path = inPlace
			? replaceFilenameToken(parts.path, token, markerToken)
			: insertFilenameMarker(cleanPath(parts.path, markerToken), token, markerToken);
		return renderUrl({ path, query: removeQueryMarker(parts.query, markerToken), fragment: parts.fragment });
	}

	const path = cleanPath(parts.path, markerToken);
	const param = `${markerToken}=${token}`;
	let query: string;
	if (inPlace && parts.query !== null) {
		query = parts.query
			.split("&")
			.map((p) => (queryMarkerValue(p, markerToken) === null ? p : param))
			.join("&");
	} else {
		const rest = removeQueryMarker(parts.query, markerToken);
		query = rest ? `${param}&${rest}` : param;
	}
	return renderUrl({ path, query, fragment: parts.fragment });
};

/** Render the literal with every marker removed */
export const removeMarker = (parts: UrlParts, markerToken: string): string =>
	renderUrl({
		path: cleanPath(parts.path, markerToken),
		query: removeQueryMarker(parts.query, markerToken),
		fragment: parts.fragment,
	});
