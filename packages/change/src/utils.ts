/**
 * Utility functions for revert operations.
 *
 * Provides helpers for:
 * - Tag formatting (OSC XML)
 * - Element content replacement
 * - Stats and warning summaries
 *
 * @module
 */

import type { OsmElement, OsmTags } from "@osm-undo/shared/types"
import { elementKey } from "@osm-undo/shared/utils"
import type { AmbiguousInversionWarning, InvertStats } from "./types"

const XML_ENTITIES: Record<string, string> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
	'"': "&quot;",
	"'": "&apos;",
	"\t": "&#9;",
	"\n": "&#10;",
	"\r": "&#13;",
}

/**
 * Escape a value for use inside an XML attribute. Tabs and line breaks become character
 * references so that they survive attribute value normalization.
 */
export function escapeXml(value: string | number) {
	return String(value).replace(/[&<>"'\t\n\r]/g, (char) => XML_ENTITIES[char] ?? char)
}

/**
 * Convert OSM tags object to OSC XML tag elements.
 * @param tags - The tags to convert.
 * @returns XML string of `<tag k="..." v="..." />` elements.
 */
export function osmTagsToOscTags(tags: OsmTags): string {
	return Object.entries(tags)
		.map(([key, value]) => {
			return `<tag k="${escapeXml(key)}" v="${escapeXml(value)}" />`
		})
		.join("")
}

/**
 * Copy `target` with the given tags and the geometry of `source`, which must be the same type.
 */
export function replaceGeometry(
	target: OsmElement,
	source: OsmElement,
	tags: OsmTags,
): OsmElement {
	if (target.type === "node" && source.type === "node") {
		return { ...target, tags, lon: source.lon, lat: source.lat }
	}
	if (target.type === "way" && source.type === "way") {
		return { ...target, tags, refs: [...source.refs] }
	}
	if (target.type === "relation" && source.type === "relation") {
		return {
			...target,
			tags,
			members: source.members.map((member) => ({ ...member })),
		}
	}
	throw Error(`Cannot copy ${source.type} geometry onto a ${target.type}`)
}

/**
 * Convert camelCase string to sentence case.
 * @param str - The camelCase string.
 * @returns The string in sentence case (e.g., "parentsFixed" -> "parents fixed").
 */
export function camelCaseToSentenceCase(str: string) {
	return str
		.replace(/([A-Z])/g, " $1")
		.trim()
		.toLowerCase()
}

/**
 * Summarize the revert stats with the most significant changes first.
 */
export function changeStatsSummary(stats: InvertStats & { parentsFixed?: number }) {
	const counts = Object.entries(stats)
		.filter(([, value]) => value != null && value > 0)
		.sort(([, a], [, b]) => (b ?? 0) - (a ?? 0))

	if (counts.length === 0) return "Revert is empty."

	return `Revert summary: ${counts
		.map(([key, value]) => `${value?.toLocaleString("en-US")} ${camelCaseToSentenceCase(key)}`)
		.join(", ")}`
}

const WARNING_LABELS: Record<AmbiguousInversionWarning["reason"], string> = {
	"non-contiguous-history": "edited outside the reverted changesets in between",
	"later-edit-conflict": "changed later by someone else",
	"dependent-edits": "later work depends on it",
	revived: "exists again after being deleted",
	"stale-version": "changed while the revert was computed",
	"parent-unavailable": "referencing element could not be fetched",
}

/**
 * Render warnings as an operator checklist, one line per element, linking to the element on the
 * map website. Returns an empty list when there are no warnings.
 */
export function warningChecklist(
	warnings: AmbiguousInversionWarning[],
	websiteUrl: string,
): string[] {
	if (warnings.length === 0) return []
	const base = websiteUrl.replace(/\/+$/, "")
	return [
		`${warnings.length.toLocaleString("en-US")} ${warnings.length === 1 ? "element needs" : "elements need"} manual review:`,
		...warnings.map(
			({ ref, reason }) =>
				`Please verify: ${base}/${elementKey(ref)} (${WARNING_LABELS[reason]})`,
		),
	]
}
