/**
 * Element filter parsing.
 *
 * Turns user tokens such as `node123`, `w:45`, `-rel 7` or `+relation;8` into include/exclude id
 * sets per element type. A leading `-` excludes, an optional leading `+` includes.
 *
 * @module
 */

import { InputValidationError } from "./errors"
import type { ElementRef, OsmEntityType } from "./types"

export type ElementFilterMode = "include" | "exclude"

/** A single parsed filter token. */
export interface ElementFilterToken {
	mode: ElementFilterMode
	type: OsmEntityType
	id: number
}

export type ElementFilter = Record<
	ElementFilterMode,
	Record<OsmEntityType, Set<number>>
>

/**
 * Accepted prefixes per type. Longer prefixes come first so `relation` is not read as `r` + `elation`.
 */
const TYPE_PREFIXES: [OsmEntityType, string[]][] = [
	["node", ["nodes", "node", "n"]],
	["way", ["ways", "way", "w"]],
	["relation", ["relations", "relation", "rel", "r"]],
]

const SEPARATORS = /^[:;.,\s]+/

/**
 * Parse a single filter token.
 * @throws InputValidationError for an unknown prefix or a non-numeric id.
 */
export function parseElementFilterToken(token: string): ElementFilterToken {
	let rest = token.trim().toLowerCase()
	let mode: ElementFilterMode = "include"
	if (rest.startsWith("-")) {
		mode = "exclude"
		rest = rest.slice(1).trimStart()
	} else if (rest.startsWith("+")) {
		rest = rest.slice(1).trimStart()
	}

	for (const [type, prefixes] of TYPE_PREFIXES) {
		const prefix = prefixes.find((p) => rest.startsWith(p))
		if (prefix == null) continue
		const id = rest.slice(prefix.length).replace(SEPARATORS, "")
		if (!/^\d+$/.test(id)) {
			throw new InputValidationError(
				`${type[0]?.toUpperCase()}${type.slice(1)} element id must be numeric: ${id}`,
				{ token },
			)
		}
		return { mode, type, id: Number(id) }
	}

	throw new InputValidationError(`Unknown element filter format: ${token}`, {
		token,
	})
}

/** Create an empty element filter. */
export function emptyElementFilter(): ElementFilter {
	return {
		include: { node: new Set(), way: new Set(), relation: new Set() },
		exclude: { node: new Set(), way: new Set(), relation: new Set() },
	}
}

/**
 * Parse filter tokens into include/exclude id sets. All tokens are validated eagerly.
 */
export function parseElementFilter(tokens: Iterable<string>): ElementFilter {
	const filter = emptyElementFilter()
	for (const token of tokens) {
		if (token.trim() === "") continue
		const { mode, type, id } = parseElementFilterToken(token)
		filter[mode][type].add(id)
	}
	return filter
}

function hasIncludes(filter: ElementFilter) {
	const { include } = filter
	return include.node.size + include.way.size + include.relation.size > 0
}

/**
 * Check if an element passes the filter. Exclusions always win; when any inclusion is given, only
 * included elements pass.
 */
export function matchesElementFilter(filter: ElementFilter, ref: ElementRef) {
	if (filter.exclude[ref.type].has(ref.id)) return false
	if (!hasIncludes(filter)) return true
	return filter.include[ref.type].has(ref.id)
}
