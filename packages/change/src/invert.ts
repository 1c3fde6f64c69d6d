/**
 * Inversion of a changeset diff.
 *
 * For every element the targeted changesets touched, computes the single action that undoes their
 * edits against the live state. Edits made by anyone else in between (or after) are never
 * overwritten: when they overlap what would be restored, the element is reported as a warning and
 * left alone.
 *
 * @module
 */

import {
	OSM_ENTITY_TYPES,
	type OsmElement,
	type OsmTags,
} from "@osm-undo/shared/types"
import {
	changedTagKeys,
	elementKey,
	entityPropertiesEqual,
	isGeometryEqual,
} from "@osm-undo/shared/utils"
import { compareDiffEntries } from "./merge"
import type {
	AmbiguousInversionWarning,
	ChangesetDiff,
	DiffEntry,
	InvertedDiff,
	InvertedElement,
	InvertOptions,
	InvertResult,
	WarningReason,
} from "./types"
import { replaceGeometry } from "./utils"

type ElementState = OsmElement | null | undefined

/** Visible versions only; deleted and absent states are `false`. */
function isVisible(state: ElementState): state is OsmElement {
	return state != null && state.info.visible
}

/** Two states are the same when both are gone, or both are visible with equal tags and geometry. */
export function isSameState(a: ElementState, b: ElementState) {
	if (!isVisible(a) || !isVisible(b)) return isVisible(a) === isVisible(b)
	return entityPropertiesEqual(a, b)
}

/**
 * An entry whose `new` version directly follows its `old` one. Created elements start at version 1.
 */
export function isContiguousEntry(entry: DiffEntry) {
	if (entry.old == null) return entry.new.info.version === 1
	return entry.old.info.version + 1 === entry.new.info.version
}

/**
 * What changed between two states of one element.
 */
function changedAspects(from: ElementState, to: ElementState) {
	if (isVisible(from) !== isVisible(to)) {
		return { visibility: true, tags: new Set<string>(), geometry: true }
	}
	if (!isVisible(from) || !isVisible(to)) {
		return { visibility: false, tags: new Set<string>(), geometry: false }
	}
	return {
		visibility: false,
		tags: changedTagKeys(from.tags, to.tags),
		geometry: !isGeometryEqual(from, to),
	}
}

type Outcome =
	| { kind: "action"; inverted: InvertedElement }
	| { kind: "warning"; reason: WarningReason }
	| { kind: "none" }

const NONE: Outcome = { kind: "none" }

/**
 * Invert the edits of one element. `entries` are newest first and not empty.
 */
function invertElement(
	entries: DiffEntry[],
	onlyTags: Set<string>,
): Outcome {
	const newest = entries[0]
	const oldest = entries.at(-1)
	if (newest == null || oldest == null) return NONE
	if (!entries.every(isContiguousEntry)) {
		return { kind: "warning", reason: "non-contiguous-history" }
	}

	const { ref } = newest
	const known = newest.new
	const restore = oldest.old
	const current = entries.find((entry) => entry.current !== undefined)?.current
	const live = current === undefined ? known : current

	// Edits by others: between consecutive targeted entries, and after the newest one.
	const gaps: [ElementState, ElementState][] = []
	for (let i = 0; i + 1 < entries.length; i++) {
		const newer = entries[i]
		const older = entries[i + 1]
		if (newer && older && !isSameState(older.new, newer.old)) {
			gaps.push([older.new, newer.old])
		}
	}
	if (!isSameState(known, live)) gaps.push([known, live])

	if (!isVisible(restore)) {
		// Created by the targeted edits.
		if (!isVisible(known)) {
			return isVisible(live) ? { kind: "warning", reason: "revived" } : NONE
		}
		if (!isVisible(live)) return NONE
		if (gaps.length > 0) return { kind: "warning", reason: "dependent-edits" }
		return {
			kind: "action",
			inverted: {
				ref,
				action: "delete",
				element: live,
				baseVersion: live.info.version,
			},
		}
	}

	if (!isVisible(known)) {
		// Deleted by the targeted edits.
		if (isVisible(live)) return { kind: "warning", reason: "revived" }
		if (gaps.length > 0) {
			return { kind: "warning", reason: "later-edit-conflict" }
		}
		return {
			kind: "action",
			inverted: { ref, action: "create", element: restore, baseVersion: 0 },
		}
	}

	if (!isVisible(live)) return { kind: "warning", reason: "later-edit-conflict" }

	const targetedKeys = new Set<string>()
	let targetedGeometry = false
	for (const entry of entries) {
		const aspects = changedAspects(entry.old, entry.new)
		for (const key of aspects.tags) targetedKeys.add(key)
		targetedGeometry ||= aspects.geometry
	}

	const revertKeys =
		onlyTags.size > 0
			? [...targetedKeys].filter((key) => onlyTags.has(key))
			: [...targetedKeys]
	const revertGeometry = onlyTags.size === 0 && targetedGeometry

	for (const [from, to] of gaps) {
		const aspects = changedAspects(from, to)
		if (
			aspects.visibility ||
			revertKeys.some((key) => aspects.tags.has(key)) ||
			(revertGeometry && aspects.geometry)
		) {
			return { kind: "warning", reason: "later-edit-conflict" }
		}
	}

	const tags: OsmTags = { ...live.tags }
	for (const key of revertKeys) {
		const value = restore.tags?.[key]
		if (value === undefined) delete tags[key]
		else tags[key] = value
	}
	const element = replaceGeometry(live, revertGeometry ? restore : live, tags)
	if (entityPropertiesEqual(element, live)) return NONE

	return {
		kind: "action",
		inverted: {
			ref,
			action: "modify",
			element,
			baseVersion: live.info.version,
		},
	}
}

/**
 * Group entries by element, newest first, keeping the order in which elements first appear.
 */
function groupEntries(entries: DiffEntry[]) {
	const groups = new Map<string, DiffEntry[]>()
	for (const entry of entries) {
		const key = elementKey(entry.ref)
		const group = groups.get(key)
		if (group) group.push(entry)
		else groups.set(key, [entry])
	}
	return [...groups.values()].map((group) => group.sort(compareDiffEntries))
}

/**
 * Compute the actions that undo a (merged) diff.
 *
 * Entries that changed nothing are ignored. Every element of the diff either yields one action,
 * one warning, or nothing when the live state already matches what would be restored.
 *
 * @param diff - The diff to invert. It is not mutated.
 * @param options.onlyTags - When non-empty, modify actions only revert these tag keys and leave
 * geometry alone. Creations and deletions are inverted regardless.
 */
export function invertDiff(
	diff: ChangesetDiff,
	options: Partial<InvertOptions> = {},
): InvertResult {
	const onlyTags = new Set(options.onlyTags ?? [])
	const elements: InvertedDiff = { node: [], way: [], relation: [] }
	const stats = { create: 0, modify: 0, delete: 0 }
	const warnings: AmbiguousInversionWarning[] = []

	for (const type of OSM_ENTITY_TYPES) {
		const effective = diff[type].filter(
			(entry) => !isSameState(entry.old, entry.new),
		)
		for (const entries of groupEntries(effective)) {
			const outcome = invertElement(entries, onlyTags)
			if (outcome.kind === "action") {
				elements[type].push(outcome.inverted)
				stats[outcome.inverted.action]++
			} else if (outcome.kind === "warning" && entries[0]) {
				warnings.push({ ref: entries[0].ref, reason: outcome.reason })
			}
		}
	}

	return { elements, stats, warnings }
}
