import { OSM_ENTITY_TYPES } from "@osm-undo/shared/types"
import type { ChangesetDiff, DiffEntry } from "./types"

/**
 * Newest first: descending timestamp, then descending changeset id, then descending version.
 */
export function compareDiffEntries(a: DiffEntry, b: DiffEntry) {
	return (
		b.timestamp - a.timestamp ||
		b.changeset - a.changeset ||
		b.new.info.version - a.new.info.version
	)
}

/**
 * Merge the diffs of several changesets into one diff sorted newest first per element type.
 * Entries of an element touched by more than one changeset are all kept.
 * @param diffs - The per-changeset diffs. They are not mutated.
 * @returns A new diff.
 */
export function mergeChangesetDiffs(diffs: ChangesetDiff[]): ChangesetDiff {
	const merged: ChangesetDiff = { node: [], way: [], relation: [] }
	for (const type of OSM_ENTITY_TYPES) {
		merged[type] = diffs
			.flatMap((diff) => diff[type])
			.sort(compareDiffEntries)
	}
	return merged
}
