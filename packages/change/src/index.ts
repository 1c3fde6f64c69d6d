/**
 * @osm-undo/change - computing the revert of OSM changesets.
 *
 * Turns changesets into the change document that undoes them, against the live state of the
 * graph. Every stage is a separate function so it can be used and tested on its own.
 *
 * Key capabilities:
 * - **History**: Fetch what a changeset changed, partitioned and retried.
 * - **Merge**: Combine the diffs of several changesets newest first.
 * - **Inversion**: Compute per-element undo actions, optionally limited to some tag keys.
 * - **Reconciliation**: Refresh versions and resubmit referencing ways and relations.
 * - **Documents**: Build the ordered change document and its OSC XML.
 *
 * @example
 * ```ts
 * import { buildChangeDocument, fetchHistory, invertDiff, mergeChangesetDiffs, reconcileParents } from "@osm-undo/change"
 *
 * const diff = mergeChangesetDiffs([await fetchHistory(changeset, {}, overpass)])
 * const inversion = invertDiff(diff, { onlyTags: ["name"] })
 * const reconciled = await reconcileParents(inversion, { history: overpass, mapData: osm })
 * const document = buildChangeDocument(reconciled.elements, metadata)
 * ```
 *
 * @module @osm-undo/change
 */

export * from "./change-document"
export * from "./history"
export * from "./invert"
export * from "./merge"
export * from "./osc"
export * from "./reconcile"
export * from "./types"
export * from "./utils"
