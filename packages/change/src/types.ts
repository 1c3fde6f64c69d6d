/**
 * Type definitions for revert computation.
 * @module
 */

import type {
	ElementRef,
	OsmElement,
	OsmEntityType,
	OsmTags,
} from "@osm-undo/shared/types"

/**
 * One element version produced by a changeset, paired with the version it replaced.
 *
 * - `old` is `null` when the changeset created the element.
 * - `new` is invisible when the changeset deleted the element.
 * - `current` is the live version seen during retrieval: `undefined` when unknown, `null` when the
 *   element is not in the live graph.
 */
export type DiffEntry = {
	ref: ElementRef
	old: OsmElement | null
	new: OsmElement
	current?: OsmElement | null
	timestamp: number
	changeset: number
}

/** Diff entries grouped by element type. */
export type ChangesetDiff = Record<OsmEntityType, DiffEntry[]>

/** The type of change being emitted. */
export type OsmChangeTypes = "modify" | "create" | "delete"

/**
 * The action undoing the targeted edits of one element.
 *
 * `element` holds the resulting tags and geometry. `baseVersion` is the version the service must
 * hold when the change is uploaded (0 for creations). `touch` marks a parent resubmitted unchanged.
 */
export type InvertedElement = {
	ref: ElementRef
	action: OsmChangeTypes
	element: OsmElement
	baseVersion: number
	touch?: boolean
}

export type InvertedDiff = Record<OsmEntityType, InvertedElement[]>

/** Counts of emitted actions. */
export type InvertStats = Record<OsmChangeTypes, number>

export type WarningReason =
	/** The element was edited by someone else while a targeted changeset was open. */
	| "non-contiguous-history"
	/** A non-targeted edit changed what the revert would restore. */
	| "later-edit-conflict"
	/** Later work depends on an element the revert would delete. */
	| "dependent-edits"
	/** An element deleted by the targeted edits exists again. */
	| "revived"
	/** The element changed between retrieval and reconciliation. */
	| "stale-version"
	/** A referencing way or relation could not be re-fetched. */
	| "parent-unavailable"

/**
 * An element flagged for manual review instead of being silently overwritten.
 */
export type AmbiguousInversionWarning = {
	ref: ElementRef
	reason: WarningReason
}

export type InvertOptions = {
	/** When non-empty, only these tag keys are reverted by modify actions. */
	onlyTags: Iterable<string>
}

export type InvertResult = {
	elements: InvertedDiff
	stats: InvertStats
	warnings: AmbiguousInversionWarning[]
}

export type ReconcileResult = {
	elements: InvertedDiff
	parentsFixed: number
	warnings: AmbiguousInversionWarning[]
}

/**
 * Metadata attached to a change document.
 */
export type ChangeDocumentMetadata = {
	changesetIds: number[]
	createdBy: string
	website?: string
	/** Base URL of the map website, used to link a single source changeset. */
	websiteUrl: string
	filter?: string
	stats: InvertStats
	parentsFixed: number
	/** Changeset count of the uploading user, including the upload itself. */
	changesetsCount?: number
	extraTags?: OsmTags
}
