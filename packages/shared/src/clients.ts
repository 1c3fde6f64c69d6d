/**
 * Boundary contracts of the services the revert pipeline talks to.
 *
 * The core only depends on these interfaces. `@osm-undo/api` implements them over the OSM API
 * and Overpass API; tests use in-process fakes.
 *
 * @module
 */

import type {
	ElementIdSets,
	ElementRef,
	OsmChangeDocument,
	OsmChangesetContents,
	OsmElement,
	OsmEntityType,
	OsmRelationMember,
	OsmTags,
	OsmUser,
} from "./types"

/**
 * The authoritative map-data service.
 */
export interface MapDataClient {
	/** Changeset metadata and every element version it produced. */
	getChangeset(id: number): Promise<OsmChangesetContents>
	/** A user by id, or `null` when the account no longer exists. */
	getUser(id: number): Promise<OsmUser | null>
	/** The user the client is authorized as. */
	getAuthorizedUser(): Promise<OsmUser>
	/** Maximum number of elements a single changeset upload may contain. */
	getChangesetMaxSize(): Promise<number>
	/**
	 * Latest versions of the given elements, deleted ones included as invisible versions.
	 * Elements that never existed are left out.
	 */
	getElements(type: OsmEntityType, ids: number[]): Promise<OsmElement[]>
	/** Open a changeset, upload the document into it and close it. Returns the new changeset id. */
	uploadDiff(
		document: OsmChangeDocument,
		comment: string,
		extraTags: OsmTags,
	): Promise<number>
	/** Comment on a changeset discussion. Returns a human readable status. */
	postDiscussionComment(changesetId: number, text: string): Promise<string>
}

/**
 * A historical element record as returned by the history service, before normalization.
 * `timestamp` is an ISO 8601 string.
 */
export interface RawHistoryElement {
	type: OsmEntityType
	id: number
	version: number
	timestamp: string
	changeset: number
	uid?: number
	user?: string
	tags?: OsmTags
	lat?: number
	lon?: number
	nodes?: number[]
	members?: OsmRelationMember[]
}

export interface HistoryQuery {
	/** Elements to return. */
	selection: ElementIdSets
	/** Query the graph as it was at this moment (milliseconds since the epoch). Omit for now. */
	date?: number
	/** Filter clause; matching elements are reported in `matched`. */
	filter?: string
}

export interface HistoryQueryResult {
	/** Selected elements visible at the query date. */
	elements: RawHistoryElement[]
	/** Selected elements matching the filter. Empty when no filter was given. */
	matched: ElementRef[]
	/** Edits up to this moment (milliseconds since the epoch) are reflected in the result. */
	timestampBase?: number
}

/**
 * The element history service.
 */
export interface HistoryQueryClient {
	queryElements(query: HistoryQuery): Promise<HistoryQueryResult>
	/** Ways and relations currently referencing any of the selected elements. */
	findParents(selection: ElementIdSets): Promise<ElementRef[]>
}
