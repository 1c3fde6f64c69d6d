/**
 * Shared OSM Types
 */

export type OsmEntityType = "node" | "way" | "relation"

/** Entity types in the order the change protocol creates them. */
export const OSM_ENTITY_TYPES = ["node", "way", "relation"] as const

export interface OsmEntityTypeMap extends Record<OsmEntityType, IOsmEntity> {
	node: OsmNode
	way: OsmWay
	relation: OsmRelation
}

export interface OsmTags {
	[key: string]: string
}

export interface IOsmEntity {
	id: number
	tags?: OsmTags
}

export interface OsmNode extends IOsmEntity {
	lon: number
	lat: number
}

export interface OsmWay extends IOsmEntity {
	// OSM IDs of the nodes that make up this way
	refs: number[]
}

export interface OsmRelationMember {
	type: OsmEntityType
	ref: number
	role: string
}

export interface OsmRelation extends IOsmEntity {
	members: OsmRelationMember[]
}

export type OsmEntity = OsmNode | OsmWay | OsmRelation

/**
 * Unique key of an element in the graph.
 */
export interface ElementRef<T extends OsmEntityType = OsmEntityType> {
	type: T
	id: number
}

/**
 * Version metadata of a single element revision. `timestamp` is milliseconds since the epoch.
 */
export interface OsmVersionInfo {
	version: number
	timestamp: number
	changeset: number
	visible: boolean
	uid?: number
	user?: string
}

/**
 * An immutable snapshot of one element at one version. An invisible (deleted) version carries no tags
 * and empty geometry.
 */
export type OsmElement<T extends OsmEntityType = OsmEntityType> = {
	[K in T]: OsmEntityTypeMap[K] & { type: K; info: OsmVersionInfo }
}[T]

/**
 * Ids grouped by element type, used to select elements in history and map-data queries.
 */
export type ElementIdSets = Record<OsmEntityType, number[]>

export interface OsmUser {
	id: number
	displayName: string
	roles: string[]
	changesetsCount: number
}

/**
 * Changeset metadata. Dates are milliseconds since the epoch.
 */
export interface OsmChangesetInfo {
	id: number
	uid: number
	user?: string
	createdAt: number
	closedAt?: number
	open: boolean
	changesCount: number
	tags: OsmTags
}

/**
 * A downloaded changeset: its metadata and every element version it produced.
 */
export interface OsmChangesetContents {
	info: OsmChangesetInfo
	elements: OsmElement[]
}

/**
 * An element as presented in a change document: tags and geometry plus the version the service
 * must currently hold. Created elements carry version 0 and a negative placeholder id.
 */
export type OsmChangeElement<T extends OsmEntityType = OsmEntityType> = {
	[K in T]: OsmEntityTypeMap[K] & { type: K; version: number }
}[T]

/**
 * An inert change document in the order the change protocol applies it.
 */
export interface OsmChangeDocument {
	create: OsmChangeElement[]
	modify: OsmChangeElement[]
	delete: OsmChangeElement[]
	/** Changeset tags describing the upload. */
	tags: OsmTags
}
