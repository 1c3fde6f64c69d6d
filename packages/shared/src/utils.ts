/**
 * General OSM entity utilities.
 *
 * Provides type guards, equality checks, element keys and tag/geometry comparison for OSM
 * elements. Uses deep equality checking for tags and entity-specific properties.
 *
 * @module
 */

import { dequal } from "dequal/lite"
import type {
	ElementIdSets,
	ElementRef,
	OsmElement,
	OsmEntity,
	OsmNode,
	OsmRelation,
	OsmTags,
	OsmWay,
} from "./types"

/** Type guard: check if entity is a Node. */
export function isNode(entity: OsmEntity): entity is OsmNode {
	return "lon" in entity && "lat" in entity
}

/** Type guard: check if entity is a Way. */
export function isWay(entity: OsmEntity): entity is OsmWay {
	return "refs" in entity
}

/** Type guard: check if entity is a Relation. */
export function isRelation(entity: OsmEntity): entity is OsmRelation {
	return "members" in entity
}

/** Check if two entities carry the same tags. Missing and empty tags are equal. */
export function isTagsEqual(a?: OsmTags, b?: OsmTags) {
	return dequal(a ?? {}, b ?? {})
}

/** Check if two entities have the same geometry (position, refs or members). */
export function isGeometryEqual(a: OsmEntity, b: OsmEntity) {
	if (isNode(a) && isNode(b)) return a.lat === b.lat && a.lon === b.lon
	if (isWay(a) && isWay(b)) return dequal(a.refs, b.refs)
	if (isRelation(a) && isRelation(b)) return dequal(a.members, b.members)
	return false
}

/** Check if two entities have equal properties (type-aware comparison, ids ignored). */
export function entityPropertiesEqual(a: OsmEntity, b: OsmEntity) {
	return isTagsEqual(a.tags, b.tags) && isGeometryEqual(a, b)
}

/**
 * Tag keys whose value differs between two tag sets, including added and removed keys.
 */
export function changedTagKeys(a?: OsmTags, b?: OsmTags): Set<string> {
	const before = a ?? {}
	const after = b ?? {}
	const keys = new Set<string>()
	for (const key of Object.keys(before)) {
		if (before[key] !== after[key]) keys.add(key)
	}
	for (const key of Object.keys(after)) {
		if (before[key] !== after[key]) keys.add(key)
	}
	return keys
}

/** Render an element ref as its `type/id` key. */
export function elementKey(ref: ElementRef) {
	return `${ref.type}/${ref.id}`
}

/** Ref of an element version. */
export function elementRef(element: OsmElement): ElementRef {
	return { type: element.type, id: element.id }
}

/** Create an empty id set for every element type. */
export function emptyIdSets(): ElementIdSets {
	return { node: [], way: [], relation: [] }
}

/** Total number of ids across all element types. */
export function idSetsSize(ids: ElementIdSets) {
	return ids.node.length + ids.way.length + ids.relation.length
}

/**
 * Refs of every element referenced by an entity: way nodes or relation members.
 */
export function referencedRefs(entity: OsmEntity): ElementRef[] {
	if (isWay(entity))
		return entity.refs.map((id) => ({ type: "node" as const, id }))
	if (isRelation(entity))
		return entity.members.map((member) => ({
			type: member.type,
			id: member.ref,
		}))
	return []
}

/** Plural suffix helper for progress messages. */
export function plural(count: number, word: string) {
	return `${count.toLocaleString("en-US")} ${word}${count === 1 ? "" : "s"}`
}
