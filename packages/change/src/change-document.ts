/**
 * Change document assembly.
 *
 * Orders reconciled actions the way the change protocol applies them, assigns placeholder ids to
 * created elements and describes the upload in changeset tags.
 *
 * @module
 */

import type {
	OsmChangeDocument,
	OsmChangeElement,
	OsmEntityType,
	OsmTags,
} from "@osm-undo/shared/types"
import { elementKey } from "@osm-undo/shared/utils"
import type {
	ChangeDocumentMetadata,
	InvertedDiff,
	InvertedElement,
	InvertStats,
	OsmChangeTypes,
} from "./types"

const CREATE_ORDER: OsmEntityType[] = ["node", "way", "relation"]
const MODIFY_ORDER: OsmEntityType[] = ["node", "way", "relation"]
const DELETE_ORDER: OsmEntityType[] = ["relation", "way", "node"]

/**
 * Changeset tags describing a revert upload.
 */
export function changeDocumentTags(metadata: ChangeDocumentMetadata): OsmTags {
	const { changesetIds, stats } = metadata
	const [single] = changesetIds
	const tags: OsmTags = {
		...metadata.extraTags,
		created_by: metadata.createdBy,
	}
	if (metadata.website) tags["website"] = metadata.website
	tags["id"] =
		changesetIds.length === 1 && single !== undefined
			? `${metadata.websiteUrl.replace(/\/+$/, "")}/changeset/${single}`
			: changesetIds.join(";")
	if (metadata.filter) tags["filter"] = metadata.filter
	if (metadata.changesetsCount !== undefined) {
		tags["changesets_count"] = String(metadata.changesetsCount)
	}
	tags["revert:create"] = String(stats.create)
	tags["revert:modify"] = String(stats.modify)
	tags["revert:delete"] = String(stats.delete)
	tags["revert:parents"] = String(metadata.parentsFixed)
	return tags
}

/**
 * Convert an inverted element into a change document element, rewriting references to created
 * elements through `placeholders`.
 */
function toChangeElement(
	inverted: InvertedElement,
	placeholders: Map<string, number>,
): OsmChangeElement {
	const id = placeholders.get(elementKey(inverted.ref)) ?? inverted.ref.id
	const version = inverted.action === "create" ? 0 : inverted.baseVersion
	const { element } = inverted
	const tags = { ...element.tags }
	switch (element.type) {
		case "node":
			return { type: "node", id, version, tags, lon: element.lon, lat: element.lat }
		case "way":
			return {
				type: "way",
				id,
				version,
				tags,
				refs: element.refs.map(
					(ref) => placeholders.get(elementKey({ type: "node", id: ref })) ?? ref,
				),
			}
		case "relation":
			return {
				type: "relation",
				id,
				version,
				tags,
				members: element.members.map((member) => ({
					...member,
					ref:
						placeholders.get(elementKey({ type: member.type, id: member.ref })) ??
						member.ref,
				})),
			}
	}
}

/**
 * Build the change document for a reconciled inversion.
 *
 * Creates come first (nodes, ways, relations) so later elements can reference them, then modifies
 * (nodes, ways, relations), then deletes (relations, ways, nodes). Created elements get ids
 * -1, -2, … in that order; every way node and relation member pointing at them is rewritten.
 */
export function buildChangeDocument(
	elements: InvertedDiff,
	metadata: ChangeDocumentMetadata,
): OsmChangeDocument {
	const byAction = (action: OsmChangeTypes, order: OsmEntityType[]) =>
		order.flatMap((type) =>
			elements[type].filter((inverted) => inverted.action === action),
		)

	const creates = byAction("create", CREATE_ORDER)
	const placeholders = new Map<string, number>()
	creates.forEach((inverted, index) => {
		placeholders.set(elementKey(inverted.ref), -(index + 1))
	})

	const convert = (inverted: InvertedElement) =>
		toChangeElement(inverted, placeholders)

	return {
		create: creates.map(convert),
		modify: byAction("modify", MODIFY_ORDER).map(convert),
		delete: byAction("delete", DELETE_ORDER).map(convert),
		tags: changeDocumentTags(metadata),
	}
}

/** Number of elements a change document uploads. */
export function changeDocumentSize(document: OsmChangeDocument) {
	return (
		document.create.length + document.modify.length + document.delete.length
	)
}

/**
 * Count the create, modify and delete actions of an inversion. Touched parents are not counted.
 */
export function countActions(elements: InvertedDiff): InvertStats {
	const stats: InvertStats = { create: 0, modify: 0, delete: 0 }
	for (const type of CREATE_ORDER) {
		for (const inverted of elements[type]) {
			if (!inverted.touch) stats[inverted.action]++
		}
	}
	return stats
}
