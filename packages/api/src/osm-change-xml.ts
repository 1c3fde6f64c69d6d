/**
 * osmChange XML parsing.
 *
 * Reads the document returned by `GET /api/0.6/changeset/{id}/download`: every element version a
 * changeset produced, grouped in create, modify and delete sections.
 *
 * @module
 */

import { DataConsistencyError } from "@osm-undo/shared/errors"
import type {
	OsmElement,
	OsmTags,
	OsmVersionInfo,
} from "@osm-undo/shared/types"
import { XMLParser } from "fast-xml-parser"
import { type OsmChangeXml, OsmChangeXmlSchema } from "./schemas"

const ARRAY_TAGS = new Set([
	"create",
	"modify",
	"delete",
	"node",
	"way",
	"relation",
	"tag",
	"nd",
	"member",
])

const parser = new XMLParser({
	ignoreAttributes: false,
	attributeNamePrefix: "",
	parseAttributeValue: false,
	// Tag values are kept verbatim; the API writes newlines and tabs as character references.
	trimValues: false,
	htmlEntities: true,
	isArray: (name, _jPath, _isLeafNode, isAttribute) =>
		!isAttribute && ARRAY_TAGS.has(name),
})

type XmlSection = OsmChangeXml["osmChange"]["create"][number]
type XmlElement = XmlSection["node" | "way" | "relation"][number]

function toInfo(element: XmlElement, deleted: boolean): OsmVersionInfo {
	return {
		version: element.version,
		timestamp: Date.parse(element.timestamp),
		changeset: element.changeset,
		visible: !deleted && element.visible !== "false",
		uid: element.uid,
		user: element.user,
	}
}

function toTags(element: XmlElement): OsmTags {
	return Object.fromEntries(element.tag.map(({ k, v }) => [k, v]))
}

function sectionElements(section: XmlSection, deleted: boolean): OsmElement[] {
	return [
		...section.node.map(
			(node): OsmElement => ({
				type: "node",
				id: node.id,
				tags: toTags(node),
				lat: node.lat ?? 0,
				lon: node.lon ?? 0,
				info: toInfo(node, deleted),
			}),
		),
		...section.way.map(
			(way): OsmElement => ({
				type: "way",
				id: way.id,
				tags: toTags(way),
				refs: way.nd.map(({ ref }) => ref),
				info: toInfo(way, deleted),
			}),
		),
		...section.relation.map(
			(relation): OsmElement => ({
				type: "relation",
				id: relation.id,
				tags: toTags(relation),
				members: relation.member.map(({ type, ref, role }) => ({
					type,
					ref,
					role,
				})),
				info: toInfo(relation, deleted),
			}),
		),
	]
}

/**
 * Parse an osmChange document into the element versions it contains, in document order per
 * section (creates, then modifies, then deletes). Versions in delete sections are invisible.
 * @throws DataConsistencyError when the document is not a valid osmChange document.
 */
export function parseOsmChange(xml: string): OsmElement[] {
	const result = OsmChangeXmlSchema.safeParse(parser.parse(xml))
	if (!result.success) {
		throw new DataConsistencyError(
			`Invalid osmChange document: ${result.error.message}`,
		)
	}
	const { create, modify, delete: remove } = result.data.osmChange
	return [
		...create.flatMap((section) => sectionElements(section, false)),
		...modify.flatMap((section) => sectionElements(section, false)),
		...remove.flatMap((section) => sectionElements(section, true)),
	]
}
