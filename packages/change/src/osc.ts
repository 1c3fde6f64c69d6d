/**
 * OSC (OSM Change) XML generation.
 *
 * Converts a change document into the osmChange XML format used by OpenStreetMap for change
 * uploads (`POST /api/0.6/changeset/{id}/upload`) and for offline review in editors.
 *
 * @module
 */

import type {
	OsmChangeDocument,
	OsmChangeElement,
} from "@osm-undo/shared/types"
import { escapeXml, osmTagsToOscTags } from "./utils"

/**
 * Options for OSC generation.
 */
export interface OscOptions {
	/**
	 * Changeset the document is uploaded into. Written on every element when set; offline
	 * documents leave it out.
	 */
	changesetId?: number
	/** Value of the root `generator` attribute. */
	generator: string
}

const DEFAULT_OSC_OPTIONS: OscOptions = {
	generator: "osm-undo",
}

function elementAttributes(
	element: OsmChangeElement,
	changesetId: number | undefined,
) {
	const changeset =
		changesetId === undefined ? "" : ` changeset="${changesetId}"`
	return `id="${element.id}" version="${element.version}"${changeset}`
}

/**
 * Generate the XML of one element with its tags and geometry.
 */
function elementToXml(element: OsmChangeElement, changesetId?: number) {
	const attributes = elementAttributes(element, changesetId)
	const tags = element.tags ? osmTagsToOscTags(element.tags) : ""
	switch (element.type) {
		case "node":
			return `<node ${attributes} lat="${element.lat}" lon="${element.lon}">${tags}</node>`
		case "way": {
			const nodes = element.refs.map((ref) => `<nd ref="${ref}" />`).join("")
			return `<way ${attributes}>${tags}${nodes}</way>`
		}
		case "relation": {
			const members = element.members
				.map(
					(member) =>
						`<member type="${member.type}" ref="${member.ref}" role="${escapeXml(member.role)}" />`,
				)
				.join("")
			return `<relation ${attributes}>${tags}${members}</relation>`
		}
	}
}

/**
 * Generate an OSC (OSM Change) XML string from a change document.
 *
 * Produces an `<osmChange>` document with create, modify and delete sections, keeping the element
 * order of the document. Deleted elements are written in full.
 *
 * @example
 * ```ts
 * const document = buildChangeDocument(reconciled.elements, metadata)
 * await writeFile("revert.osc", generateOscChanges(document))
 * ```
 */
export function generateOscChanges(
	document: OsmChangeDocument,
	options: Partial<OscOptions> = {},
) {
	const { changesetId, generator } = { ...DEFAULT_OSC_OPTIONS, ...options }
	const section = (elements: OsmChangeElement[]) =>
		elements.map((element) => elementToXml(element, changesetId)).join("")

	return `<osmChange version="0.6" generator="${escapeXml(generator)}"><create>${section(document.create)}</create><modify>${section(document.modify)}</modify><delete>${section(document.delete)}</delete></osmChange>`
}
