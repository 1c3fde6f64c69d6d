import { makeNode, makeRelation, makeWay } from "@osm-undo/test-utils/fixtures"
import type { OsmElement } from "@osm-undo/shared/types"
import { elementRef } from "@osm-undo/shared/utils"
import { describe, expect, it } from "vitest"
import {
	buildChangeDocument,
	changeDocumentSize,
	changeDocumentTags,
	countActions,
} from "../src/change-document"
import type {
	ChangeDocumentMetadata,
	InvertedDiff,
	InvertedElement,
} from "../src/types"

function inverted(
	action: InvertedElement["action"],
	element: OsmElement,
	baseVersion: number,
): InvertedElement {
	return { ref: elementRef(element), action, element, baseVersion }
}

const metadata: ChangeDocumentMetadata = {
	changesetIds: [123],
	createdBy: "osm-undo 0.1.0",
	website: "https://example.org/undo",
	websiteUrl: "https://www.openstreetmap.org/",
	filter: "[highway]",
	stats: { create: 2, modify: 2, delete: 3 },
	parentsFixed: 1,
	changesetsCount: 501,
}

describe("buildChangeDocument", () => {
	const elements: InvertedDiff = {
		node: [
			inverted("delete", makeNode(6), 1),
			inverted("create", makeNode(3, { tags: { amenity: "bench" } }), 0),
			inverted("modify", makeNode(4, { version: 2 }), 2),
		],
		way: [
			inverted("delete", makeWay(7, { version: 3, refs: [6] }), 3),
			inverted("create", makeWay(8, { refs: [3, 4] }), 0),
		],
		relation: [
			inverted("delete", makeRelation(9), 1),
			inverted(
				"modify",
				makeRelation(11, {
					version: 4,
					members: [
						{ type: "way", ref: 8, role: "outer" },
						{ type: "node", ref: 4, role: "" },
					],
				}),
				4,
			),
		],
	}

	it("orders actions the way the change protocol applies them", () => {
		const document = buildChangeDocument(elements, metadata)
		const keys = (list: { type: string; id: number }[]) =>
			list.map(({ type, id }) => `${type}/${id}`)

		expect(keys(document.create)).toEqual(["node/-1", "way/-2"])
		expect(keys(document.modify)).toEqual(["node/4", "relation/11"])
		expect(keys(document.delete)).toEqual(["relation/9", "way/7", "node/6"])
		expect(changeDocumentSize(document)).toBe(7)
	})

	it("rewrites references to created elements", () => {
		const document = buildChangeDocument(elements, metadata)
		const way = document.create[1]
		const relation = document.modify[1]
		if (way?.type !== "way" || relation?.type !== "relation") {
			throw Error("Unexpected document order")
		}

		expect(way.refs).toEqual([-1, 4])
		expect(relation.members).toEqual([
			{ type: "way", ref: -2, role: "outer" },
			{ type: "node", ref: 4, role: "" },
		])
	})

	it("presents the base version of every element", () => {
		const document = buildChangeDocument(elements, metadata)
		expect(document.create.map((e) => e.version)).toEqual([0, 0])
		expect(document.modify.map((e) => e.version)).toEqual([2, 4])
		expect(document.delete.map((e) => e.version)).toEqual([1, 3, 1])
	})

	it("does not mutate the inverted elements", () => {
		buildChangeDocument(elements, metadata)
		expect(elements.way[1]?.element).toEqual(makeWay(8, { refs: [3, 4] }))
	})
})

describe("changeDocumentTags", () => {
	it("describes a single changeset revert", () => {
		expect(changeDocumentTags(metadata)).toEqual({
			created_by: "osm-undo 0.1.0",
			website: "https://example.org/undo",
			id: "https://www.openstreetmap.org/changeset/123",
			filter: "[highway]",
			changesets_count: "501",
			"revert:create": "2",
			"revert:modify": "2",
			"revert:delete": "3",
			"revert:parents": "1",
		})
	})

	it("lists several changesets by id", () => {
		const tags = changeDocumentTags({
			...metadata,
			changesetIds: [1, 2],
			filter: undefined,
		})
		expect(tags["id"]).toBe("1;2")
		expect(tags["filter"]).toBeUndefined()
	})
})

describe("countActions", () => {
	it("counts actions without touched parents", () => {
		const parent = makeWay(8, { refs: [1, 2], version: 3 })
		expect(
			countActions({
				node: [
					inverted("delete", makeNode(1), 1),
					inverted("create", makeNode(2), 0),
				],
				way: [{ ...inverted("modify", parent, 3), touch: true }],
				relation: [inverted("modify", makeRelation(9, { version: 2 }), 2)],
			}),
		).toEqual({ create: 1, modify: 1, delete: 1 })
	})
})
