import {
	FakeHistoryClient,
	FakeMapDataClient,
	makeDeleted,
	makeNode,
	makeWay,
} from "@osm-undo/test-utils/fixtures"
import type { OsmElement } from "@osm-undo/shared/types"
import { elementRef } from "@osm-undo/shared/utils"
import { describe, expect, it } from "vitest"
import { reconcileParents } from "../src/reconcile"
import type { InvertedDiff, InvertedElement } from "../src/types"

function inversionOf(elements: InvertedElement[]): { elements: InvertedDiff } {
	return {
		elements: {
			node: elements.filter((e) => e.ref.type === "node"),
			way: elements.filter((e) => e.ref.type === "way"),
			relation: elements.filter((e) => e.ref.type === "relation"),
		},
	}
}

function inverted(
	action: InvertedElement["action"],
	element: OsmElement,
	baseVersion = element.info.version,
): InvertedElement {
	return { ref: elementRef(element), action, element, baseVersion }
}

function clients(live: OsmElement[], history: OsmElement[] = live) {
	return {
		mapData: new FakeMapDataClient({ elements: live }),
		history: new FakeHistoryClient({ versions: history }),
	}
}

describe("reconcileParents", () => {
	it("touches an untouched way referencing a reverted node", async () => {
		const node = makeNode(1, { version: 2, tags: { name: "a" } })
		const way = makeWay(100, { refs: [1, 2] })
		const result = await reconcileParents(
			inversionOf([inverted("modify", node)]),
			clients([node, way]),
		)

		expect(result.parentsFixed).toBe(1)
		expect(result.elements.node).toEqual([inverted("modify", node)])
		expect(result.elements.way).toEqual([
			{
				ref: { type: "way", id: 100 },
				action: "modify",
				element: way,
				baseVersion: 1,
				touch: true,
			},
		])
		expect(result.warnings).toEqual([])
	})

	it("drops elements changed since retrieval", async () => {
		const node = makeNode(1, { version: 2 })
		const { mapData, history } = clients([makeNode(1, { version: 3 })])
		const result = await reconcileParents(
			inversionOf([inverted("modify", node)]),
			{ mapData, history },
		)

		expect(result.elements.node).toEqual([])
		expect(result.warnings).toEqual([
			{ ref: { type: "node", id: 1 }, reason: "stale-version" },
		])
		expect(history.parentQueries).toEqual([])
	})

	it("drops deletions of elements that are already deleted", async () => {
		const node = makeNode(5)
		const result = await reconcileParents(
			inversionOf([inverted("delete", node)]),
			clients([makeDeleted(node)]),
		)

		expect(result.elements.node).toEqual([])
		expect(result.warnings).toEqual([])
	})

	it("drops modifications of elements deleted since retrieval", async () => {
		const node = makeNode(5, { tags: { name: "a" } })
		const result = await reconcileParents(
			inversionOf([inverted("modify", node)]),
			clients([makeDeleted(node)]),
		)

		expect(result.elements.node).toEqual([])
		expect(result.warnings).toEqual([
			{ ref: { type: "node", id: 5 }, reason: "stale-version" },
		])
	})

	it("moves base versions to the live version", async () => {
		const node = makeNode(1, { version: 4 })
		const result = await reconcileParents(
			inversionOf([inverted("modify", node, 5)]),
			clients([node]),
		)
		expect(result.elements.node[0]?.baseVersion).toBe(4)
	})

	it("keeps a deletion that a remaining way still references", async () => {
		const node = makeNode(1)
		const way = makeWay(100, { refs: [1, 2] })
		const result = await reconcileParents(
			inversionOf([inverted("delete", node)]),
			clients([node, way]),
		)

		expect(result.elements).toEqual({ node: [], way: [], relation: [] })
		expect(result.parentsFixed).toBe(0)
		expect(result.warnings).toEqual([
			{ ref: { type: "node", id: 1 }, reason: "dependent-edits" },
		])
	})

	it("deletes a way together with its nodes", async () => {
		const nodes = [makeNode(1), makeNode(2)]
		const way = makeWay(50, { refs: [1, 2] })
		const result = await reconcileParents(
			inversionOf([
				inverted("delete", way),
				...nodes.map((node) => inverted("delete", node)),
			]),
			clients([...nodes, way]),
		)

		expect(result.elements.node.map((e) => e.ref.id)).toEqual([1, 2])
		expect(result.elements.way.map((e) => e.ref.id)).toEqual([50])
		expect(result.warnings).toEqual([])
	})

	it("keeps the nodes of a way whose deletion was dropped", async () => {
		const nodes = [makeNode(1), makeNode(2)]
		const way = makeWay(50, { refs: [1, 2] })
		const edited = makeWay(50, { version: 2, changeset: 30, refs: [1, 2] })
		const result = await reconcileParents(
			inversionOf([
				inverted("delete", way),
				...nodes.map((node) => inverted("delete", node)),
			]),
			clients([...nodes, edited], [...nodes, way, edited]),
		)

		expect(result.elements).toEqual({ node: [], way: [], relation: [] })
		expect(result.warnings).toEqual([
			{ ref: { type: "way", id: 50 }, reason: "stale-version" },
			{ ref: { type: "node", id: 1 }, reason: "dependent-edits" },
			{ ref: { type: "node", id: 2 }, reason: "dependent-edits" },
		])
	})

	it("warns about parents that cannot be fetched", async () => {
		const node = makeNode(1, { tags: { name: "a" } })
		const way = makeWay(100, { refs: [1] })
		const result = await reconcileParents(
			inversionOf([inverted("modify", node)]),
			clients([node], [node, way]),
		)

		expect(result.parentsFixed).toBe(0)
		expect(result.elements.node).toHaveLength(1)
		expect(result.warnings).toEqual([
			{ ref: { type: "way", id: 100 }, reason: "parent-unavailable" },
		])
	})

	it("passes creations through without fetching them", async () => {
		const node = makeNode(3, { tags: { amenity: "bench" } })
		const { mapData, history } = clients([])
		const result = await reconcileParents(
			inversionOf([inverted("create", node, 0)]),
			{ mapData, history },
		)

		expect(result.elements.node).toEqual([inverted("create", node, 0)])
		expect(mapData.calls).toEqual([])
	})
})
