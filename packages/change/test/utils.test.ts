import { makeNode, makeWay } from "@osm-undo/test-utils/fixtures"
import { describe, expect, it } from "vitest"
import {
	changeStatsSummary,
	escapeXml,
	replaceGeometry,
	warningChecklist,
} from "../src/utils"

describe("change utils", () => {
	it("summarizes stats with the largest counts first", () => {
		expect(
			changeStatsSummary({ create: 0, modify: 2, delete: 3, parentsFixed: 1 }),
		).toBe("Revert summary: 3 delete, 2 modify, 1 parents fixed")
		expect(changeStatsSummary({ create: 0, modify: 0, delete: 0 })).toBe(
			"Revert is empty.",
		)
	})

	it("renders warnings as a checklist", () => {
		expect(
			warningChecklist(
				[
					{ ref: { type: "node", id: 1 }, reason: "later-edit-conflict" },
					{ ref: { type: "way", id: 2 }, reason: "revived" },
				],
				"https://www.openstreetmap.org/",
			),
		).toEqual([
			"2 elements need manual review:",
			"Please verify: https://www.openstreetmap.org/node/1 (changed later by someone else)",
			"Please verify: https://www.openstreetmap.org/way/2 (exists again after being deleted)",
		])
		expect(warningChecklist([], "https://www.openstreetmap.org")).toEqual([])
	})

	it("escapes xml attribute values", () => {
		expect(escapeXml(`a<b>&"c'`)).toBe("a&lt;b&gt;&amp;&quot;c&apos;")
	})

	it("copies geometry between elements of the same type", () => {
		const target = makeNode(1, { version: 3, lat: 5, tags: { name: "x" } })
		const source = makeNode(1, { lat: 1, lon: 2 })
		expect(replaceGeometry(target, source, { name: "y" })).toEqual(
			makeNode(1, { version: 3, lat: 1, lon: 2, tags: { name: "y" } }),
		)
		expect(() => replaceGeometry(target, makeWay(1), {})).toThrow(
			"Cannot copy way geometry onto a node",
		)
	})
})
