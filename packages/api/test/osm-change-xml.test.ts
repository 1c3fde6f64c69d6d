import { DataConsistencyError } from "@osm-undo/shared/errors"
import { BASE_TIMESTAMP, readFixture } from "@osm-undo/test-utils/fixtures"
import { describe, expect, it } from "vitest"
import { parseOsmChange } from "../src/osm-change-xml"

describe("parseOsmChange", () => {
	it("reads every section of a changeset download", async () => {
		const elements = parseOsmChange(await readFixture("changeset-10.osc"))

		expect(elements.map(({ type, id }) => `${type}/${id}`)).toEqual([
			"node/1",
			"way/2",
			"relation/6",
			"node/5",
		])
		expect(elements[0]).toEqual({
			type: "node",
			id: 1,
			lat: 52.5,
			lon: 13.4,
			tags: { shop: "bakery", name: "Crumbs & Co" },
			info: {
				version: 1,
				timestamp: BASE_TIMESTAMP + 20_000,
				changeset: 10,
				visible: true,
				uid: 2,
				user: "author",
			},
		})
	})

	it("keeps way nodes and relation members in order", async () => {
		const [, way, relation] = parseOsmChange(
			await readFixture("changeset-10.osc"),
		)
		if (way?.type !== "way" || relation?.type !== "relation") {
			throw Error("Unexpected element order")
		}

		expect(way.refs).toEqual([3, 4])
		expect(relation.members).toEqual([
			{ type: "way", ref: 2, role: "outer" },
			{ type: "node", ref: 1, role: "" },
		])
	})

	it("marks deleted versions invisible", async () => {
		const deleted = parseOsmChange(await readFixture("changeset-10.osc")).at(-1)
		expect(deleted?.info.visible).toBe(false)
		expect(deleted?.info.version).toBe(3)
		expect(deleted?.tags).toEqual({})
	})

	it("keeps tag values verbatim", () => {
		const [node] = parseOsmChange(`<osmChange version="0.6">
  <modify>
    <node id="7" version="2" changeset="10" timestamp="2024-01-01T00:00:20Z" lat="1" lon="2">
      <tag k="description" v="line one&#10;line two"/>
      <tag k="name" v=" Padded "/>
      <tag k="note" v="caf&#233;&#9;&amp;#10;"/>
    </node>
  </modify>
</osmChange>`)

		expect(node?.tags).toEqual({
			description: "line one\nline two",
			name: " Padded ",
			note: "café\t&#10;",
		})
	})

	it("accepts empty documents", () => {
		expect(
			parseOsmChange(
				'<osmChange version="0.6"><create/><modify>\n  </modify></osmChange>',
			),
		).toEqual([])
	})

	it("rejects documents that are not osmChange", () => {
		expect(() => parseOsmChange("<osm><node/></osm>")).toThrow(
			DataConsistencyError,
		)
	})
})
