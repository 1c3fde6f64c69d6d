import { UpstreamFetchError } from "@osm-undo/shared/errors"
import {
	BASE_TIMESTAMP,
	createFakeFetch,
	jsonResponse,
} from "@osm-undo/test-utils/fixtures"
import { describe, expect, it } from "vitest"
import {
	buildHistoryQuery,
	buildParentsQuery,
	OverpassClient,
} from "../src/overpass"

const INTERPRETER = "https://overpass.test/api/interpreter"
const selection = { node: [1, 2], way: [3], relation: [] }

describe("Overpass queries", () => {
	it("queries past states with metadata", () => {
		expect(
			buildHistoryQuery({ selection, date: BASE_TIMESTAMP + 9_000 }, 180),
		).toBe(
			'[out:json][timeout:180][date:"2024-01-01T00:00:09.000Z"];(node(id:1,2);way(id:3););out meta;',
		)
	})

	it("adds the ids of filter matches", () => {
		expect(buildHistoryQuery({ selection, filter: "[highway]" }, 60)).toBe(
			"[out:json][timeout:60];(node(id:1,2);way(id:3););out meta;" +
				"(node(id:1,2)[highway];way(id:3)[highway];);out ids;",
		)
	})

	it("recurses up to referencing ways and relations", () => {
		expect(buildParentsQuery(selection, 60)).toBe(
			"[out:json][timeout:60];(node(id:1,2);way(id:3);)->.c;(way(bn.c);rel(bn.c);rel(bw.c);rel(br.c););out ids;",
		)
	})
})

describe("OverpassClient", () => {
	function client(body: () => Response) {
		const { fetch, requests } = createFakeFetch({ [`POST ${INTERPRETER}`]: body })
		return { overpass: new OverpassClient({ apiUrl: INTERPRETER, fetch }), requests }
	}

	it("separates element records from filter matches", async () => {
		const { overpass, requests } = client(() =>
			jsonResponse({
				elements: [
					{
						type: "node",
						id: 1,
						version: 2,
						timestamp: "2024-01-01T00:00:00Z",
						changeset: 10,
						lat: 1,
						lon: 2,
						tags: { highway: "crossing" },
					},
					{
						type: "way",
						id: 3,
						version: 1,
						timestamp: "2024-01-01T00:00:00Z",
						changeset: 9,
						nodes: [1, 2],
					},
					{ type: "node", id: 1 },
				],
			}),
		)

		const result = await overpass.queryElements({ selection, filter: "[highway]" })
		expect(result.matched).toEqual([{ type: "node", id: 1 }])
		expect(result.elements).toEqual([
			{
				type: "node",
				id: 1,
				version: 2,
				timestamp: "2024-01-01T00:00:00Z",
				changeset: 10,
				lat: 1,
				lon: 2,
				tags: { highway: "crossing" },
			},
			{
				type: "way",
				id: 3,
				version: 1,
				timestamp: "2024-01-01T00:00:00Z",
				changeset: 9,
				nodes: [1, 2],
				tags: {},
			},
		])
		expect(new URLSearchParams(requests[0]?.body).get("data")).toBe(
			buildHistoryQuery({ selection, filter: "[highway]" }, 180),
		)
	})

	it("reports how current the history data is", async () => {
		const { overpass } = client(() =>
			jsonResponse({
				osm3s: { timestamp_osm_base: "2024-01-01T00:05:00Z" },
				elements: [],
			}),
		)
		const result = await overpass.queryElements({ selection })

		expect(result).toEqual({
			elements: [],
			matched: [],
			timestampBase: Date.UTC(2024, 0, 1, 0, 5),
		})
	})

	it("treats runtime errors in the remark as transient", async () => {
		const { overpass } = client(() =>
			jsonResponse({
				elements: [],
				remark: "runtime error: Query timed out in \"query\" at line 1 after 180 seconds.",
			}),
		)
		const error = await overpass.queryElements({ selection }).catch((e: unknown) => e)

		expect(error).toBeInstanceOf(UpstreamFetchError)
		expect(error).toMatchObject({ retryable: true })
	})

	it("marks rate limiting as transient", async () => {
		const { overpass } = client(() => new Response("Too many requests", { status: 429 }))
		await expect(overpass.findParents(selection)).rejects.toMatchObject({
			status: 429,
			retryable: true,
		})
	})

	it("returns parent refs", async () => {
		const { overpass } = client(() =>
			jsonResponse({
				elements: [
					{ type: "way", id: 30 },
					{ type: "relation", id: 40 },
				],
			}),
		)
		expect(await overpass.findParents(selection)).toEqual([
			{ type: "way", id: 30 },
			{ type: "relation", id: 40 },
		])
	})
})
