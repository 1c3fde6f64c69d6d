import { FakeMapDataClient } from "@osm-undo/test-utils/fixtures"
import { describe, expect, it } from "vitest"
import {
	filterDiscussionChangesets,
	isDiscussionTarget,
	postDiscussions,
} from "../src/discussion"

describe("filterDiscussionChangesets", () => {
	const ids = [3, 5, 8]

	it("selects the changesets to comment on", () => {
		expect(filterDiscussionChangesets(ids, "all")).toEqual([3, 5, 8])
		expect(filterDiscussionChangesets(ids, "newest")).toEqual([8])
		expect(filterDiscussionChangesets(ids, "oldest")).toEqual([3])
		expect(filterDiscussionChangesets([], "newest")).toEqual([])
	})

	it("recognizes targets", () => {
		expect(isDiscussionTarget("oldest")).toBe(true)
		expect(isDiscussionTarget("latest")).toBe(false)
	})
})

describe("postDiscussions", () => {
	it("comments on every changeset in order", async () => {
		const mapData = new FakeMapDataClient()
		const messages: string[] = []
		const statuses = await postDiscussions(mapData, [3, 5], "Reverted", (p) =>
			messages.push(p.msg),
		)

		expect(statuses).toEqual([
			{ changesetId: 3, status: "OK" },
			{ changesetId: 5, status: "OK" },
		])
		expect(messages).toEqual(["[1/2] Changeset 3: OK", "[2/2] Changeset 5: OK"])
	})
})
