import { describe, expect, it } from "vitest"
import { InputValidationError } from "../src/errors"
import { parseQueryFilter } from "../src/query-filter"

describe("parseQueryFilter", () => {
	it("returns undefined for empty filters", () => {
		expect(parseQueryFilter()).toBeUndefined()
		expect(parseQueryFilter("   ")).toBeUndefined()
	})

	it("accepts tag and area clauses", () => {
		expect(parseQueryFilter(" [highway] ")).toBe("[highway]")
		expect(parseQueryFilter('[name~"^Main (St|Street)$"][shop]')).toBe(
			'[name~"^Main (St|Street)$"][shop]',
		)
		expect(parseQueryFilter("(around:100,52.5,13.4) [amenity=cafe]")).toBe(
			"(around:100,52.5,13.4) [amenity=cafe]",
		)
	})

	it("ignores brackets inside quotes", () => {
		expect(parseQueryFilter('["name"="a]b"]')).toBe('["name"="a]b"]')
		expect(parseQueryFilter("['note'='it\\'s']")).toBe("['note'='it\\'s']")
	})

	it("rejects malformed filters", () => {
		expect(() => parseQueryFilter("highway")).toThrow(
			'Query filter clauses must start with "[" or "(", got "h" at position 0',
		)
		expect(() => parseQueryFilter("[highway")).toThrow(
			"Unclosed bracket in query filter",
		)
		expect(() => parseQueryFilter("[highway)")).toThrow(
			'Unbalanced ")" at position 8 in query filter',
		)
		expect(() => parseQueryFilter('[name="x]')).toThrow(
			"Unterminated quote in query filter",
		)
		expect(() => parseQueryFilter("[a];out;")).toThrow(InputValidationError)
	})
})
