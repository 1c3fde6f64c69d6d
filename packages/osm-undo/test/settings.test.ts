import { InputValidationError } from "@osm-undo/shared/errors"
import { describe, expect, it } from "vitest"
import {
	DEFAULT_REVERT_SETTINGS,
	OSM_API_URL,
	settingsFromEnv,
} from "../src/settings"

describe("settingsFromEnv", () => {
	it("uses the defaults for unset and empty variables", () => {
		expect(settingsFromEnv({ OSM_API_URL: "" })).toEqual({
			...DEFAULT_REVERT_SETTINGS,
			authorization: undefined,
			website: undefined,
		})
	})

	it("reads service URLs and the authorization", () => {
		const settings = settingsFromEnv({
			OSM_API_URL: "https://osm.test/api/0.6",
			OSM_WEBSITE_URL: "https://osm.test",
			OVERPASS_API_URL: "https://overpass.test/api/interpreter",
			OSM_AUTHORIZATION: "Bearer test-token",
			OSM_UNDO_WEBSITE: "https://undo.test",
			UNRELATED: "ignored",
		})
		expect(settings).toMatchObject({
			osmApiUrl: "https://osm.test/api/0.6",
			osmWebsiteUrl: "https://osm.test",
			overpassApiUrl: "https://overpass.test/api/interpreter",
			authorization: "Bearer test-token",
			website: "https://undo.test",
		})
		expect(DEFAULT_REVERT_SETTINGS.osmApiUrl).toBe(OSM_API_URL)
	})

	it("rejects invalid URLs", () => {
		expect(() => settingsFromEnv({ OVERPASS_API_URL: "overpass" })).toThrow(
			InputValidationError,
		)
	})
})
