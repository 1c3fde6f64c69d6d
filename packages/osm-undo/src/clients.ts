import {
	type FetchFunction,
	globalFetch,
	OsmApiClient,
	OverpassClient,
} from "@osm-undo/api"
import type {
	HistoryQueryClient,
	MapDataClient,
} from "@osm-undo/shared/clients"
import type { RevertSettings } from "./settings"

export interface RevertClients {
	mapData: MapDataClient
	history: HistoryQueryClient
}

/**
 * Create the OSM API and Overpass API clients described by `settings`.
 */
export function createClients(
	settings: RevertSettings,
	fetch: FetchFunction = globalFetch,
): RevertClients {
	return {
		mapData: new OsmApiClient({
			apiUrl: settings.osmApiUrl,
			authorization: settings.authorization,
			generator: settings.createdBy,
			userAgent: settings.userAgent,
			fetch,
		}),
		history: new OverpassClient({
			apiUrl: settings.overpassApiUrl,
			userAgent: settings.userAgent,
			fetch,
		}),
	}
}
