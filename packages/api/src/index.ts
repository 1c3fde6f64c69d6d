/**
 * @osm-undo/api - clients of the OpenStreetMap services used to revert changesets.
 *
 * - `OsmApiClient`: the OSM API 0.6, authoritative map data, changeset download and upload.
 * - `OverpassClient`: the Overpass API, element states at past dates and referencing parents.
 *
 * Both take an injectable `fetch` and validate every response with zod.
 *
 * @module @osm-undo/api
 */

export * from "./http"
export * from "./osm-api"
export * from "./osm-change-xml"
export * from "./overpass"
