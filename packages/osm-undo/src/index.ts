/**
 * osm-undo - revert OpenStreetMap changesets.
 *
 * `revert()` runs the whole pipeline against the OSM API and Overpass API clients created by
 * `createClients()`. The stages it is made of are re-exported from `@osm-undo/change`.
 *
 * @module osm-undo
 */

// Re-export libraries
export * from "@osm-undo/api"
export * from "@osm-undo/change"
export * from "@osm-undo/shared/clients"
export * from "@osm-undo/shared/element-filter"
export * from "@osm-undo/shared/errors"
export * from "@osm-undo/shared/progress"
export * from "@osm-undo/shared/query-filter"
export * from "@osm-undo/shared/types"

export * from "./clients"
export * from "./discussion"
export * from "./policy"
export * from "./revert"
export * from "./settings"
