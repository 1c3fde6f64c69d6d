/**
 * Overpass API client.
 *
 * Implements `HistoryQueryClient` with Overpass QL: element states at a past date through the
 * `date` setting, filter matches through a second `out ids` statement, and parents through
 * recursion.
 *
 * @module
 */

import { renderIdSelection } from "@osm-undo/change/history"
import type {
	HistoryQuery,
	HistoryQueryClient,
	HistoryQueryResult,
	RawHistoryElement,
} from "@osm-undo/shared/clients"
import { UpstreamFetchError } from "@osm-undo/shared/errors"
import type { ElementIdSets, ElementRef } from "@osm-undo/shared/types"
import { globalFetch, type HttpOptions, requestJson } from "./http"
import {
	type OverpassElement,
	type OverpassResponse,
	OverpassResponseSchema,
} from "./schemas"

export interface OverpassClientOptions extends HttpOptions {
	/** Interpreter endpoint, e.g. `https://overpass-api.de/api/interpreter`. */
	apiUrl: string
	/** Server-side query timeout in seconds. */
	queryTimeoutSeconds: number
}

export const DEFAULT_OVERPASS_OPTIONS: OverpassClientOptions = {
	apiUrl: "https://overpass-api.de/api/interpreter",
	queryTimeoutSeconds: 180,
	userAgent: "osm-undo",
	timeoutMs: 200_000,
	fetch: globalFetch,
}

function settings(timeoutSeconds: number, date?: number) {
	const dateSetting =
		date === undefined ? "" : `[date:"${new Date(date).toISOString()}"]`
	return `[out:json][timeout:${timeoutSeconds}]${dateSetting};`
}

/**
 * Query the selected elements with metadata and, when a filter is given, the ids of the selected
 * elements matching it.
 */
export function buildHistoryQuery(
	{ selection, date, filter }: HistoryQuery,
	timeoutSeconds: number,
) {
	let query = `${settings(timeoutSeconds, date)}(${renderIdSelection(selection)});out meta;`
	if (filter) query += `(${renderIdSelection(selection, filter)});out ids;`
	return query
}

/**
 * Query the ids of ways and relations referencing any selected element.
 */
export function buildParentsQuery(
	selection: ElementIdSets,
	timeoutSeconds: number,
) {
	return `${settings(timeoutSeconds)}(${renderIdSelection(selection)})->.c;(way(bn.c);rel(bn.c);rel(bw.c);rel(br.c););out ids;`
}

function toRawElement(element: OverpassElement): RawHistoryElement {
	const { version, timestamp, changeset } = element
	if (version === undefined || timestamp === undefined || changeset === undefined) {
		throw new UpstreamFetchError(
			`Overpass returned ${element.type} ${element.id} without metadata`,
			{ retryable: false },
		)
	}
	const raw: RawHistoryElement = {
		type: element.type,
		id: element.id,
		version,
		timestamp,
		changeset,
		uid: element.uid,
		user: element.user,
		tags: element.tags ?? {},
	}
	switch (element.type) {
		case "node":
			return { ...raw, lat: element.lat, lon: element.lon }
		case "way":
			return { ...raw, nodes: element.nodes ?? [] }
		case "relation":
			return { ...raw, members: element.members ?? [] }
	}
}

/**
 * Overpass API client.
 */
export class OverpassClient implements HistoryQueryClient {
	readonly options: OverpassClientOptions

	constructor(options: Partial<OverpassClientOptions> = {}) {
		this.options = { ...DEFAULT_OVERPASS_OPTIONS, ...options }
	}

	/**
	 * Run a query.
	 * @throws UpstreamFetchError (retryable) when Overpass reports a runtime error, such as a
	 * timeout or memory exhaustion, in its `remark`.
	 */
	async interpret(query: string): Promise<OverpassResponse> {
		const response = await requestJson(
			this.options.apiUrl,
			OverpassResponseSchema,
			{ method: "POST", body: new URLSearchParams({ data: query }) },
			this.options,
		)
		if (response.remark?.includes("runtime error")) {
			throw new UpstreamFetchError(`Overpass: ${response.remark}`, {
				retryable: true,
				url: this.options.apiUrl,
			})
		}
		return response
	}

	async queryElements(query: HistoryQuery): Promise<HistoryQueryResult> {
		const { elements, osm3s } = await this.interpret(
			buildHistoryQuery(query, this.options.queryTimeoutSeconds),
		)
		const result: HistoryQueryResult = { elements: [], matched: [] }
		if (osm3s) result.timestampBase = Date.parse(osm3s.timestamp_osm_base)
		for (const element of elements) {
			// `out ids` output carries no version.
			if (element.version === undefined) {
				result.matched.push({ type: element.type, id: element.id })
			} else {
				result.elements.push(toRawElement(element))
			}
		}
		return result
	}

	async findParents(selection: ElementIdSets): Promise<ElementRef[]> {
		const { elements } = await this.interpret(
			buildParentsQuery(selection, this.options.queryTimeoutSeconds),
		)
		return elements.map(({ type, id }) => ({ type, id }))
	}
}
