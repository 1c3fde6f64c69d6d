/**
 * OSM API 0.6 client.
 *
 * Implements `MapDataClient` over the JSON endpoints of the OpenStreetMap API, plus the osmChange
 * XML download of changesets and the XML upload of change documents.
 *
 * @module
 */

import { generateOscChanges } from "@osm-undo/change/osc"
import { osmTagsToOscTags } from "@osm-undo/change/utils"
import type { MapDataClient } from "@osm-undo/shared/clients"
import { UpstreamFetchError } from "@osm-undo/shared/errors"
import {
	logProgress,
	type OnProgress,
	progress,
} from "@osm-undo/shared/progress"
import type {
	OsmChangeDocument,
	OsmChangesetContents,
	OsmElement,
	OsmEntityType,
	OsmTags,
	OsmUser,
	OsmVersionInfo,
} from "@osm-undo/shared/types"
import {
	globalFetch,
	type HttpOptions,
	requestJson,
	requestText,
} from "./http"
import { parseOsmChange } from "./osm-change-xml"
import {
	type ApiElement,
	CapabilitiesResponseSchema,
	ChangesetResponseSchema,
	ElementsResponseSchema,
	type UserResponse,
	UserResponseSchema,
} from "./schemas"

export interface OsmApiClientOptions extends HttpOptions {
	/** Base URL of the API, e.g. `https://api.openstreetmap.org/api/0.6`. */
	apiUrl: string
	/** `generator` written into uploaded osmChange documents. */
	generator: string
	/** Receives failures that do not fail the operation, such as closing a changeset after an upload error. */
	onProgress: OnProgress
}

export const DEFAULT_OSM_API_OPTIONS: OsmApiClientOptions = {
	apiUrl: "https://api.openstreetmap.org/api/0.6",
	generator: "osm-undo",
	userAgent: "osm-undo",
	timeoutMs: 60_000,
	fetch: globalFetch,
	onProgress: logProgress,
}

function toUser({ user }: UserResponse): OsmUser {
	return {
		id: user.id,
		displayName: user.display_name,
		roles: user.roles,
		changesetsCount: user.changesets.count,
	}
}

export function toOsmElement(element: ApiElement): OsmElement {
	const info: OsmVersionInfo = {
		version: element.version,
		timestamp: Date.parse(element.timestamp),
		changeset: element.changeset,
		visible: element.visible,
		uid: element.uid,
		user: element.user,
	}
	const base = { id: element.id, tags: element.tags, info }
	switch (element.type) {
		case "node":
			return {
				...base,
				type: "node",
				lat: element.lat ?? 0,
				lon: element.lon ?? 0,
			}
		case "way":
			return { ...base, type: "way", refs: element.nodes }
		case "relation":
			return { ...base, type: "relation", members: element.members }
	}
}

function isStatus(error: unknown, ...statuses: number[]) {
	return (
		error instanceof UpstreamFetchError &&
		error.status !== undefined &&
		statuses.includes(error.status)
	)
}

/**
 * OpenStreetMap API client.
 *
 * @example
 * ```ts
 * const osm = new OsmApiClient({ authorization: `Bearer ${token}` })
 * const user = await osm.getAuthorizedUser()
 * ```
 */
export class OsmApiClient implements MapDataClient {
	readonly options: OsmApiClientOptions

	constructor(options: Partial<OsmApiClientOptions> = {}) {
		this.options = { ...DEFAULT_OSM_API_OPTIONS, ...options }
	}

	private url(path: string) {
		return `${this.options.apiUrl.replace(/\/+$/, "")}${path}`
	}

	async getChangeset(id: number): Promise<OsmChangesetContents> {
		const { changeset } = await requestJson(
			this.url(`/changeset/${id}.json`),
			ChangesetResponseSchema,
			{},
			this.options,
		)
		const xml = await requestText(
			this.url(`/changeset/${id}/download`),
			{},
			this.options,
		)
		return {
			info: {
				id: changeset.id,
				uid: changeset.uid,
				user: changeset.user,
				createdAt: Date.parse(changeset.created_at),
				closedAt: changeset.closed_at
					? Date.parse(changeset.closed_at)
					: undefined,
				open: changeset.open,
				changesCount: changeset.changes_count,
				tags: changeset.tags,
			},
			elements: parseOsmChange(xml),
		}
	}

	async getUser(id: number): Promise<OsmUser | null> {
		try {
			const response = await requestJson(
				this.url(`/user/${id}.json`),
				UserResponseSchema,
				{},
				this.options,
			)
			return toUser(response)
		} catch (error) {
			if (isStatus(error, 404, 410)) return null
			throw error
		}
	}

	async getAuthorizedUser() {
		const response = await requestJson(
			this.url("/user/details.json"),
			UserResponseSchema,
			{},
			this.options,
		)
		return toUser(response)
	}

	async getChangesetMaxSize() {
		const { api } = await requestJson(
			this.url("/capabilities.json"),
			CapabilitiesResponseSchema,
			{},
			this.options,
		)
		return api.changesets.maximum_elements
	}

	async getElements(type: OsmEntityType, ids: number[]) {
		if (ids.length === 0) return []
		try {
			const { elements } = await requestJson(
				this.url(`/${type}s.json?${type}s=${ids.join(",")}`),
				ElementsResponseSchema,
				{},
				this.options,
			)
			return elements.map(toOsmElement)
		} catch (error) {
			// The batch endpoint fails as a whole when one of the ids never existed.
			if (!isStatus(error, 404)) throw error
			if (ids.length === 1) return []
		}

		const elements: OsmElement[] = []
		for (const id of ids) elements.push(...(await this.getElements(type, [id])))
		return elements
	}

	async uploadDiff(
		document: OsmChangeDocument,
		comment: string,
		extraTags: OsmTags,
	) {
		const tags: OsmTags = { ...document.tags, ...extraTags, comment }
		const created = await requestText(
			this.url("/changeset/create"),
			{
				method: "PUT",
				headers: { "Content-Type": "text/xml; charset=utf-8" },
				body: `<osm><changeset>${osmTagsToOscTags(tags)}</changeset></osm>`,
			},
			this.options,
		)
		const changesetId = Number.parseInt(created.trim(), 10)
		if (!Number.isSafeInteger(changesetId)) {
			throw new UpstreamFetchError(
				`Unexpected changeset id in response: ${created.slice(0, 50)}`,
				{ retryable: false },
			)
		}

		try {
			await requestText(
				this.url(`/changeset/${changesetId}/upload`),
				{
					method: "POST",
					headers: { "Content-Type": "text/xml; charset=utf-8" },
					body: generateOscChanges(document, {
						changesetId,
						generator: this.options.generator,
					}),
				},
				this.options,
			)
		} catch (error) {
			// The upload error is rethrown even when closing fails too.
			try {
				await this.closeChangeset(changesetId)
			} catch (closeError) {
				const reason =
					closeError instanceof Error ? closeError.message : String(closeError)
				this.options.onProgress(
					progress(`Changeset ${changesetId} could not be closed: ${reason}`),
				)
			}
			throw error
		}
		await this.closeChangeset(changesetId)
		return changesetId
	}

	async closeChangeset(id: number) {
		await requestText(
			this.url(`/changeset/${id}/close`),
			{ method: "PUT" },
			this.options,
		)
	}

	async postDiscussionComment(changesetId: number, text: string) {
		try {
			await requestText(
				this.url(`/changeset/${changesetId}/comment`),
				{ method: "POST", body: new URLSearchParams({ text }) },
				this.options,
			)
			return "OK"
		} catch (error) {
			if (error instanceof UpstreamFetchError) return `Failed: ${error.message}`
			throw error
		}
	}
}
