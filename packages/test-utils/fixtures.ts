import { readFile } from "node:fs/promises"
import { dirname, join, resolve } from "node:path"
import { fileURLToPath } from "node:url"
import type { DiffEntry } from "@osm-undo/change/types"
import type {
	HistoryQuery,
	HistoryQueryClient,
	HistoryQueryResult,
	MapDataClient,
	RawHistoryElement,
} from "@osm-undo/shared/clients"
import { UpstreamFetchError } from "@osm-undo/shared/errors"
import type {
	ElementIdSets,
	ElementRef,
	OsmChangeDocument,
	OsmChangesetContents,
	OsmElement,
	OsmEntityType,
	OsmRelationMember,
	OsmTags,
	OsmUser,
	OsmVersionInfo,
} from "@osm-undo/shared/types"
import {
	elementKey,
	elementRef,
	referencedRefs,
} from "@osm-undo/shared/utils"

const __dirname = dirname(fileURLToPath(import.meta.url))
const ROOT_DIR = resolve(__dirname, "../../")
const FIXTURES_DIR = resolve(ROOT_DIR, "fixtures")

export function getFixturePath(name: string) {
	return join(FIXTURES_DIR, name)
}

/**
 * Read a text fixture from the top level fixtures directory.
 */
export function readFixture(name: string) {
	return readFile(getFixturePath(name), "utf8")
}

export const BASE_TIMESTAMP = Date.UTC(2024, 0, 1)

export function makeInfo(info: Partial<OsmVersionInfo> = {}): OsmVersionInfo {
	return {
		version: 1,
		timestamp: BASE_TIMESTAMP,
		changeset: 1,
		visible: true,
		...info,
	}
}

type VersionFixture = Partial<OsmVersionInfo> & { tags?: OsmTags }

export function makeNode(
	id: number,
	{ tags = {}, lat = 0, lon = 0, ...info }: VersionFixture & {
		lat?: number
		lon?: number
	} = {},
): OsmElement<"node"> {
	return { type: "node", id, tags, lat, lon, info: makeInfo(info) }
}

export function makeWay(
	id: number,
	{ tags = {}, refs = [], ...info }: VersionFixture & { refs?: number[] } = {},
): OsmElement<"way"> {
	return { type: "way", id, tags, refs, info: makeInfo(info) }
}

export function makeRelation(
	id: number,
	{
		tags = {},
		members = [],
		...info
	}: VersionFixture & { members?: OsmRelationMember[] } = {},
): OsmElement<"relation"> {
	return { type: "relation", id, tags, members, info: makeInfo(info) }
}

/**
 * The deleted version following `element`: invisible, no tags and no geometry.
 */
export function makeDeleted(
	element: OsmElement,
	info: Partial<OsmVersionInfo> = {},
): OsmElement {
	const deletedInfo = makeInfo({
		...element.info,
		version: element.info.version + 1,
		...info,
		visible: false,
	})
	switch (element.type) {
		case "node":
			return { ...element, tags: {}, info: deletedInfo }
		case "way":
			return { ...element, tags: {}, refs: [], info: deletedInfo }
		case "relation":
			return { ...element, tags: {}, members: [], info: deletedInfo }
	}
}

/**
 * A diff entry for the edit that produced `newVersion`, dated by it.
 */
export function makeEntry(
	old: OsmElement | null,
	newVersion: OsmElement,
	current?: OsmElement | null,
): DiffEntry {
	return {
		ref: elementRef(newVersion),
		old,
		new: newVersion,
		current,
		timestamp: newVersion.info.timestamp,
		changeset: newVersion.info.changeset,
	}
}

export function makeUser(user: Partial<OsmUser> = {}): OsmUser {
	return {
		id: 1,
		displayName: "mapper",
		roles: [],
		changesetsCount: 500,
		...user,
	}
}

/**
 * Changeset contents built from the versions it produced.
 */
export function makeChangeset(
	id: number,
	elements: OsmElement[],
	info: Partial<OsmChangesetContents["info"]> = {},
): OsmChangesetContents {
	return {
		info: {
			id,
			uid: 2,
			user: "author",
			createdAt: BASE_TIMESTAMP,
			closedAt: BASE_TIMESTAMP,
			open: false,
			changesCount: elements.length,
			tags: {},
			...info,
		},
		elements,
	}
}

/**
 * Raw history record of a visible element version.
 */
export function toRawHistoryElement(element: OsmElement): RawHistoryElement {
	const raw: RawHistoryElement = {
		type: element.type,
		id: element.id,
		version: element.info.version,
		timestamp: new Date(element.info.timestamp).toISOString(),
		changeset: element.info.changeset,
		uid: element.info.uid,
		user: element.info.user,
		tags: { ...element.tags },
	}
	switch (element.type) {
		case "node":
			return { ...raw, lat: element.lat, lon: element.lon }
		case "way":
			return { ...raw, nodes: [...element.refs] }
		case "relation":
			return { ...raw, members: element.members.map((m) => ({ ...m })) }
	}
}

export interface RecordedRequest {
	method: string
	url: string
	headers: Headers
	body?: string
}

/**
 * A `fetch` answering from routes keyed by `METHOD url`. Unknown routes respond 404. Every request
 * is recorded.
 */
export function createFakeFetch(
	routes: Record<string, (request: RecordedRequest) => Response>,
) {
	const requests: RecordedRequest[] = []
	const fetch = async (input: string, init: RequestInit = {}) => {
		const request: RecordedRequest = {
			method: init.method ?? "GET",
			url: input,
			headers: new Headers(init.headers),
			body: init.body == null ? undefined : String(init.body),
		}
		requests.push(request)
		const route = routes[`${request.method} ${request.url}`]
		return route ? route(request) : new Response("Not found", { status: 404 })
	}
	return { fetch, requests }
}

export function jsonResponse(body: unknown, status = 200) {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "Content-Type": "application/json" },
	})
}

/**
 * Map-data service backed by in-memory data. Records every call, upload and comment.
 */
export class FakeMapDataClient implements MapDataClient {
	readonly calls: string[] = []
	readonly uploads: {
		document: OsmChangeDocument
		comment: string
		extraTags: OsmTags
	}[] = []
	readonly comments: { changesetId: number; text: string }[] = []
	readonly changesets = new Map<number, OsmChangesetContents>()
	readonly users = new Map<number, OsmUser>()
	readonly elements = new Map<string, OsmElement>()
	authorizedUser: OsmUser
	maxChangesetSize: number
	nextChangesetId = 9_000

	constructor({
		changesets = [],
		users = [],
		elements = [],
		authorizedUser = makeUser(),
		maxChangesetSize = 10_000,
	}: {
		changesets?: OsmChangesetContents[]
		users?: OsmUser[]
		elements?: OsmElement[]
		authorizedUser?: OsmUser
		maxChangesetSize?: number
	} = {}) {
		for (const changeset of changesets)
			this.changesets.set(changeset.info.id, changeset)
		for (const user of users) this.users.set(user.id, user)
		this.setElements(elements)
		this.authorizedUser = authorizedUser
		this.maxChangesetSize = maxChangesetSize
	}

	/** Set the latest version of elements. */
	setElements(elements: OsmElement[]) {
		for (const element of elements) this.elements.set(elementKey(element), element)
	}

	async getChangeset(id: number) {
		this.calls.push(`getChangeset ${id}`)
		const changeset = this.changesets.get(id)
		if (!changeset) {
			throw new UpstreamFetchError(`Changeset ${id} not found`, {
				status: 404,
				retryable: false,
			})
		}
		return changeset
	}

	async getUser(id: number) {
		this.calls.push(`getUser ${id}`)
		return this.users.get(id) ?? null
	}

	async getAuthorizedUser() {
		this.calls.push("getAuthorizedUser")
		return this.authorizedUser
	}

	async getChangesetMaxSize() {
		this.calls.push("getChangesetMaxSize")
		return this.maxChangesetSize
	}

	async getElements(type: OsmEntityType, ids: number[]) {
		this.calls.push(`getElements ${type} ${ids.join(",")}`)
		return ids.flatMap((id) => {
			const element = this.elements.get(elementKey({ type, id }))
			return element ? [element] : []
		})
	}

	async uploadDiff(
		document: OsmChangeDocument,
		comment: string,
		extraTags: OsmTags,
	) {
		this.calls.push("uploadDiff")
		this.uploads.push({ document, comment, extraTags })
		return this.nextChangesetId++
	}

	async postDiscussionComment(changesetId: number, text: string) {
		this.calls.push(`postDiscussionComment ${changesetId}`)
		this.comments.push({ changesetId, text })
		return "OK"
	}
}

/**
 * History service backed by every version of a set of elements.
 *
 * `matches` decides which element states satisfy a filter clause. The first `failures` calls to
 * `queryElements` reject with a retryable error.
 */
export class FakeHistoryClient implements HistoryQueryClient {
	readonly queries: HistoryQuery[] = []
	readonly parentQueries: ElementIdSets[] = []
	readonly versions = new Map<string, OsmElement[]>()
	matches: (element: OsmElement, filter: string) => boolean
	failures: number
	/** Reported as the moment the history data is current to. */
	timestampBase?: number

	constructor({
		versions = [],
		matches = () => true,
		failures = 0,
		timestampBase,
	}: {
		versions?: OsmElement[]
		matches?: (element: OsmElement, filter: string) => boolean
		failures?: number
		timestampBase?: number
	} = {}) {
		this.addVersions(versions)
		this.matches = matches
		this.failures = failures
		this.timestampBase = timestampBase
	}

	addVersions(versions: OsmElement[]) {
		for (const version of versions) {
			const key = elementKey(version)
			const list = this.versions.get(key) ?? []
			list.push(version)
			list.sort((a, b) => a.info.version - b.info.version)
			this.versions.set(key, list)
		}
	}

	/** The version of an element valid at `date`, or the latest one. */
	stateAt(ref: ElementRef, date?: number) {
		const list = this.versions.get(elementKey(ref)) ?? []
		return list.filter((v) => date === undefined || v.info.timestamp <= date).at(-1)
	}

	async queryElements(query: HistoryQuery): Promise<HistoryQueryResult> {
		this.queries.push(query)
		if (this.failures > 0) {
			this.failures--
			throw new UpstreamFetchError("Overpass is busy", {
				status: 429,
				retryable: true,
			})
		}
		const elements: RawHistoryElement[] = []
		const matched: ElementRef[] = []
		for (const type of ["node", "way", "relation"] as const) {
			for (const id of query.selection[type]) {
				const state = this.stateAt({ type, id }, query.date)
				if (!state?.info.visible) continue
				elements.push(toRawHistoryElement(state))
				if (query.filter && this.matches(state, query.filter)) {
					matched.push({ type, id })
				}
			}
		}
		const result: HistoryQueryResult = { elements, matched }
		if (this.timestampBase !== undefined) result.timestampBase = this.timestampBase
		return result
	}

	async findParents(selection: ElementIdSets) {
		this.parentQueries.push(selection)
		const selected = new Set(
			(["node", "way", "relation"] as const).flatMap((type) =>
				selection[type].map((id) => elementKey({ type, id })),
			),
		)
		const parents: ElementRef[] = []
		for (const list of this.versions.values()) {
			const latest = list.at(-1)
			if (!latest?.info.visible) continue
			if (referencedRefs(latest).some((ref) => selected.has(elementKey(ref)))) {
				parents.push(elementRef(latest))
			}
		}
		return parents
	}
}
