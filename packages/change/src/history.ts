/**
 * History retrieval.
 *
 * Builds the diff of one changeset: for every element version the changeset produced, the version
 * it replaced, plus the live version. Element ids are queried in partitions bounded by id count
 * and query length; partitions run on a bounded pool and are retried on transient failures.
 *
 * @module
 */

import type {
	HistoryQuery,
	HistoryQueryClient,
	HistoryQueryResult,
	RawHistoryElement,
} from "@osm-undo/shared/clients"
import {
	type ElementFilter,
	matchesElementFilter,
} from "@osm-undo/shared/element-filter"
import {
	DataConsistencyError,
	InputValidationError,
	UpstreamFetchError,
} from "@osm-undo/shared/errors"
import { mapWithConcurrency } from "@osm-undo/shared/pool"
import {
	ignoreProgress,
	type OnProgress,
	progress,
	stepProgress,
} from "@osm-undo/shared/progress"
import { type RetryOptions, withRetry } from "@osm-undo/shared/retry"
import {
	type ElementIdSets,
	type ElementRef,
	OSM_ENTITY_TYPES,
	type OsmChangesetContents,
	type OsmChangesetInfo,
	type OsmElement,
	type OsmEntityType,
	type OsmVersionInfo,
} from "@osm-undo/shared/types"
import {
	elementKey,
	elementRef,
	emptyIdSets,
	idSetsSize,
	plural,
} from "@osm-undo/shared/utils"
import type { ChangesetDiff, DiffEntry } from "./types"

/**
 * Restricts which elements of a changeset are retrieved.
 */
export interface HistoryFilter {
	/** History service filter clause; elements matching before the changeset or now are kept. */
	query?: string
	/** Include/exclude ids, applied before any query. */
	elements?: ElementFilter
}

export interface PartitionLimits {
	maxIdsPerQuery: number
	maxQueryLength: number
}

export interface FetchHistoryOptions extends PartitionLimits {
	/** Partitions queried in parallel. */
	workerCount: number
	retry: Partial<RetryOptions>
	onProgress: OnProgress
}

export const DEFAULT_FETCH_HISTORY_OPTIONS: FetchHistoryOptions = {
	maxIdsPerQuery: 1_000,
	maxQueryLength: 12_000,
	workerCount: 2,
	retry: {},
	onProgress: ignoreProgress,
}

/** The pre-changeset state is read this long before the changeset was opened. */
const BEFORE_CHANGESET_MS = 1_000

/**
 * Render an id selection as history query statements, e.g. `node(id:1,2);way(id:3);`. The optional
 * filter clause is appended to every statement.
 */
export function renderIdSelection(selection: ElementIdSets, filter = "") {
	return OSM_ENTITY_TYPES.filter((type) => selection[type].length > 0)
		.map((type) => `${type}(id:${selection[type].join(",")})${filter};`)
		.join("")
}

/**
 * Split ids into partitions. Types are taken in protocol order and ids ascending, so the same input
 * always yields the same partitions. Each partition holds at most `maxIdsPerQuery` ids and renders
 * to at most `maxQueryLength` characters, unless a single id alone is longer.
 */
export function partitionElementIds(
	ids: ElementIdSets,
	{ maxIdsPerQuery, maxQueryLength }: PartitionLimits,
): ElementIdSets[] {
	const partitions: ElementIdSets[] = []
	let current = emptyIdSets()
	let count = 0
	let length = 0

	const cost = (type: OsmEntityType, id: number) =>
		current[type].length === 0
			? `${type}(id:${id});`.length
			: `,${id}`.length

	for (const type of OSM_ENTITY_TYPES) {
		for (const id of ids[type].toSorted((a, b) => a - b)) {
			if (
				count > 0 &&
				(count >= maxIdsPerQuery || length + cost(type, id) > maxQueryLength)
			) {
				partitions.push(current)
				current = emptyIdSets()
				count = 0
				length = 0
			}
			length += cost(type, id)
			current[type].push(id)
			count++
		}
	}
	if (count > 0) partitions.push(current)

	return partitions
}

/**
 * Normalize a raw history record into an element version.
 */
export function normalizeHistoryElement(raw: RawHistoryElement): OsmElement {
	const info: OsmVersionInfo = {
		version: raw.version,
		timestamp: Date.parse(raw.timestamp),
		changeset: raw.changeset,
		visible: true,
		uid: raw.uid,
		user: raw.user,
	}
	const base = { id: raw.id, tags: { ...raw.tags }, info }
	switch (raw.type) {
		case "node":
			if (raw.lat == null || raw.lon == null) {
				throw new DataConsistencyError(
					`History record of node ${raw.id} v${raw.version} has no position`,
				)
			}
			return { ...base, type: "node", lat: raw.lat, lon: raw.lon }
		case "way":
			return { ...base, type: "way", refs: [...(raw.nodes ?? [])] }
		case "relation":
			return {
				...base,
				type: "relation",
				members: (raw.members ?? []).map((member) => ({ ...member })),
			}
	}
}

/** Number of element versions a changeset produced. */
export function changesetSize(changeset: OsmChangesetContents) {
	return changeset.elements.length
}

/** Number of entries in a diff. */
export function diffSize(diff: ChangesetDiff) {
	return diff.node.length + diff.way.length + diff.relation.length
}

/**
 * Group the versions a changeset produced by element, each list ascending by version.
 */
function groupChangesetVersions(changeset: OsmChangesetContents) {
	const grouped = new Map<string, OsmElement[]>()
	for (const element of changeset.elements) {
		const key = elementKey(element)
		const versions = grouped.get(key)
		if (versions) versions.push(element)
		else grouped.set(key, [element])
	}
	for (const versions of grouped.values()) {
		versions.sort((a, b) => a.info.version - b.info.version)
	}
	return grouped
}

/**
 * @throws UpstreamFetchError (retryable) when the history service has not caught up with the
 * changeset yet.
 */
function checkTimestampBase(
	{ timestampBase }: HistoryQueryResult,
	{ id, closedAt }: OsmChangesetInfo,
) {
	if (timestampBase === undefined || closedAt === undefined) return
	if (timestampBase >= closedAt) return
	throw new UpstreamFetchError(
		`History service is behind changeset ${id}: data until ${new Date(timestampBase).toISOString()}, closed at ${new Date(closedAt).toISOString()}`,
		{ retryable: true },
	)
}

function indexRawElements(result: HistoryQueryResult) {
	const index = new Map<string, RawHistoryElement>()
	for (const raw of result.elements) index.set(elementKey(raw), raw)
	return index
}

/**
 * Fetch the diff of a changeset.
 *
 * Per partition, the history service is asked for the state one second before the changeset was
 * opened (only for elements that existed by then) and for the live state. Every version the
 * changeset produced becomes one entry, whose `old` is the previous version within the changeset
 * or the pre-changeset state.
 *
 * @throws InputValidationError when the changeset is still open.
 * @throws UpstreamFetchError when a partition keeps failing after retries, or the history service
 * keeps lagging behind the changeset; no partial diff is returned.
 * @throws DataConsistencyError when the diff has more entries than the changes the changeset
 * declares.
 */
export async function fetchHistory(
	changeset: OsmChangesetContents,
	filter: HistoryFilter,
	client: HistoryQueryClient,
	options: Partial<FetchHistoryOptions> = {},
): Promise<ChangesetDiff> {
	const opts = { ...DEFAULT_FETCH_HISTORY_OPTIONS, ...options }
	const { info } = changeset
	if (info.open) {
		throw new InputValidationError(
			`Changeset ${info.id} is still open and cannot be reverted yet`,
			{ changeset: info.id },
		)
	}
	const grouped = groupChangesetVersions(changeset)

	const refs: ElementRef[] = []
	const ids = emptyIdSets()
	for (const versions of grouped.values()) {
		const first = versions[0]
		if (first == null) continue
		const ref = elementRef(first)
		if (filter.elements && !matchesElementFilter(filter.elements, ref))
			continue
		refs.push(ref)
		ids[ref.type].push(ref.id)
	}

	const partitions = partitionElementIds(ids, opts)
	const steps = partitions.length + 1
	opts.onProgress(
		stepProgress(
			1,
			steps,
			`Changeset ${info.id}: ${plural(changesetSize(changeset), "element")}, ${plural(partitions.length, "partition")}`,
		),
	)

	const results = await mapWithConcurrency(
		partitions,
		opts.workerCount,
		async (selection, index) => {
			const attempt = async (historyQuery: HistoryQuery) => {
				const result = await client.queryElements(historyQuery)
				checkTimestampBase(result, info)
				return result
			}
			const query = (historyQuery: HistoryQuery) =>
				withRetry(() => attempt(historyQuery), {
					...opts.retry,
					onRetry: (error, attempt, delayMs) => {
						const reason = error instanceof Error ? error.message : String(error)
						opts.onProgress(
							progress(
								`Partition ${index + 1}: ${reason}, retry ${attempt} in ${delayMs} ms`,
							),
						)
					},
				})

			const beforeSelection = emptyIdSets()
			for (const type of OSM_ENTITY_TYPES) {
				beforeSelection[type] = selection[type].filter(
					(id) =>
						(grouped.get(elementKey({ type, id }))?.[0]?.info.version ?? 1) > 1,
				)
			}

			const before =
				idSetsSize(beforeSelection) > 0
					? await query({
							selection: beforeSelection,
							date: info.createdAt - BEFORE_CHANGESET_MS,
							filter: filter.query,
						})
					: { elements: [], matched: [] }
			const current = await query({ selection, filter: filter.query })

			opts.onProgress(
				stepProgress(
					index + 2,
					steps,
					`Partition ${index + 1}: ${plural(idSetsSize(selection), "element")}`,
				),
			)
			return { before, current }
		},
	)

	const beforeElements = new Map<string, RawHistoryElement>()
	const currentElements = new Map<string, RawHistoryElement>()
	const matched = new Set<string>()
	for (const { before, current } of results) {
		for (const [key, raw] of indexRawElements(before)) beforeElements.set(key, raw)
		for (const [key, raw] of indexRawElements(current))
			currentElements.set(key, raw)
		for (const ref of [...before.matched, ...current.matched])
			matched.add(elementKey(ref))
	}

	const diff: ChangesetDiff = { node: [], way: [], relation: [] }
	for (const ref of refs) {
		const key = elementKey(ref)
		if (filter.query && !matched.has(key)) continue

		const versions = grouped.get(key) ?? []
		const currentRaw = currentElements.get(key)
		const current = currentRaw ? normalizeHistoryElement(currentRaw) : null
		const beforeRaw = beforeElements.get(key)

		let previous: OsmElement | null =
			(versions[0]?.info.version ?? 1) > 1 && beforeRaw
				? normalizeHistoryElement(beforeRaw)
				: null
		for (const version of versions) {
			const entry: DiffEntry = {
				ref,
				old: previous,
				new: version,
				current,
				timestamp: version.info.timestamp,
				changeset: info.id,
			}
			diff[ref.type].push(entry)
			previous = version
		}
	}

	const size = diffSize(diff)
	const declared = info.changesCount
	if (size > declared) {
		throw new DataConsistencyError(
			`Diff must not be larger than changeset size: ${size} > ${declared}`,
			{ changeset: info.id, diffSize: size, changesetSize: declared },
		)
	}

	return diff
}
