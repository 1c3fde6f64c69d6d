/**
 * Parent consistency reconciliation.
 *
 * Runs right before the change document is built. Refreshes the base version of every outgoing
 * element from the live graph, keeps deletions that later work still references, and resubmits
 * the ways and relations referencing changed elements at their live version.
 *
 * @module
 */

import type {
	HistoryQueryClient,
	MapDataClient,
} from "@osm-undo/shared/clients"
import {
	ignoreProgress,
	type OnProgress,
	progress,
} from "@osm-undo/shared/progress"
import { type RetryOptions, withRetry } from "@osm-undo/shared/retry"
import {
	type ElementIdSets,
	type ElementRef,
	OSM_ENTITY_TYPES,
	type OsmElement,
} from "@osm-undo/shared/types"
import {
	elementKey,
	emptyIdSets,
	idSetsSize,
	plural,
	referencedRefs,
} from "@osm-undo/shared/utils"
import type {
	AmbiguousInversionWarning,
	InvertedDiff,
	InvertedElement,
	InvertResult,
	ReconcileResult,
} from "./types"

export interface ReconcileClients {
	history: Pick<HistoryQueryClient, "findParents">
	mapData: Pick<MapDataClient, "getElements">
}

export interface ReconcileOptions {
	/** Ids per `getElements` request. */
	maxIdsPerQuery: number
	retry: Partial<RetryOptions>
	onProgress: OnProgress
}

export const DEFAULT_RECONCILE_OPTIONS: ReconcileOptions = {
	maxIdsPerQuery: 500,
	retry: {},
	onProgress: ignoreProgress,
}

function toIdSets(refs: Iterable<ElementRef>) {
	const ids = emptyIdSets()
	for (const ref of refs) ids[ref.type].push(ref.id)
	return ids
}

/**
 * Fetch the live versions of the given elements, keyed by `type/id`.
 */
async function fetchLiveElements(
	mapData: ReconcileClients["mapData"],
	ids: ElementIdSets,
	{ maxIdsPerQuery, retry }: ReconcileOptions,
) {
	const live = new Map<string, OsmElement>()
	for (const type of OSM_ENTITY_TYPES) {
		for (let i = 0; i < ids[type].length; i += maxIdsPerQuery) {
			const chunk = ids[type].slice(i, i + maxIdsPerQuery)
			const elements = await withRetry(
				() => mapData.getElements(type, chunk),
				retry,
			)
			for (const element of elements) live.set(elementKey(element), element)
		}
	}
	return live
}

/**
 * Reconcile an inversion against the live graph.
 *
 * 1. Every outgoing modify and delete is re-fetched. Elements changed since retrieval are dropped
 *    with a `stale-version` warning, deletions of already deleted elements are dropped silently,
 *    and the rest move to their live version.
 * 2. Deletions still referenced by a way or relation that stays in the graph are dropped with a
 *    `dependent-edits` warning, until no such deletion remains.
 * 3. Every other live parent of an outgoing element is appended as an unchanged `touch` modify.
 *
 * @param inversion - The inversion to reconcile. It is not mutated.
 */
export async function reconcileParents(
	inversion: Pick<InvertResult, "elements">,
	{ history, mapData }: ReconcileClients,
	options: Partial<ReconcileOptions> = {},
): Promise<ReconcileResult> {
	const opts = { ...DEFAULT_RECONCILE_OPTIONS, ...options }
	const warnings: AmbiguousInversionWarning[] = []
	const all = OSM_ENTITY_TYPES.flatMap((type) => inversion.elements[type])

	const existing = all.filter((inverted) => inverted.action !== "create")
	opts.onProgress(
		progress(`Refreshing ${plural(existing.length, "element")}`),
	)
	const live = await fetchLiveElements(
		mapData,
		toIdSets(existing.map((inverted) => inverted.ref)),
		opts,
	)

	// Elements staying in the graph unchanged; their references keep a deletion alive.
	const staying: OsmElement[] = []
	let outgoing: InvertedElement[] = []
	for (const inverted of all) {
		if (inverted.action === "create") {
			outgoing.push(inverted)
			continue
		}
		const current = live.get(elementKey(inverted.ref))
		if (current == null || !current.info.visible) {
			if (inverted.action === "modify") {
				warnings.push({ ref: inverted.ref, reason: "stale-version" })
			}
			continue
		}
		if (current.info.version > inverted.baseVersion) {
			warnings.push({ ref: inverted.ref, reason: "stale-version" })
			staying.push(current)
			continue
		}
		outgoing.push({ ...inverted, baseVersion: current.info.version })
	}

	const selection = toIdSets(
		outgoing
			.filter((inverted) => inverted.action !== "create")
			.map((inverted) => inverted.ref),
	)
	const parentRefs =
		idSetsSize(selection) > 0
			? await withRetry(() => history.findParents(selection), opts.retry)
			: []
	const outgoingKeys = new Set(outgoing.map(({ ref }) => elementKey(ref)))
	const externalRefs = [
		...new Map(
			parentRefs
				.filter((ref) => !outgoingKeys.has(elementKey(ref)))
				.map((ref) => [elementKey(ref), ref] as const),
		).values(),
	]
	const parentLive = await fetchLiveElements(
		mapData,
		toIdSets(externalRefs),
		opts,
	)

	const parents: OsmElement[] = []
	for (const ref of externalRefs) {
		const parent = parentLive.get(elementKey(ref))
		if (parent?.info.visible) parents.push(parent)
		else warnings.push({ ref, reason: "parent-unavailable" })
	}

	for (;;) {
		const referenced = new Set<string>()
		const holders = [
			...parents,
			...staying,
			...outgoing
				.filter((inverted) => inverted.action !== "delete")
				.map((inverted) => inverted.element),
		]
		for (const holder of holders) {
			for (const ref of referencedRefs(holder)) referenced.add(elementKey(ref))
		}

		const blocked = outgoing.filter(
			(inverted) =>
				inverted.action === "delete" &&
				referenced.has(elementKey(inverted.ref)),
		)
		if (blocked.length === 0) break

		for (const inverted of blocked) {
			warnings.push({ ref: inverted.ref, reason: "dependent-edits" })
			staying.push(live.get(elementKey(inverted.ref)) ?? inverted.element)
		}
		outgoing = outgoing.filter((inverted) => !blocked.includes(inverted))
	}

	const changedKeys = new Set(
		outgoing
			.filter((inverted) => inverted.action !== "create")
			.map(({ ref }) => elementKey(ref)),
	)
	const elements: InvertedDiff = { node: [], way: [], relation: [] }
	for (const inverted of outgoing) elements[inverted.ref.type].push(inverted)

	let parentsFixed = 0
	for (const parent of parents) {
		const touchesChange = referencedRefs(parent).some((ref) =>
			changedKeys.has(elementKey(ref)),
		)
		if (!touchesChange) continue
		elements[parent.type].push({
			ref: { type: parent.type, id: parent.id },
			action: "modify",
			element: parent,
			baseVersion: parent.info.version,
			touch: true,
		})
		parentsFixed++
	}

	opts.onProgress(progress(`Parents fixed: ${parentsFixed}`))
	return { elements, parentsFixed, warnings }
}
