/**
 * The revert pipeline.
 *
 * Validates the request, checks the reverting user against the revert policy, computes the revert
 * of every requested changeset and either returns it as an osmChange document or uploads it and
 * comments on the reverted changesets. Every outcome is returned as a `RevertResult`.
 *
 * @module
 */

import {
	type AmbiguousInversionWarning,
	buildChangeDocument,
	type ChangesetDiff,
	changeDocumentSize,
	changeStatsSummary,
	changesetSize,
	countActions,
	diffSize,
	fetchHistory,
	generateOscChanges,
	type HistoryFilter,
	type InvertStats,
	invertDiff,
	mergeChangesetDiffs,
	reconcileParents,
	warningChecklist,
} from "@osm-undo/change"
import { parseElementFilter } from "@osm-undo/shared/element-filter"
import {
	InputValidationError,
	PolicyError,
} from "@osm-undo/shared/errors"
import {
	logProgress,
	type OnProgress,
	progress,
} from "@osm-undo/shared/progress"
import { parseQueryFilter } from "@osm-undo/shared/query-filter"
import { withRetry } from "@osm-undo/shared/retry"
import type { OsmChangeDocument, OsmTags } from "@osm-undo/shared/types"
import { plural } from "@osm-undo/shared/utils"
import type { RevertClients } from "./clients"
import {
	DISCUSSION_TARGETS,
	type DiscussionStatus,
	type DiscussionTarget,
	filterDiscussionChangesets,
	isDiscussionTarget,
	postDiscussions,
} from "./discussion"
import {
	canRevertModerators,
	checkChangesetsLimit,
	checkRevertTarget,
	checkUploadSize,
	isModerator,
} from "./policy"
import { DEFAULT_REVERT_SETTINGS, type RevertSettings } from "./settings"

export interface RevertOptions {
	changesetIds: (number | string)[]
	/** Comment of the revert changeset. Required unless `offline`. */
	comment?: string
	/** Element filter tokens such as `node123` or `-w45`. */
	elementFilter?: string[]
	/** Overpass filter clauses, e.g. `[highway]`. */
	queryFilter?: string
	/** Only revert these tag keys of modified elements. */
	onlyTags?: string[]
	/** Posted on the reverted changesets after the upload, with a link to the revert appended. */
	discussion?: string
	/** One of `DISCUSSION_TARGETS`. Defaults to `all`. */
	discussionTarget?: string
	/** Return the osmChange document instead of uploading it. */
	offline?: boolean
	/** Additional tags of the revert changeset. */
	extraTags?: OsmTags
}

/**
 * Revert options checked and normalized.
 */
export interface RevertRequest {
	/** Deduplicated, ascending. */
	changesetIds: number[]
	comment: string
	filter: HistoryFilter
	onlyTags: string[]
	discussion?: string
	discussionTarget: DiscussionTarget
	offline: boolean
	extraTags: OsmTags
}

export interface RevertSummary {
	stats: InvertStats
	parentsFixed: number
	warnings: AmbiguousInversionWarning[]
}

export type RevertResult =
	| (RevertSummary & {
			status: "success"
			mode: "offline"
			document: OsmChangeDocument
			osc: string
	  })
	| (RevertSummary & {
			status: "success"
			mode: "upload"
			document: OsmChangeDocument
			changesetId: number
			changesetUrl: string
			discussions: DiscussionStatus[]
	  })
	| (RevertSummary & { status: "nothing-to-revert" })
	| { status: "policy-blocked"; error: PolicyError }
	| { status: "failed"; error: Error }

function parseChangesetIds(ids: (number | string)[]) {
	const parsed = new Set<number>()
	for (const id of ids) {
		const value = String(id).trim()
		if (value === "") continue
		if (!/^\d+$/.test(value)) {
			throw new InputValidationError(`Changeset ids must be numeric: ${value}`, {
				id: value,
			})
		}
		const changesetId = Number(value)
		if (!Number.isSafeInteger(changesetId) || changesetId <= 0) {
			throw new InputValidationError(`Invalid changeset id: ${value}`, {
				id: value,
			})
		}
		parsed.add(changesetId)
	}
	if (parsed.size === 0) throw new InputValidationError("Missing changeset id")
	return [...parsed].sort((a, b) => a - b)
}

/**
 * Check and normalize revert options without any network call.
 * @throws InputValidationError for the first invalid option.
 */
export function validateRevertOptions(
	options: RevertOptions,
	{ minDiscussionLength }: Pick<RevertSettings, "minDiscussionLength">,
): RevertRequest {
	const changesetIds = parseChangesetIds(options.changesetIds)

	const filter: HistoryFilter = {}
	const tokens = (options.elementFilter ?? []).filter((t) => t.trim() !== "")
	if (tokens.length > 0) filter.elements = parseElementFilter(tokens)
	const query = parseQueryFilter(options.queryFilter)
	if (query) filter.query = query

	const offline = options.offline ?? false
	const comment = options.comment?.trim() ?? ""
	if (!offline && comment === "") {
		throw new InputValidationError("A comment is required to upload a revert")
	}

	const discussion = options.discussion?.trim() ?? ""
	if (discussion !== "" && discussion.length < minDiscussionLength) {
		throw new InputValidationError(
			`Discussion must be at least ${minDiscussionLength} characters long`,
			{ length: discussion.length },
		)
	}

	const discussionTarget = options.discussionTarget ?? "all"
	if (!isDiscussionTarget(discussionTarget)) {
		throw new InputValidationError(
			`Discussion target must be one of ${DISCUSSION_TARGETS.join(", ")}: ${discussionTarget}`,
		)
	}

	return {
		changesetIds,
		comment,
		filter,
		onlyTags: (options.onlyTags ?? []).map((t) => t.trim()).filter(Boolean),
		discussion: discussion === "" ? undefined : discussion,
		discussionTarget,
		offline,
		extraTags: options.extraTags ?? {},
	}
}

function reportWarnings(
	warnings: AmbiguousInversionWarning[],
	websiteUrl: string,
	onProgress: OnProgress,
) {
	for (const line of warningChecklist(warnings, websiteUrl)) {
		onProgress(progress(line))
	}
}

async function runRevert(
	request: RevertRequest,
	{ mapData, history }: RevertClients,
	settings: RevertSettings,
	onProgress: OnProgress,
): Promise<RevertResult> {
	const { changesetIds, filter } = request
	const retry = settings.history.retry

	onProgress(progress("Logging in to OpenStreetMap"))
	const user = await withRetry(() => mapData.getAuthorizedUser(), retry)
	onProgress(
		progress(
			`Welcome, ${user.displayName}${isModerator(user) ? " (moderator)" : ""}!`,
		),
	)
	checkChangesetsLimit(user, changesetIds.length, settings)

	const diffs: ChangesetDiff[] = []
	for (const changesetId of changesetIds) {
		onProgress(progress(`Downloading changeset ${changesetId}`))
		const changeset = await withRetry(
			() => mapData.getChangeset(changesetId),
			retry,
		)
		if (!canRevertModerators(user, settings)) {
			const author = await withRetry(
				() => mapData.getUser(changeset.info.uid),
				retry,
			)
			checkRevertTarget(author, changesetId)
		}
		if (changesetSize(changeset) === 0) {
			onProgress(progress(`Changeset ${changesetId} is empty`))
			continue
		}

		const diff = await fetchHistory(changeset, filter, history, {
			...settings.history,
			onProgress,
		})
		diffs.push(diff)
		onProgress(
			progress(
				`Changeset ${changesetId}: ${plural(diffSize(diff), "element")}${filter.query ? " (filtered)" : ""}`,
			),
		)
	}

	onProgress(progress("Generating a revert"))
	const inversion = invertDiff(mergeChangesetDiffs(diffs), {
		onlyTags: request.onlyTags,
	})
	const reconciled = await reconcileParents(
		inversion,
		{ mapData, history },
		{ ...settings.reconcile, onProgress },
	)
	const { parentsFixed } = reconciled
	const summary: RevertSummary = {
		stats: countActions(reconciled.elements),
		parentsFixed,
		warnings: [...inversion.warnings, ...reconciled.warnings],
	}
	if (parentsFixed > 0) {
		onProgress(progress(`Fixing ${plural(parentsFixed, "parent")}`))
	}
	onProgress(progress(changeStatsSummary({ ...summary.stats, parentsFixed })))

	const document = buildChangeDocument(reconciled.elements, {
		changesetIds,
		createdBy: settings.createdBy,
		website: settings.website,
		websiteUrl: settings.osmWebsiteUrl,
		filter: filter.query,
		stats: summary.stats,
		parentsFixed,
		changesetsCount: user.changesetsCount + 1,
		extraTags: request.extraTags,
	})
	const size = changeDocumentSize(document)

	if (size === 0) {
		reportWarnings(summary.warnings, settings.osmWebsiteUrl, onProgress)
		onProgress(progress("Nothing to revert"))
		return { status: "nothing-to-revert", ...summary }
	}

	if (request.offline) {
		onProgress(progress(`Writing ${plural(size, "change")} as osmChange`))
		const osc = generateOscChanges(document, { generator: settings.createdBy })
		reportWarnings(summary.warnings, settings.osmWebsiteUrl, onProgress)
		onProgress(progress("Success"))
		return { status: "success", mode: "offline", document, osc, ...summary }
	}

	const maxSize = await withRetry(() => mapData.getChangesetMaxSize(), retry)
	checkUploadSize(size, maxSize, changesetIds.length)

	onProgress(progress(`Uploading ${plural(size, "change")}`))
	const changesetId = await mapData.uploadDiff(document, request.comment, {})
	const changesetUrl = `${settings.osmWebsiteUrl.replace(/\/+$/, "")}/changeset/${changesetId}`

	let discussions: DiscussionStatus[] = []
	if (request.discussion) {
		const targets = filterDiscussionChangesets(
			changesetIds,
			request.discussionTarget,
		)
		onProgress(progress(`Discussing ${plural(targets.length, "changeset")}`))
		discussions = await postDiscussions(
			mapData,
			targets,
			`${request.discussion}\n\n${changesetUrl}`,
			onProgress,
		)
	}

	reportWarnings(summary.warnings, settings.osmWebsiteUrl, onProgress)
	onProgress(progress(`Success: ${changesetUrl}`))
	return {
		status: "success",
		mode: "upload",
		document,
		changesetId,
		changesetUrl,
		discussions,
		...summary,
	}
}

/**
 * Revert changesets.
 *
 * Input is validated before any network call. Policy violations return `policy-blocked`, every
 * other failure returns `failed`; nothing is uploaded once a failure occurred.
 *
 * @example
 * ```ts
 * const settings = settingsFromEnv()
 * const result = await revert(
 * 	{ changesetIds: [123456], comment: "Revert vandalism", onlyTags: ["name"] },
 * 	createClients(settings),
 * 	settings,
 * )
 * if (result.status === "success" && result.mode === "upload") console.log(result.changesetUrl)
 * ```
 */
export async function revert(
	options: RevertOptions,
	clients: RevertClients,
	settings: Partial<RevertSettings> = {},
	onProgress: OnProgress = logProgress,
): Promise<RevertResult> {
	const opts = { ...DEFAULT_REVERT_SETTINGS, ...settings }
	try {
		const request = validateRevertOptions(options, opts)
		return await runRevert(request, clients, opts, onProgress)
	} catch (error) {
		if (error instanceof PolicyError) {
			onProgress(progress(error.message))
			return { status: "policy-blocked", error }
		}
		const failure = error instanceof Error ? error : Error(String(error))
		onProgress(progress(`Revert failed: ${failure.message}`))
		return { status: "failed", error: failure }
	}
}
