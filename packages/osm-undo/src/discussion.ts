/**
 * Changeset discussion comments posted after a revert upload.
 * @module
 */

import type { MapDataClient } from "@osm-undo/shared/clients"
import { ignoreProgress, type OnProgress, stepProgress } from "@osm-undo/shared/progress"

export const DISCUSSION_TARGETS = ["all", "newest", "oldest"] as const

/** Which of the reverted changesets receive the discussion comment. */
export type DiscussionTarget = (typeof DISCUSSION_TARGETS)[number]

export function isDiscussionTarget(value: string): value is DiscussionTarget {
	return DISCUSSION_TARGETS.some((target) => target === value)
}

/**
 * Select the changesets to comment on from ids sorted ascending.
 */
export function filterDiscussionChangesets(
	changesetIds: number[],
	target: DiscussionTarget,
): number[] {
	switch (target) {
		case "all":
			return [...changesetIds]
		case "newest":
			return changesetIds.slice(-1)
		case "oldest":
			return changesetIds.slice(0, 1)
	}
}

export interface DiscussionStatus {
	changesetId: number
	status: string
}

/**
 * Post `text` on every changeset, one after another. Failures are reported in the status and do not
 * stop the remaining comments.
 */
export async function postDiscussions(
	mapData: Pick<MapDataClient, "postDiscussionComment">,
	changesetIds: number[],
	text: string,
	onProgress: OnProgress = ignoreProgress,
): Promise<DiscussionStatus[]> {
	const statuses: DiscussionStatus[] = []
	for (const [i, changesetId] of changesetIds.entries()) {
		const status = await mapData.postDiscussionComment(changesetId, text)
		onProgress(
			stepProgress(i + 1, changesetIds.length, `Changeset ${changesetId}: ${status}`),
		)
		statuses.push({ changesetId, status })
	}
	return statuses
}
