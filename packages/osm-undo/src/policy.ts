/**
 * Limits on who may revert what.
 *
 * The number of changesets reverted at once grows with the edit count of the reverting user, and
 * inexperienced users cannot revert the work of moderators.
 *
 * @module
 */

import { PolicyError } from "@osm-undo/shared/errors"
import type { OsmUser } from "@osm-undo/shared/types"
import { plural } from "@osm-undo/shared/utils"
import {
	type ChangesetsLimitStep,
	MODERATOR_ROLES,
	type RevertSettings,
} from "./settings"

export function isModerator(user: Pick<OsmUser, "roles">) {
	return user.roles.some((role) => MODERATOR_ROLES.includes(role))
}

/**
 * The highest limit of all steps reached with `edits`. 0 when no step is reached.
 */
export function changesetsLimit(edits: number, steps: ChangesetsLimitStep[]) {
	return Math.max(
		0,
		...steps.filter((step) => step.minEdits <= edits).map((step) => step.limit),
	)
}

/** The next step above `edits`, if any. */
function nextStep(edits: number, steps: ChangesetsLimitStep[]) {
	return steps
		.filter((step) => step.minEdits > edits)
		.toSorted((a, b) => a.minEdits - b.minEdits)[0]
}

/**
 * @throws PolicyError when `user` may not revert `count` changesets at once.
 */
export function checkChangesetsLimit(
	user: OsmUser,
	count: number,
	{ changesetsLimits }: Pick<RevertSettings, "changesetsLimits">,
) {
	const steps = changesetsLimits[isModerator(user) ? "moderator" : "user"]
	const edits = user.changesetsCount
	const limit = changesetsLimit(edits, steps)
	const next = nextStep(edits, steps)

	if (limit === 0) {
		throw new PolicyError(
			next
				? `You need to make at least ${plural(next.minEdits, "edit")} to revert changesets`
				: "This account cannot revert changesets",
			{ edits, limit },
		)
	}
	if (count > limit) {
		let message = `For safety, you can only revert up to ${plural(limit, "changeset")} at a time`
		if (next) message += `. To increase this limit, make at least ${plural(next.minEdits, "edit")}`
		throw new PolicyError(message, { edits, limit, count })
	}
	return limit
}

/**
 * Moderators and experienced users may revert changesets made by moderators.
 */
export function canRevertModerators(
	user: OsmUser,
	{ moderatorRevertThreshold }: Pick<RevertSettings, "moderatorRevertThreshold">,
) {
	return isModerator(user) || user.changesetsCount >= moderatorRevertThreshold
}

/**
 * @throws PolicyError when `author`, the author of the changeset, is a moderator.
 */
export function checkRevertTarget(author: OsmUser | null, changesetId: number) {
	if (author && isModerator(author)) {
		throw new PolicyError(
			`Changeset ${changesetId} was made by a moderator and cannot be reverted`,
			{ changesetId, author: author.id },
		)
	}
}

/**
 * @throws PolicyError when the revert has more elements than a single upload may carry.
 */
export function checkUploadSize(size: number, maxSize: number, changesets: number) {
	if (size <= maxSize) return
	let message = `Revert is too big: ${size.toLocaleString("en-US")} > ${maxSize.toLocaleString("en-US")}`
	if (changesets > 1) message += ". Try reverting fewer changesets at once"
	throw new PolicyError(message, { size, maxSize })
}
