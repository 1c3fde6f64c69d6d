import type { FetchHistoryOptions, ReconcileOptions } from "@osm-undo/change"
import { InputValidationError } from "@osm-undo/shared/errors"
import { z } from "zod"

export const OSM_API_URL = "https://api.openstreetmap.org/api/0.6"
export const OSM_WEBSITE_URL = "https://www.openstreetmap.org"
export const OVERPASS_API_URL = "https://overpass-api.de/api/interpreter"
export const CREATED_BY = "osm-undo 0.1.0"

/** Roles that make an account a moderator. */
export const MODERATOR_ROLES = ["moderator", "administrator"]

/** The reverting user may revert `limit` changesets at once after `minEdits` edits. */
export interface ChangesetsLimitStep {
	minEdits: number
	limit: number
}

export type ChangesetsLimitConfig = Record<
	"user" | "moderator",
	ChangesetsLimitStep[]
>

export const CHANGESETS_LIMIT_CONFIG: ChangesetsLimitConfig = {
	user: [
		{ minEdits: 0, limit: 0 },
		{ minEdits: 10, limit: 1 },
		{ minEdits: 100, limit: 3 },
		{ minEdits: 1_000, limit: 10 },
		{ minEdits: 3_000, limit: 30 },
	],
	moderator: [{ minEdits: 0, limit: 50 }],
}

/**
 * Below this many edits, non-moderators cannot revert changesets made by moderators.
 */
export const CHANGESETS_LIMIT_MODERATOR_REVERT = 2_000

/** Shorter discussion texts are ignored to prevent accidental comments. */
export const MIN_DISCUSSION_LENGTH = 4

export interface RevertSettings {
	osmApiUrl: string
	/** Base URL of the map website, used for changeset and element links. */
	osmWebsiteUrl: string
	overpassApiUrl: string
	/** Value of the `Authorization` header sent to the OSM API. */
	authorization?: string
	createdBy: string
	/** Written as the `website` tag of revert changesets. */
	website?: string
	userAgent: string
	changesetsLimits: ChangesetsLimitConfig
	moderatorRevertThreshold: number
	minDiscussionLength: number
	history: Partial<Omit<FetchHistoryOptions, "onProgress">>
	reconcile: Partial<Omit<ReconcileOptions, "onProgress">>
}

export const DEFAULT_REVERT_SETTINGS: RevertSettings = {
	osmApiUrl: OSM_API_URL,
	osmWebsiteUrl: OSM_WEBSITE_URL,
	overpassApiUrl: OVERPASS_API_URL,
	createdBy: CREATED_BY,
	userAgent: CREATED_BY,
	changesetsLimits: CHANGESETS_LIMIT_CONFIG,
	moderatorRevertThreshold: CHANGESETS_LIMIT_MODERATOR_REVERT,
	minDiscussionLength: MIN_DISCUSSION_LENGTH,
	history: {},
	reconcile: {},
}

const EnvSchema = z.object({
	OSM_API_URL: z.string().url().optional(),
	OSM_WEBSITE_URL: z.string().url().optional(),
	OVERPASS_API_URL: z.string().url().optional(),
	OSM_AUTHORIZATION: z.string().min(1).optional(),
	OSM_UNDO_WEBSITE: z.string().url().optional(),
})

/**
 * Read settings from environment variables, falling back to the defaults. Empty variables count
 * as unset.
 * @throws InputValidationError when a variable holds an invalid URL.
 */
export function settingsFromEnv(
	env: Record<string, string | undefined> = process.env,
): RevertSettings {
	const set = Object.fromEntries(
		Object.entries(env).filter(([, value]) => value != null && value !== ""),
	)
	const parsed = EnvSchema.safeParse(set)
	if (!parsed.success) {
		const [issue] = parsed.error.issues
		throw new InputValidationError(
			`Invalid environment variable ${issue?.path.join(".")}: ${issue?.message}`,
		)
	}
	const vars = parsed.data
	return {
		...DEFAULT_REVERT_SETTINGS,
		osmApiUrl: vars.OSM_API_URL ?? OSM_API_URL,
		osmWebsiteUrl: vars.OSM_WEBSITE_URL ?? OSM_WEBSITE_URL,
		overpassApiUrl: vars.OVERPASS_API_URL ?? OVERPASS_API_URL,
		authorization: vars.OSM_AUTHORIZATION,
		website: vars.OSM_UNDO_WEBSITE,
	}
}
