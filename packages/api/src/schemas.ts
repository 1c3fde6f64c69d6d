/**
 * Response schemas of the OSM API and Overpass API.
 *
 * @module
 */

import { OSM_ENTITY_TYPES } from "@osm-undo/shared/types"
import { z } from "zod"

export const EntityTypeSchema = z.enum(OSM_ENTITY_TYPES)

export const TagsSchema = z.record(z.string())

export const MemberSchema = z.object({
	type: EntityTypeSchema,
	ref: z.number(),
	role: z.string().default(""),
})

// =============================================================================
// OSM API (JSON)
// =============================================================================

export const ChangesetResponseSchema = z.object({
	changeset: z.object({
		id: z.number(),
		created_at: z.string(),
		closed_at: z.string().optional(),
		open: z.boolean(),
		user: z.string().optional(),
		uid: z.number(),
		changes_count: z.number(),
		tags: TagsSchema.default({}),
	}),
})

export type ChangesetResponse = z.infer<typeof ChangesetResponseSchema>

export const UserResponseSchema = z.object({
	user: z.object({
		id: z.number(),
		display_name: z.string(),
		roles: z.array(z.string()).default([]),
		changesets: z.object({ count: z.number() }),
	}),
})

export type UserResponse = z.infer<typeof UserResponseSchema>

export const CapabilitiesResponseSchema = z.object({
	api: z.object({
		changesets: z.object({ maximum_elements: z.number() }),
	}),
})

const ApiElementBase = {
	id: z.number(),
	version: z.number(),
	timestamp: z.string(),
	changeset: z.number(),
	user: z.string().optional(),
	uid: z.number().optional(),
	visible: z.boolean().default(true),
	tags: TagsSchema.default({}),
}

export const ApiElementSchema = z.discriminatedUnion("type", [
	z.object({
		...ApiElementBase,
		type: z.literal("node"),
		lat: z.number().optional(),
		lon: z.number().optional(),
	}),
	z.object({
		...ApiElementBase,
		type: z.literal("way"),
		nodes: z.array(z.number()).default([]),
	}),
	z.object({
		...ApiElementBase,
		type: z.literal("relation"),
		members: z.array(MemberSchema).default([]),
	}),
])

export type ApiElement = z.infer<typeof ApiElementSchema>

export const ElementsResponseSchema = z.object({
	elements: z.array(ApiElementSchema),
})

// =============================================================================
// OSM API (osmChange XML, as parsed by fast-xml-parser)
// =============================================================================

const XmlTagSchema = z.object({ k: z.string(), v: z.string() })

const XmlElementBase = {
	id: z.coerce.number(),
	version: z.coerce.number(),
	changeset: z.coerce.number(),
	timestamp: z.string(),
	user: z.string().optional(),
	uid: z.coerce.number().optional(),
	visible: z.string().optional(),
	tag: z.array(XmlTagSchema).default([]),
}

export const XmlNodeSchema = z.object({
	...XmlElementBase,
	lat: z.coerce.number().optional(),
	lon: z.coerce.number().optional(),
})

export const XmlWaySchema = z.object({
	...XmlElementBase,
	nd: z.array(z.object({ ref: z.coerce.number() })).default([]),
})

export const XmlRelationSchema = z.object({
	...XmlElementBase,
	member: z
		.array(
			z.object({
				type: EntityTypeSchema,
				ref: z.coerce.number(),
				role: z.string().default(""),
			}),
		)
		.default([]),
})

/** An empty `<create/>` section parses as an empty or whitespace-only string. */
const emptyAsObject = (value: unknown) =>
	typeof value === "string" && value.trim() === "" ? {} : value

const XmlSectionSchema = z.preprocess(
	emptyAsObject,
	z.object({
		node: z.array(XmlNodeSchema).default([]),
		way: z.array(XmlWaySchema).default([]),
		relation: z.array(XmlRelationSchema).default([]),
	}),
)

export const OsmChangeXmlSchema = z.object({
	osmChange: z.preprocess(
		emptyAsObject,
		z.object({
			create: z.array(XmlSectionSchema).default([]),
			modify: z.array(XmlSectionSchema).default([]),
			delete: z.array(XmlSectionSchema).default([]),
		}),
	),
})

export type OsmChangeXml = z.infer<typeof OsmChangeXmlSchema>

// =============================================================================
// Overpass API (JSON)
// =============================================================================

/** `out meta` elements carry version metadata; `out ids` elements only type and id. */
const OverpassElementBase = {
	id: z.number(),
	version: z.number().optional(),
	timestamp: z.string().optional(),
	changeset: z.number().optional(),
	user: z.string().optional(),
	uid: z.number().optional(),
	tags: TagsSchema.optional(),
}

export const OverpassElementSchema = z.discriminatedUnion("type", [
	z.object({
		...OverpassElementBase,
		type: z.literal("node"),
		lat: z.number().optional(),
		lon: z.number().optional(),
	}),
	z.object({
		...OverpassElementBase,
		type: z.literal("way"),
		nodes: z.array(z.number()).optional(),
	}),
	z.object({
		...OverpassElementBase,
		type: z.literal("relation"),
		members: z.array(MemberSchema).optional(),
	}),
])

export type OverpassElement = z.infer<typeof OverpassElementSchema>

export const OverpassResponseSchema = z.object({
	osm3s: z.object({ timestamp_osm_base: z.string().datetime() }).optional(),
	elements: z.array(OverpassElementSchema),
	remark: z.string().optional(),
})

export type OverpassResponse = z.infer<typeof OverpassResponseSchema>
