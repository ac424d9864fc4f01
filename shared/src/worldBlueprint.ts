/**
 * World Blueprint Schema (Zod validation)
 *
 * Describes the rooms, links and contents a world is seeded from. Links refer to rooms by id
 * so the blueprint itself stays acyclic JSON even when the resulting room graph is not.
 */
import { z } from 'zod'
import { ValidationException } from './exceptions/index.js'

export const ItemBlueprintSchema = z.object({
    name: z.string().min(1),
    count: z.number().int().nonnegative().default(1),
    weight: z.number().nonnegative().default(0),
    itemDescription: z.string().default('')
})
export type ItemBlueprint = z.infer<typeof ItemBlueprintSchema>

export const ActorBlueprintSchema = z.object({
    name: z.string().min(1),
    description: z.string().optional()
})
export type ActorBlueprint = z.infer<typeof ActorBlueprintSchema>

export const ExitBlueprintSchema = z.object({
    direction: z.string().min(1),
    to: z.string().min(1),
    /** Also create the opposite exit back to this room (recognised directions only). */
    reciprocal: z.boolean().optional()
})
export type ExitBlueprint = z.infer<typeof ExitBlueprintSchema>

export const RoomBlueprintSchema = z.object({
    id: z.string().min(1),
    description: z.string(),
    trapdoor: z.boolean().default(false),
    exits: z.array(ExitBlueprintSchema).default([]),
    items: z.array(ItemBlueprintSchema).default([]),
    actors: z.array(ActorBlueprintSchema).default([]),
    requiredKey: ItemBlueprintSchema.optional(),
    trapdoorDestinations: z.array(z.string().min(1)).default([])
})
export type RoomBlueprint = z.infer<typeof RoomBlueprintSchema>

export const WorldBlueprintSchema = z
    .array(RoomBlueprintSchema)
    .min(1)
    .superRefine((rooms, ctx) => {
        const seen = new Set<string>()
        rooms.forEach((room, index) => {
            if (seen.has(room.id)) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate room id "${room.id}"`, path: [index, 'id'] })
            }
            seen.add(room.id)
        })
    })
export type WorldBlueprint = z.infer<typeof WorldBlueprintSchema>

/**
 * Validate raw blueprint data.
 * Throws ValidationException carrying the flattened zod issues on failure.
 */
export function parseWorldBlueprint(data: unknown): WorldBlueprint {
    const result = WorldBlueprintSchema.safeParse(data)
    if (result.success) {
        return result.data
    }
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new ValidationException('World blueprint is invalid', details)
}
