import type { Actor } from '../actor.js'
import type { Item } from '../item.js'

/** Everything the long description needs, already in display order. */
export interface RoomDescriptionParts {
    description: string
    items: readonly Item[]
    actors: readonly Actor[]
    exitDirections: readonly string[]
}

/**
 * Render the exits line, e.g. "Exits: north west".
 * A room with no exits still renders the bare "Exits:" label.
 */
export function generateExitString(directions: readonly string[]): string {
    let result = 'Exits:'
    for (const direction of directions) {
        result += ` ${direction}`
    }
    return result
}

/**
 * One line per item. Anything with a count other than 1 gets the plural phrasing,
 * even when the name has no plural form ("There are sword laying around.").
 */
export function generateItemLine(item: Item): string {
    const lead = item.count !== 1 ? `There are ${item.name} laying around.` : `There is a(n) ${item.name} laying around.`
    if (item.itemDescription.trim().length > 0) {
        return `${lead} ${item.itemDescription}.\n`
    }
    return `${lead}\n`
}

export function generateActorLine(actor: Actor): string {
    return `A(n) ${actor.name} is in the room. ${actor.description ?? ''}\n`
}

/**
 * Compose the prose shown to the player when they look around.
 *
 * @example
 * generateLongDescription({
 *     description: 'a kitchen',
 *     items: [{ name: 'apples', count: 3, weight: 1, itemDescription: '' }],
 *     actors: [],
 *     exitDirections: ['north']
 * })
 * // Returns: "You are a kitchen.\nThere are apples laying around.\nExits: north"
 */
export function generateLongDescription(parts: RoomDescriptionParts): string {
    let text = `You are ${parts.description}.\n`
    for (const item of parts.items) {
        text += generateItemLine(item)
    }
    for (const actor of parts.actors) {
        text += generateActorLine(actor)
    }
    return text + generateExitString(parts.exitDirections)
}
