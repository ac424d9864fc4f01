/**
 * A countable, weighted object lying in a room (or, later, carried by the player).
 * Rooms compare items by identity when removing them and by name when searching.
 */
export interface Item {
    name: string
    /** How many of the thing there are; anything other than 1 reads as plural. */
    count: number
    weight: number
    itemDescription: string
}

export interface CreateItemOptions {
    count?: number
    weight?: number
    itemDescription?: string
}

export function createItem(name: string, opts: CreateItemOptions = {}): Item {
    return {
        name,
        count: opts.count ?? 1,
        weight: opts.weight ?? 0,
        itemDescription: opts.itemDescription ?? ''
    }
}
