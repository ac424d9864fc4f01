import type { Room } from './room.js'

/** Source of randomness in [0, 1); injectable for deterministic tests. NaN is treated as 0. */
export type RandomSource = () => number

/**
 * Pick where a trapdoor drops its occupant.
 * Returns undefined for rooms that are not trapdoors or have nowhere to send anyone.
 */
export function pickTrapdoorDestination(room: Room, random: RandomSource = Math.random): Room | undefined {
    if (!room.isTrapdoor()) return undefined
    const destinations = room.getTrapdoorDestinations()
    if (destinations.length === 0) return undefined
    const roll = random()
    const index = Number.isNaN(roll) ? 0 : Math.min(Math.floor(roll * destinations.length), destinations.length - 1)
    return destinations[Math.max(index, 0)]
}
