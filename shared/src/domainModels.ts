/**
 * Core domain model types for the Zuul world graph.
 *
 * Rooms reference each other directly (exits, trapdoor destinations) and may form cycles.
 * The backend keeps an arena of rooms keyed by their stable id so callers outside the
 * graph can address a room without holding a reference to it.
 */

// --- Direction & movement ----------------------------------------------------

/** Cardinal & common text‑adventure directions. Exit labels are free-form; these are the ones with a known opposite. */
export type Direction =
    | 'north'
    | 'south'
    | 'east'
    | 'west'
    | 'northeast'
    | 'northwest'
    | 'southeast'
    | 'southwest'
    | 'up'
    | 'down'
    | 'in'
    | 'out'

export const DIRECTIONS: readonly Direction[] = [
    'north',
    'south',
    'east',
    'west',
    'northeast',
    'northwest',
    'southeast',
    'southwest',
    'up',
    'down',
    'in',
    'out'
] as const

export function isDirection(value: string): value is Direction {
    return DIRECTIONS.some((direction) => direction === value)
}

/** Map of directions to their canonical opposites for bidirectional exit creation */
const OPPOSITE_DIRECTIONS: Readonly<Record<Direction, Direction>> = {
    north: 'south',
    south: 'north',
    east: 'west',
    west: 'east',
    northeast: 'southwest',
    southwest: 'northeast',
    northwest: 'southeast',
    southeast: 'northwest',
    up: 'down',
    down: 'up',
    in: 'out',
    out: 'in'
} as const

export function getOppositeDirection(direction: Direction): Direction {
    return OPPOSITE_DIRECTIONS[direction]
}

// --- Actor movement ----------------------------------------------------------

/** Outcome of relocating an actor between rooms. Callers may ignore it. */
export type MoveActorResult = 'moved' | 'actor-not-found' | 'invalid-destination'

export function isMoveActorFailure(result: MoveActorResult): result is Exclude<MoveActorResult, 'moved'> {
    return result !== 'moved'
}
