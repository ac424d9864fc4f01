// Canonical game telemetry event names (Domain.[Subject].Action) with 2-3 PascalCase segments.
//
// NO INLINE LITERALS: all event names must be referenced from this registry.

export const GAME_EVENT_NAMES = [
    // World setup
    'World.Seed.Completed',
    // Rooms
    'World.Room.Described',
    'World.Room.NotFound',
    // Actors
    'World.Actor.Moved',
    'World.Actor.MoveFailed',
    // Trapdoors
    'World.Trapdoor.Triggered',
    'World.Trapdoor.Empty',
    // Internal / fallback diagnostics
    'Telemetry.EventName.Invalid'
] as const

export type GameEventName = (typeof GAME_EVENT_NAMES)[number]

export function isGameEventName(name: string): name is GameEventName {
    return GAME_EVENT_NAMES.some((registered) => registered === name)
}

// Regex every registered name must satisfy (checked in tests)
export const TELEMETRY_NAME_REGEX = /^[A-Z][A-Za-z]+(\.[A-Z][A-Za-z]+){1,2}$/
