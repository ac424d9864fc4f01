import { v4 as uuidv4 } from 'uuid'
import type { Actor } from './actor.js'
import type { MoveActorResult } from './domainModels.js'
import type { Item } from './item.js'
import { generateExitString, generateLongDescription } from './utils/roomDescriptionGenerator.js'

/**
 * One location in the game world.
 *
 * A room is connected to other rooms through exits, keyed by a free-form direction label.
 * Exits and trapdoor destinations are plain references, so layouts may loop back on themselves.
 * Exits and actors keep insertion order, which is the order the long description lists them in.
 *
 * Absence is never an error here: lookups return `undefined` and removals of things that
 * are not present do nothing.
 */
export class Room {
    readonly id: string
    private description: string
    private readonly trapdoor: boolean
    private readonly exits = new Map<string, Room>()
    private readonly items: Item[] = []
    private readonly actors = new Map<string, Actor>()
    private readonly trapdoorDestinations: Room[] = []
    private requiredKey?: Item

    /**
     * @param description - Something like "in a kitchen" or "outside the main entrance"; rendered after "You are ".
     * @param isTrapdoor - Whether entering this room may drop the occupant into one of its trapdoor destinations.
     * @param id - Stable identifier; a UUIDv4 is generated when omitted.
     */
    constructor(description: string, isTrapdoor = false, id: string = uuidv4()) {
        this.id = id
        this.description = description
        this.trapdoor = isTrapdoor
    }

    isTrapdoor(): boolean {
        return this.trapdoor
    }

    // --- Exits -----------------------------------------------------------------

    /** Define (or replace) the exit in the given direction. */
    setExit(direction: string, neighbor: Room): void {
        this.exits.set(direction, neighbor)
    }

    getExit(direction: string): Room | undefined {
        return this.exits.get(direction)
    }

    getExitDirections(): string[] {
        return Array.from(this.exits.keys())
    }

    /** "Exits:" followed by each direction label, e.g. "Exits: north west". */
    getExitString(): string {
        return generateExitString(this.getExitDirections())
    }

    // --- Trapdoor --------------------------------------------------------------

    /** Append a room the trapdoor may lead to. Duplicates are kept. */
    addTrapdoorDestination(room: Room): void {
        this.trapdoorDestinations.push(room)
    }

    getTrapdoorDestinations(): readonly Room[] {
        return [...this.trapdoorDestinations]
    }

    // --- Items -----------------------------------------------------------------

    addItem(item: Item): void {
        this.items.push(item)
    }

    /** Remove the first occurrence of this exact item. */
    removeItem(item: Item): void {
        const index = this.items.indexOf(item)
        if (index !== -1) {
            this.items.splice(index, 1)
        }
    }

    /** Snapshot of the items in the room; mutating it does not touch the room. */
    getItems(): readonly Item[] {
        return [...this.items]
    }

    /** First item whose name matches exactly (case-sensitive). */
    findItemByName(name: string): Item | undefined {
        return this.items.find((item) => item.name === name)
    }

    // --- Description -----------------------------------------------------------

    getShortDescription(): string {
        return this.description
    }

    setDescription(description: string): void {
        this.description = description
    }

    /**
     * Full description in the form:
     * ```
     * You are in the kitchen.
     * There is a(n) knife laying around. sharp.
     * A(n) cook is in the room. Busy stirring a pot.
     * Exits: north west
     * ```
     */
    getLongDescription(): string {
        return generateLongDescription({
            description: this.description,
            items: this.items,
            actors: Array.from(this.actors.values()),
            exitDirections: this.getExitDirections()
        })
    }

    // --- Required key ----------------------------------------------------------

    /** Item needed to enter this room. Stored only; callers decide whether to enforce it. */
    getRequiredKey(): Item | undefined {
        return this.requiredKey
    }

    setRequiredKey(key: Item | undefined): void {
        this.requiredKey = key
    }

    // --- Actors ----------------------------------------------------------------

    /** Put an actor in the room, replacing any actor already here under the same name. */
    setActor(actor: Actor): void {
        this.actors.set(actor.name, actor)
    }

    getActor(name: string): Actor | undefined {
        return this.actors.get(name)
    }

    getActors(): Actor[] {
        return Array.from(this.actors.values())
    }

    /** Remove the actor for good. Does nothing if no actor has that name. */
    removeActor(name: string): void {
        this.actors.delete(name)
    }

    /**
     * Move the named actor from this room to `destination`.
     * Leaves both rooms untouched when the actor is not here or the destination is missing.
     */
    moveActor(actorName: string, destination: Room | null | undefined): MoveActorResult {
        const actor = this.actors.get(actorName)
        if (!actor) {
            console.warn('actor or room does not exist', { actorName, roomId: this.id })
            return 'actor-not-found'
        }
        if (!(destination instanceof Room)) {
            console.warn('actor or room does not exist', { actorName, roomId: this.id })
            return 'invalid-destination'
        }
        // Same room: keep the actor's place in the listing.
        if (destination === this) return 'moved'
        this.actors.delete(actorName)
        destination.setActor(actor)
        return 'moved'
    }
}
