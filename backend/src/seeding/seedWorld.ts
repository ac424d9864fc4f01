import {
    createActor,
    createItem,
    getOppositeDirection,
    isDirection,
    type Item,
    type ItemBlueprint,
    NotFoundException,
    parseWorldBlueprint,
    Room,
    type WorldBlueprint
} from '@zuul/shared'
import { readFile } from 'node:fs/promises'
import starterRoomsData from '../data/zuulRooms.json' with { type: 'json' }
import type { IRoomRepository } from '../repos/roomRepository.js'

export interface SeedWorldOptions {
    roomRepository: IRoomRepository
    /** Raw blueprint data; validated before use. Defaults to the bundled starter world. */
    blueprint?: unknown
    log?: (...args: unknown[]) => void
    /** Non-fatal blueprint problems; falls back to `log`. */
    warn?: (message: string, properties: Record<string, unknown>) => void
}

export interface SeedWorldResult {
    roomsCreated: number
    exitsCreated: number
    itemsPlaced: number
    actorsPlaced: number
    trapdoorDestinationsLinked: number
}

/**
 * Read a blueprint from disk. Missing or unreadable files surface as the fs error.
 */
export async function loadBlueprintFile(path: string): Promise<WorldBlueprint> {
    const raw = await readFile(path, 'utf-8')
    return parseWorldBlueprint(JSON.parse(raw))
}

const toItem = (bp: ItemBlueprint) => createItem(bp.name, { count: bp.count, weight: bp.weight, itemDescription: bp.itemDescription })

/**
 * Build the room graph from a blueprint and register every room in the repository.
 *
 * Phase 1 creates all rooms with their contents; phase 2 links exits, trapdoor
 * destinations and required keys, so a blueprint may reference rooms declared further down.
 * Rooms reach the repository only once every link resolved: a link to an unknown room id
 * aborts seeding with NotFoundException and leaves the repository untouched.
 *
 * A required key whose name matches an item placed somewhere in the world is that same item.
 */
export async function seedWorld(opts: SeedWorldOptions): Promise<SeedWorldResult> {
    const blueprint = parseWorldBlueprint(opts.blueprint ?? starterRoomsData)
    const log = opts.log || (() => {})
    const warn = opts.warn || ((message: string, properties: Record<string, unknown>) => log(message, properties))
    const repo = opts.roomRepository

    const rooms = new Map<string, Room>()
    const placedItems = new Map<string, Item>()
    let roomsCreated = 0
    let exitsCreated = 0
    let itemsPlaced = 0
    let actorsPlaced = 0
    let trapdoorDestinationsLinked = 0

    // Phase 1: rooms and their contents
    for (const bp of blueprint) {
        const room = new Room(bp.description, bp.trapdoor, bp.id)
        for (const itemBp of bp.items) {
            const item = toItem(itemBp)
            room.addItem(item)
            if (!placedItems.has(item.name)) placedItems.set(item.name, item)
            itemsPlaced++
        }
        for (const actor of bp.actors) {
            room.setActor(createActor(actor.name, actor.description))
            actorsPlaced++
        }
        rooms.set(bp.id, room)
    }

    const resolve = (id: string, from: string): Room => {
        const room = rooms.get(id)
        if (!room) {
            throw new NotFoundException(`Room "${from}" links to unknown room "${id}"`, id)
        }
        return room
    }

    // Phase 2: exits, trapdoor destinations and keys
    for (const bp of blueprint) {
        const from = resolve(bp.id, bp.id)
        for (const exit of bp.exits) {
            const to = resolve(exit.to, bp.id)
            from.setExit(exit.direction, to)
            exitsCreated++
            if (!exit.reciprocal) continue
            if (!isDirection(exit.direction)) {
                warn('seedWorld: no opposite for direction', { direction: exit.direction, roomId: bp.id })
                continue
            }
            to.setExit(getOppositeDirection(exit.direction), from)
            exitsCreated++
        }
        for (const destinationId of bp.trapdoorDestinations) {
            from.addTrapdoorDestination(resolve(destinationId, bp.id))
            trapdoorDestinationsLinked++
        }
        if (bp.requiredKey) {
            from.setRequiredKey(placedItems.get(bp.requiredKey.name) ?? toItem(bp.requiredKey))
        }
    }

    // Phase 3: register
    for (const room of rooms.values()) {
        const added = await repo.add(room)
        if (added.created) roomsCreated++
    }

    log('seedWorld: rooms', roomsCreated, 'exits', exitsCreated)

    return { roomsCreated, exitsCreated, itemsPlaced, actorsPlaced, trapdoorDestinationsLinked }
}
