import type { Room } from '@zuul/shared'
import { injectable } from 'inversify'
import { BaseMemoryRepository } from './base/BaseMemoryRepository.js'
import type { IRoomRepository } from './roomRepository.js'

/**
 * In-memory arena of rooms keyed by id. Used for local play & tests.
 */
@injectable()
export class InMemoryRoomRepository extends BaseMemoryRepository<string, Room> implements IRoomRepository {
    async get(id: string): Promise<Room | undefined> {
        return this.records.get(id)
    }

    async add(room: Room): Promise<{ created: boolean; id: string }> {
        const created = !this.records.has(room.id)
        this.records.set(room.id, room)
        return { created, id: room.id }
    }

    async listAll(): Promise<Room[]> {
        return Array.from(this.records.values())
    }
}
