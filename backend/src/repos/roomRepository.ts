import type { Room } from '@zuul/shared'

// Repository contract isolates the room arena from services & seeding.
// Rooms still reference each other directly; the repository is how callers
// outside the graph address a room by its stable id.
export interface IRoomRepository {
    get(id: string): Promise<Room | undefined>
    /** Register a room. Re-adding an id replaces the previous room. */
    add(room: Room): Promise<{ created: boolean; id: string }>
    listAll(): Promise<Room[]>
    clear(): void
}
