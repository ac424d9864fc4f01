import type { Room } from './room.js'

/**
 * The person at the keyboard. Tracks where they stand; inventory and coin pouch are not modelled yet.
 */
export class Player {
    private currentRoom?: Room

    constructor(
        readonly id: string,
        readonly name: string
    ) {}

    getCurrentRoom(): Room | undefined {
        return this.currentRoom
    }

    /** Place the player in a room. Required keys are not checked here. */
    enterRoom(room: Room): void {
        this.currentRoom = room
    }
}
