import { pickTrapdoorDestination, type RandomSource, type Room } from '@zuul/shared'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import type { IRoomRepository } from '../repos/roomRepository.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'

/**
 * Decides where a trapdoor room drops whoever enters it.
 */
@injectable()
export class TrapdoorService {
    private random: RandomSource = Math.random

    constructor(
        @inject(TOKENS.RoomRepository) private rooms: IRoomRepository,
        @inject(TelemetryService) private telemetry: TelemetryService
    ) {}

    /** Swap the random source (tests). */
    setRandomSource(random: RandomSource): void {
        this.random = random
    }

    /**
     * Destination for an occupant of `roomId`, or undefined when the room is unknown,
     * not a trapdoor, or has no destinations.
     */
    async resolve(roomId: string): Promise<Room | undefined> {
        const room = await this.rooms.get(roomId)
        if (!room || !room.isTrapdoor()) return undefined

        const destination = pickTrapdoorDestination(room, this.random)
        if (!destination) {
            this.telemetry.trackGameEventStrict('World.Trapdoor.Empty', { roomId })
            return undefined
        }

        this.telemetry.trackGameEventStrict('World.Trapdoor.Triggered', { roomId, destinationId: destination.id })
        return destination
    }
}
