import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import type { IRoomRepository } from '../repos/roomRepository.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'

/**
 * Renders rooms for the player by id.
 */
@injectable()
export class RoomDescriptionService {
    constructor(
        @inject(TOKENS.RoomRepository) private rooms: IRoomRepository,
        @inject(TelemetryService) private telemetry: TelemetryService
    ) {}

    /** Long description of the room, or undefined for an unknown id. */
    async describe(roomId: string, opts?: { playerGuid?: string }): Promise<string | undefined> {
        const room = await this.rooms.get(roomId)
        if (!room) {
            this.telemetry.trackGameEventStrict('World.Room.NotFound', { roomId }, opts)
            return undefined
        }
        const text = room.getLongDescription()
        this.telemetry.trackGameEventStrict(
            'World.Room.Described',
            { roomId, itemCount: room.getItems().length, actorCount: room.getActors().length },
            opts
        )
        return text
    }
}
