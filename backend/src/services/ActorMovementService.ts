import { isMoveActorFailure, type MoveActorResult } from '@zuul/shared'
import { inject, injectable } from 'inversify'
import { TOKENS } from '../di/tokens.js'
import type { IRoomRepository } from '../repos/roomRepository.js'
import { TelemetryService } from '../telemetry/TelemetryService.js'

export type ActorMoveOutcome = MoveActorResult | 'room-not-found'

/**
 * Moves NPCs between rooms addressed by id.
 *
 * Failures are reported, never thrown: the game keeps running when an actor
 * or destination has gone missing.
 */
@injectable()
export class ActorMovementService {
    constructor(
        @inject(TOKENS.RoomRepository) private rooms: IRoomRepository,
        @inject(TelemetryService) private telemetry: TelemetryService
    ) {}

    async moveActor(fromRoomId: string, actorName: string, toRoomId: string): Promise<ActorMoveOutcome> {
        const from = await this.rooms.get(fromRoomId)
        if (!from) {
            this.reportFailure(fromRoomId, actorName, toRoomId, 'room-not-found')
            return 'room-not-found'
        }

        // Unknown destination ids fall through as a missing destination.
        const to = await this.rooms.get(toRoomId)
        const result = from.moveActor(actorName, to)

        if (isMoveActorFailure(result)) {
            this.reportFailure(fromRoomId, actorName, toRoomId, result)
            return result
        }

        this.telemetry.trackGameEventStrict('World.Actor.Moved', { actorName, fromRoomId, toRoomId })
        return result
    }

    private reportFailure(fromRoomId: string, actorName: string, toRoomId: string, reason: Exclude<ActorMoveOutcome, 'moved'>): void {
        const properties = { actorName, fromRoomId, toRoomId, reason }
        this.telemetry.trackGameEventStrict('World.Actor.MoveFailed', properties)
        this.telemetry.trackWarning('actor or room does not exist', properties)
    }
}
