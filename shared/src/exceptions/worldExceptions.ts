/**
 * Domain exceptions for world setup and configuration.
 *
 * Gameplay operations on rooms never throw; these cover the places where a broken
 * blueprint or configuration has to stop startup.
 */

/**
 * Base class for all world-related domain exceptions.
 */
export abstract class WorldException extends Error {
    constructor(
        message: string,
        public readonly statusCode?: number
    ) {
        super(message)
        this.name = this.constructor.name
        Error.captureStackTrace(this, this.constructor)
    }
}

/**
 * A referenced room (or other resource) does not exist.
 */
export class NotFoundException extends WorldException {
    constructor(
        message: string,
        public readonly resourceId?: string
    ) {
        super(message, 404)
    }
}

/**
 * Malformed blueprint or configuration data.
 */
export class ValidationException extends WorldException {
    constructor(
        message: string,
        public readonly details?: string
    ) {
        super(message, 400)
    }
}
