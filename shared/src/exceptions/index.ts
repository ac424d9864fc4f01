/**
 * Domain exceptions for world setup.
 */

export { WorldException, NotFoundException, ValidationException } from './worldExceptions.js'
