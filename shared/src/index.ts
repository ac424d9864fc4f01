// Root barrel – intentionally concise. Grouped re-exports keep exports close to implementation.

export * from './actor.js'
export * from './domainModels.js'
export * from './exceptions/index.js'
export * from './item.js'
export * from './player.js'
export * from './room.js'
export * from './serviceConstants.js'
export * from './telemetryEvents.js'
export * from './trapdoor.js'
export * from './utils/roomDescriptionGenerator.js'
export * from './worldBlueprint.js'
