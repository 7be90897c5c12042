/**
 * @bearing/core
 *
 * Framework-agnostic attention-allocation engine: record store, health,
 * urgency, briefing, drift, weekly review, scheduling and notifications.
 */

export * from './common/index.js'
export * from './storage/index.js'
export * from './campaigns/index.js'
export * from './missions/index.js'
export * from './sorties/index.js'
export * from './checkins/index.js'
export * from './allocation/index.js'
export * from './review/index.js'
export * from './notify/index.js'
export * from './schedule/index.js'
export * from './config/index.js'
