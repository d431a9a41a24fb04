/**
 * @crosslag/bar-sync
 *
 * Keeps the two correlated series in minute-aligned rolling buffers and
 * publishes an event for every completed bar.
 */

export { DualSeriesSynchronizer } from './synchronizer.js'
export type { DualSeriesSynchronizerOptions } from './synchronizer.js'

export { EventBus } from './events.js'
export type { BarEvent, DroppedBarEvent, SyncEventMap, EventListener } from './events.js'
