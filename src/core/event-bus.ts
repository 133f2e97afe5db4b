/**
 * TypedEventBus: typed pub/sub between the control loop and its observers.
 *
 * Dispatch is synchronous: handlers run inside emit(). The loop itself never
 * waits on a subscriber, so slow observers (CLI progress, recorders) must
 * schedule their own async work.
 */

import { EventEmitter } from 'node:events'
import type { OrchestratorEvents } from './event-bus.types.js'

export type EventHandler<K extends keyof OrchestratorEvents> = (
  payload: OrchestratorEvents[K]
) => void

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

export interface TypedEventBus {
  /** Emit an event; every registered handler runs before emit() returns. */
  emit<K extends keyof OrchestratorEvents>(event: K, payload: OrchestratorEvents[K]): void

  /** Subscribe to every emission of an event. */
  on<K extends keyof OrchestratorEvents>(event: K, handler: EventHandler<K>): void

  /** Subscribe to the next emission only. */
  once<K extends keyof OrchestratorEvents>(event: K, handler: EventHandler<K>): void

  /** Unsubscribe a handler. Unknown handlers are ignored. */
  off<K extends keyof OrchestratorEvents>(event: K, handler: EventHandler<K>): void

  /** Number of handlers currently attached to an event. */
  listenerCount(event: keyof OrchestratorEvents): number
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * EventEmitter-backed bus.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('iteration:complete', ({ iteration, pv }) => {
 *   console.log(`Iteration ${iteration} measured PV=${pv}`)
 * })
 * bus.emit('iteration:complete', { runId: 'run-1', iteration: 1, pv: 0.42, bestPv: 0.42 })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter = new EventEmitter()

  constructor(maxListeners = 50) {
    this._emitter.setMaxListeners(maxListeners)
  }

  emit<K extends keyof OrchestratorEvents>(event: K, payload: OrchestratorEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof OrchestratorEvents>(event: K, handler: EventHandler<K>): void {
    // EventEmitter types listeners as (...args: any[]) => void
    this._emitter.on(event, handler as (arg: unknown) => void)
  }

  once<K extends keyof OrchestratorEvents>(event: K, handler: EventHandler<K>): void {
    this._emitter.once(event, handler as (arg: unknown) => void)
  }

  off<K extends keyof OrchestratorEvents>(event: K, handler: EventHandler<K>): void {
    this._emitter.off(event, handler as (arg: unknown) => void)
  }

  listenerCount(event: keyof OrchestratorEvents): number {
    return this._emitter.listenerCount(event)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
