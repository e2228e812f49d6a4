// TimerRuntime - context object tying the engine together
//
// Owns the store, connection and dispatcher and is passed explicitly to every
// consumer (renderer, keyboard, status surface). Frames, ticks and controls all
// run on the one event loop, so store writes never interleave.

import type { Settings } from '@/config/settings'
import { TimerConnection } from '@/transport/TimerConnection'
import { normalize as defaultNormalize, type Normalizer } from '@/protocol/normalizer'
import { TimerStore } from './TimerStore'
import { IntentDispatcher } from './IntentDispatcher'
import { createComponentLogger } from '@/utils/logger'
import { framesReceived } from '@/api/middlewares/metrics'

const logger = createComponentLogger('TimerRuntime')

export const TICK_INTERVAL_MS = 1000

export type RuntimeSettings = Pick<
  Settings,
  'serverUrl' | 'addtimeAffectsEventDuration' | 'displayMode' | 'reconnectDelayMs' | 'maxReconnectDelayMs'
>

export interface TimerRuntimeOptions {
  settings: RuntimeSettings
  normalizer?: Normalizer
  tickIntervalMs?: number
}

export class TimerRuntime {
  public readonly store: TimerStore
  public readonly connection: TimerConnection
  public readonly dispatcher: IntentDispatcher
  private readonly normalize: Normalizer
  private readonly tickIntervalMs: number
  private alignTimer?: NodeJS.Timeout
  private tickTimer?: NodeJS.Timeout
  private unsubscribers: Array<() => void> = []
  private running = false

  constructor(options: TimerRuntimeOptions) {
    const { settings } = options
    this.normalize = options.normalizer ?? defaultNormalize
    this.tickIntervalMs = options.tickIntervalMs ?? TICK_INTERVAL_MS

    this.store = new TimerStore({ displayMode: settings.displayMode })
    this.connection = new TimerConnection({
      serverUrl: settings.serverUrl,
      reconnectDelayMs: settings.reconnectDelayMs,
      maxReconnectDelayMs: settings.maxReconnectDelayMs,
    })
    this.dispatcher = new IntentDispatcher(this.connection, this.store, {
      addtimeAffectsEventDuration: settings.addtimeAffectsEventDuration,
    })
  }

  /**
   * Connect to the timer server and start the local tick
   */
  start(): void {
    if (this.running) {
      return
    }
    this.running = true

    this.unsubscribers.push(
      this.connection.onFrame(frame => this.handleFrame(frame)),
      this.connection.onStatus(connected => this.store.setConnected(connected))
    )
    this.connection.connect()
    this.startTicking()

    logger.info({ url: this.connection.url }, 'Timer runtime started')
  }

  /**
   * Stop ticking and cancel reconnects. The store keeps its last model.
   */
  stop(): void {
    if (!this.running) {
      return
    }
    this.running = false

    if (this.alignTimer) clearTimeout(this.alignTimer)
    if (this.tickTimer) clearInterval(this.tickTimer)
    this.alignTimer = undefined
    this.tickTimer = undefined

    this.connection.close()
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe()
    }

    logger.info('Timer runtime stopped')
  }

  isRunning(): boolean {
    return this.running
  }

  private handleFrame(frame: unknown): void {
    const update = this.normalize(frame)
    framesReceived.inc({ kind: update.kind })
    this.store.applyUpdate(update)
  }

  // First tick lands on the next wall-clock boundary so the clock face turns over on time
  private startTicking(): void {
    const delay = this.tickIntervalMs - (Date.now() % this.tickIntervalMs)
    this.alignTimer = setTimeout(() => {
      this.alignTimer = undefined
      this.tick()
      this.tickTimer = setInterval(() => this.tick(), this.tickIntervalMs)
    }, delay)
  }

  private tick(): void {
    try {
      this.store.tick(new Date())
    } catch (err) {
      logger.error({ err }, 'Tick failed')
    }
  }
}
