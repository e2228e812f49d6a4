// TimerStore - Timer State Machine
// Single owner of the TimerModel. Snapshots, connection changes and ticks are the
// only writers; every write recomputes the RenderState and notifies subscribers.

import type {
  DisplayMode,
  NormalizedUpdate,
  RenderState,
  RuntimeSnapshot,
  TimerModel,
} from '@/types/runtime'
import { project } from './projection'
import { createComponentLogger } from '@/utils/logger'

const logger = createComponentLogger('TimerStore')

export type RenderListener = (state: RenderState, model: TimerModel) => void

export interface TimerStoreOptions {
  displayMode?: DisplayMode
}

export function hasLoadedEvent(snapshot: RuntimeSnapshot): boolean {
  const event = snapshot.currentEvent
  return event !== undefined && Object.values(event).some(value => value !== undefined)
}

export function createEmptyModel(): TimerModel {
  return {
    snapshot: { connected: false },
    hasLoadedEvent: false,
    lastUpdateInstant: undefined,
    connected: false,
  }
}

/**
 * States: Disconnected -> Connected(Idle) <-> Connected(Loaded)
 *
 * Idle/Loaded only changes through applySnapshot(); tick() and setConnected()
 * never touch it. Server values are shown as reported, there is no local
 * interpolation between pushes.
 */
export class TimerStore {
  private model: TimerModel = createEmptyModel()
  private displayMode: DisplayMode
  private renderState: RenderState
  private listeners = new Set<RenderListener>()

  constructor(options: TimerStoreOptions = {}, now: Date = new Date()) {
    this.displayMode = options.displayMode ?? 'timer'
    this.renderState = project(this.model, now, { displayMode: this.displayMode })
  }

  getModel(): TimerModel {
    return this.model
  }

  getDisplayMode(): DisplayMode {
    return this.displayMode
  }

  /**
   * Current render state. Pass `now` to project against a different instant
   * than the last tick without storing it.
   */
  getRenderState(now?: Date): RenderState {
    if (now) {
      return project(this.model, now, { displayMode: this.displayMode })
    }
    return this.renderState
  }

  /**
   * Replace the stored snapshot wholesale. The connection pseudo-field is kept.
   */
  applySnapshot(snapshot: RuntimeSnapshot, now: Date = new Date()): void {
    const next: RuntimeSnapshot = { ...snapshot, connected: this.model.connected }
    const loaded = hasLoadedEvent(next)

    if (loaded !== this.model.hasLoadedEvent) {
      logger.info({ title: next.currentEvent?.title }, loaded ? 'Event loaded' : 'No event loaded')
    }

    this.model = {
      snapshot: next,
      hasLoadedEvent: loaded,
      lastUpdateInstant: now,
      connected: this.model.connected,
    }
    this.recompute(now)
  }

  /**
   * Apply a normalizer result: full snapshots replace, partial ones merge their
   * slice over the retained snapshot, ignored frames change nothing.
   */
  applyUpdate(update: NormalizedUpdate, now: Date = new Date()): void {
    switch (update.kind) {
      case 'full':
        this.applySnapshot(update.snapshot, now)
        break
      case 'partial':
        this.applySnapshot({ ...this.model.snapshot, ...update.patch }, now)
        break
      case 'ignored':
        logger.trace({ reason: update.reason }, 'Ignored frame')
        break
    }
  }

  setConnected(connected: boolean, now: Date = new Date()): void {
    if (connected === this.model.connected) {
      return
    }
    this.model = {
      ...this.model,
      snapshot: { ...this.model.snapshot, connected },
      connected,
    }
    this.recompute(now)
  }

  setDisplayMode(mode: DisplayMode, now: Date = new Date()): void {
    if (mode === this.displayMode) {
      return
    }
    this.displayMode = mode
    logger.info({ mode }, 'Display mode changed')
    this.recompute(now)
  }

  /**
   * Local 1 Hz tick. Drives the wall-clock display; never changes Idle/Loaded.
   */
  tick(now: Date = new Date()): void {
    this.recompute(now)
  }

  subscribe(listener: RenderListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private recompute(now: Date): void {
    this.renderState = project(this.model, now, { displayMode: this.displayMode })
    for (const listener of this.listeners) {
      try {
        listener(this.renderState, this.model)
      } catch (err) {
        logger.error({ err }, 'Render listener failed')
      }
    }
  }
}
