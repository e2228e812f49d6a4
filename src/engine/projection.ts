// Presentation Projection
// Pure function from (TimerModel, now) to RenderState. Never mutates the model.

import type {
  ColorTier,
  DisplayMode,
  EventInfo,
  RenderState,
  RundownPosition,
  TimerModel,
} from '@/types/runtime'

export const IDLE_TEXT = '--:--'

export interface ProjectionOptions {
  displayMode?: DisplayMode
}

/**
 * Whole seconds shown for a millisecond value. Count-down rounds up so the first
 * second is not skipped (59999 ms shows as 60); count-up rounds down.
 */
export function displaySeconds(ms: number, direction: 'up' | 'down'): number {
  const seconds = direction === 'down' ? Math.ceil(ms / 1000) : Math.floor(ms / 1000)
  // Math.ceil(-0.5) is -0
  return seconds === 0 ? 0 : seconds
}

const pad = (value: number) => String(value).padStart(2, '0')

/**
 * Formats whole seconds as MM:SS, or HH:MM:SS from one hour up.
 * `negative` marks overtime, which can still round to zero seconds.
 */
export function formatSeconds(totalSeconds: number, negative = totalSeconds < 0): string {
  const abs = Math.abs(totalSeconds)
  const hours = Math.floor(abs / 3600)
  const minutes = Math.floor((abs % 3600) / 60)
  const seconds = abs % 60

  const base = hours > 0 ? `${pad(hours)}:${pad(minutes)}:${pad(seconds)}` : `${pad(minutes)}:${pad(seconds)}`
  return negative ? `-${base}` : base
}

export function formatClock(now: Date): string {
  return `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`
}

export function countDownTier(remainingMs: number, event: EventInfo | undefined): ColorTier {
  if (remainingMs < 0) return 'danger'
  if (event?.dangerThresholdMs !== undefined && remainingMs <= event.dangerThresholdMs) return 'danger'
  if (event?.warningThresholdMs !== undefined && remainingMs <= event.warningThresholdMs) return 'warning'
  return 'normal'
}

export function countUpTier(elapsedMs: number, event: EventInfo | undefined): ColorTier {
  if (event?.durationMs !== undefined && elapsedMs >= event.durationMs) return 'warning'
  return 'normal'
}

export function controlEnablement(position: RundownPosition | undefined) {
  if (!position) return { prevEnabled: false, nextEnabled: false }
  return {
    prevEnabled: position.index > 0,
    nextEnabled: position.index < position.total - 1,
  }
}

interface TimerFace {
  displayText: string
  colorTier: ColorTier
  dimmed: boolean
}

const IDLE_FACE: TimerFace = { displayText: IDLE_TEXT, colorTier: 'normal', dimmed: true }

function timerFace(model: TimerModel, now: Date, displayMode: DisplayMode): TimerFace {
  const { snapshot } = model
  const clockFace: TimerFace = { displayText: formatClock(now), colorTier: 'normal', dimmed: false }

  if (displayMode === 'clock' || snapshot.timerType === 'clock') return clockFace
  if (!model.hasLoadedEvent) return IDLE_FACE
  if (snapshot.timerType === 'none') return { displayText: '', colorTier: 'normal', dimmed: false }

  const reading = snapshot.timer
  const event = snapshot.currentEvent

  if (snapshot.timerType === 'countUp') {
    const elapsed = reading?.elapsedMs ?? reading?.currentMs
    if (elapsed === undefined) return IDLE_FACE
    return {
      displayText: formatSeconds(displaySeconds(elapsed, 'up'), elapsed < 0),
      colorTier: countUpTier(elapsed, event),
      dimmed: false,
    }
  }

  // countDown, unknown, and unreported types all read as a count-down
  const remaining = reading?.remainingMs ?? reading?.currentMs
  if (remaining === undefined) return IDLE_FACE
  return {
    displayText: formatSeconds(displaySeconds(remaining, 'down'), remaining < 0),
    colorTier: countDownTier(remaining, event),
    dimmed: false,
  }
}

export function project(model: TimerModel, now: Date, options: ProjectionOptions = {}): RenderState {
  const face = timerFace(model, now, options.displayMode ?? 'timer')
  const { snapshot } = model

  return {
    ...face,
    dimmed: face.dimmed || !model.connected,
    connected: model.connected,
    ...controlEnablement(snapshot.rundownPosition),
    title: snapshot.currentEvent?.title,
    nextTitle: snapshot.nextEvent?.title,
    blackout: snapshot.timerMessage?.blackout ?? false,
  }
}

export function renderStatesEqual(a: RenderState, b: RenderState): boolean {
  return (
    a.displayText === b.displayText &&
    a.colorTier === b.colorTier &&
    a.dimmed === b.dimmed &&
    a.connected === b.connected &&
    a.prevEnabled === b.prevEnabled &&
    a.nextEnabled === b.nextEnabled &&
    a.title === b.title &&
    a.nextTitle === b.nextTitle &&
    a.blackout === b.blackout
  )
}
