// Canonical timer model
// Every snapshot field is optional: absent means "not reported in this update", never zero

export type TimerType = 'countUp' | 'countDown' | 'clock' | 'none' | 'unknown'

/** Server playback states seen in the wild; other strings pass through unchanged */
export type PlaybackState = 'play' | 'pause' | 'stop' | 'armed' | 'roll' | (string & {})

export interface TimerReading {
  currentMs?: number
  remainingMs?: number
  elapsedMs?: number
  runningFlag?: boolean
  playbackState?: PlaybackState
}

export interface EventInfo {
  id?: string
  title?: string
  warningThresholdMs?: number
  dangerThresholdMs?: number
  durationMs?: number
}

export interface RundownPosition {
  index: number
  total: number
}

export interface TimerMessageFlags {
  blink?: boolean
  blackout?: boolean
}

export interface RuntimeSnapshot {
  timer?: TimerReading
  timerType?: TimerType
  currentEvent?: EventInfo
  nextEvent?: EventInfo
  rundownPosition?: RundownPosition
  timerMessage?: TimerMessageFlags
  // Set from transport status by the store, never by the normalizer
  connected?: boolean
}

/**
 * Slices a granular update may refresh. Each slice owns a fixed set of snapshot keys.
 */
export type SnapshotSlice = 'timer' | 'currentEvent' | 'nextEvent' | 'rundown' | 'timerMessage'

export type NormalizedUpdate =
  | { kind: 'full'; snapshot: RuntimeSnapshot }
  | { kind: 'partial'; slice: SnapshotSlice; patch: RuntimeSnapshot }
  | { kind: 'ignored'; reason: string }

export type DisplayMode = 'timer' | 'clock'

export interface TimerModel {
  snapshot: RuntimeSnapshot
  hasLoadedEvent: boolean
  lastUpdateInstant?: Date
  connected: boolean
}

export type ColorTier = 'normal' | 'warning' | 'danger'

export interface RenderState {
  displayText: string
  colorTier: ColorTier
  dimmed: boolean
  connected: boolean
  prevEnabled: boolean
  nextEnabled: boolean
  title?: string
  nextTitle?: string
  blackout: boolean
}
