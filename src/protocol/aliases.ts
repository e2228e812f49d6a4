// Key alias tables for inbound payloads
// Ordered by priority: the first key holding a usable value wins

import type { SnapshotSlice } from '@/types/runtime'

export const TIMER_KEYS = {
  container: ['timer'],
  current: ['current', 'timer', 'currentTime', 'time'],
  remaining: ['remaining'],
  elapsed: ['elapsed'],
  running: ['running', 'isRunning'],
  playback: ['playback', 'playState', 'state'],
} as const

export const TIMER_TYPE_KEYS = {
  top: ['timerType'],
  nested: ['timerType', 'type', 'mode'],
  event: ['timerType'],
} as const

export const EVENT_KEYS = {
  current: ['currentEvent', 'eventNow'],
  next: ['nextEvent', 'eventNext', 'next'],
  id: ['id', '_id'],
  title: ['title', 'name'],
  warning: ['timeWarning', 'warningThresholdMs', 'warning'],
  danger: ['timeDanger', 'dangerThresholdMs', 'danger'],
  duration: ['duration', 'durationMs'],
} as const

export const RUNDOWN_KEYS = {
  container: ['runtime'],
  index: ['selectedEventIndex', 'eventIndex'],
  total: ['numEvents', 'totalEvents'],
} as const

export const MESSAGE_KEYS = {
  container: ['message'],
  timer: ['timer'],
} as const

/**
 * Keys whose presence marks a full frame as carrying timer state.
 * A full frame with none of them (a clock heartbeat, an ack) is ignored.
 */
export const STATE_KEYS: readonly string[] = [
  ...TIMER_KEYS.current,
  ...TIMER_KEYS.remaining,
  ...TIMER_KEYS.elapsed,
  ...TIMER_KEYS.running,
  ...TIMER_KEYS.playback,
  ...TIMER_TYPE_KEYS.top,
  ...EVENT_KEYS.current,
  ...EVENT_KEYS.next,
  ...RUNDOWN_KEYS.container,
  ...RUNDOWN_KEYS.index,
  ...RUNDOWN_KEYS.total,
  ...MESSAGE_KEYS.container,
]

export type SliceTagTarget = SnapshotSlice | 'ignore'

/**
 * Known granular update tags. Frames whose tag is not listed here are treated
 * as full snapshots.
 */
export const DEFAULT_SLICE_TAGS: Readonly<Record<string, SliceTagTarget>> = {
  'ontime-timer': 'timer',
  'ontime-eventNow': 'currentEvent',
  'ontime-eventNext': 'nextEvent',
  'ontime-runtime': 'rundown',
  'ontime-message': 'timerMessage',
  'ontime-clock': 'ignore',
  'ontime-onAir': 'ignore',
  'ontime-log': 'ignore',
  'ontime-refetch': 'ignore',
  'ontime-publicEventNow': 'ignore',
  'ontime-publicEventNext': 'ignore',
  pong: 'ignore',
  version: 'ignore',
  client: 'ignore',
  dialog: 'ignore',
}
