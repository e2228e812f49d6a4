// Payload Normalizer
// Maps any inbound JSON value to a NormalizedUpdate. Pure and total: malformed
// or missing fields resolve to undefined, nothing here throws.

import type {
  EventInfo,
  NormalizedUpdate,
  RundownPosition,
  RuntimeSnapshot,
  SnapshotSlice,
  TimerMessageFlags,
  TimerReading,
  TimerType,
} from '@/types/runtime'
import {
  DEFAULT_SLICE_TAGS,
  EVENT_KEYS,
  MESSAGE_KEYS,
  RUNDOWN_KEYS,
  STATE_KEYS,
  TIMER_KEYS,
  TIMER_TYPE_KEYS,
  type SliceTagTarget,
} from './aliases'

type JsonObject = Record<string, unknown>
type Reader<T> = (value: unknown) => T | undefined

const ENVELOPE_KEYS = ['tag', 'type']

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

const readNumber: Reader<number> = value =>
  typeof value === 'number' && Number.isFinite(value) ? value : undefined

// Event durations and thresholds go back to the server as integers
const readInteger: Reader<number> = value =>
  typeof value === 'number' && Number.isInteger(value) ? value : undefined

const readBoolean: Reader<boolean> = value => (typeof value === 'boolean' ? value : undefined)

const readString: Reader<string> = value =>
  typeof value === 'string' && value.trim().length > 0 ? value : undefined

const readIdentifier: Reader<string> = value =>
  typeof value === 'number' && Number.isFinite(value) ? String(value) : readString(value)

/**
 * Walks `keys` in order and returns the first value `read` accepts
 */
function pick<T>(source: JsonObject | undefined, keys: readonly string[], read: Reader<T>): T | undefined {
  if (!source) return undefined
  for (const key of keys) {
    if (!(key in source)) continue
    const value = read(source[key])
    if (value !== undefined) return value
  }
  return undefined
}

function pickRecord(source: JsonObject | undefined, keys: readonly string[]): JsonObject | undefined {
  return pick(source, keys, value => (isRecord(value) ? value : undefined))
}

function compact<T extends object>(value: T): T | undefined {
  return Object.values(value).some(field => field !== undefined) ? value : undefined
}

/**
 * Parses a timer type string. Matching ignores case, dashes, underscores and spaces.
 */
export function parseTimerType(value: unknown): TimerType | undefined {
  const raw = readString(value)
  if (raw === undefined) return undefined

  switch (raw.toLowerCase().replace(/[-_\s]/g, '')) {
    case 'countdown':
    case 'timetoend':
      return 'countDown'
    case 'countup':
      return 'countUp'
    case 'clock':
      return 'clock'
    case 'none':
      return 'none'
    default:
      return 'unknown'
  }
}

function readReading(source: JsonObject | undefined): TimerReading | undefined {
  return compact<TimerReading>({
    currentMs: pick(source, TIMER_KEYS.current, readNumber),
    remainingMs: pick(source, TIMER_KEYS.remaining, readNumber),
    elapsedMs: pick(source, TIMER_KEYS.elapsed, readNumber),
    runningFlag: pick(source, TIMER_KEYS.running, readBoolean),
    playbackState: pick(source, TIMER_KEYS.playback, readString),
  })
}

export function readEvent(value: unknown): EventInfo | undefined {
  if (!isRecord(value)) return undefined
  return compact<EventInfo>({
    id: pick(value, EVENT_KEYS.id, readIdentifier),
    title: pick(value, EVENT_KEYS.title, readString),
    warningThresholdMs: pick(value, EVENT_KEYS.warning, readInteger),
    dangerThresholdMs: pick(value, EVENT_KEYS.danger, readInteger),
    durationMs: pick(value, EVENT_KEYS.duration, readInteger),
  })
}

function readRundown(source: JsonObject | undefined): RundownPosition | undefined {
  const sources = [source, pickRecord(source, RUNDOWN_KEYS.container)]
  const readIndex: Reader<number> = value =>
    Number.isInteger(value) && typeof value === 'number' && value >= 0 ? value : undefined
  const readTotal: Reader<number> = value =>
    Number.isInteger(value) && typeof value === 'number' && value > 0 ? value : undefined

  for (const candidate of sources) {
    const index = pick(candidate, RUNDOWN_KEYS.index, readIndex)
    const total = pick(candidate, RUNDOWN_KEYS.total, readTotal)
    if (index !== undefined && total !== undefined) {
      return index < total ? { index, total } : undefined
    }
  }
  return undefined
}

function readTimerMessage(source: JsonObject | undefined): TimerMessageFlags | undefined {
  const flags = pickRecord(source, MESSAGE_KEYS.timer) ?? source
  if (!flags) return undefined
  return compact<TimerMessageFlags>({
    blink: readBoolean(flags.blink),
    blackout: readBoolean(flags.blackout),
  })
}

function resolveTimerType(
  working: JsonObject | undefined,
  timerObject: JsonObject | undefined,
  rawEvent: JsonObject | undefined
): TimerType | undefined {
  return (
    pick(working, TIMER_TYPE_KEYS.top, parseTimerType) ??
    pick(timerObject, TIMER_TYPE_KEYS.nested, parseTimerType) ??
    pick(rawEvent, TIMER_TYPE_KEYS.event, parseTimerType)
  )
}

function readSnapshot(working: JsonObject): RuntimeSnapshot {
  const timerObject = pickRecord(working, TIMER_KEYS.container)
  const rawEvent = pickRecord(working, EVENT_KEYS.current)

  return {
    timer: readReading(timerObject ?? working),
    timerType: resolveTimerType(working, timerObject, rawEvent),
    currentEvent: readEvent(rawEvent),
    nextEvent: readEvent(pickRecord(working, EVENT_KEYS.next)),
    rundownPosition: readRundown(working),
    timerMessage: readTimerMessage(pickRecord(working, MESSAGE_KEYS.container)),
  }
}

function readSlice(slice: SnapshotSlice, working: JsonObject | undefined): RuntimeSnapshot {
  switch (slice) {
    case 'timer': {
      const timerType = pick(working, TIMER_TYPE_KEYS.nested, parseTimerType)
      const patch: RuntimeSnapshot = { timer: readReading(working) }
      // Timer pushes often omit the type; keep the last known one in that case
      if (timerType !== undefined) patch.timerType = timerType
      return patch
    }
    case 'currentEvent':
      return { currentEvent: readEvent(working) }
    case 'nextEvent':
      return { nextEvent: readEvent(working) }
    case 'rundown':
      return { rundownPosition: readRundown(working) }
    case 'timerMessage':
      return { timerMessage: readTimerMessage(working) }
  }
}

interface Envelope {
  kind?: string
  working: unknown
}

function unwrap(raw: unknown): Envelope {
  if (!isRecord(raw)) return { working: raw }

  const kind = readString(raw.tag) ?? readString(raw.type)
  if ('payload' in raw) return { kind, working: raw.payload }

  const working: JsonObject = {}
  for (const [key, value] of Object.entries(raw)) {
    if (!ENVELOPE_KEYS.includes(key)) working[key] = value
  }
  return { kind, working }
}

export interface NormalizerOptions {
  /** Extra or overriding granular tag entries, merged over the defaults */
  sliceTags?: Record<string, SliceTagTarget>
}

export type Normalizer = (raw: unknown) => NormalizedUpdate

export function createNormalizer(options: NormalizerOptions = {}): Normalizer {
  const sliceTags: Record<string, SliceTagTarget> = { ...DEFAULT_SLICE_TAGS, ...options.sliceTags }

  return (raw: unknown): NormalizedUpdate => {
    const { kind, working } = unwrap(raw)
    const target = kind !== undefined && Object.hasOwn(sliceTags, kind) ? sliceTags[kind] : undefined
    const object = isRecord(working) ? working : undefined

    if (target === 'ignore') {
      return { kind: 'ignored', reason: `tag ${kind}` }
    }
    if (target !== undefined) {
      return { kind: 'partial', slice: target, patch: readSlice(target, object) }
    }

    if (!object || !STATE_KEYS.some(key => key in object)) {
      return { kind: 'ignored', reason: object && 'clock' in object ? 'clock heartbeat' : 'no timer state' }
    }
    return { kind: 'full', snapshot: readSnapshot(object) }
  }
}

export const normalize: Normalizer = createNormalizer()
