import { describe, it, expect, beforeEach, vi } from 'vitest'
import { TimerStore, hasLoadedEvent } from '@/engine/TimerStore'
import { normalize } from '@/protocol/normalizer'
import type { RenderState } from '@/types/runtime'
import { createFullFrame, createTimerFrame, CLOCK_HEARTBEAT } from '../fixtures/sampleFrames'

const T0 = new Date(2026, 2, 14, 9, 0, 0)
const T1 = new Date(2026, 2, 14, 9, 0, 1)

describe('TimerStore', () => {
  let store: TimerStore

  beforeEach(() => {
    store = new TimerStore({}, T0)
  })

  describe('initial state', () => {
    it('should start disconnected and idle', () => {
      const model = store.getModel()
      expect(model.connected).toBe(false)
      expect(model.hasLoadedEvent).toBe(false)
      expect(model.lastUpdateInstant).toBeUndefined()

      const state = store.getRenderState()
      expect(state.displayText).toBe('--:--')
      expect(state.dimmed).toBe(true)
      expect(state.prevEnabled).toBe(false)
      expect(state.nextEnabled).toBe(false)
    })
  })

  describe('Idle/Loaded transitions', () => {
    it('should load an event from a full snapshot', () => {
      store.setConnected(true, T0)
      store.applyUpdate(normalize(createFullFrame()), T1)

      const model = store.getModel()
      expect(model.hasLoadedEvent).toBe(true)
      expect(model.lastUpdateInstant).toBe(T1)
      expect(model.snapshot.connected).toBe(true)
      expect(store.getRenderState().displayText).toBe('04:05')
      expect(store.getRenderState().title).toBe('Keynote')
    })

    it('should return to idle when a snapshot reports no current event', () => {
      store.applyUpdate(normalize(createFullFrame()), T0)
      store.applyUpdate(normalize(createFullFrame({ eventNow: null })), T1)

      expect(store.getModel().hasLoadedEvent).toBe(false)
      expect(store.getRenderState().displayText).toBe('--:--')
    })

    it('should return to idle on an explicit eventNow unload', () => {
      store.applyUpdate(normalize(createFullFrame()), T0)
      store.applyUpdate(normalize({ tag: 'ontime-eventNow', payload: null }), T1)

      expect(store.getModel().hasLoadedEvent).toBe(false)
    })

    it('should treat an event with only undefined fields as not loaded', () => {
      expect(hasLoadedEvent({ currentEvent: { id: undefined, title: undefined } })).toBe(false)
      expect(hasLoadedEvent({ currentEvent: { title: 'Break' } })).toBe(true)
      expect(hasLoadedEvent({})).toBe(false)
    })
  })

  describe('applyUpdate()', () => {
    it('should be idempotent for a repeated snapshot', () => {
      const snapshot = normalize(createFullFrame())
      store.applyUpdate(snapshot, T0)
      const first = store.getRenderState()
      store.applyUpdate(snapshot, T0)

      expect(store.getRenderState()).toEqual(first)
    })

    it('should merge a timer slice over the retained snapshot', () => {
      store.applyUpdate(normalize(createFullFrame()), T0)
      store.applyUpdate(normalize(createTimerFrame({ current: 30000, playback: 'play' })), T1)

      const { snapshot } = store.getModel()
      expect(snapshot.timer).toEqual({ currentMs: 30000, playbackState: 'play' })
      // Untouched slices are retained
      expect(snapshot.currentEvent?.title).toBe('Keynote')
      expect(snapshot.timerType).toBe('countDown')
      expect(snapshot.rundownPosition).toEqual({ index: 1, total: 4 })
      expect(store.getRenderState().displayText).toBe('00:30')
      expect(store.getRenderState().colorTier).toBe('warning')
    })

    it('should replace every slice on a full snapshot', () => {
      store.applyUpdate(normalize(createFullFrame()), T0)
      store.applyUpdate(normalize({ tag: 'ontime', payload: { eventNow: { title: 'Break' } } }), T1)

      const { snapshot } = store.getModel()
      expect(snapshot.currentEvent).toEqual({ title: 'Break' })
      expect(snapshot.timer).toBeUndefined()
      expect(snapshot.nextEvent).toBeUndefined()
      expect(snapshot.rundownPosition).toBeUndefined()
    })

    it('should leave the model untouched for ignored frames', () => {
      store.applyUpdate(normalize(createFullFrame()), T0)
      const before = store.getModel()
      store.applyUpdate(normalize(CLOCK_HEARTBEAT), T1)

      expect(store.getModel()).toBe(before)
    })
  })

  describe('setConnected()', () => {
    it('should keep the snapshot and dim the render while disconnected', () => {
      store.setConnected(true, T0)
      store.applyUpdate(normalize(createFullFrame()), T0)
      store.setConnected(false, T1)

      const state = store.getRenderState()
      expect(store.getModel().hasLoadedEvent).toBe(true)
      expect(store.getModel().snapshot.connected).toBe(false)
      expect(state.displayText).toBe('04:05')
      expect(state.dimmed).toBe(true)
      expect(state.connected).toBe(false)
    })

    it('should not notify when the status is unchanged', () => {
      const listener = vi.fn()
      store.subscribe(listener)
      store.setConnected(false, T1)

      expect(listener).not.toHaveBeenCalled()
    })
  })

  describe('tick()', () => {
    it('should never change Idle/Loaded', () => {
      store.applyUpdate(normalize(createFullFrame()), T0)
      store.tick(T1)
      expect(store.getModel().hasLoadedEvent).toBe(true)
      expect(store.getModel().lastUpdateInstant).toBe(T0)
    })

    it('should show server values as reported between pushes', () => {
      store.applyUpdate(normalize(createFullFrame()), T0)
      store.tick(new Date(T0.getTime() + 5000))
      expect(store.getRenderState().displayText).toBe('04:05')
    })

    it('should advance the wall clock in clock mode', () => {
      store.setDisplayMode('clock', T0)
      expect(store.getRenderState().displayText).toBe('09:00:00')
      store.tick(T1)
      expect(store.getRenderState().displayText).toBe('09:00:01')
    })
  })

  describe('subscribe()', () => {
    it('should notify with the render state and model on every write', () => {
      const seen: RenderState[] = []
      store.subscribe(state => seen.push(state))

      store.setConnected(true, T0)
      store.applyUpdate(normalize(createFullFrame()), T1)

      expect(seen).toHaveLength(2)
      expect(seen[1].displayText).toBe('04:05')
    })

    it('should stop notifying after unsubscribe', () => {
      const listener = vi.fn()
      const unsubscribe = store.subscribe(listener)
      unsubscribe()
      store.tick(T1)

      expect(listener).not.toHaveBeenCalled()
    })

    it('should keep notifying other listeners when one throws', () => {
      const listener = vi.fn()
      store.subscribe(() => {
        throw new Error('render failed')
      })
      store.subscribe(listener)

      expect(() => store.tick(T1)).not.toThrow()
      expect(listener).toHaveBeenCalledTimes(1)
    })
  })
})
