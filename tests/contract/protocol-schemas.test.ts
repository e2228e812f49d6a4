/**
 * Contract tests for the outbound {tag, payload} protocol
 *
 * Every control the dispatcher can produce must satisfy OutboundMessageSchema,
 * and malformed messages must never reach the socket.
 */

import { describe, it, expect } from 'vitest'
import { OutboundMessageSchema } from '@/types/protocol'
import { IntentDispatcher, CONTROL_ACTIONS } from '@/engine/IntentDispatcher'
import type { OutboundMessage } from '@/types/protocol'

describe('OutboundMessageSchema', () => {
  describe('valid messages', () => {
    it.each([
      { tag: 'poll' },
      { tag: 'start' },
      { tag: 'pause' },
      { tag: 'reload' },
      { tag: 'load', payload: 'next' },
      { tag: 'load', payload: 'previous' },
      { tag: 'addtime', payload: { add: 60000 } },
      { tag: 'addtime', payload: { remove: 60000 } },
      { tag: 'change', payload: { e1: { duration: 360000 } } },
      { tag: 'change', payload: { e1: { duration: 0 } } },
      { tag: 'message', payload: { timer: { blink: true } } },
      { tag: 'message', payload: { timer: { blackout: false } } },
    ])('should accept $tag', message => {
      expect(OutboundMessageSchema.safeParse(message).success).toBe(true)
    })
  })

  describe('invalid messages', () => {
    it.each([
      ['unknown tag', { tag: 'roll' }],
      ['load without direction', { tag: 'load' }],
      ['load to a named event', { tag: 'load', payload: 'e3' }],
      ['addtime with both keys', { tag: 'addtime', payload: { add: 60000, remove: 60000 } }],
      ['addtime with a negative amount', { tag: 'addtime', payload: { add: -60000 } }],
      ['addtime with a fractional amount', { tag: 'addtime', payload: { add: 1.5 } }],
      ['change with no event', { tag: 'change', payload: {} }],
      ['change with two events', { tag: 'change', payload: { e1: { duration: 1 }, e2: { duration: 1 } } }],
      ['change with a negative duration', { tag: 'change', payload: { e1: { duration: -1 } } }],
      ['message with both flags', { tag: 'message', payload: { timer: { blink: true, blackout: true } } }],
      ['message with a string flag', { tag: 'message', payload: { timer: { blink: 'on' } } }],
    ])('should reject %s', (_label, message) => {
      expect(OutboundMessageSchema.safeParse(message).success).toBe(false)
    })
  })

  it('should accept everything the dispatcher emits', () => {
    const sent: OutboundMessage[] = []
    const snapshot = {
      currentEvent: { id: 'e1', durationMs: 300000 },
      rundownPosition: { index: 1, total: 3 },
    }
    const source = { getModel: () => ({ snapshot, hasLoadedEvent: true, connected: true }) }

    for (const addtimeAffectsEventDuration of [false, true]) {
      const dispatcher = new IntentDispatcher({ send: message => sent.push(message) }, source, {
        addtimeAffectsEventDuration,
      })
      for (const action of CONTROL_ACTIONS) {
        expect(dispatcher.perform(action).status).toBe('sent')
      }
    }

    // restart sends two messages
    expect(sent).toHaveLength((CONTROL_ACTIONS.length + 1) * 2)
    for (const message of sent) {
      expect(OutboundMessageSchema.parse(message)).toEqual(message)
    }
  })
})
