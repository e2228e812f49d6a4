// IntentDispatcher - user controls to outbound protocol messages
//
// Sending never mutates the model: the UI keeps showing pre-control state until
// the server's resulting snapshot arrives.

import { IntentError, TransportError, type ControlError } from '@/errors/TimerErrors'
import type { OutboundMessage } from '@/types/protocol'
import type { TimerModel } from '@/types/runtime'
import { controlEnablement } from './projection'
import { createComponentLogger } from '@/utils/logger'
import { controlsRejected, controlsSent } from '@/api/middlewares/metrics'

const logger = createComponentLogger('IntentDispatcher')

export const ONE_MINUTE_MS = 60000

export interface MessageSink {
  send(message: OutboundMessage): void
}

export interface ModelSource {
  getModel(): TimerModel
}

export interface IntentDispatcherOptions {
  /** ±1 minute edits the current event's duration instead of nudging the running timer */
  addtimeAffectsEventDuration: boolean
}

export const CONTROL_ACTIONS = [
  'start',
  'pause',
  'reload',
  'restart',
  'next',
  'previous',
  'add-minute',
  'remove-minute',
  'blink',
  'blackout',
] as const

export type ControlAction = (typeof CONTROL_ACTIONS)[number]

export type ControlOutcome =
  | { status: 'sent'; sent: OutboundMessage[] }
  | { status: 'rejected'; error: ControlError; sent: OutboundMessage[] }

export class IntentDispatcher {
  private sink: MessageSink
  private source: ModelSource
  private options: IntentDispatcherOptions

  constructor(sink: MessageSink, source: ModelSource, options: IntentDispatcherOptions) {
    this.sink = sink
    this.source = source
    this.options = options
  }

  /**
   * Run a control by name. `enabled` sets blink/blackout explicitly; when it is
   * omitted those two toggle the server-reported flag.
   */
  perform(action: ControlAction, enabled?: boolean): ControlOutcome {
    switch (action) {
      case 'start':
        return this.start()
      case 'pause':
        return this.pause()
      case 'reload':
        return this.reload()
      case 'restart':
        return this.restartAndStart()
      case 'next':
        return this.next()
      case 'previous':
        return this.previous()
      case 'add-minute':
        return this.addMinute()
      case 'remove-minute':
        return this.removeMinute()
      case 'blink':
        return enabled === undefined ? this.toggleBlink() : this.blink(enabled)
      case 'blackout':
        return enabled === undefined ? this.toggleBlackout() : this.blackout(enabled)
    }
  }

  start(): ControlOutcome {
    return this.dispatch('start', [{ tag: 'start' }])
  }

  pause(): ControlOutcome {
    return this.dispatch('pause', [{ tag: 'pause' }])
  }

  reload(): ControlOutcome {
    return this.dispatch('reload', [{ tag: 'reload' }])
  }

  /**
   * Double activation: reload the current event, then start it. Two messages in
   * that order, so a drop between them leaves the event reloaded but not started.
   */
  restartAndStart(): ControlOutcome {
    return this.dispatch('restart', [{ tag: 'reload' }, { tag: 'start' }])
  }

  next(): ControlOutcome {
    if (!controlEnablement(this.source.getModel().snapshot.rundownPosition).nextEnabled) {
      return this.reject(new IntentError('CONTROL_DISABLED', 'next', 'Already at the last event'))
    }
    return this.dispatch('next', [{ tag: 'load', payload: 'next' }])
  }

  previous(): ControlOutcome {
    if (!controlEnablement(this.source.getModel().snapshot.rundownPosition).prevEnabled) {
      return this.reject(new IntentError('CONTROL_DISABLED', 'previous', 'Already at the first event'))
    }
    return this.dispatch('previous', [{ tag: 'load', payload: 'previous' }])
  }

  addMinute(): ControlOutcome {
    return this.adjustTime('add-minute', ONE_MINUTE_MS)
  }

  removeMinute(): ControlOutcome {
    return this.adjustTime('remove-minute', -ONE_MINUTE_MS)
  }

  blink(enabled: boolean): ControlOutcome {
    return this.dispatch('blink', [{ tag: 'message', payload: { timer: { blink: enabled } } }])
  }

  blackout(enabled: boolean): ControlOutcome {
    return this.dispatch('blackout', [{ tag: 'message', payload: { timer: { blackout: enabled } } }])
  }

  /** Invert the server-reported blink flag (off when never reported) */
  toggleBlink(): ControlOutcome {
    return this.blink(!(this.source.getModel().snapshot.timerMessage?.blink ?? false))
  }

  toggleBlackout(): ControlOutcome {
    return this.blackout(!(this.source.getModel().snapshot.timerMessage?.blackout ?? false))
  }

  private adjustTime(control: string, deltaMs: number): ControlOutcome {
    if (!this.options.addtimeAffectsEventDuration) {
      const payload: { add: number } | { remove: number } =
        deltaMs > 0 ? { add: deltaMs } : { remove: -deltaMs }
      return this.dispatch(control, [{ tag: 'addtime', payload }])
    }

    const event = this.source.getModel().snapshot.currentEvent
    if (event?.id === undefined || event.durationMs === undefined) {
      return this.reject(
        new IntentError('MISSING_EVENT_CONTEXT', control, 'Current event id and duration are required')
      )
    }

    const duration = Math.max(0, event.durationMs + deltaMs)
    return this.dispatch(control, [{ tag: 'change', payload: { [event.id]: { duration } } }])
  }

  private dispatch(control: string, messages: OutboundMessage[]): ControlOutcome {
    const sent: OutboundMessage[] = []

    for (const message of messages) {
      try {
        this.sink.send(message)
      } catch (err) {
        if (err instanceof TransportError) {
          return this.reject(err, sent, control)
        }
        throw err
      }
      sent.push(message)
      controlsSent.inc({ tag: message.tag })
    }

    logger.info({ control, tags: sent.map(message => message.tag) }, 'Control sent')
    return { status: 'sent', sent }
  }

  private reject(error: ControlError, sent: OutboundMessage[] = [], control?: string): ControlOutcome {
    controlsRejected.inc({ code: error.code })
    logger.warn(
      { control: control ?? (error instanceof IntentError ? error.control : undefined), code: error.code, sent: sent.length },
      'Control rejected'
    )
    return { status: 'rejected', error, sent }
  }
}
