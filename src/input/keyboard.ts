// Keyboard bindings
// Turns keypresses on an interactive terminal into user intents

import readline from 'readline'
import type { ControlAction } from '@/engine/IntentDispatcher'
import type { TimerRuntime } from '@/engine/TimerRuntime'
import { createComponentLogger } from '@/utils/logger'

const logger = createComponentLogger('Keyboard')

export interface KeyPress {
  name?: string
  sequence?: string
  ctrl?: boolean
  shift?: boolean
}

export type KeyAction = ControlAction | 'toggle-display' | 'quit'

/**
 * Key map:
 *   s start · p pause · r reload · R reload and start
 *   n / → next · b / ← previous · + / = add minute · - / _ remove minute
 *   k blink · x blackout · c timer/clock · q, Esc, Ctrl+C quit
 */
export function resolveKeyAction(key: KeyPress): KeyAction | undefined {
  if (key.ctrl && key.name === 'c') return 'quit'

  switch (key.sequence) {
    case '+':
    case '=':
      return 'add-minute'
    case '-':
    case '_':
      return 'remove-minute'
    case 'R':
      return 'restart'
  }

  switch (key.name) {
    case 's':
      return 'start'
    case 'p':
      return 'pause'
    case 'r':
      return key.shift ? 'restart' : 'reload'
    case 'n':
    case 'right':
      return 'next'
    case 'b':
    case 'left':
      return 'previous'
    case 'k':
      return 'blink'
    case 'x':
      return 'blackout'
    case 'c':
      return 'toggle-display'
    case 'q':
    case 'escape':
      return 'quit'
    default:
      return undefined
  }
}

export interface KeyboardOptions {
  onQuit: () => void
}

/**
 * Listen for keypresses on `input` and route them to the runtime.
 *
 * @returns a function that removes the listener and restores the terminal mode
 */
export function bindKeyboard(
  input: NodeJS.ReadStream,
  runtime: TimerRuntime,
  options: KeyboardOptions
): () => void {
  readline.emitKeypressEvents(input)
  if (input.isTTY) {
    input.setRawMode(true)
  }

  const onKeypress = (_str: string | undefined, key: KeyPress | undefined) => {
    if (!key) return
    const action = resolveKeyAction(key)
    if (!action) return

    if (action === 'quit') {
      options.onQuit()
      return
    }
    if (action === 'toggle-display') {
      runtime.store.setDisplayMode(runtime.store.getDisplayMode() === 'timer' ? 'clock' : 'timer')
      return
    }

    const outcome = runtime.dispatcher.perform(action)
    if (outcome.status === 'rejected') {
      logger.debug({ action, code: outcome.error.code }, 'Key control rejected')
    }
  }

  input.on('keypress', onKeypress)
  input.resume()

  return () => {
    input.off('keypress', onKeypress)
    if (input.isTTY) {
      input.setRawMode(false)
    }
    input.pause()
  }
}
