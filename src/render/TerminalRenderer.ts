// Terminal render surface
// Prints one status line per RenderState change; rewrites the line in place on a TTY

import type { RenderState } from '@/types/runtime'
import type { TimerStore } from '@/engine/TimerStore'
import { renderStatesEqual } from '@/engine/projection'

export interface RenderTarget {
  write(chunk: string): unknown
  isTTY?: boolean
}

export function formatRenderLine(state: RenderState): string {
  const parts = [`${state.displayText === '' ? '(no timer)' : state.displayText} [${state.colorTier}]`]

  if (state.title) parts.push(state.title)
  if (state.nextTitle) parts.push(`next: ${state.nextTitle}`)

  const nav = [state.prevEnabled ? 'prev' : undefined, state.nextEnabled ? 'next' : undefined].filter(Boolean)
  if (nav.length > 0) parts.push(`<${nav.join('|')}>`)

  if (state.blackout) parts.push('(blackout)')
  if (!state.connected) parts.push('(offline)')

  return parts.join('  ')
}

export class TerminalRenderer {
  private target: RenderTarget
  private last?: RenderState
  private unsubscribe?: () => void

  constructor(target: RenderTarget) {
    this.target = target
  }

  attach(store: TimerStore): void {
    this.detach()
    this.render(store.getRenderState())
    this.unsubscribe = store.subscribe(state => this.render(state))
  }

  detach(): void {
    this.unsubscribe?.()
    this.unsubscribe = undefined
    if (this.last && this.target.isTTY) {
      this.target.write('\n')
    }
  }

  render(state: RenderState): void {
    if (this.last && renderStatesEqual(this.last, state)) {
      return
    }
    this.last = state

    const line = formatRenderLine(state)
    // \r + erase-line keeps a single live line on a terminal
    this.target.write(this.target.isTTY ? `\r\x1b[2K${line}` : `${line}\n`)
  }
}
