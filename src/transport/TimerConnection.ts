import WebSocket from 'ws'
import type { RawData } from 'ws'
import { TransportError } from '@/errors/TimerErrors'
import { OutboundMessageSchema, type OutboundMessage } from '@/types/protocol'
import { createComponentLogger } from '@/utils/logger'
import { reconnectsTotal, serverConnected } from '@/api/middlewares/metrics'

const logger = createComponentLogger('TimerConnection')

export const DEFAULT_RECONNECT_DELAY_MS = 1000
export const DEFAULT_MAX_RECONNECT_DELAY_MS = 10000

export type ConnectionStatus = 'idle' | 'connecting' | 'connected' | 'disconnected' | 'closed'

export type FrameListener = (frame: unknown) => void
export type StatusListener = (connected: boolean) => void

export interface TimerConnectionOptions {
  serverUrl: string
  reconnectDelayMs?: number
  maxReconnectDelayMs?: number
}

/**
 * Derive the WebSocket endpoint from the configured server base URL:
 * http → ws, https → wss, trailing slashes dropped, `/ws` appended
 */
export function toWebSocketUrl(serverUrl: string): string {
  const base = serverUrl.trim().replace(/\/+$/, '')
  return `${base.replace(/^http/i, 'ws')}/ws`
}

function decodeFrame(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8')
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8')
  return Buffer.from(data).toString('utf8')
}

/**
 * TimerConnection - the single socket to the timer server
 *
 * - Sends `poll` on every successful open so the server replies with a full snapshot
 * - Reconnects after unexpected drops with a doubling delay, capped at maxReconnectDelayMs
 * - send() is synchronous and throws TransportError instead of queueing
 */
export class TimerConnection {
  public readonly url: string
  private ws: WebSocket | null = null
  private status: ConnectionStatus = 'idle'
  private reconnectTimer?: NodeJS.Timeout
  private readonly initialDelayMs: number
  private readonly maxDelayMs: number
  private nextDelayMs: number
  private frameListeners = new Set<FrameListener>()
  private statusListeners = new Set<StatusListener>()

  constructor(options: TimerConnectionOptions) {
    this.url = toWebSocketUrl(options.serverUrl)
    this.initialDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS
    this.maxDelayMs = Math.max(options.maxReconnectDelayMs ?? DEFAULT_MAX_RECONNECT_DELAY_MS, this.initialDelayMs)
    this.nextDelayMs = this.initialDelayMs
  }

  /**
   * Open the connection. Safe to call again while a socket or reconnect is pending.
   *
   * @throws TransportError(CLOSED) after close()
   */
  connect(): void {
    if (this.status === 'closed') {
      throw new TransportError('CLOSED')
    }
    if (this.ws || this.reconnectTimer) {
      return
    }
    this.open()
  }

  getStatus(): ConnectionStatus {
    return this.status
  }

  isConnected(): boolean {
    return this.status === 'connected'
  }

  /**
   * Send one outbound message
   *
   * @throws TransportError(NOT_CONNECTED) when the socket is not open
   * @throws TransportError(CLOSED) after close()
   */
  send(message: OutboundMessage): void {
    if (this.status === 'closed') {
      throw new TransportError('CLOSED')
    }
    const ws = this.ws
    if (!ws || this.status !== 'connected' || ws.readyState !== WebSocket.OPEN) {
      throw new TransportError('NOT_CONNECTED')
    }

    const validated = OutboundMessageSchema.parse(message)
    ws.send(JSON.stringify(validated), err => {
      if (err) {
        logger.error({ err, tag: validated.tag }, 'Failed to write message to timer server')
      }
    })
    logger.debug({ tag: validated.tag }, 'Sent message')
  }

  onFrame(listener: FrameListener): () => void {
    this.frameListeners.add(listener)
    return () => {
      this.frameListeners.delete(listener)
    }
  }

  onStatus(listener: StatusListener): () => void {
    this.statusListeners.add(listener)
    return () => {
      this.statusListeners.delete(listener)
    }
  }

  /**
   * Close the socket and stop scheduling reconnects
   */
  close(): void {
    if (this.status === 'closed') {
      return
    }
    const wasConnected = this.status === 'connected'
    this.status = 'closed'

    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer)
      this.reconnectTimer = undefined
    }

    const ws = this.ws
    this.ws = null
    if (ws) {
      ws.close(1000, 'Client shutting down')
    }

    if (wasConnected) {
      this.notifyStatus(false)
    }
    logger.info({ url: this.url }, 'Timer server connection closed')
  }

  private open(): void {
    this.status = 'connecting'
    logger.info({ url: this.url }, 'Connecting to timer server')

    const ws = new WebSocket(this.url)
    this.ws = ws

    ws.on('open', () => {
      if (this.ws !== ws) return
      this.status = 'connected'
      this.nextDelayMs = this.initialDelayMs
      logger.info({ url: this.url }, 'Timer server connected')
      this.notifyStatus(true)
      this.send({ tag: 'poll' })
    })

    ws.on('message', (data, isBinary) => {
      if (this.ws !== ws || isBinary) return
      this.handleMessage(data)
    })

    ws.on('close', code => {
      this.handleClose(ws, code)
    })

    // 'close' always follows 'error', reconnect is scheduled there
    ws.on('error', err => {
      logger.warn({ err, url: this.url }, 'Timer server socket error')
    })
  }

  private handleMessage(data: RawData): void {
    let frame: unknown
    try {
      frame = JSON.parse(decodeFrame(data))
    } catch (err) {
      logger.warn({ err }, 'Dropping frame that is not valid JSON')
      return
    }

    for (const listener of this.frameListeners) {
      try {
        listener(frame)
      } catch (err) {
        logger.error({ err }, 'Frame listener failed')
      }
    }
  }

  private handleClose(ws: WebSocket, code: number): void {
    if (this.ws !== ws) {
      return
    }
    this.ws = null

    const wasConnected = this.status === 'connected'
    this.status = 'disconnected'
    if (wasConnected) {
      logger.warn({ code }, 'Timer server connection dropped')
      this.notifyStatus(false)
    }
    this.scheduleReconnect()
  }

  private scheduleReconnect(): void {
    const delay = this.nextDelayMs
    this.nextDelayMs = Math.min(delay * 2, this.maxDelayMs)
    reconnectsTotal.inc()

    logger.info({ delay_ms: delay }, 'Scheduling reconnect')
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined
      this.open()
    }, delay)
  }

  private notifyStatus(connected: boolean): void {
    serverConnected.set(connected ? 1 : 0)
    for (const listener of this.statusListeners) {
      try {
        listener(connected)
      } catch (err) {
        logger.error({ err }, 'Status listener failed')
      }
    }
  }
}
