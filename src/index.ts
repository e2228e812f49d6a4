// showclock - Main Entry Point
// Mirrors a show-control timer server and renders it to the terminal

// Load environment variables first (from .env and .env.local)
import '@/config/env'

import http from 'http'
import { loadSettings, type Settings } from '@/config/settings'
import { ConfigurationError } from '@/errors/TimerErrors'
import { TimerRuntime } from '@/engine/TimerRuntime'
import { TerminalRenderer } from '@/render/TerminalRenderer'
import { bindKeyboard } from '@/input/keyboard'
import { createApp } from '@/api/app'
import { logger } from '@/utils/logger'

// Global references for cleanup
let runtime: TimerRuntime | null = null
let renderer: TerminalRenderer | null = null
let server: http.Server | null = null
let unbindKeyboard: (() => void) | null = null

async function main() {
  let settings: Settings
  try {
    settings = loadSettings()
  } catch (err) {
    if (err instanceof ConfigurationError) {
      logger.fatal({ issues: err.issues }, err.message)
      process.exit(1)
    }
    throw err
  }

  logger.info(
    { serverUrl: settings.serverUrl, addtimeAffectsEventDuration: settings.addtimeAffectsEventDuration },
    'showclock initializing...'
  )

  // 1. Engine: connection, store, dispatcher, tick
  runtime = new TimerRuntime({ settings })

  // 2. Render surface
  renderer = new TerminalRenderer(process.stdout)
  renderer.attach(runtime.store)

  // 3. Keyboard controls (interactive terminals only)
  if (settings.keyboardControls && process.stdin.isTTY) {
    unbindKeyboard = bindKeyboard(process.stdin, runtime, {
      onQuit: () => shutdown('keyboard'),
    })
    logger.info('Keyboard controls enabled')
  }

  // 4. Optional status/control HTTP surface
  if (settings.statusPort !== undefined) {
    const app = createApp({ runtime })
    const httpServer = http.createServer(app)
    server = httpServer
    await new Promise<void>((resolve, reject) => {
      httpServer.once('error', reject)
      httpServer.listen(settings.statusPort, settings.statusHost, () => {
        logger.info({ host: settings.statusHost, port: settings.statusPort }, 'Status server listening')
        resolve()
      })
    })
  }

  runtime.start()

  process.on('SIGTERM', () => shutdown('SIGTERM'))
  process.on('SIGINT', () => shutdown('SIGINT'))
}

let shuttingDown = false

/**
 * Graceful shutdown: stop input, stop the engine (cancels reconnects), close the
 * status server. Forced exit after 5 seconds.
 */
function shutdown(signal: string) {
  if (shuttingDown) return
  shuttingDown = true
  logger.info({ signal }, 'Shutdown requested')

  setTimeout(() => {
    logger.error('Graceful shutdown timeout (5s), forcing exit')
    process.exit(1)
  }, 5000).unref()

  unbindKeyboard?.()
  renderer?.detach()
  runtime?.stop()

  if (!server) {
    process.exit(0)
  }
  server.close(err => {
    if (err) {
      logger.error({ err }, 'Error closing status server')
      process.exit(1)
    }
    logger.info('Shutdown complete')
    process.exit(0)
  })
}

main().catch(err => {
  logger.fatal({ err }, 'Unhandled error in main')
  process.exit(1)
})
