import { describe, it, expect } from 'vitest'
import { loadSettings } from '@/config/settings'
import { ConfigurationError } from '@/errors/TimerErrors'

// Helper to capture the thrown ConfigurationError
const configurationErrorFor = (env: NodeJS.ProcessEnv): ConfigurationError => {
  try {
    loadSettings(env)
  } catch (err) {
    if (err instanceof ConfigurationError) return err
    throw err
  }
  throw new Error('expected loadSettings to throw')
}

describe('loadSettings()', () => {
  it('should apply defaults for an empty environment', () => {
    expect(loadSettings({})).toEqual({
      serverUrl: 'http://localhost:4001',
      addtimeAffectsEventDuration: false,
      displayMode: 'timer',
      reconnectDelayMs: 1000,
      maxReconnectDelayMs: 10000,
      statusPort: undefined,
      statusHost: '127.0.0.1',
      keyboardControls: true,
    })
  })

  it('should read every variable', () => {
    const settings = loadSettings({
      SERVER_URL: ' https://timer.example.test:4001 ',
      ADDTIME_AFFECTS_EVENT_DURATION: 'true',
      DISPLAY_MODE: 'clock',
      RECONNECT_DELAY_MS: '250',
      RECONNECT_MAX_DELAY_MS: '2000',
      STATUS_PORT: '4100',
      STATUS_HOST: '0.0.0.0',
      KEYBOARD_CONTROLS: '0',
    })

    expect(settings).toEqual({
      serverUrl: 'https://timer.example.test:4001',
      addtimeAffectsEventDuration: true,
      displayMode: 'clock',
      reconnectDelayMs: 250,
      maxReconnectDelayMs: 2000,
      statusPort: 4100,
      statusHost: '0.0.0.0',
      keyboardControls: false,
    })
  })

  it('should treat empty strings as unset', () => {
    const settings = loadSettings({ SERVER_URL: '', STATUS_PORT: '  ' })
    expect(settings.serverUrl).toBe('http://localhost:4001')
    expect(settings.statusPort).toBeUndefined()
  })

  it('should accept 1 as a boolean flag', () => {
    expect(loadSettings({ ADDTIME_AFFECTS_EVENT_DURATION: '1' }).addtimeAffectsEventDuration).toBe(true)
  })

  it('should reject a non-http server URL', () => {
    const error = configurationErrorFor({ SERVER_URL: 'ftp://timer.example.test' })
    expect(error.code).toBe('INVALID_CONFIGURATION')
    expect(error.issues).toEqual([{ field: 'SERVER_URL', message: 'must use http or https' }])
  })

  it('should reject an unknown boolean spelling', () => {
    const error = configurationErrorFor({ KEYBOARD_CONTROLS: 'yes' })
    expect(error.issues).toEqual([{ field: 'KEYBOARD_CONTROLS', message: 'must be one of: true, false, 1, 0' }])
  })

  it('should reject a max reconnect delay below the initial delay', () => {
    const error = configurationErrorFor({ RECONNECT_DELAY_MS: '5000', RECONNECT_MAX_DELAY_MS: '1000' })
    expect(error.issues).toEqual([
      { field: 'RECONNECT_MAX_DELAY_MS', message: 'must be at least RECONNECT_DELAY_MS' },
    ])
    expect(error.message).toBe(
      'Invalid configuration: RECONNECT_MAX_DELAY_MS must be at least RECONNECT_DELAY_MS'
    )
  })

  it('should list every invalid variable', () => {
    const error = configurationErrorFor({ DISPLAY_MODE: 'banner', STATUS_PORT: 'abc' })
    expect(error.issues.map(issue => issue.field).sort()).toEqual(['DISPLAY_MODE', 'STATUS_PORT'])
  })
})
