import { CommanderError } from 'commander'
import { describe, expect, it } from 'vitest'
import { ConfigError, loadConfig } from '../src/config'

describe('loadConfig', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadConfig([], {})).toEqual({
      host: '0.0.0.0',
      port: 7777,
      rulesFile: 'rules.yaml',
      logLevel: 'warn',
      logFile: 'stderr',
      logRotation: null,
      quiet: false,
      actionTimeoutMs: 0,
    })
  })

  it('reads the environment', () => {
    const config = loadConfig([], {
      HOST: '127.0.0.1',
      PORT: '8080',
      RULES_FILE: 'hooks.yml',
      LOG_LEVEL: 'DEBUG',
      LOG_FILE: 'stdout',
      ACTION_TIMEOUT_MS: '30000',
    })

    expect(config).toEqual({
      host: '127.0.0.1',
      port: 8080,
      rulesFile: 'hooks.yml',
      logLevel: 'debug',
      logFile: 'stdout',
      logRotation: null,
      quiet: false,
      actionTimeoutMs: 30000,
    })
  })

  it('lets flags override the environment', () => {
    const config = loadConfig(
      ['-p', '9000', '-r', 'other.yaml', '--log-level', 'WARNING', '--log-file', '/var/log/hooks.log', '-q', '--action-timeout', '250'],
      { PORT: '8080', RULES_FILE: 'hooks.yml', LOG_LEVEL: 'info' }
    )

    expect(config).toMatchObject({
      port: 9000,
      rulesFile: 'other.yaml',
      logLevel: 'warn',
      logFile: '/var/log/hooks.log',
      quiet: true,
      actionTimeoutMs: 250,
    })
  })

  it('maps critical to error', () => {
    expect(loadConfig(['--log-level', 'CRITICAL'], {}).logLevel).toBe('error')
  })

  it('rejects a port below 1', () => {
    expect(() => loadConfig(['--port', '0'], {})).toThrow(
      new ConfigError('Invalid configuration: port: only positive ports are permitted')
    )
  })

  it('rejects an unknown log level', () => {
    expect(() => loadConfig([], { LOG_LEVEL: 'verbose' })).toThrow(ConfigError)
  })

  it('rejects a negative action timeout', () => {
    expect(() => loadConfig([], { ACTION_TIMEOUT_MS: '-5' })).toThrow(ConfigError)
  })

  it('rotates by size by default once an argument is given', () => {
    const config = loadConfig(['--log-file', '/var/log/hooks.log', '--log-rotate-arg', '1m'], {})
    expect(config.logRotation).toEqual({ size: '1M' })
  })

  it('reads a time rotation from the environment', () => {
    const config = loadConfig([], { LOG_FILE: '/var/log/hooks.log', LOG_ROTATE: 'TIME', LOG_ROTATE_ARG: '3:H' })
    expect(config.logRotation).toEqual({ interval: '3h' })
  })

  it('lets rotation flags override the environment', () => {
    const config = loadConfig(
      ['--log-rotate', 'time', '--log-rotate-arg', 'midnight'],
      { LOG_ROTATE: 'size', LOG_ROTATE_ARG: '10k' }
    )
    expect(config.logRotation).toEqual({ interval: '1d' })
  })

  it('treats an empty LOG_ROTATE_ARG as no rotation', () => {
    expect(loadConfig([], { LOG_ROTATE_ARG: '' }).logRotation).toBeNull()
  })

  it('rejects an unknown rotation mode', () => {
    expect(() => loadConfig(['--log-rotate', 'weekly', '--log-rotate-arg', '1'], {})).toThrow(ConfigError)
  })

  it('rejects a rotation argument that does not fit the mode', () => {
    expect(() => loadConfig(['--log-rotate', 'time', '--log-rotate-arg', '7:M'], {})).toThrow(
      new ConfigError('Invalid configuration: logRotateArg: "7:M" is not a valid rotation time, seconds and minutes must divide 60')
    )
    expect(() => loadConfig(['--log-rotate-arg', 'lots'], {})).toThrow(
      new ConfigError('Invalid configuration: logRotateArg: "lots" is not a valid size, use a number with an optional k, m or g suffix')
    )
  })

  it('surfaces unknown flags as commander errors', () => {
    expect(() => loadConfig(['--bogus'], {})).toThrow(CommanderError)
  })
})
