import { basename, dirname } from 'node:path'
import colors from 'colors'
import { createStream, type RotatingFileStream } from 'rotating-file-stream'

colors.enable()

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LogDestination = 'stdout' | 'stderr' | (string & {})

const LEVEL_RANK: Record<LogLevel | 'success', number> = {
  debug: 10,
  info: 20,
  success: 20,
  warn: 30,
  error: 40,
}

interface LoggerSettings {
  level: LogLevel
  quiet: boolean
  write: (line: string) => void
}

/** Rotation of a log file, as taken by `rotating-file-stream`. */
export type LogRotation = { size: string } | { interval: string }
export type LogRotateMode = 'size' | 'time'

const SIZE_PATTERN = /^(\d+)([bkmg])?$/i
const TIME_PATTERN = /^(?:(\d+):)?(s|m|h|d|midnight)$/i

/**
 * Parses `--log-rotate-arg`: a size such as `512k` or `1m` for `size`, or
 * `[interval:]when` for `time`, where `when` is S, M, H, D or midnight.
 * Returns an error message for anything else.
 */
export function parseLogRotation(mode: LogRotateMode, arg: string): LogRotation | string {
  if (mode === 'size') {
    const match = SIZE_PATTERN.exec(arg.trim())
    if (!match || Number(match[1]) < 1) {
      return `"${arg}" is not a valid size, use a number with an optional k, m or g suffix`
    }
    return { size: `${Number(match[1])}${(match[2] ?? 'b').toUpperCase()}` }
  }

  const match = TIME_PATTERN.exec(arg.trim())
  const count = match?.[1] === undefined ? 1 : Number(match[1])
  if (!match || count < 1) {
    return `"${arg}" is not a valid rotation time, use [interval:]when with when one of S, M, H, D or midnight`
  }

  const when = match[2].toLowerCase()
  const unit = when === 'midnight' ? 'd' : when
  // the stream aligns rotations to the clock, which needs even divisions
  if ((unit === 's' || unit === 'm') && 60 % count !== 0) {
    return `"${arg}" is not a valid rotation time, seconds and minutes must divide 60`
  }
  if (unit === 'h' && 24 % count !== 0) {
    return `"${arg}" is not a valid rotation time, hours must divide 24`
  }
  return { interval: `${count}${unit}` }
}

let fileStream: RotatingFileStream | null = null

const settings: LoggerSettings = {
  level: 'info',
  quiet: false,
  write: (line) => process.stdout.write(line + '\n'),
}

export interface LoggerOptions {
  level?: LogLevel
  destination?: LogDestination
  quiet?: boolean
  /** Only applies to file destinations. */
  rotation?: LogRotation | null
}

export function configureLogger(options: LoggerOptions): void {
  if (options.level) settings.level = options.level
  if (options.quiet !== undefined) settings.quiet = options.quiet

  if (options.destination === undefined) return

  if (fileStream) {
    fileStream.end()
    fileStream = null
  }

  if (options.destination === 'stdout') {
    colors.enable()
    settings.write = (line) => process.stdout.write(line + '\n')
  } else if (options.destination === 'stderr') {
    colors.enable()
    settings.write = (line) => process.stderr.write(line + '\n')
  } else {
    colors.disable()
    const stream = createStream(basename(options.destination), {
      path: dirname(options.destination),
      ...(options.rotation ?? {}),
    })
    stream.on('error', (error) => {
      process.stderr.write(`logger: cannot write to ${options.destination}: ${error.message}\n`)
    })
    fileStream = stream
    settings.write = (line) => stream.write(line + '\n')
  }
}

function generateTraceId(): string {
  return Math.random().toString(36).substring(2, 8).toUpperCase()
}

function getCallerLocation(): string {
  const stack = new Error().stack
  if (!stack) return 'unknown:0'
  const lines = stack.split('\n').slice(4)
  for (const line of lines) {
    const match = line.match(/at\s+(?:.*\s+)?(.+):(\d+):\d+/)
    if (match) {
      const file = match[1].split('/').pop() || 'unknown'
      return `${file}:${match[2]}`
    }
  }
  return 'unknown:0'
}

function formatMessage(args: unknown[]): string {
  return args.map(a => {
    if (typeof a === 'string') return a
    if (a instanceof Error) return a.stack || `${a.name}: ${a.message}`
    if (typeof a === 'object') return JSON.stringify(a, null, 2)
    return String(a)
  }).join(' ')
}

function formatLog(
  level: LogLevel | 'success',
  colorFn: (s: string) => string,
  args: unknown[],
  traceId?: string,
  caller?: string
) {
  if (settings.quiet || LEVEL_RANK[level] < LEVEL_RANK[settings.level]) return
  const timestamp = new Date().toISOString().slice(11, 23)
  const msg = formatMessage(args)
  settings.write(`[${timestamp}] [${colorFn(level.toUpperCase())}] [${traceId || generateTraceId()}] ${caller || getCallerLocation()} ${msg}`)
}

export interface LoggerInterface {
  info: (...args: unknown[]) => void
  success: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  debug: (...args: unknown[]) => void
  withTrace: (traceId: string) => LoggerInterface
  at: (caller: string) => LoggerInterface
}

function createLoggerWithCaller(baseTraceId: string | undefined, caller: string | undefined): LoggerInterface {
  return {
    info: (...args) => formatLog('info', colors.cyan, args, baseTraceId, caller),
    success: (...args) => formatLog('success', colors.green, args, baseTraceId, caller),
    error: (...args) => formatLog('error', colors.red, args, baseTraceId, caller),
    warn: (...args) => formatLog('warn', colors.yellow, args, baseTraceId, caller),
    debug: (...args) => formatLog('debug', colors.gray, args, baseTraceId, caller),
    withTrace: (traceId: string) => createLoggerWithCaller(traceId, caller),
    at: (newCaller: string) => createLoggerWithCaller(baseTraceId, newCaller)
  }
}

export const logger = createLoggerWithCaller(undefined, undefined)

export function createLoggerWithTrace(traceId: string, caller?: string): LoggerInterface {
  return createLoggerWithCaller(traceId, caller)
}

export function createEventTraceId(): string {
  return `EVT-${Date.now().toString(36).toUpperCase()}-${generateTraceId()}`
}
