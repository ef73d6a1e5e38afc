import { spawn } from 'node:child_process'
import type { HeaderMap, WebhookRequest } from '../parser/webhook-request'
import { logger, type LoggerInterface } from '../logger'

export const ENV_PREFIX = 'YAGWR_'

export interface ActionResult {
  success: boolean
  exitCode: number | null
  signal: NodeJS.Signals | null
  stdout: string
  stderr: string
  error?: string
  timedOut?: boolean
  durationMs: number
}

export interface ExecuteOptions {
  log?: LoggerInterface
  /** Sends SIGTERM to the command's process group after this many milliseconds. 0 disables it. */
  timeoutMs?: number
}

export function headerEnvironment(headers: HeaderMap): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [name, value] of Object.entries(headers)) {
    env[ENV_PREFIX + name.replace(/[\s-]/g, '_')] = String(value)
  }
  return env
}

function describeBody(body: Buffer | null): string {
  if (body === null) return '<no payload>'
  return body.toString('utf8').trim()
}

/**
 * Runs `action` through the shell with the request headers exported as
 * `YAGWR_*` variables and the request body on stdin. Never rejects: a failing
 * command or a spawn error is reported through the result and the log.
 */
export function executeAction(
  request: WebhookRequest,
  action: string,
  options: ExecuteOptions = {}
): Promise<ActionResult> {
  const log = options.log ?? logger
  const timeoutMs = options.timeoutMs ?? 0
  const startTime = Date.now()

  return new Promise((resolve) => {
    const stdout: Buffer[] = []
    const stderr: Buffer[] = []
    let spawnError: Error | null = null
    let timedOut = false
    let timer: NodeJS.Timeout | undefined
    let settled = false

    log.debug(`Command: ${JSON.stringify(action)}`)

    // own process group, so a timeout reaches the commands the shell started
    const proc = spawn(action, {
      shell: true,
      detached: true,
      stdio: ['pipe', 'pipe', 'pipe'],
      env: { ...process.env, ...headerEnvironment(request.headers) },
    })

    proc.stdout.on('data', (chunk: Buffer) => stdout.push(chunk))
    proc.stderr.on('data', (chunk: Buffer) => stderr.push(chunk))

    // the command may exit without reading its input
    proc.stdin.on('error', (error) => {
      log.debug(`Could not write payload to stdin: ${error.message}`)
    })

    proc.on('error', (error) => {
      spawnError = error
      log.error(`Unable to run command ${JSON.stringify(action)}:`, error)
      // no 'close' follows when the process never started
      if (proc.pid === undefined) finish(null, null)
    })

    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true
        log.warn(`Command exceeded ${timeoutMs}ms, sending SIGTERM`)
        terminateGroup()
      }, timeoutMs)
    }

    function terminateGroup() {
      if (proc.pid === undefined) return
      try {
        process.kill(-proc.pid, 'SIGTERM')
      } catch (error) {
        log.debug('Process group already gone, signalling the shell only:', error)
        proc.kill('SIGTERM')
      }
    }

    // after a timeout, stop waiting on pipes a surviving descendant still holds
    proc.on('exit', () => {
      if (!timedOut) return
      proc.stdout.destroy()
      proc.stderr.destroy()
    })

    function finish(code: number | null, signal: NodeJS.Signals | null) {
      if (settled) return
      settled = true
      if (timer) clearTimeout(timer)

      const result: ActionResult = {
        success: spawnError === null && code === 0,
        exitCode: code,
        signal,
        stdout: Buffer.concat(stdout).toString('utf8').trim(),
        stderr: Buffer.concat(stderr).toString('utf8').trim(),
        durationMs: Date.now() - startTime,
      }
      if (spawnError) result.error = spawnError.message
      if (timedOut) result.timedOut = true

      log.debug(`return code: ${code}`)
      if (result.stdout) log.debug(`STDOUT:\n${result.stdout}`)
      if (result.stderr) log.debug(`STDERR:\n${result.stderr}`)

      if (!result.success) {
        log.warn(`Command failed (exit code ${code}${signal ? `, signal ${signal}` : ''}), payload was\n${describeBody(request.body)}\n----`)
      }

      resolve(result)
    }

    proc.on('close', finish)

    log.debug('Writing stdin with payload')
    if (request.body) {
      proc.stdin.end(request.body)
    } else {
      proc.stdin.end()
    }
  })
}
