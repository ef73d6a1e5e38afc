import { afterEach, describe, expect, it } from 'vitest'
import { executeAction, headerEnvironment } from '../../src/actions/shell-action'
import { createTestLogger, messages } from '../helpers/logger'
import { buildHeaders } from '../../src/parser/webhook-request'
import { makeRequest } from '../helpers/request'

describe('headerEnvironment', () => {
  it('prefixes names and replaces whitespace and dashes', () => {
    expect(headerEnvironment({
      'X-Gitlab-Event': 'Push Hook',
      'Odd Header\tName': 'x',
      Host: 'ci.example.test',
    })).toEqual({
      YAGWR_X_Gitlab_Event: 'Push Hook',
      YAGWR_Odd_Header_Name: 'x',
      YAGWR_Host: 'ci.example.test',
    })
  })

  it('exports a header named __proto__', () => {
    expect(headerEnvironment(buildHeaders([['__proto__', 'x']]))).toEqual({ YAGWR___proto__: 'x' })
  })
})

describe('executeAction', () => {
  afterEach(() => {
    delete process.env.WEBHOOK_RUNNER_TEST_VAR
  })

  it('exports request headers to the command', async () => {
    const result = await executeAction(makeRequest(), 'printf "%s|%s" "$YAGWR_X_Gitlab_Event" "$YAGWR_Host"', { log: createTestLogger() })

    expect(result.success).toBe(true)
    expect(result.exitCode).toBe(0)
    expect(result.stdout).toBe('Push Hook|ci.example.test')
  })

  it('extends the current environment instead of replacing it', async () => {
    process.env.WEBHOOK_RUNNER_TEST_VAR = 'kept'
    const result = await executeAction(makeRequest(), 'printf "%s" "$WEBHOOK_RUNNER_TEST_VAR"', { log: createTestLogger() })
    expect(result.stdout).toBe('kept')
  })

  it('feeds the body to stdin', async () => {
    const result = await executeAction(makeRequest(), 'cat', { log: createTestLogger() })
    expect(result.stdout).toBe('{"ref":"main"}')
  })

  it('closes stdin right away when there is no body', async () => {
    const result = await executeAction(makeRequest({ body: null }), 'wc -c', { log: createTestLogger() })
    expect(result.success).toBe(true)
    expect(result.stdout).toBe('0')
  })

  it('reports a failing command without throwing', async () => {
    const log = createTestLogger()
    const result = await executeAction(makeRequest(), 'echo oops >&2; exit 3', { log })

    expect(result).toMatchObject({ success: false, exitCode: 3, signal: null, stdout: '', stderr: 'oops' })
    expect(messages(log.warn)).toEqual(['Command failed (exit code 3), payload was\n{"ref":"main"}\n----'])
  })

  it('replaces bytes that are not UTF-8', async () => {
    const result = await executeAction(makeRequest(), "printf '\\377ok'", { log: createTestLogger() })
    expect(result.stdout).toBe('\uFFFDok')
  })

  it('terminates a command that exceeds the timeout', async () => {
    const result = await executeAction(makeRequest(), 'exec sleep 5', { log: createTestLogger(), timeoutMs: 50 })

    expect(result.success).toBe(false)
    expect(result.timedOut).toBe(true)
    expect(result.signal).toBe('SIGTERM')
    expect(result.exitCode).toBeNull()
  })

  it('terminates the commands a compound action started when the timeout expires', async () => {
    const result = await executeAction(makeRequest(), 'sleep 3; echo done', { log: createTestLogger(), timeoutMs: 100 })

    expect(result.success).toBe(false)
    expect(result.timedOut).toBe(true)
    expect(result.stdout).toBe('')
    expect(result.durationMs).toBeLessThan(2000)
  })
})
