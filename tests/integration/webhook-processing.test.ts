import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { DispatchController } from '../../src/dispatch/controller'
import { DispatchWorker, type ActionOutcome } from '../../src/dispatch/dispatch-worker'
import { WorkerBridge } from '../../src/dispatch/worker-bridge'
import { loadRules } from '../../src/engine/rule-loader'
import { createApp } from '../../src/server'
import { createTestLogger } from '../helpers/logger'
import { makeRequest } from '../helpers/request'

describe('webhook to shell command', () => {
  let dir: string
  let bridge: WorkerBridge | undefined

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'webhook-runner-'))
  })

  afterEach(async () => {
    await bridge?.stop()
    bridge = undefined
    await rm(dir, { recursive: true, force: true })
  })

  async function boot(rules: unknown) {
    const log = createTestLogger()
    const { rules: loaded } = loadRules(rules, log)
    const controller = new DispatchController(loaded)
    const outcomes: ActionOutcome[][] = []
    const worker = new DispatchWorker(controller, {
      log,
      onRequestProcessed: (_request, result) => outcomes.push(result),
    })
    bridge = new WorkerBridge((signal, self) => worker.run(signal, self), { log })
    bridge.start()
    await controller.waitUntilReady(1000)
    return { controller, outcomes }
  }

  it('runs the matching action with the headers in its environment', async () => {
    const out = join(dir, 'out')
    const { controller, outcomes } = await boot([
      { condition: 'gitlab_event=Push Hook', action: `env > ${out}` },
    ])

    controller.submit(makeRequest())
    await vi.waitFor(() => expect(outcomes).toHaveLength(1), { timeout: 5000 })

    const lines = (await readFile(out, 'utf8')).split('\n')
    expect(lines).toContain('YAGWR_X_Gitlab_Event=Push Hook')
    expect(lines).toContain('YAGWR_X_Gitlab_Token=test-secret')
    expect(outcomes[0].map(outcome => outcome.result.success)).toEqual([true])
  })

  it('goes from an HTTP POST to the command output', async () => {
    const out = join(dir, 'payload')
    const { controller, outcomes } = await boot([
      { condition: { all: ['gitlab_event = Push Hook', 'path ~= /hooks/'] }, action: `cat > ${out}` },
      { condition: 'gitlab_event = Merge Request Hook', action: `touch ${join(dir, 'never')}` },
    ])
    const app = createApp(controller)

    const res = await app.request('/hooks/deploy', {
      method: 'POST',
      headers: { 'X-Gitlab-Event': 'Push Hook', 'Content-Length': '17' },
      body: '{"ref":"release"}',
    })
    expect(res.status).toBe(200)

    await vi.waitFor(() => expect(outcomes).toHaveLength(1), { timeout: 5000 })
    expect(await readFile(out, 'utf8')).toBe('{"ref":"release"}')
    await expect(readFile(join(dir, 'never'))).rejects.toMatchObject({ code: 'ENOENT' })
  })

  it('keeps processing after a failing command', async () => {
    const out = join(dir, 'after')
    const { controller, outcomes } = await boot([
      { condition: 'path = /fail', action: 'exit 7' },
      { condition: 'path = /ok', action: `echo done > ${out}` },
    ])

    controller.submit(makeRequest({ path: '/fail' }))
    controller.submit(makeRequest({ path: '/ok' }))
    await vi.waitFor(() => expect(outcomes).toHaveLength(2), { timeout: 5000 })

    expect(outcomes[0].map(outcome => outcome.result.exitCode)).toEqual([7])
    expect(await readFile(out, 'utf8')).toBe('done\n')
  })
})
