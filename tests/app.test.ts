import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { main } from '../src/app'

describe('main', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'webhook-runner-main-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('refuses to start when no rule is valid', async () => {
    const file = join(dir, 'rules.yaml')
    await writeFile(file, '- condition: not an expression\n  action: "true"\n')
    expect(await main(['--rules', file, '--quiet'])).toBe(1)
  })

  it('refuses to start when the rule file is missing', async () => {
    expect(await main(['--rules', join(dir, 'missing.yaml'), '--quiet'])).toBe(1)
  })

  it('exits with 2 on an invalid configuration', async () => {
    expect(await main(['--port', '0', '--quiet'])).toBe(2)
  })

  it('exits with 0 after printing the version', async () => {
    expect(await main(['--version'])).toBe(0)
  })
})
