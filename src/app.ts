import { createServer } from 'node:http'
import { getRequestListener } from '@hono/node-server'
import { CommanderError } from 'commander'
import { loadConfig, ConfigError, type Config } from './config'
import { loadRulesFromFile, type RuleLoadResult } from './engine'
import { DispatchController, DispatchWorker, WorkerBridge } from './dispatch'
import { createApp } from './server'
import { configureLogger, logger } from './logger'

const READY_TIMEOUT_MS = 5000

function resolveConfig(argv: readonly string[]): Config | number {
  try {
    return loadConfig(argv)
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode
    }
    if (error instanceof ConfigError) {
      process.stderr.write(`${error.message}\n`)
      return 2
    }
    throw error
  }
}

/**
 * Loads the rules, boots the dispatch worker and serves webhooks until
 * SIGINT/SIGTERM. Resolves with the process exit code.
 */
export async function main(argv: readonly string[]): Promise<number> {
  const config = resolveConfig(argv)
  if (typeof config === 'number') return config

  configureLogger({
    level: config.logLevel,
    destination: config.logFile,
    quiet: config.quiet,
    rotation: config.logRotation,
  })
  const log = logger.at('[MAIN]')

  let loaded: RuleLoadResult
  try {
    loaded = await loadRulesFromFile(config.rulesFile)
  } catch (error) {
    log.error('Unable to load rules:', error)
    return 1
  }
  if (loaded.rules.length === 0) {
    log.error(`No valid rule in ${config.rulesFile}, refusing to start`)
    return 1
  }

  const controller = new DispatchController(loaded.rules)
  const worker = new DispatchWorker(controller, { actionTimeoutMs: config.actionTimeoutMs })
  const bridge = new WorkerBridge((signal, self) => worker.run(signal, self), { name: 'AsyncWorker' })

  bridge.start()
  try {
    await controller.waitUntilReady(READY_TIMEOUT_MS)
  } catch (error) {
    log.error('Dispatch worker did not start:', error)
    await bridge.stop()
    return 1
  }

  const app = createApp(controller)

  const exitCode = await new Promise<number>((resolve) => {
    const server = createServer(getRequestListener(app.fetch))

    let closing = false
    const shutdown = (code: number) => {
      if (closing) return
      closing = true
      process.off('SIGINT', onSignal)
      process.off('SIGTERM', onSignal)
      server.close(() => resolve(code))
    }

    const onSignal = (signal: NodeJS.Signals) => {
      log.info(`Received ${signal}, shutting down`)
      shutdown(0)
    }

    server.on('error', (error: Error) => {
      log.error('The HTTP server terminated with an error:', error)
      if (!server.listening) {
        closing = true
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
        resolve(1)
        return
      }
      shutdown(1)
    })

    process.on('SIGINT', onSignal)
    process.on('SIGTERM', onSignal)

    server.listen(config.port, config.host, () => {
      log.info(`Listening on ${config.host}:${config.port}`)
    })
  })

  await bridge.stop()
  log.info('Stopped')
  return exitCode
}
