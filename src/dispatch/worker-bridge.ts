import { logger, type LoggerInterface } from '../logger'

export type WorkerTask = (signal: AbortSignal, bridge: WorkerBridge) => Promise<void>

export class BridgeNotRunningError extends Error {
  constructor(name: string) {
    super(`${name} is not running`)
    this.name = 'BridgeNotRunningError'
  }
}

export interface WorkerBridgeOptions {
  name?: string
  log?: LoggerInterface
}

function isAbort(error: unknown, signal: AbortSignal): boolean {
  return signal.aborted && (error === signal.reason || (error instanceof Error && error.name === 'AbortError'))
}

/**
 * Hosts one long-lived task and is the only way other code reaches it.
 *
 * `callSoon` queues a callback onto the task's side of the event loop
 * (callbacks run in submission order); `stop` delivers the cancellation the
 * same way and then waits for the task to finish.
 */
export class WorkerBridge {
  readonly name: string
  private readonly log: LoggerInterface
  private controller: AbortController | null = null
  private task: Promise<void> | null = null
  private stopping: Promise<void> | null = null

  constructor(private readonly body: WorkerTask, options: WorkerBridgeOptions = {}) {
    this.name = options.name ?? 'AsyncWorker'
    this.log = (options.log ?? logger).at(`[${this.name}]`)
  }

  get running(): boolean {
    return this.task !== null && this.stopping === null
  }

  start(): void {
    if (this.task) {
      this.log.debug('Already started')
      return
    }

    this.log.debug('Starting worker task')
    const controller = new AbortController()
    this.controller = controller

    this.task = new Promise<void>((resolve) => setImmediate(resolve))
      .then(() => this.body(controller.signal, this))
      .then(
        () => this.log.debug('Worker task finished'),
        (error: unknown) => {
          if (isAbort(error, controller.signal)) {
            this.log.debug('Worker task cancelled')
          } else {
            this.log.error('Worker task stopped with an error:', error)
          }
        }
      )
  }

  /**
   * Queues `fn` to run on a later turn of the event loop. Throws
   * `BridgeNotRunningError` once the bridge is stopped or before it starts.
   */
  callSoon(fn: () => void): void {
    if (!this.running) {
      throw new BridgeNotRunningError(this.name)
    }
    setImmediate(() => {
      try {
        fn()
      } catch (error) {
        this.log.error('Scheduled callback failed:', error)
      }
    })
  }

  stop(): Promise<void> {
    if (this.stopping) return this.stopping
    const task = this.task
    const controller = this.controller
    if (!task || !controller) return Promise.resolve()

    this.log.debug('Stopping worker task')
    this.stopping = new Promise<void>((resolve) => {
      setImmediate(() => {
        this.log.debug('Cancelling the worker task')
        controller.abort()
        resolve()
      })
    })
      .then(() => task)
      .catch((error: unknown) => {
        this.log.error('Unable to cancel worker task:', error)
      })
      .finally(() => {
        this.task = null
        this.controller = null
        this.stopping = null
        this.log.debug('Worker task joined')
      })

    return this.stopping
  }
}
