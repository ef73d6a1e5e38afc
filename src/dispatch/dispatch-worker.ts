import { EventRouter } from '../engine'
import { executeAction, type ActionResult } from '../actions'
import type { WebhookRequest } from '../parser'
import { logger, type LoggerInterface } from '../logger'
import { AsyncQueue } from './async-queue'
import type { DispatchController } from './controller'
import type { WorkerBridge } from './worker-bridge'

export type WorkerState = 'booting' | 'running' | 'draining' | 'stopped'

export interface ActionOutcome {
  ruleIndex: number
  action: string
  result: ActionResult
}

export interface DispatchWorkerOptions {
  actionTimeoutMs?: number
  log?: LoggerInterface
  /** Replaces the shell executor, mainly for tests. */
  execute?: typeof executeAction
  onRequestProcessed?: (request: WebhookRequest, outcomes: ActionOutcome[]) => void
}

/**
 * The task hosted by the `WorkerBridge`: takes requests off its queue one at
 * a time and runs the action of every matching rule, in rule order, waiting
 * for each command before evaluating the next rule.
 */
export class DispatchWorker {
  private current: WorkerState = 'booting'
  private readonly router: EventRouter
  private readonly log: LoggerInterface
  private readonly execute: typeof executeAction

  constructor(
    private readonly controller: DispatchController,
    private readonly options: DispatchWorkerOptions = {}
  ) {
    this.router = new EventRouter(controller.rules)
    this.log = (options.log ?? logger).at('[PROCESS]')
    this.execute = options.execute ?? executeAction
  }

  get state(): WorkerState {
    return this.current
  }

  async run(signal: AbortSignal, bridge: WorkerBridge): Promise<void> {
    this.current = 'booting'
    this.log.debug('Starting request worker')

    const queue = new AsyncQueue<WebhookRequest>()
    this.controller.publish(bridge, queue)
    this.current = 'running'
    this.log.info(`Request worker running with ${this.router.size} rule(s)`)

    try {
      while (!signal.aborted) {
        let request: WebhookRequest
        try {
          request = await queue.get(signal)
        } catch (error) {
          if (signal.aborted) break
          throw error
        }
        await this.process(request, signal)
      }
      this.current = 'draining'
      if (queue.size > 0) {
        this.log.warn(`Stopping with ${queue.size} unprocessed request(s)`)
      }
    } finally {
      this.controller.retract()
      this.current = 'stopped'
      this.log.debug('Request worker stopped')
    }
  }

  private async process(request: WebhookRequest, signal: AbortSignal): Promise<void> {
    const log = this.log.withTrace(request.traceId)
    const outcomes: ActionOutcome[] = []

    for (const { rule, index } of this.router.matches(request, log)) {
      log.info(`Rule ${index} matched, running its action`)
      try {
        const result = await this.execute(request, rule.action, {
          log,
          timeoutMs: this.options.actionTimeoutMs,
        })
        outcomes.push({ ruleIndex: index, action: rule.action, result })
        if (result.success) {
          log.success(`Action of rule ${index} finished in ${result.durationMs}ms`)
        } else {
          log.error(`Action of rule ${index} failed with exit code ${result.exitCode}`)
        }
      } catch (error) {
        log.error(`Unable to execute action of rule ${index}:`, error)
      }

      if (signal.aborted) {
        this.current = 'draining'
        log.warn('Stop requested, skipping the remaining rules')
        break
      }
    }

    if (outcomes.length === 0) {
      log.debug('No rule matched')
    }

    this.options.onRequestProcessed?.(request, outcomes)
  }
}
