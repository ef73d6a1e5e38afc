import type { Rule } from '../engine/rule'
import { cloneRequest, type WebhookRequest } from '../parser/webhook-request'
import type { AsyncQueue } from './async-queue'
import type { WorkerBridge } from './worker-bridge'

export class HandoffError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'HandoffError'
  }
}

interface Published {
  bridge: WorkerBridge
  queue: AsyncQueue<WebhookRequest>
}

/**
 * State shared between the HTTP side and the dispatch worker. The worker
 * publishes its queue once while booting; the HTTP side only reads it.
 */
export class DispatchController {
  private published: Published | null = null
  private readonly readyWaiters: Array<() => void> = []

  constructor(readonly rules: readonly Rule[]) {}

  get ready(): boolean {
    return this.published !== null
  }

  publish(bridge: WorkerBridge, queue: AsyncQueue<WebhookRequest>): void {
    this.published = { bridge, queue }
    for (const notify of this.readyWaiters.splice(0)) notify()
  }

  /** Clears the published queue once the worker has stopped. */
  retract(): void {
    this.published = null
  }

  waitUntilReady(timeoutMs = 5000): Promise<void> {
    if (this.published) return Promise.resolve()

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const index = this.readyWaiters.indexOf(notify)
        if (index !== -1) this.readyWaiters.splice(index, 1)
        reject(new HandoffError(`dispatch worker not ready after ${timeoutMs}ms`))
      }, timeoutMs)
      const notify = () => {
        clearTimeout(timer)
        resolve()
      }
      this.readyWaiters.push(notify)
    })
  }

  /**
   * Hands a copy of `request` to the dispatch worker without waiting for it
   * to be processed.
   */
  submit(request: WebhookRequest): void {
    const published = this.published
    if (!published) {
      throw new HandoffError('dispatch worker has not published its queue yet')
    }
    const copy = cloneRequest(request)
    try {
      published.bridge.callSoon(() => published.queue.put(copy))
    } catch (error) {
      throw new HandoffError('unable to push request into the dispatch queue', { cause: error })
    }
  }
}
