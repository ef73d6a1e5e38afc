interface Waiter<T> {
  resolve: (item: T) => void
}

function abortReason(signal: AbortSignal): unknown {
  return signal.reason ?? new DOMException('The operation was aborted', 'AbortError')
}

/**
 * Unbounded FIFO. `put` never blocks; `get` waits for an item and can be
 * cancelled through an `AbortSignal`.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = []
  private readonly waiters: Waiter<T>[] = []

  get size(): number {
    return this.items.length
  }

  get waiting(): number {
    return this.waiters.length
  }

  put(item: T): void {
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter.resolve(item)
      return
    }
    this.items.push(item)
  }

  /**
   * Resolves with the oldest item, waiting for one if the queue is empty.
   * Rejects with the signal's reason as soon as `signal` aborts; an aborted
   * call never consumes an item.
   */
  get(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal))
    }

    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1)
      return Promise.resolve(item)
    }

    return new Promise<T>((resolve, reject) => {
      const waiter: Waiter<T> = { resolve }

      if (signal) {
        const onAbort = () => {
          const index = this.waiters.indexOf(waiter)
          if (index !== -1) this.waiters.splice(index, 1)
          reject(abortReason(signal))
        }
        waiter.resolve = (item) => {
          signal.removeEventListener('abort', onAbort)
          resolve(item)
        }
        signal.addEventListener('abort', onAbort, { once: true })
      }

      this.waiters.push(waiter)
    })
  }
}
