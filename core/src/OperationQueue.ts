import { AsyncLocalStorage } from 'node:async_hooks'
import { StateConflict } from './errors.js'

interface RunningOperation {
  name: string
  active: boolean
}

/**
 * Runs operations one at a time, in submission order.
 *
 * An operation that awaits (an ownership query, for instance) keeps the queue
 * until it settles, so no other operation observes its intermediate state.
 * Submitting to the same queue from inside a running operation is rejected
 * with `REENTRANT_CALL`; waiting for it would never finish. Work the operation
 * schedules for later (a timer, say) runs normally once it has settled.
 */
export class OperationQueue {
  private tail: Promise<void> = Promise.resolve()
  private readonly context = new AsyncLocalStorage<RunningOperation>()

  /**
   * Name of the still-running operation whose async context the caller is in
   */
  get current(): string | undefined {
    const running = this.context.getStore()
    return running?.active === true ? running.name : undefined
  }

  run<T>(name: string, operation: () => Promise<T> | T): Promise<T> {
    const running = this.current
    if (running !== undefined) {
      return Promise.reject(new StateConflict(
        'REENTRANT_CALL',
        `Cannot start ${name} while ${running} is in progress`
      ))
    }

    const result = this.tail.then(async () => {
      const entry: RunningOperation = { name, active: true }
      try {
        return await this.context.run(entry, operation)
      } finally {
        entry.active = false
      }
    })
    this.tail = result.then(() => undefined, () => undefined)
    return result
  }
}
