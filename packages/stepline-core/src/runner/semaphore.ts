import { PipelineContractError } from '../errors.js'

/**
 * Releases an acquired permit. Calling it more than once has no effect.
 */
export type ReleasePermit = () => void

/**
 * FIFO counting semaphore used as the job admission limit.
 */
export class Semaphore {
  private available: number
  private readonly waiters: Array<() => void> = []

  /**
   * Creates a semaphore.
   *
   * @param permits Number of concurrent holders, at least 1.
   */
  public constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new PipelineContractError(`maxConcurrency must be a positive integer (got ${permits})`)
    }

    this.available = permits
  }

  /**
   * Waits for a free permit.
   *
   * @returns Release function for the acquired permit.
   */
  public async acquire(): Promise<ReleasePermit> {
    if (this.available > 0) {
      this.available -= 1
      return this.createRelease()
    }

    await new Promise<void>((resolve) => {
      this.waiters.push(resolve)
    })
    return this.createRelease()
  }

  /** Number of callers waiting for a permit. */
  public get pending(): number {
    return this.waiters.length
  }

  private createRelease(): ReleasePermit {
    let released = false

    return (): void => {
      if (released) {
        return
      }
      released = true

      // Hand the permit straight to the next waiter.
      const next = this.waiters.shift()
      if (next) {
        next()
        return
      }
      this.available += 1
    }
  }
}
