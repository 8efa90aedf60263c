/**
 * SerialLane: one-at-a-time execution for one direction of the channel.
 *
 * Operations run in call order and never overlap, so a frame is fully
 * written (or read) before the next operation on the same side starts.
 * Two lanes share nothing: a write never waits for a pending read.
 *
 * @module
 */
export class SerialLane {
  private chain: Promise<void> = Promise.resolve()
  private queued = 0

  /**
   * Run `fn` after every previously submitted operation has settled.
   * The returned promise settles with `fn`'s outcome.
   */
  run<T>(fn: () => Promise<T>): Promise<T> {
    this.queued += 1
    const result = this.chain.then(fn)
    // Chain continues regardless to maintain serialization
    this.chain = result.then(
      () => {
        this.queued -= 1
      },
      () => {
        this.queued -= 1
      }
    )
    return result
  }

  /**
   * Operations submitted and not yet settled, including the running one.
   */
  get depth(): number {
    return this.queued
  }
}
