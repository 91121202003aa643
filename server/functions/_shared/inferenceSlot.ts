import { InferenceTimeout } from './errors'

type Turn<T> = {
  outcome: Promise<T>
  settled: Promise<void>
}

const noop = () => {}

/**
 * Single serialized access point to the inference engine.
 *
 * Calls run one at a time in the order `run` was called. A call that misses
 * its deadline rejects with `InferenceTimeout` right away, but the slot is only
 * handed to the next caller once the abandoned call has actually settled.
 */
export class InferenceSlot {
  private tail: Promise<void> = Promise.resolve()
  private waiting = 0

  /** Calls accepted and not yet settled, the running one included. */
  get depth(): number {
    return this.waiting
  }

  run<T>(task: () => Promise<T>, timeoutMs: number): Promise<T> {
    this.waiting++
    const turn = this.tail.then(() => this.invoke(task, timeoutMs))
    this.tail = turn.then((t) => t.settled)
    return turn.then((t) => t.outcome)
  }

  private invoke<T>(task: () => Promise<T>, timeoutMs: number): Turn<T> {
    const call = Promise.resolve().then(task)
    let timer: ReturnType<typeof setTimeout> | undefined
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new InferenceTimeout(timeoutMs)), timeoutMs)
    })
    const settled = call.then(noop, noop).finally(() => {
      clearTimeout(timer)
      this.waiting--
    })
    return { outcome: Promise.race([call, deadline]), settled }
  }
}
