import { EventEmitter, on } from 'node:events'
import type {
  RepostedIdsListener,
  Unsubscribe,
} from '@root/types/reposts.types.js'

const CHANGE_EVENT = 'change'

/**
 * Holds the latest set of reposted addressable IDs and notifies subscribers
 * whenever a new set is published. New subscribers receive the current set
 * immediately.
 */
export class RepostedIdsChannel {
  private readonly eventEmitter = new EventEmitter()
  private current: ReadonlySet<string> = new Set()
  private closed = false

  constructor() {
    // One listener per open SSE stream
    this.eventEmitter.setMaxListeners(100)
  }

  get value(): ReadonlySet<string> {
    return this.current
  }

  get isClosed(): boolean {
    return this.closed
  }

  publish(addressableIds: Iterable<string>): void {
    if (this.closed) return
    this.current = new Set(addressableIds)
    this.eventEmitter.emit(CHANGE_EVENT, this.current)
  }

  subscribe(listener: RepostedIdsListener): Unsubscribe {
    if (this.closed) return () => {}

    listener(this.current)
    this.eventEmitter.on(CHANGE_EVENT, listener)
    return () => {
      this.eventEmitter.off(CHANGE_EVENT, listener)
    }
  }

  /**
   * Async stream of the current set followed by every published set.
   *
   * The listener is attached before this returns, so nothing published
   * between the call and the first read is lost. Ends with an AbortError when
   * `signal` aborts.
   */
  stream(signal?: AbortSignal): AsyncGenerator<ReadonlySet<string>> {
    const changes = on(this.eventEmitter, CHANGE_EVENT, { signal })
    const initial = this.current

    return (async function* () {
      yield initial
      for await (const [addressableIds] of changes) {
        if (addressableIds instanceof Set) {
          yield addressableIds
        }
      }
    })()
  }

  listenerCount(): number {
    return this.eventEmitter.listenerCount(CHANGE_EVENT)
  }

  close(): void {
    this.closed = true
    this.eventEmitter.removeAllListeners()
  }
}
