import { RingQueue } from '../queue/RingQueue.js'
import type { RingQueueOptions } from '../queue/ringQueueOptions.js'

export const DEFAULT_EVENT_LOG_CAPACITY = 64

/**
 * What to do with a new event when the log is full and cannot grow.
 */
export type OverflowPolicy = 'reject' | 'dropOldest'

export interface LoggedEvent<T> {
  readonly id: number
  readonly event: T
}

export type EventLogQueueOptions = Pick<
  RingQueueOptions<unknown>,
  'minSize' | 'growthFactor' | 'shrinkFactor'
>

export interface EventLogOptions<T> {
  initialCapacity?: number
  queue?: EventLogQueueOptions
  overflow?: OverflowPolicy
  /**
   * Events for which this returns false are not recorded.
   */
  accept?: (event: T) => boolean
  /**
   * Called once the log gives up an entry: after it was flushed, dropped or disposed.
   */
  release?: (entry: LoggedEvent<T>) => void
}

export type RecordResult =
  | { status: 'recorded'; id: number }
  | { status: 'filtered' }
  | { status: 'rejected' }

/**
 * A log of events that producers record into and consumers flush out of, buffered in a RingQueue.
 */
export class EventLog<T> {
  private queue: RingQueue<LoggedEvent<T>>
  private overflow: OverflowPolicy
  private accept?: (event: T) => boolean
  private release?: (entry: LoggedEvent<T>) => void

  private nextId = 0
  private droppedCount = 0
  private rejectedCount = 0
  private last: LoggedEvent<T> | undefined = undefined

  private onEventsAvailable?: () => void
  private notifyScheduled = false
  private disposed = false

  constructor(options: EventLogOptions<T> = {}) {
    this.queue = new RingQueue<LoggedEvent<T>>(
      options.initialCapacity ?? DEFAULT_EVENT_LOG_CAPACITY,
      { ...options.queue }
    )
    this.overflow = options.overflow ?? 'reject'
    this.accept = options.accept
    this.release = options.release
  }

  /**
   * Number of events recorded since the log was created, including those already flushed.
   */
  get totalRecorded(): number {
    return this.nextId
  }

  get pending(): number {
    return this.queue.length
  }

  get dropped(): number {
    return this.droppedCount
  }

  get rejected(): number {
    return this.rejectedCount
  }

  get lastEvent(): LoggedEvent<T> | undefined {
    return this.last
  }

  public setEventsAvailableCallback(callback: () => void): void {
    this.onEventsAvailable = callback
  }

  /**
   * Record an event.
   *
   * @param event the event to record
   * @returns the id assigned to the event, or why it was not recorded
   */
  public record(event: T): RecordResult {
    if (this.accept && !this.accept(event)) {
      return { status: 'filtered' }
    }

    const entry: LoggedEvent<T> = { id: this.nextId, event }
    if (this.queue.push(entry) === 'atCapacity' && !this.makeRoomFor(entry)) {
      this.rejectedCount++
      return { status: 'rejected' }
    }

    this.nextId++
    this.last = entry
    this.scheduleNotify()
    return { status: 'recorded', id: entry.id }
  }

  /**
   * Remove every pending entry, oldest first.
   *
   * @param sink receives each entry before it is released
   * @returns the number of entries flushed
   *
   * If the sink throws, the entry it was given is still released and the error is rethrown.
   * Entries after it stay pending.
   */
  public flush(sink?: (entry: LoggedEvent<T>) => void): number {
    let flushed = 0
    for (let next = this.queue.pop(); next.status === 'ok'; next = this.queue.pop()) {
      flushed++
      try {
        sink?.(next.value)
      } finally {
        this.release?.(next.value)
      }
    }
    return flushed
  }

  /**
   * Iterate pending entries without flushing them.
   */
  public entries(): IterableIterator<LoggedEvent<T>> {
    return this.queue[Symbol.iterator]()
  }

  public dispose(): void {
    if (this.disposed) {
      return
    }
    this.flush()
    this.queue.dispose()
    this.disposed = true
  }

  /**
   * Apply the overflow policy to a full log.
   *
   * @returns true if the entry was queued
   */
  private makeRoomFor(entry: LoggedEvent<T>): boolean {
    if (this.overflow === 'reject') {
      return false
    }

    const oldest = this.queue.pop()
    if (oldest.status === 'ok') {
      this.droppedCount++
      this.release?.(oldest.value)
    }
    return this.queue.push(entry) === 'ok'
  }

  private scheduleNotify(): void {
    if (this.notifyScheduled || !this.onEventsAvailable) {
      return
    }

    this.notifyScheduled = true

    // Use a microtask to debounce notifications
    queueMicrotask(() => {
      this.notifyScheduled = false
      this.onEventsAvailable?.()
    })
  }
}
