import { InvalidOptionsError, OutOfRangeError, QueueDisposedError } from './errors.js'
import type { PeekResult, PopResult, PushResult } from './results.js'
import {
  resolveRingQueueOptions,
  type ResizeKind,
  type ResolvedRingQueueOptions,
  type RingQueueOptions
} from './ringQueueOptions.js'
import { allocateSlots, type Slot, type SlotStorage } from './storage.js'

export interface ResizeStats {
  grows: number
  shrinks: number
  failedShrinks: number
}

/**
 * A FIFO queue backed by a circular buffer that grows when full and, optionally,
 * shrinks when mostly empty.
 *
 * The queue owns every element until it is popped. Popping hands the element to the
 * caller and vacates its slot. Elements still queued at teardown are handed to the
 * `release` option.
 */
export class RingQueue<T> implements Iterable<T> {
  private slots: SlotStorage<T>
  private start = 0
  private size = 0
  private disposed = false
  private readonly options: ResolvedRingQueueOptions<T>
  private readonly resizeStats: ResizeStats = { grows: 0, shrinks: 0, failedShrinks: 0 }
  private shrinkFailure: unknown = undefined

  /**
   * Creates a queue with room for `capacity` elements.
   *
   * @param capacity the initial number of slots, an integer >= 1
   * @param options the growth, shrink and teardown policy of the queue
   * @throws InvalidOptionsError if the capacity or the options are invalid
   * @throws OutOfMemoryError if the backing store cannot be allocated
   */
  constructor(capacity: number, options: RingQueueOptions<T> = {}) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new InvalidOptionsError(
        `RingQueue capacity must be an integer >= 1, received ${capacity}`
      )
    }
    this.options = resolveRingQueueOptions(options)
    this.slots = allocateSlots(this.options.allocate, capacity)
  }

  get length(): number {
    return this.size
  }

  get capacity(): number {
    return this.slots.length
  }

  get stats(): ResizeStats {
    return { ...this.resizeStats }
  }

  /**
   * The error behind the most recent failed shrink, if any.
   */
  get lastShrinkError(): unknown {
    return this.shrinkFailure
  }

  isEmpty(): boolean {
    return this.size === 0
  }

  isFull(): boolean {
    return this.size === this.slots.length
  }

  /**
   * Append an element to the back of the queue, expanding the backing store if the
   * queue is full and the growth policy allows it.
   *
   * @param item the element to enqueue, owned by the queue until popped
   * @returns 'ok' if the element was queued, 'atCapacity' if the queue is full and cannot grow
   * @throws OutOfMemoryError if the queue needed to grow and the allocation failed
   *
   * A failed grow, including one cancelled by a throwing onResize, leaves the queue unchanged.
   */
  push(item: T): PushResult {
    this.assertUsable()

    if (this.size === this.slots.length) {
      const { growthFactor } = this.options
      if (growthFactor <= 1) {
        return 'atCapacity'
      }
      const newCapacity = Math.floor(this.size * growthFactor)
      if (newCapacity <= this.slots.length) {
        return 'atCapacity'
      }
      this.resize(newCapacity, 'grow')
    }

    this.slots[(this.start + this.size) % this.slots.length] = { value: item }
    this.size++
    return 'ok'
  }

  /**
   * Remove the oldest element and hand it to the caller.
   *
   * @returns the element, or an empty result if there is nothing queued
   */
  pop(): PopResult<T> {
    this.assertUsable()
    if (this.size === 0) {
      return { status: 'empty' }
    }

    const value = this.take()
    this.shrinkIfSparse()
    return { status: 'ok', value }
  }

  /**
   * Read the element at `index` positions from the front without removing it.
   *
   * @param index the logical offset from the oldest element
   * @returns the element, or an outOfRange result
   * @throws OutOfRangeError if the queue is strict and the index is invalid
   */
  peek(index: number): PeekResult<T> {
    this.assertUsable()
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      if (this.options.strict) {
        throw new OutOfRangeError(index, this.size)
      }
      return { status: 'outOfRange', index, size: this.size }
    }
    return { status: 'ok', value: this.slotAt(index).value }
  }

  toArray(): T[] {
    return [...this]
  }

  *[Symbol.iterator](): IterableIterator<T> {
    this.assertUsable()
    for (let i = 0; i < this.size; i++) {
      yield this.slotAt(i).value
    }
  }

  /**
   * Give up every queued element, oldest first, to the release option.
   * The capacity is unchanged.
   */
  clear(): void {
    this.assertUsable()
    const { release } = this.options
    while (this.size > 0) {
      const value = this.take()
      release?.(value)
    }
    this.start = 0
  }

  /**
   * Release all queued elements and the backing store. The queue cannot be used afterwards.
   */
  dispose(): void {
    if (this.disposed) {
      return
    }
    this.clear()
    this.slots = []
    this.disposed = true
  }

  /**
   * Vacate the front slot and return its element, without any shrink check.
   */
  private take(): T {
    const slot = this.slotAt(0)
    this.slots[this.start] = undefined
    this.start = (this.start + 1) % this.slots.length
    this.size--
    return slot.value
  }

  private slotAt(offset: number): Slot<T> {
    const slot = this.slots[(this.start + offset) % this.slots.length]
    if (!slot) {
      throw new Error(`RingQueue slot at offset ${offset} is vacant inside the live window`)
    }
    return slot
  }

  private shrinkIfSparse(): void {
    const { minSize, shrinkFactor } = this.options
    if (shrinkFactor <= 0 || this.size < minSize) {
      return
    }
    if (this.size / this.slots.length >= shrinkFactor) {
      return
    }

    // The element is already popped, a shrink that fails for any reason keeps the larger store.
    try {
      this.resize(this.size, 'shrink')
    } catch (err) {
      this.resizeStats.failedShrinks++
      this.shrinkFailure = err
    }
  }

  /**
   * Move the live elements into a new store of `newCapacity` slots, oldest first at index 0.
   * The new store is allocated and filled, then onResize is told, and only then does it
   * replace the old store. An error from either step leaves the queue as it was.
   */
  private resize(newCapacity: number, kind: ResizeKind): void {
    const next = allocateSlots(this.options.allocate, newCapacity)
    const previousCapacity = this.slots.length

    for (let i = 0; i < this.size; i++) {
      next[i] = this.slots[(this.start + i) % previousCapacity]
    }

    this.options.onResize?.({ kind, from: previousCapacity, to: newCapacity, size: this.size })

    this.slots = next
    this.start = 0
    if (kind === 'grow') {
      this.resizeStats.grows++
    } else {
      this.resizeStats.shrinks++
    }
  }

  private assertUsable(): void {
    if (this.disposed) {
      throw new QueueDisposedError()
    }
  }
}
