import { OutOfMemoryError } from './errors.js'

/**
 * An occupied storage slot. Vacant slots are `undefined`, which keeps `undefined`
 * usable as an element value.
 */
export interface Slot<T> {
  readonly value: T
}

export type SlotStorage<T> = (Slot<T> | undefined)[]

/**
 * Allocates a backing store of exactly `capacity` vacant slots.
 */
export type SlotAllocator<T> = (capacity: number) => SlotStorage<T>

export function defaultAllocator<T>(capacity: number): SlotStorage<T> {
  return new Array<Slot<T> | undefined>(capacity)
}

/**
 * Allocate a backing store, reporting allocation failures as an OutOfMemoryError.
 *
 * @param allocate the allocator to use
 * @param capacity the number of slots required
 * @returns the new, fully vacant storage
 */
export function allocateSlots<T>(allocate: SlotAllocator<T>, capacity: number): SlotStorage<T> {
  let slots: SlotStorage<T>
  try {
    slots = allocate(capacity)
  } catch (err) {
    if (err instanceof RangeError) {
      throw new OutOfMemoryError(capacity, { cause: err })
    }
    throw err
  }

  if (slots.length !== capacity) {
    throw new OutOfMemoryError(capacity, {
      cause: new Error(`Allocator returned ${slots.length} slots`)
    })
  }
  return slots
}
