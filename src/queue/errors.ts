/**
 * Base class for all errors thrown by a RingQueue.
 */
export class RingQueueError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Thrown when a queue is created with a capacity or policy it cannot honor.
 */
export class InvalidOptionsError extends RingQueueError {}

/**
 * Thrown when the backing store for a queue cannot be allocated.
 */
export class OutOfMemoryError extends RingQueueError {
  constructor(
    readonly requestedCapacity: number,
    options?: ErrorOptions
  ) {
    super(`Unable to allocate ${requestedCapacity} queue slots`, options)
  }
}

/**
 * Thrown by a strict queue when peeking outside of the live elements.
 */
export class OutOfRangeError extends RingQueueError {
  constructor(
    readonly index: number,
    readonly size: number
  ) {
    super(`Index ${index} is out of range for a queue of size ${size}`)
  }
}

export class QueueDisposedError extends RingQueueError {
  constructor() {
    super('RingQueue has been disposed')
  }
}
