import { InvalidOptionsError } from './errors.js'
import { defaultAllocator, type SlotAllocator } from './storage.js'

export const DEFAULT_MIN_SIZE = 16
export const DEFAULT_GROWTH_FACTOR = 2.0
export const DEFAULT_SHRINK_FACTOR = 0.0

/**
 * Largest allowed product of shrinkFactor and growthFactor. Keeping the shrink
 * threshold at half of the occupancy left after a grow separates every pair of
 * resizes by a number of operations proportional to the queue size.
 */
export const MAX_SHRINK_GROWTH_PRODUCT = 0.5

export type ResizeKind = 'grow' | 'shrink'

export interface ResizeEvent {
  kind: ResizeKind
  from: number
  to: number
  size: number
}

export interface RingQueueOptions<T> {
  /**
   * The queue is never shrunk while it holds fewer than this many elements.
   */
  minSize?: number

  /**
   * Multiplier applied to the size when a full queue needs to expand.
   * Set to 1.0 or less for a static capacity.
   */
  growthFactor?: number

  /**
   * The backing store is shrunk to the current size once size / capacity drops
   * below this fraction. 0.0 disables shrinking.
   */
  shrinkFactor?: number

  /**
   * Throw an OutOfRangeError from peek instead of returning an outOfRange result.
   */
  strict?: boolean

  /**
   * Called for every element the queue gives up during clear or dispose.
   */
  release?: (item: T) => void

  allocate?: SlotAllocator<T>

  /**
   * Called once the new store is ready and before it replaces the old one.
   * Throwing cancels the resize.
   */
  onResize?: (event: ResizeEvent) => void
}

export interface ResolvedRingQueueOptions<T> {
  minSize: number
  growthFactor: number
  shrinkFactor: number
  strict: boolean
  release: ((item: T) => void) | undefined
  allocate: SlotAllocator<T>
  onResize: ((event: ResizeEvent) => void) | undefined
}

/**
 * Apply defaults to queue options and validate the resulting policy.
 *
 * @param options the options supplied by the caller
 * @returns the complete set of options
 * @throws InvalidOptionsError if the policy is not usable
 */
export function resolveRingQueueOptions<T>(
  options: RingQueueOptions<T> = {}
): ResolvedRingQueueOptions<T> {
  const resolved: ResolvedRingQueueOptions<T> = {
    minSize: options.minSize ?? DEFAULT_MIN_SIZE,
    growthFactor: options.growthFactor ?? DEFAULT_GROWTH_FACTOR,
    shrinkFactor: options.shrinkFactor ?? DEFAULT_SHRINK_FACTOR,
    strict: options.strict ?? false,
    release: options.release,
    allocate: options.allocate ?? defaultAllocator,
    onResize: options.onResize
  }

  const { minSize, growthFactor, shrinkFactor } = resolved
  if (!Number.isInteger(minSize) || minSize < 1) {
    throw new InvalidOptionsError(`minSize must be an integer >= 1, received ${minSize}`)
  }
  if (!Number.isFinite(growthFactor)) {
    throw new InvalidOptionsError(`growthFactor must be a finite number, received ${growthFactor}`)
  }
  if (!Number.isFinite(shrinkFactor) || shrinkFactor < 0 || shrinkFactor >= 1) {
    throw new InvalidOptionsError(
      `shrinkFactor must be in the range [0, 1), received ${shrinkFactor}`
    )
  }

  if (shrinkFactor > 0) {
    if (growthFactor <= 1) {
      throw new InvalidOptionsError(
        'shrinkFactor requires growthFactor > 1, a static capacity queue cannot be shrunk'
      )
    }
    if (shrinkFactor * growthFactor > MAX_SHRINK_GROWTH_PRODUCT) {
      throw new InvalidOptionsError(
        `shrinkFactor ${shrinkFactor} is too close to 1 / growthFactor (${growthFactor}), ` +
          `shrinkFactor * growthFactor must not exceed ${MAX_SHRINK_GROWTH_PRODUCT}`
      )
    }
  }

  return resolved
}
