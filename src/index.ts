export {
  DEFAULT_EVENT_LOG_CAPACITY,
  EventLog,
  type EventLogOptions,
  type EventLogQueueOptions,
  type LoggedEvent,
  type OverflowPolicy,
  type RecordResult
} from './eventLog/EventLog.js'
export { formatLoggedEvent } from './eventLog/format.js'
export {
  InvalidOptionsError,
  OutOfMemoryError,
  OutOfRangeError,
  QueueDisposedError,
  RingQueueError
} from './queue/errors.js'
export type { PeekResult, PopResult, PushResult, Taken } from './queue/results.js'
export {
  DEFAULT_GROWTH_FACTOR,
  DEFAULT_MIN_SIZE,
  DEFAULT_SHRINK_FACTOR,
  type ResizeEvent,
  type ResizeKind,
  type RingQueueOptions
} from './queue/ringQueueOptions.js'
export { RingQueue, type ResizeStats } from './queue/RingQueue.js'
export type { Slot, SlotAllocator, SlotStorage } from './queue/storage.js'
export { parseOperation, parseOperations, type WorkloadOperation } from './simulate/operations.js'
export { simulateWorkload, type WorkloadReport, type WorkloadRequest } from './simulate/simulate.js'
