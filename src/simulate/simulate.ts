import { EventLog, type LoggedEvent } from '../eventLog/EventLog.js'
import { RingQueue } from '../queue/RingQueue.js'
import type { ResizeEvent, RingQueueOptions } from '../queue/ringQueueOptions.js'
import type { WorkloadOperation } from './operations.js'

export interface WorkloadRequest {
  capacity: number
  queue?: Omit<RingQueueOptions<number>, 'onResize'>
  operations: WorkloadOperation[]
}

export interface PeekOutcome {
  index: number
  value: number | 'outOfRange'
}

export interface WorkloadReport {
  pushed: number
  rejected: number
  popped: number
  emptyPops: number
  peeks: PeekOutcome[]
  finalSize: number
  finalCapacity: number
  peakCapacity: number
  grows: number
  shrinks: number
  failedShrinks: number
  fifoPreserved: boolean
  resizes: LoggedEvent<ResizeEvent>[]
}

/**
 * Run a scripted workload against a RingQueue and report how it behaved.
 *
 * Pushed elements are consecutive integers starting at 0, which lets every pop be
 * checked against FIFO order.
 *
 * @param request the queue configuration and the operations to run
 * @returns the workload report
 */
export function simulateWorkload(request: WorkloadRequest): WorkloadReport {
  const resizeLog = new EventLog<ResizeEvent>()
  const queue = new RingQueue<number>(request.capacity, {
    ...request.queue,
    onResize: (event) => {
      resizeLog.record(event)
    }
  })

  const report: WorkloadReport = {
    pushed: 0,
    rejected: 0,
    popped: 0,
    emptyPops: 0,
    peeks: [],
    finalSize: 0,
    finalCapacity: 0,
    peakCapacity: queue.capacity,
    grows: 0,
    shrinks: 0,
    failedShrinks: 0,
    fifoPreserved: true,
    resizes: []
  }

  let nextValue = 0
  let expectedValue = 0

  const pushOne = () => {
    if (queue.push(nextValue) === 'ok') {
      nextValue++
      report.pushed++
      report.peakCapacity = Math.max(report.peakCapacity, queue.capacity)
    } else {
      report.rejected++
    }
  }

  const popOne = (): boolean => {
    const result = queue.pop()
    if (result.status === 'empty') {
      return false
    }
    if (result.value !== expectedValue) {
      report.fifoPreserved = false
    }
    expectedValue = result.value + 1
    report.popped++
    return true
  }

  for (const operation of request.operations) {
    if (operation.kind === 'push') {
      for (let i = 0; i < operation.count; i++) {
        pushOne()
      }
    } else if (operation.kind === 'pop') {
      for (let i = 0; i < operation.count; i++) {
        if (!popOne()) {
          report.emptyPops++
        }
      }
    } else if (operation.kind === 'peek') {
      const result = queue.peek(operation.index)
      report.peeks.push({
        index: operation.index,
        value: result.status === 'ok' ? result.value : 'outOfRange'
      })
    } else {
      while (popOne()) {}
    }
  }

  const stats = queue.stats
  report.finalSize = queue.length
  report.finalCapacity = queue.capacity
  report.grows = stats.grows
  report.shrinks = stats.shrinks
  report.failedShrinks = stats.failedShrinks
  resizeLog.flush((entry) => report.resizes.push(entry))

  return report
}
