import { describe, expect, it } from 'vitest'
import type { WorkloadOperation } from './operations.js'
import { simulateWorkload } from './simulate.js'

describe('simulateWorkload', () => {
  it('should report a growing workload', () => {
    //Given a small queue and a workload that overflows it
    const operations: WorkloadOperation[] = [
      { kind: 'push', count: 5 },
      { kind: 'pop', count: 2 },
      { kind: 'peek', index: 0 },
      { kind: 'peek', index: 3 },
      { kind: 'drain' }
    ]

    //When simulating it
    const report = simulateWorkload({ capacity: 4, operations })

    //Then the report should show one grow and an intact order
    expect(report).toEqual({
      pushed: 5,
      rejected: 0,
      popped: 5,
      emptyPops: 0,
      peeks: [
        { index: 0, value: 2 },
        { index: 3, value: 'outOfRange' }
      ],
      finalSize: 0,
      finalCapacity: 8,
      peakCapacity: 8,
      grows: 1,
      shrinks: 0,
      failedShrinks: 0,
      fifoPreserved: true,
      resizes: [{ id: 0, event: { kind: 'grow', from: 4, to: 8, size: 4 } }]
    })
  })

  it('should count rejected pushes and empty pops for a static queue', () => {
    //When simulating an overflowing and overdrained static queue
    const report = simulateWorkload({
      capacity: 2,
      queue: { growthFactor: 1 },
      operations: [
        { kind: 'push', count: 3 },
        { kind: 'pop', count: 3 }
      ]
    })

    //Then the extra push and the extra pop should be counted
    expect(report.pushed).toBe(2)
    expect(report.rejected).toBe(1)
    expect(report.popped).toBe(2)
    expect(report.emptyPops).toBe(1)
    expect(report.finalCapacity).toBe(2)
    expect(report.resizes).toEqual([])
    expect(report.fifoPreserved).toBe(true)
  })

  it('should log grows and shrinks in the order they happened', () => {
    //When simulating a workload that grows and then shrinks
    const report = simulateWorkload({
      capacity: 16,
      queue: { minSize: 16, shrinkFactor: 0.25 },
      operations: [
        { kind: 'push', count: 100 },
        { kind: 'pop', count: 80 }
      ]
    })

    //Then every resize should be in the log
    expect(report.resizes.map((entry) => entry.event)).toEqual([
      { kind: 'grow', from: 16, to: 32, size: 16 },
      { kind: 'grow', from: 32, to: 64, size: 32 },
      { kind: 'grow', from: 64, to: 128, size: 64 },
      { kind: 'shrink', from: 128, to: 31, size: 31 }
    ])
    expect(report.peakCapacity).toBe(128)
    expect(report.finalCapacity).toBe(31)
    expect(report.finalSize).toBe(20)
  })
})
