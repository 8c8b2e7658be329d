import { describe, expect, it } from 'vitest'
import { parseOperation, parseOperations, type WorkloadOperation } from './operations.js'

const validOperationTests: { only?: true; raw: string; expected: WorkloadOperation }[] = [
  { raw: 'push:100', expected: { kind: 'push', count: 100 } },
  { raw: 'push', expected: { kind: 'push', count: 1 } },
  { raw: 'pop:80', expected: { kind: 'pop', count: 80 } },
  { raw: 'pop', expected: { kind: 'pop', count: 1 } },
  { raw: 'pop:0', expected: { kind: 'pop', count: 0 } },
  { raw: 'peek:3', expected: { kind: 'peek', index: 3 } },
  { raw: 'peek:-1', expected: { kind: 'peek', index: -1 } },
  { raw: ' drain ', expected: { kind: 'drain' } }
]

const invalidOperationTests: { only?: true; raw: string; message: string }[] = [
  { raw: 'shove:1', message: 'Invalid operation "shove:1"' },
  { raw: 'push:abc', message: 'Invalid operation "push:abc"' },
  { raw: 'push:-2', message: 'The count must not be negative' },
  { raw: 'peek', message: 'peek requires an index' },
  { raw: 'drain:4', message: 'drain does not take a count' }
]

describe('parseOperation', () => {
  for (const test of validOperationTests) {
    const func = test.only ? it.only : it
    func(`should parse "${test.raw}"`, () => {
      expect(parseOperation(test.raw)).toEqual(test.expected)
    })
  }

  for (const test of invalidOperationTests) {
    const func = test.only ? it.only : it
    func(`should reject "${test.raw}"`, () => {
      expect(() => parseOperation(test.raw)).toThrow(test.message)
    })
  }
})

describe('parseOperations', () => {
  it('should parse every operation in order', () => {
    //Given a list of raw operations
    const raw = ['push:5', 'pop:2', 'drain']

    //When parsing them
    const operations = parseOperations(raw)

    //Then they should be parsed in order
    expect(operations).toEqual([
      { kind: 'push', count: 5 },
      { kind: 'pop', count: 2 },
      { kind: 'drain' }
    ])
  })
})
