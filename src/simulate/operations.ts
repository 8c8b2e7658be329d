export type WorkloadOperation =
  | { kind: 'push'; count: number }
  | { kind: 'pop'; count: number }
  | { kind: 'peek'; index: number }
  | { kind: 'drain' }

const operationPattern = /^(push|pop|peek|drain)(?::(-?\d+))?$/

/**
 * Parse a single workload operation such as `push:100`, `pop`, `peek:3` or `drain`.
 *
 * @param raw the operation as written on the command line
 * @returns the parsed operation
 */
export function parseOperation(raw: string): WorkloadOperation {
  const match = operationPattern.exec(raw.trim())
  if (!match) {
    throw new Error(
      `Invalid operation "${raw}". Expected push[:count], pop[:count], peek:index or drain`
    )
  }

  const [, kind, argument] = match
  const value = argument === undefined ? undefined : parseInt(argument, 10)

  if (kind === 'drain') {
    if (value !== undefined) {
      throw new Error(`Invalid operation "${raw}". drain does not take a count`)
    }
    return { kind: 'drain' }
  }

  if (kind === 'peek') {
    if (value === undefined) {
      throw new Error(`Invalid operation "${raw}". peek requires an index`)
    }
    return { kind: 'peek', index: value }
  }

  const count = value ?? 1
  if (count < 0) {
    throw new Error(`Invalid operation "${raw}". The count must not be negative`)
  }
  return kind === 'push' ? { kind: 'push', count } : { kind: 'pop', count }
}

export function parseOperations(raw: string[]): WorkloadOperation[] {
  return raw.map(parseOperation)
}
