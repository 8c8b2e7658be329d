export type PushResult = 'ok' | 'atCapacity'

export interface Taken<T> {
  status: 'ok'
  value: T
}

export type PopResult<T> = Taken<T> | { status: 'empty' }

export type PeekResult<T> = Taken<T> | { status: 'outOfRange'; index: number; size: number }
