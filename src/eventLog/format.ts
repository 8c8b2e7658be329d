import type { LoggedEvent } from './EventLog.js'

/**
 * Format a logged event as a single line, e.g. `event #3: disk full`.
 *
 * @param entry the entry to format
 * @param describe turns the event into text, by default strings are used as is
 *   and anything else is JSON encoded
 * @returns the formatted line
 */
export function formatLoggedEvent<T>(
  entry: LoggedEvent<T>,
  describe: (event: T) => string = describeEvent
): string {
  return `event #${entry.id}: ${describe(entry.event)}`
}

function describeEvent(event: unknown): string {
  if (typeof event === 'string') {
    return event
  }
  return JSON.stringify(event)
}
