#!/usr/bin/env node

import { booleanArgument, parseCliArguments, stringArrayArgument } from '@cloud-copilot/cli'
import { formatLoggedEvent } from './eventLog/format.js'
import type { ResizeEvent } from './queue/ringQueueOptions.js'
import { parseOperations } from './simulate/operations.js'
import { simulateWorkload } from './simulate/simulate.js'
import { factorArgument, integerArgument } from './utils/numericArguments.js'
import { ringQueueVersion } from './utils/packageVersion.js'

const DEFAULT_CAPACITY = 16

const main = async () => {
  const cli = await parseCliArguments(
    'ring-queue',
    {
      simulate: {
        description: 'Run a push/pop workload against a ring queue and report how it resized',
        arguments: {
          capacity: integerArgument({
            description: `The initial capacity of the queue. Defaults to ${DEFAULT_CAPACITY}`
          }),
          minSize: integerArgument({
            description: 'The queue is never shrunk while it holds fewer elements than this'
          }),
          growthFactor: factorArgument({
            description:
              'Multiplier applied to the size when a full queue grows, ' +
              '1.0 or less for a static capacity'
          }),
          shrinkFactor: factorArgument({
            description:
              'Shrink the queue once size / capacity drops below this fraction, 0 to never shrink'
          }),
          operations: stringArrayArgument({
            description:
              'The operations to run in order: push[:count], pop[:count], peek:index or drain',
            defaultValue: []
          }),
          verbose: booleanArgument({
            description: 'Print every resize before the report',
            character: 'v'
          })
        }
      }
    },
    {},
    {
      envPrefix: 'RING_QUEUE',
      showHelpIfNoArgs: true,
      requireSubcommand: true,
      expectOperands: false,
      version: {
        currentVersion: ringQueueVersion
      }
    }
  )

  if (cli.subcommand === 'simulate') {
    const { capacity, minSize, growthFactor, shrinkFactor, operations, verbose } = cli.args
    if (operations.length === 0) {
      console.error('Error: At least one operation must be provided for simulate command')
      process.exit(1)
    }

    const report = simulateWorkload({
      capacity: capacity ?? DEFAULT_CAPACITY,
      queue: { minSize, growthFactor, shrinkFactor },
      operations: parseOperations(operations)
    })

    if (verbose) {
      for (const entry of report.resizes) {
        console.log(formatLoggedEvent(entry, describeResize))
      }
    }
    console.log(JSON.stringify(report, null, 2))

    if (!report.fifoPreserved) {
      console.error('Error: Elements were not returned in the order they were pushed')
      process.exit(1)
    }
  }
}

function describeResize(event: ResizeEvent): string {
  return `${event.kind} ${event.from} -> ${event.to} slots with ${event.size} elements`
}

main()
  .catch((e) => {
    console.error(e)
    process.exit(1)
  })
  .then(() => {})
  .finally(() => {})
