/**
 * keyseal Output Selector
 *
 * --output wins over --quiet; --quiet alone discards the payload.
 */

import fs from 'node:fs'
import type { OptionModel, OutputSink } from '../types.js'
import { WriteError } from './errors.js'

export function selectOutput(model: OptionModel): OutputSink {
  if (model.output !== undefined) {
    return { type: 'file', path: model.output }
  }
  if (model.quiet) {
    return { type: 'suppressed' }
  }
  return { type: 'stdout' }
}

export interface SinkIO {
  stdout: (text: string) => void
}

/**
 * Deliver the payload to the selected sink
 *
 * File sinks get the payload as-is, stdout gets a trailing newline.
 */
export function writeToSink(sink: OutputSink, payload: string, io: SinkIO): void {
  switch (sink.type) {
    case 'file':
      try {
        fs.writeFileSync(sink.path, payload, { mode: 0o600 })
      } catch (err) {
        throw new WriteError(sink.path, err instanceof Error ? err : undefined)
      }
      return

    case 'stdout':
      io.stdout(payload.endsWith('\n') ? payload : `${payload}\n`)
      return

    case 'suppressed':
      return
  }
}
