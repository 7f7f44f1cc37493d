/**
 * keyseal Command Selector
 *
 * Maps the mode flags to exactly one command.
 */

import type { CommandKind, CommandPlan, DataInput, OptionModel } from '../types.js'
import { CommandAmbiguousError } from './errors.js'

const MODE_FLAGS: ReadonlyArray<{ kind: CommandKind; flag: string }> = [
  { kind: 'generate', flag: '--generate' },
  { kind: 'encrypt', flag: '--encrypt' },
  { kind: 'decrypt', flag: '--decrypt' },
  { kind: 'edit', flag: '--edit' }
]

function selectInput(model: OptionModel, kind: CommandKind): DataInput {
  if (kind === 'generate') return { type: 'none' }
  if (model.string !== undefined) return { type: 'string', value: model.string }
  if (model.file !== undefined) return { type: 'file', path: model.file }
  return { type: 'stdin' }
}

/**
 * Select the command for this invocation
 */
export function selectCommand(model: OptionModel): CommandPlan {
  const active = MODE_FLAGS.filter(mode => model[mode.kind])

  if (active.length === 0) {
    throw new CommandAmbiguousError('No mode specified', 'NO_MODE', {
      suggestion: 'Pick one of -g, -e, -d or -t'
    })
  }

  if (active.length > 1) {
    const flags = active.map(mode => mode.flag)
    throw new CommandAmbiguousError(`Conflicting modes: ${flags.join(', ')}`, 'CONFLICTING_MODES', {
      suggestion: 'Pick exactly one of -g, -e, -d or -t',
      context: { flags }
    })
  }

  const kind = active[0].kind

  if (kind === 'edit' && model.file === undefined) {
    throw new CommandAmbiguousError('--edit requires --file', 'EDIT_REQUIRES_FILE', {
      suggestion: 'Only encrypted files can be edited: keyseal -t -f <file>'
    })
  }

  if (model.string !== undefined && model.file !== undefined) {
    throw new CommandAmbiguousError('--string and --file cannot be used together', 'CONFLICTING_INPUTS')
  }

  const ignored: string[] = []
  if (model.backup && kind !== 'edit') {
    ignored.push('--backup')
  }
  // edit rewrites --file in place
  if (model.output !== undefined && kind === 'edit') {
    ignored.push('--output')
  }

  return {
    kind,
    input: selectInput(model, kind),
    backup: kind === 'edit' && model.backup,
    ignored
  }
}
