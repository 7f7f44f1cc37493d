/**
 * keyseal CLI - Colors
 *
 * Terminal colors using tuiuiu.js text-utils + ANSI 256 for the amber palette.
 * Whether color is on is decided once per invocation and passed in; nothing
 * here reads global state.
 */

import { colorize, style } from 'tuiuiu.js'
import type { Formatter } from 'cli-args-parser'
import type { OptionModel } from '../../types.js'

export interface RenderMode {
  color: boolean
}

/**
 * Decide the rendering mode: --no-color, then NO_COLOR, then FORCE_COLOR,
 * then the config file, then whether stderr is a terminal.
 */
export function resolveRenderMode(
  model: Pick<OptionModel, 'noColor'>,
  env: NodeJS.ProcessEnv,
  isTTY: boolean,
  configColor?: boolean
): RenderMode {
  if (model.noColor) return { color: false }
  if (env.NO_COLOR !== undefined) return { color: false }
  if (env.FORCE_COLOR !== undefined) return { color: true }
  if (configColor === false) return { color: false }
  return { color: isTTY }
}

type Paint = (text: string) => string

const plain: Paint = text => text

/**
 * Palette (ANSI 256)
 *
 * - 214: Amber      : primary, commands
 * - 220: Gold       : flags, highlights
 * - 180: Sand       : muted descriptions
 * - 245: Medium gray: labels
 */
function ansi256(code: number): Paint {
  return text => `\x1b[38;5;${code}m${text}\x1b[39m`
}

export interface Palette {
  enabled: boolean
  bold: Paint
  dim: Paint
  c: {
    command: Paint
    flag: Paint
    value: Paint
    label: Paint
    muted: Paint
    header: Paint
    success: Paint
    error: Paint
    warning: Paint
    info: Paint
  }
  symbols: {
    success: string
    error: string
    warning: string
    info: string
  }
  /** Help/version token styles for cli-args-parser */
  formatter: Formatter
}

export function createPalette(mode: RenderMode): Palette {
  const on = mode.color
  const when = (paint: Paint): Paint => (on ? paint : plain)

  const bold = when(text => style(text, 'bold'))
  const dim = when(text => style(text, 'dim'))
  const red = when(text => colorize(text, 'red'))
  const green = when(text => colorize(text, 'green'))
  const yellow = when(text => colorize(text, 'yellow'))
  const amber = when(ansi256(214))
  const gold = when(ansi256(220))
  const sand = when(ansi256(180))
  const gray = when(ansi256(245))

  const c = {
    command: (text: string) => bold(amber(text)),
    flag: gold,
    value: sand,
    label: gray,
    muted: dim,
    header: (text: string) => bold(text),
    success: green,
    error: red,
    warning: yellow,
    info: amber
  }

  const formatter: Formatter = {
    'section-header': s => bold(s),
    'program-name': s => bold(amber(s)),
    'version': s => gold(s),
    'description': s => s,
    'command-name': s => amber(s),
    'command-alias': s => gray(s),
    'command-description': s => s,
    'option-flag': s => gold(s),
    'option-type': s => sand(s),
    'option-default': s => dim(s),
    'option-description': s => s,
    'positional-name': s => sand(s),
    'error-header': s => bold(red(s)),
    'error-message': s => red(s),
    'error-option': s => amber(s)
  }

  return {
    enabled: on,
    bold,
    dim,
    c,
    symbols: {
      success: on ? green('✓') : '[OK]',
      error: on ? red('✗') : '[ERROR]',
      warning: on ? yellow('⚠') : '[WARN]',
      info: on ? amber('ℹ') : '[INFO]'
    },
    formatter
  }
}
