/**
 * Value masking for private keys shown in diagnostics
 */

export interface MaskOptions {
  /** Characters visible at start (default: 4) */
  visibleStart?: number
  /** Characters visible at end (default: 4) */
  visibleEnd?: number
  /** Character used for masking (default: '*') */
  maskChar?: string
  /** Minimum length to show any edges (default: 12) */
  minLengthToReveal?: number
}

const DEFAULT_OPTIONS: Required<MaskOptions> = {
  visibleStart: 4,
  visibleEnd: 4,
  maskChar: '*',
  minLengthToReveal: 12
}

/**
 * Mask a sensitive value for display
 *
 * @example
 * maskValue('q7BvX2mKp9LtR4sW')
 * // => 'q7Bv****R4sW'
 *
 * maskValue('mykey')
 * // => '****'
 */
export function maskValue(value: string, options: MaskOptions = {}): string {
  const opts = { ...DEFAULT_OPTIONS, ...options }
  const mask = opts.maskChar.repeat(4)

  if (value.length < opts.minLengthToReveal) {
    return mask
  }

  return `${value.slice(0, opts.visibleStart)}${mask}${value.slice(-opts.visibleEnd)}`
}
