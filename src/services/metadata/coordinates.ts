// Conversion of EXIF rational / DMS encodings into decimal units

import type { RationalInput } from '../../types/photo'
import { CoordinateError } from '../errors'

export type Axis = 'latitude' | 'longitude'

const POSITIVE_HEMISPHERE: Record<Axis, string> = { latitude: 'N', longitude: 'E' }
const NEGATIVE_HEMISPHERE: Record<Axis, string> = { latitude: 'S', longitude: 'W' }
const AXIS_LIMIT: Record<Axis, number> = { latitude: 90, longitude: 180 }

function divide(numerator: number, denominator: number): number {
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator)) {
    throw new CoordinateError(`Non-finite rational ${numerator}/${denominator}`)
  }
  if (denominator === 0) {
    throw new CoordinateError(`Zero denominator in rational ${numerator}/0`)
  }
  return numerator / denominator
}

function isRationalPair(value: RationalInput): value is readonly [number, number] {
  return Array.isArray(value)
}

/**
 * Turn one rational component into a double. Accepts plain numbers
 * (including pre-reduced decimals), [num, den] pairs, {numerator, denominator}
 * objects and "num/den" or decimal strings.
 */
export function rationalToNumber(value: RationalInput): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new CoordinateError(`Non-finite value ${value}`)
    }
    return value
  }

  if (typeof value === 'string') {
    const text = value.trim()
    const slash = text.indexOf('/')
    if (slash >= 0) {
      const numerator = text.slice(0, slash).trim()
      const denominator = text.slice(slash + 1).trim()
      if (numerator === '' || denominator === '') {
        throw new CoordinateError(`Unparseable rational "${value}"`)
      }
      return divide(Number(numerator), Number(denominator))
    }
    const parsed = text === '' ? NaN : Number(text)
    if (!Number.isFinite(parsed)) {
      throw new CoordinateError(`Unparseable number "${value}"`)
    }
    return parsed
  }

  if (isRationalPair(value)) {
    return divide(value[0], value[1])
  }

  return divide(value.numerator, value.denominator)
}

/**
 * Reduce a hemisphere reference to its letter. Accepts 'S', 's', ['S'] style
 * values already flattened to text, and descriptions such as
 * "South latitude". Empty or missing means the positive hemisphere.
 */
export function hemisphereLetter(ref: string | undefined, axis: Axis): string {
  const letter = (ref ?? '').trim().charAt(0).toUpperCase()
  if (letter === '') return POSITIVE_HEMISPHERE[axis]
  if (letter !== POSITIVE_HEMISPHERE[axis] && letter !== NEGATIVE_HEMISPHERE[axis]) {
    throw new CoordinateError(`Invalid ${axis} reference "${ref}"`)
  }
  return letter
}

/**
 * deg + min/60 + sec/3600, negated for the southern or western hemisphere.
 * One to three components; trailing minutes/seconds may be omitted. Minutes
 * or seconds of 60 and above (writers round 59.996" up to 60) are summed as
 * given; only the total is range-checked.
 */
export function dmsToDecimal(components: readonly RationalInput[], ref: string | undefined, axis: Axis): number {
  if (components.length === 0 || components.length > 3) {
    throw new CoordinateError(`Expected 1-3 ${axis} components, got ${components.length}`)
  }

  const [degrees, minutes = 0, seconds = 0] = components.map(rationalToNumber)
  if (degrees < 0 || minutes < 0 || seconds < 0) {
    throw new CoordinateError(`Negative ${axis} component in [${degrees}, ${minutes}, ${seconds}]`)
  }

  const magnitude = degrees + minutes / 60 + seconds / 3600
  if (magnitude > AXIS_LIMIT[axis]) {
    throw new CoordinateError(`${axis} ${magnitude} exceeds ${AXIS_LIMIT[axis]}`)
  }

  const negative = hemisphereLetter(ref, axis) === NEGATIVE_HEMISPHERE[axis]
  return negative && magnitude !== 0 ? -magnitude : magnitude
}

export function normalizeLatitude(components: readonly RationalInput[], ref?: string): number {
  return dmsToDecimal(components, ref, 'latitude')
}

export function normalizeLongitude(components: readonly RationalInput[], ref?: string): number {
  return dmsToDecimal(components, ref, 'longitude')
}

/**
 * Metres; altitude reference 1 means below sea level.
 */
export function normalizeAltitude(value: RationalInput, ref?: number): number {
  const metres = rationalToNumber(value)
  if (metres < 0) {
    throw new CoordinateError(`Negative altitude magnitude ${metres}`)
  }
  return ref === 1 && metres !== 0 ? -metres : metres
}

/**
 * Fold a bearing into [0, 360).
 */
export function normalizeBearing(value: RationalInput): number {
  const degrees = rationalToNumber(value)
  const folded = ((degrees % 360) + 360) % 360
  return folded === 360 ? 0 : folded
}
