/**
 * Decode step from exifreader's expanded tag groups into the typed
 * DecodedTags / GpsFields structures.
 *
 * GPS, orientation and capture time come from the `exif` group. The `xmp`
 * group is read only when the EXIF block has no usable coordinates: editors
 * write XMP GPS as "D,M.mmmX" text, which is not a rational.
 *
 * Tag values arrive in several shapes depending on the writer: rationals as
 * [num, den] pairs or plain numbers, ASCII refs as ['N'] or 'N', single
 * values wrapped in one-element arrays. Everything is narrowed here from
 * `unknown`, so a value of an unexpected shape decodes as absent rather than
 * leaking through.
 */

import type { DecodedTags, GpsFields, RationalInput } from '../../types/photo'

interface RawTag {
  value: unknown
  description?: unknown
}

function isRawTag(candidate: unknown): candidate is RawTag {
  return typeof candidate === 'object' && candidate !== null && 'value' in candidate
}

function readTag(tags: object, name: string): RawTag | undefined {
  if (!Object.prototype.hasOwnProperty.call(tags, name)) return undefined
  const candidate: unknown = Reflect.get(tags, name)
  return isRawTag(candidate) ? candidate : undefined
}

function isNumberPair(value: unknown): value is [number, number] {
  return Array.isArray(value) && value.length === 2 && typeof value[0] === 'number' && typeof value[1] === 'number'
}

function asRational(value: unknown): RationalInput | undefined {
  if (typeof value === 'number' || typeof value === 'string') return value
  if (isNumberPair(value)) return [value[0], value[1]]
  if (Array.isArray(value) && value.length === 1) return asRational(value[0])
  if (typeof value === 'object' && value !== null && 'numerator' in value && 'denominator' in value) {
    const { numerator, denominator } = value
    if (typeof numerator === 'number' && typeof denominator === 'number') {
      return { numerator, denominator }
    }
  }
  return undefined
}

/**
 * A DMS triple: either a list of rational components ([[40,1],[26,1],[46,1]])
 * or a flat list of plain numbers ([40, 26, 46]).
 */
function asRationalList(value: unknown): RationalInput[] | undefined {
  if (!Array.isArray(value)) {
    const single = asRational(value)
    return single === undefined ? undefined : [single]
  }
  if (value.length === 0) return undefined

  const components: RationalInput[] = []
  for (const item of value) {
    const component = asRational(item)
    if (component === undefined) return undefined
    components.push(component)
  }
  return components
}

function asText(value: unknown): string | undefined {
  if (typeof value === 'string') return value.replace(/\0+$/, '')
  if (Array.isArray(value) && value.length > 0 && value.every(part => typeof part === 'string')) {
    return value.join('').replace(/\0+$/, '')
  }
  return undefined
}

function asInteger(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isInteger(value)) return value
  if (Array.isArray(value) && value.length === 1) return asInteger(value[0])
  return undefined
}

function hasGpsBlock(tags: object): boolean {
  return Object.keys(tags).some(key => key.startsWith('GPS'))
}

export function decodeGpsFields(tags: object): GpsFields | undefined {
  if (!hasGpsBlock(tags)) return undefined

  const gps: GpsFields = {}

  const latitude = readTag(tags, 'GPSLatitude')
  if (latitude) gps.latitude = asRationalList(latitude.value)

  const latitudeRef = readTag(tags, 'GPSLatitudeRef')
  if (latitudeRef) gps.latitudeRef = asText(latitudeRef.value)

  const longitude = readTag(tags, 'GPSLongitude')
  if (longitude) gps.longitude = asRationalList(longitude.value)

  const longitudeRef = readTag(tags, 'GPSLongitudeRef')
  if (longitudeRef) gps.longitudeRef = asText(longitudeRef.value)

  const altitude = readTag(tags, 'GPSAltitude')
  if (altitude) gps.altitude = asRational(altitude.value)

  const altitudeRef = readTag(tags, 'GPSAltitudeRef')
  if (altitudeRef) gps.altitudeRef = asInteger(altitudeRef.value)

  const direction = readTag(tags, 'GPSImgDirection')
  if (direction) gps.imgDirection = asRational(direction.value)

  const directionRef = readTag(tags, 'GPSImgDirectionRef')
  if (directionRef) gps.imgDirectionRef = asText(directionRef.value)

  return gps
}

const XMP_COORDINATE = /^(\d+(?:\.\d+)?),(\d+(?:\.\d+)?)(?:,(\d+(?:\.\d+)?))?([NSEW])$/i

/**
 * XMP GPSCoordinate text: "DDD,MM,SSk" or "DDD,MM.mmk" with k one of N/S/E/W.
 */
export function parseXmpCoordinate(text: string): { components: number[]; ref: string } | undefined {
  const match = XMP_COORDINATE.exec(text.trim())
  if (!match) return undefined
  const [, degrees, minutes, seconds, ref] = match
  const components = [Number(degrees), Number(minutes)]
  if (seconds !== undefined) components.push(Number(seconds))
  return { components, ref: ref.toUpperCase() }
}

function asXmpInteger(value: unknown): number | undefined {
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number(value)
  return asInteger(value)
}

export function decodeXmpGpsFields(xmp: object): GpsFields | undefined {
  if (!hasGpsBlock(xmp)) return undefined

  const gps: GpsFields = {}

  const latitudeText = asText(readTag(xmp, 'GPSLatitude')?.value)
  const latitude = latitudeText === undefined ? undefined : parseXmpCoordinate(latitudeText)
  if (latitude) {
    gps.latitude = latitude.components
    gps.latitudeRef = latitude.ref
  }

  const longitudeText = asText(readTag(xmp, 'GPSLongitude')?.value)
  const longitude = longitudeText === undefined ? undefined : parseXmpCoordinate(longitudeText)
  if (longitude) {
    gps.longitude = longitude.components
    gps.longitudeRef = longitude.ref
  }

  const altitude = readTag(xmp, 'GPSAltitude')
  if (altitude) gps.altitude = asRational(altitude.value)

  const altitudeRef = readTag(xmp, 'GPSAltitudeRef')
  if (altitudeRef) gps.altitudeRef = asXmpInteger(altitudeRef.value)

  const direction = readTag(xmp, 'GPSImgDirection')
  if (direction) gps.imgDirection = asRational(direction.value)

  return gps
}

function readGroup(tags: object, name: string): object | undefined {
  if (!Object.prototype.hasOwnProperty.call(tags, name)) return undefined
  const group: unknown = Reflect.get(tags, name)
  return typeof group === 'object' && group !== null ? group : undefined
}

function hasCoordinates(gps: GpsFields | undefined): gps is GpsFields {
  return gps?.latitude !== undefined && gps.longitude !== undefined
}

/**
 * Decode an expanded tag map (`{ exif, xmp, ... }`). EXIF GPS wins whenever
 * it carries both coordinates.
 */
export function decodeTags(tags: object): DecodedTags {
  const exif = readGroup(tags, 'exif') ?? {}
  const xmp = readGroup(tags, 'xmp')

  const exifGps = decodeGpsFields(exif)
  const xmpGps = xmp ? decodeXmpGpsFields(xmp) : undefined
  let gps = exifGps
  if (!hasCoordinates(exifGps) && hasCoordinates(xmpGps)) {
    gps = xmpGps
  } else if (!exifGps) {
    gps = xmpGps
  }

  const decoded: DecodedTags = { gps }

  const orientation = readTag(exif, 'Orientation')
  if (orientation) decoded.orientation = asInteger(orientation.value)

  const dateTimeOriginal = readTag(exif, 'DateTimeOriginal')
  if (dateTimeOriginal) decoded.dateTimeOriginal = asText(dateTimeOriginal.value)

  const offsetTimeOriginal = readTag(exif, 'OffsetTimeOriginal')
  if (offsetTimeOriginal) decoded.offsetTimeOriginal = asText(offsetTimeOriginal.value)

  return decoded
}
