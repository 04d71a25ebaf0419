// Reads one image's tag block and turns it into a PhotoMetadata record

import ExifReader from 'exifreader'
import type { DecodedTags, PhotoInput, PhotoMetadata } from '../../types/photo'
import { err, ok, type Result } from '../../types/result'
import { CoordinateError, errorToMessage, type ExtractionError } from '../errors'
import { logDebug, logWarning } from '../pipeline-logger'
import { normalizeAltitude, normalizeBearing, normalizeLatitude, normalizeLongitude } from './coordinates'
import { decodeTags } from './gps-fields'

export interface ExtractedPhoto {
  metadata: PhotoMetadata
  /** Non-fatal decode problems (altitude, bearing, timestamp) */
  warnings: string[]
}

export function toBuffer(data: Buffer | Uint8Array): Buffer {
  return Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength)
}

/**
 * Parse the tag groups. Expanded mode keeps EXIF and XMP apart, so an XMP
 * tag never replaces the EXIF tag of the same name. ExifReader throws
 * MetadataMissingError when the file has no metadata at all; that is an
 * expected outcome, anything else means the block is there but unreadable.
 */
function readTagMap(input: PhotoInput): Result<object, ExtractionError> {
  try {
    return ok(ExifReader.load(toBuffer(input.data), { expanded: true }))
  } catch (error) {
    if (error instanceof Error && error.name === 'MetadataMissingError') {
      return err({ reason: 'no-metadata', message: `${input.name}: no embedded metadata` })
    }
    return err({
      reason: 'unreadable-tags',
      message: `${input.name}: unreadable metadata (${errorToMessage(error)})`,
      cause: error
    })
  }
}

const EXIF_DATE = /^(\d{4}):(\d{2}):(\d{2})[ T](\d{2}):(\d{2}):(\d{2})/
const UTC_OFFSET = /^([+-])(\d{2}):?(\d{2})$/

/**
 * EXIF dates carry no zone. OffsetTimeOriginal supplies one when present;
 * otherwise the wall-clock time is read as UTC.
 */
export function parseExifDate(value: string, offset?: string): Date | undefined {
  const match = EXIF_DATE.exec(value.trim())
  if (!match) return undefined

  const [, year, month, day, hour, minute, second] = match.map(Number)
  let millis = Date.UTC(year, month - 1, day, hour, minute, second)
  if (Number.isNaN(millis) || month < 1 || month > 12 || day < 1 || day > 31) return undefined

  const offsetMatch = offset ? UTC_OFFSET.exec(offset.trim()) : null
  if (offsetMatch) {
    const sign = offsetMatch[1] === '-' ? -1 : 1
    const offsetMinutes = Number(offsetMatch[2]) * 60 + Number(offsetMatch[3])
    millis -= sign * offsetMinutes * 60_000
  }

  return new Date(millis)
}

/**
 * Build PhotoMetadata from already-decoded tags. Latitude and longitude are
 * all-or-nothing; altitude, bearing and timestamp degrade to absent with a
 * warning.
 */
export function buildPhotoMetadata(
  input: Pick<PhotoInput, 'name' | 'modifiedAt'>,
  tags: DecodedTags
): Result<ExtractedPhoto, ExtractionError> {
  const gps = tags.gps
  if (!gps) {
    return err({ reason: 'no-gps', message: `${input.name}: no GPS data` })
  }
  if (!gps.latitude || !gps.longitude) {
    const missing = !gps.latitude && !gps.longitude ? 'latitude and longitude' : !gps.latitude ? 'latitude' : 'longitude'
    return err({ reason: 'incomplete-gps', message: `${input.name}: GPS data is missing ${missing}` })
  }

  let latitude: number
  let longitude: number
  try {
    latitude = normalizeLatitude(gps.latitude, gps.latitudeRef)
    longitude = normalizeLongitude(gps.longitude, gps.longitudeRef)
  } catch (error) {
    if (error instanceof CoordinateError) {
      return err({ reason: 'malformed-coordinate', message: `${input.name}: ${error.message}`, cause: error })
    }
    throw error
  }

  const warnings: string[] = []

  let altitude = 0
  if (gps.altitude !== undefined) {
    try {
      altitude = normalizeAltitude(gps.altitude, gps.altitudeRef)
    } catch (error) {
      warnings.push(`${input.name}: ignoring altitude (${errorToMessage(error)})`)
    }
  }

  let orientationDegrees: number | undefined
  if (gps.imgDirection !== undefined) {
    try {
      orientationDegrees = normalizeBearing(gps.imgDirection)
    } catch (error) {
      warnings.push(`${input.name}: ignoring bearing (${errorToMessage(error)})`)
    }
  }

  const metadata: PhotoMetadata = {
    latitude,
    longitude,
    altitude,
    orientationDegrees,
    orientation: tags.orientation,
    sourceImagePath: input.name,
    capturedAtSource: 'unknown'
  }

  const exifDate = tags.dateTimeOriginal ? parseExifDate(tags.dateTimeOriginal, tags.offsetTimeOriginal) : undefined
  if (exifDate) {
    metadata.capturedAt = exifDate
    metadata.capturedAtSource = 'exif'
  } else {
    if (tags.dateTimeOriginal) {
      warnings.push(`${input.name}: unparseable DateTimeOriginal "${tags.dateTimeOriginal}"`)
    }
    // Lossy: the file's mtime is not the capture time
    if (input.modifiedAt) {
      metadata.capturedAt = input.modifiedAt
      metadata.capturedAtSource = 'file-modified'
    }
  }

  return ok({ metadata, warnings })
}

/**
 * Never throws for missing, partial or malformed metadata: those come back as
 * an ExtractionError so the batch can skip the photo.
 */
export function extractPhotoMetadata(input: PhotoInput): Result<ExtractedPhoto, ExtractionError> {
  const tagMap = readTagMap(input)
  if (!tagMap.ok) {
    logDebug(`[Extract] ${tagMap.error.message}`)
    return tagMap
  }

  const result = buildPhotoMetadata(input, decodeTags(tagMap.value))
  if (!result.ok) {
    logDebug(`[Extract] ${result.error.message}`)
    return result
  }

  for (const warning of result.value.warnings) {
    logWarning(`[Extract] ${warning}`)
  }
  const { latitude, longitude } = result.value.metadata
  logDebug(`[Extract] ${input.name}: ${latitude.toFixed(6)}, ${longitude.toFixed(6)}`)
  return result
}
