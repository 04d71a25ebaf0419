/**
 * Pipeline Configuration
 *
 * Feature switches and tunables for one photo-to-KMZ run. Defaults live in
 * DEFAULT_PIPELINE_CONFIG; GEOKMZ_* environment variables override them via
 * loadConfigFromEnv().
 */

import type { FeatureFlags } from '../types/photo'
import { BatchFailureError } from './errors'

export interface PipelineConfig extends FeatureFlags {
  /**
   * Half the side of the square fan overlay, in degrees. Values between
   * 0.00005 and 0.0002 give a marker of a few to a few tens of pixels at
   * street-level zoom.
   */
  overlayHalfWidthDegrees: number
  /**
   * Bearing used for photos without one. Undefined means such photos get a
   * placemark but no fan overlay.
   */
  assumedBearing?: number
  /** Reserved archive entry for the KML markup */
  documentEntryName: string
  /** Reserved archive entry for the shared fan marker image */
  markerEntryName: string
  /** <name> of the KML document, defaults to the output file's base name */
  documentName?: string
  /** Absolute URL; the archive never carries the placemark icon */
  placemarkIconHref: string
  /** Width attribute of the <img> embedded in each placemark description */
  imageDisplayWidth: number
  /** Fixed rotation applied once to the marker before it is packaged */
  markerPreRotationDegrees: number
  markerFetchTimeoutMs: number
  /** Extra attempts after the first failed marker download */
  markerFetchRetries: number
  /** Timestamp written on every archive entry so output is reproducible */
  archiveDate: Date
  /** DEFLATE level, 1-9 */
  compressionLevel: number
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  includeFanOverlay: true,
  annotateImage: false,
  includeAltitude: false,
  overlayHalfWidthDegrees: 0.0002,
  documentEntryName: 'doc.kml',
  markerEntryName: 'Fan.png',
  placemarkIconHref: 'http://maps.google.com/mapfiles/kml/paddle/blu-circle.png',
  imageDisplayWidth: 800,
  markerPreRotationDegrees: 0,
  markerFetchTimeoutMs: 10_000,
  markerFetchRetries: 2,
  archiveDate: new Date(Date.UTC(1980, 0, 1)),
  compressionLevel: 6
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined
  const normalized = value.trim().toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  return undefined
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : undefined
}

/**
 * Read GEOKMZ_* overrides. Unset or unparseable variables are left out so
 * they fall through to the defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<PipelineConfig> {
  const overrides: Partial<PipelineConfig> = {}

  const includeFanOverlay = parseBoolean(env.GEOKMZ_FAN_OVERLAY)
  if (includeFanOverlay !== undefined) overrides.includeFanOverlay = includeFanOverlay

  const annotateImage = parseBoolean(env.GEOKMZ_ANNOTATE_IMAGES)
  if (annotateImage !== undefined) overrides.annotateImage = annotateImage

  const includeAltitude = parseBoolean(env.GEOKMZ_INCLUDE_ALTITUDE)
  if (includeAltitude !== undefined) overrides.includeAltitude = includeAltitude

  const halfWidth = parseNumber(env.GEOKMZ_OVERLAY_HALF_WIDTH)
  if (halfWidth !== undefined) overrides.overlayHalfWidthDegrees = halfWidth

  const assumedBearing = parseNumber(env.GEOKMZ_ASSUMED_BEARING)
  if (assumedBearing !== undefined) overrides.assumedBearing = assumedBearing

  const markerRotation = parseNumber(env.GEOKMZ_MARKER_ROTATION)
  if (markerRotation !== undefined) overrides.markerPreRotationDegrees = markerRotation

  const timeout = parseNumber(env.GEOKMZ_MARKER_TIMEOUT_MS)
  if (timeout !== undefined) overrides.markerFetchTimeoutMs = timeout

  const retries = parseNumber(env.GEOKMZ_MARKER_RETRIES)
  if (retries !== undefined) overrides.markerFetchRetries = retries

  if (env.GEOKMZ_ICON_HREF) overrides.placemarkIconHref = env.GEOKMZ_ICON_HREF

  return overrides
}

/**
 * Merge overrides onto the defaults and validate the result. Every problem
 * is reported in one error.
 */
export function resolveConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const config: PipelineConfig = { ...DEFAULT_PIPELINE_CONFIG, ...overrides }
  const problems: string[] = []

  if (!(config.overlayHalfWidthDegrees > 0) || config.overlayHalfWidthDegrees > 1) {
    problems.push(`overlayHalfWidthDegrees must be in (0, 1], got ${config.overlayHalfWidthDegrees}`)
  }
  if (config.assumedBearing !== undefined && !Number.isFinite(config.assumedBearing)) {
    problems.push('assumedBearing must be a finite number')
  }
  if (!config.documentEntryName.trim()) {
    problems.push('documentEntryName must not be empty')
  }
  if (!config.markerEntryName.trim()) {
    problems.push('markerEntryName must not be empty')
  }
  if (config.documentEntryName.toLowerCase() === config.markerEntryName.toLowerCase()) {
    problems.push('documentEntryName and markerEntryName must differ')
  }
  if (!Number.isFinite(config.markerPreRotationDegrees)) {
    problems.push('markerPreRotationDegrees must be a finite number')
  }
  if (!(config.markerFetchTimeoutMs > 0)) {
    problems.push('markerFetchTimeoutMs must be positive')
  }
  if (!Number.isInteger(config.markerFetchRetries) || config.markerFetchRetries < 0) {
    problems.push('markerFetchRetries must be a non-negative integer')
  }
  if (!Number.isInteger(config.compressionLevel) || config.compressionLevel < 1 || config.compressionLevel > 9) {
    problems.push('compressionLevel must be an integer between 1 and 9')
  }
  if (!/^[a-z][a-z0-9+.-]*:/i.test(config.placemarkIconHref)) {
    problems.push(`placemarkIconHref must be an absolute URL, got "${config.placemarkIconHref}"`)
  }
  if (!(config.imageDisplayWidth > 0)) {
    problems.push('imageDisplayWidth must be positive')
  }

  if (problems.length > 0) {
    throw new BatchFailureError('invalid-config', `Invalid pipeline configuration: ${problems.join('; ')}`)
  }

  return config
}
