// Drives extraction, orientation correction, annotation and KML assembly across a batch

import type { GeoTaggedAsset, PhotoInput, PhotoMetadata } from '../../types/photo'
import { BatchFailureError, UnexpectedFaultError, errorToMessage } from '../errors'
import { annotateImage } from '../imaging/annotate'
import type { MarkerAsset } from '../imaging/marker'
import { correctOrientation } from '../imaging/orientation'
import { computeOverlayBox } from '../kml/geometry'
import { KmlDocument } from '../kml/KmlDocument'
import { formatNumber } from '../kml/xml'
import { extractPhotoMetadata, toBuffer } from '../metadata/MetadataExtractor'
import type { PipelineConfig } from '../pipeline-config'
import { log, logDebug, logWarning } from '../pipeline-logger'
import type { AssembledBatch, SkippedPhoto } from './types'

export const SUPPORTED_EXTENSIONS = ['.jpg', '.jpeg', '.png'] as const

export function baseName(name: string): string {
  const parts = name.split(/[\\/]/)
  return parts[parts.length - 1]
}

export function hasSupportedExtension(name: string): boolean {
  const lower = name.toLowerCase()
  return SUPPORTED_EXTENSIONS.some(ext => lower.endsWith(ext))
}

// Code-unit order, independent of locale
function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

export interface CandidateSelection {
  candidates: PhotoInput[]
  skipped: SkippedPhoto[]
}

/**
 * Keep recognized image files, sorted by base name then full name. Two
 * candidates with the same base name (case-insensitive), or one named like a
 * reserved archive entry, would overwrite each other in the archive, so the
 * batch is rejected instead.
 */
export function selectCandidates(files: readonly PhotoInput[], reservedNames: readonly string[]): CandidateSelection {
  const candidates: PhotoInput[] = []
  const skipped: SkippedPhoto[] = []

  for (const file of files) {
    if (hasSupportedExtension(file.name)) {
      candidates.push(file)
    } else {
      skipped.push({
        name: file.name,
        reason: 'unsupported-extension',
        message: `${file.name}: not a supported image type (${SUPPORTED_EXTENSIONS.join(', ')})`
      })
    }
  }

  candidates.sort((a, b) => compareNames(baseName(a.name), baseName(b.name)) || compareNames(a.name, b.name))

  const seen = new Map<string, string>()
  for (const reserved of reservedNames) {
    seen.set(reserved.toLowerCase(), `the reserved entry ${reserved}`)
  }

  const collisions: string[] = []
  for (const candidate of candidates) {
    const key = baseName(candidate.name).toLowerCase()
    const previous = seen.get(key)
    if (previous !== undefined) {
      collisions.push(`${candidate.name} clashes with ${previous}`)
    } else {
      seen.set(key, candidate.name)
    }
  }

  if (collisions.length > 0) {
    throw new BatchFailureError(
      'duplicate-filename',
      `Input photos must have unique file names: ${collisions.join('; ')}`
    )
  }

  return { candidates, skipped }
}

export function describePhoto(metadata: PhotoMetadata, config: Pick<PipelineConfig, 'includeAltitude'>): string[] {
  const lines: string[] = []

  lines.push(
    metadata.orientationDegrees !== undefined
      ? `Orientation: ${formatNumber(metadata.orientationDegrees, 2)}°`
      : 'Orientation: unknown'
  )

  if (config.includeAltitude) {
    lines.push(`Altitude: ${metadata.altitude.toFixed(1)} m`)
  }

  if (metadata.capturedAt) {
    const suffix = metadata.capturedAtSource === 'file-modified' ? ' (file modified time)' : ''
    lines.push(`Captured: ${metadata.capturedAt.toISOString()}${suffix}`)
  }

  return lines
}

export interface AssembleOptions {
  documentName: string
  /** Required when config.includeFanOverlay is set */
  marker?: MarkerAsset
}

/**
 * Process every candidate photo in order and build the KML document plus
 * the assets it references. Photos without usable location data are skipped;
 * a batch where none succeed fails with BatchFailureError('no-usable-photos').
 */
export async function assembleBatch(
  files: readonly PhotoInput[],
  config: PipelineConfig,
  options: AssembleOptions
): Promise<AssembledBatch> {
  const marker = options.marker
  if (config.includeFanOverlay && !marker) {
    throw new BatchFailureError('marker-unavailable', 'Fan overlays are enabled but no marker image was provided')
  }

  const reserved = config.includeFanOverlay && marker
    ? [config.documentEntryName, marker.entryName]
    : [config.documentEntryName]
  const { candidates, skipped } = selectCandidates(files, reserved)

  if (candidates.length === 0) {
    throw new BatchFailureError(
      'no-usable-photos',
      `No supported images (${SUPPORTED_EXTENSIONS.join(', ')}) were provided.`
    )
  }

  const document = new KmlDocument(options.documentName, { placemarkIconHref: config.placemarkIconHref })
  const assets: GeoTaggedAsset[] = []
  const warnings: string[] = []

  const warn = (message: string) => {
    warnings.push(message)
    logWarning(`[Batch] ${message}`)
  }

  for (const photo of candidates) {
    const entryName = baseName(photo.name)

    const extracted = extractPhotoMetadata(photo)
    if (!extracted.ok) {
      skipped.push({ name: photo.name, reason: extracted.error.reason, message: extracted.error.message })
      logWarning(`[Batch] Skipping ${extracted.error.message}`)
      continue
    }

    const { metadata } = extracted.value
    extracted.value.warnings.forEach(warning => warnings.push(warning))

    const corrected = await correctOrientation(toBuffer(photo.data), metadata.orientation)
    if (corrected.warning) {
      warn(`${entryName}: ${corrected.warning}`)
    } else if (corrected.rotation !== 0) {
      logDebug(`[Batch] ${entryName}: rotated ${corrected.rotation}°`)
    }

    const lines = describePhoto(metadata, config)

    let data = corrected.data
    if (config.annotateImage) {
      try {
        data = await annotateImage(data, lines.join(' | '))
      } catch (error) {
        throw new UnexpectedFaultError(`Could not annotate image: ${errorToMessage(error)}`, {
          fileName: photo.name,
          cause: error
        })
      }
    }

    assets.push({ metadata, entryName, data, width: corrected.width, height: corrected.height })

    document.addPlacemark({
      name: entryName,
      latitude: metadata.latitude,
      longitude: metadata.longitude,
      altitude: config.includeAltitude ? metadata.altitude : undefined,
      description: { lines, imageEntry: entryName, imageWidth: config.imageDisplayWidth }
    })

    if (config.includeFanOverlay && marker) {
      const bearing = metadata.orientationDegrees ?? config.assumedBearing
      if (bearing === undefined) {
        warn(`${entryName}: no bearing recorded, fan overlay omitted`)
      } else {
        document.addGroundOverlay({
          name: `Overlay - ${entryName}`,
          iconEntry: marker.entryName,
          box: computeOverlayBox(metadata, bearing, config.overlayHalfWidthDegrees)
        })
      }
    }
  }

  if (assets.length === 0) {
    throw new BatchFailureError(
      'no-usable-photos',
      `No valid GPS metadata found in the ${candidates.length} uploaded image(s).`
    )
  }

  log(`[Batch] ${assets.length}/${candidates.length} photo(s) geotagged, ${document.groundOverlays.length} fan overlay(s)`)

  return {
    document,
    assets,
    marker: config.includeFanOverlay ? marker : undefined,
    skipped,
    warnings
  }
}
