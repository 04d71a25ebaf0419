// KMZ export types

import type { GeoTaggedAsset, PhotoInput } from '../../types/photo'
import type { BatchFailureCode, ExtractionFailureReason } from '../errors'
import type { FetchLike, MarkerAsset, MarkerSource } from '../imaging/marker'
import type { KmlDocument } from '../kml/KmlDocument'
import type { PipelineConfig } from '../pipeline-config'

export interface SkippedPhoto {
  name: string
  reason: ExtractionFailureReason | 'unsupported-extension'
  message: string
}

export interface AssembledBatch {
  document: KmlDocument
  assets: GeoTaggedAsset[]
  /** Present when fan overlays are enabled */
  marker?: MarkerAsset
  skipped: SkippedPhoto[]
  warnings: string[]
}

export interface KmzExportRequest {
  files: PhotoInput[]
  /** Desired archive name; sanitized and given a .kmz extension */
  outputName: string
  /** Defaults to the bundled fan artwork */
  marker?: MarkerSource
  config?: Partial<PipelineConfig>
}

export interface KmzExportSuccess {
  success: true
  message: string
  filename: string
  data: Buffer
  placemarkCount: number
  overlayCount: number
  skipped: SkippedPhoto[]
  warnings: string[]
}

export interface KmzExportFailure {
  success: false
  kind: 'batch-failure' | 'unexpected-fault'
  code?: BatchFailureCode
  message: string
  filename: ''
}

export type KmzExportResult = KmzExportSuccess | KmzExportFailure

export interface KmzExportDependencies {
  /** Used for URL marker sources; defaults to the global fetch */
  fetchImpl?: FetchLike
  /** Pause between marker download attempts */
  retryDelayMs?: number
}
