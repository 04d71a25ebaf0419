// Photo-to-KMZ export service: the entry point front ends call

import * as path from 'path'
import { BatchFailureError, UnexpectedFaultError, errorToMessage } from '../errors'
import { loadMarkerAsset } from '../imaging/marker'
import { loadConfigFromEnv, resolveConfig, type PipelineConfig } from '../pipeline-config'
import { log, logWarning } from '../pipeline-logger'
import { packageKmz, saveKmzFile } from './ArchivePackager'
import { assembleBatch } from './BatchAssembler'
import type { KmzExportDependencies, KmzExportFailure, KmzExportRequest, KmzExportResult, KmzExportSuccess } from './types'

const KMZ_EXTENSION = '.kmz'

/**
 * Reduce a requested output name to a safe base name with a .kmz extension.
 * Throws BatchFailureError('invalid-output-name') when nothing usable is left.
 */
export function sanitizeOutputName(outputName: string): string {
  let base = outputName.trim().split(/[\\/]/).pop() ?? ''
  if (base.toLowerCase().endsWith(KMZ_EXTENSION)) {
    base = base.slice(0, -KMZ_EXTENSION.length)
  }
  base = base.replace(/[^a-z0-9\-_\s]/gi, '_').trim()

  if (!base || /^_+$/.test(base)) {
    throw new BatchFailureError('invalid-output-name', `"${outputName}" is not a usable output file name`)
  }
  return base + KMZ_EXTENSION
}

function toFailure(error: unknown): KmzExportFailure {
  if (error instanceof BatchFailureError) {
    return { success: false, kind: 'batch-failure', code: error.code, message: error.message, filename: '' }
  }
  if (error instanceof UnexpectedFaultError) {
    return { success: false, kind: 'unexpected-fault', message: error.message, filename: '' }
  }
  return {
    success: false,
    kind: 'unexpected-fault',
    message: `Unexpected error during KMZ export: ${errorToMessage(error)}`,
    filename: ''
  }
}

export class KmzExportService {
  private readonly baseConfig: Partial<PipelineConfig>
  private readonly dependencies: KmzExportDependencies

  constructor(baseConfig: Partial<PipelineConfig> = loadConfigFromEnv(), dependencies: KmzExportDependencies = {}) {
    this.baseConfig = baseConfig
    this.dependencies = dependencies
  }

  /**
   * Run the whole pipeline. Never throws: hard batch failures and unexpected
   * faults come back as a failure result with no archive bytes.
   */
  async export(request: KmzExportRequest): Promise<KmzExportResult> {
    try {
      const result = await this.build(request)
      log(`[Export] ${result.message}`)
      return result
    } catch (error) {
      const failure = toFailure(error)
      logWarning(`[Export] ${failure.kind}: ${failure.message}`)
      return failure
    }
  }

  /**
   * Export and write the archive into outputDirectory. The file only appears
   * once it has been written completely.
   */
  async exportToDirectory(request: KmzExportRequest, outputDirectory: string): Promise<KmzExportResult & { path?: string }> {
    const result = await this.export(request)
    if (!result.success) {
      return result
    }

    const outputPath = path.join(outputDirectory, result.filename)
    try {
      await saveKmzFile(outputPath, result.data)
      return { ...result, path: outputPath }
    } catch (error) {
      const failure = toFailure(error)
      logWarning(`[Export] ${failure.kind}: ${failure.message}`)
      return failure
    }
  }

  private async build(request: KmzExportRequest): Promise<KmzExportSuccess> {
    const config = resolveConfig({ ...this.baseConfig, ...request.config })
    const filename = sanitizeOutputName(request.outputName)
    const documentName = config.documentName ?? filename.slice(0, -KMZ_EXTENSION.length)

    const marker = config.includeFanOverlay
      ? await loadMarkerAsset(request.marker ?? { kind: 'builtin' }, {
          entryName: config.markerEntryName,
          preRotationDegrees: config.markerPreRotationDegrees,
          timeoutMs: config.markerFetchTimeoutMs,
          retries: config.markerFetchRetries,
          retryDelayMs: this.dependencies.retryDelayMs,
          fetchImpl: this.dependencies.fetchImpl
        })
      : undefined

    const batch = await assembleBatch(request.files, config, { documentName, marker })
    const data = await packageKmz(batch, config)

    const placemarkCount = batch.document.placemarks.length
    const overlayCount = batch.document.groundOverlays.length
    return {
      success: true,
      message: `KMZ export completed: ${placemarkCount} placemark(s), ${overlayCount} overlay(s), ${batch.skipped.length} skipped`,
      filename,
      data,
      placemarkCount,
      overlayCount,
      skipped: batch.skipped,
      warnings: batch.warnings
    }
  }
}

/**
 * One-shot helper: (named photo buffers, output name) -> archive bytes or a
 * structured error.
 */
export function exportKmz(request: KmzExportRequest, dependencies: KmzExportDependencies = {}): Promise<KmzExportResult> {
  return new KmzExportService(loadConfigFromEnv(), dependencies).export(request)
}
