// Public API for the KMZ export module

export { KmzExportService, exportKmz, sanitizeOutputName } from './KmzExportService'
export { assembleBatch, selectCandidates, describePhoto, SUPPORTED_EXTENSIONS } from './BatchAssembler'
export { packageKmz, planArchiveEntries, saveKmzFile } from './ArchivePackager'
export type {
  AssembledBatch,
  KmzExportDependencies,
  KmzExportFailure,
  KmzExportRequest,
  KmzExportResult,
  KmzExportSuccess,
  SkippedPhoto
} from './types'
