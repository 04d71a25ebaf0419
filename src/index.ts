export * from './services/kmz'
export { extractPhotoMetadata, buildPhotoMetadata, parseExifDate } from './services/metadata/MetadataExtractor'
export { decodeGpsFields, decodeTags, decodeXmpGpsFields, parseXmpCoordinate } from './services/metadata/gps-fields'
export {
  rationalToNumber,
  dmsToDecimal,
  normalizeLatitude,
  normalizeLongitude,
  normalizeAltitude,
  normalizeBearing
} from './services/metadata/coordinates'
export { correctOrientation, rotationForOrientation } from './services/imaging/orientation'
export { annotateImage } from './services/imaging/annotate'
export { loadMarkerAsset, fetchMarkerBytes } from './services/imaging/marker'
export type { MarkerSource, MarkerAsset, FetchLike } from './services/imaging/marker'
export { computeOverlayBox, overlayRotation, toKmlRotation } from './services/kml/geometry'
export { KmlDocument } from './services/kml/KmlDocument'
export { DEFAULT_PIPELINE_CONFIG, loadConfigFromEnv, resolveConfig } from './services/pipeline-config'
export type { PipelineConfig } from './services/pipeline-config'
export { BatchFailureError, UnexpectedFaultError, CoordinateError, errorToMessage } from './services/errors'
export type { BatchFailureCode, ExtractionError, ExtractionFailureReason } from './services/errors'
export { setLogCallback, setVerbosity, clearPipelineLogs, pipelineLogs } from './services/pipeline-logger'
export type * from './types/photo'
export type { Result } from './types/result'
