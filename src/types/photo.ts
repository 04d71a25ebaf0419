// Photo, asset and overlay types shared across the pipeline

/**
 * One component of an EXIF rational value as it may arrive from a tag block:
 * a plain or pre-reduced number, a [numerator, denominator] pair, an object
 * form, or a "num/den" / decimal string.
 */
export type RationalInput =
  | number
  | string
  | readonly [number, number]
  | { numerator: number; denominator: number }

/**
 * Typed view of the GPS sub-block. Produced by the decode step in
 * services/metadata/gps-fields; nothing downstream reads raw tag maps.
 */
export interface GpsFields {
  latitude?: RationalInput[]
  latitudeRef?: string
  longitude?: RationalInput[]
  longitudeRef?: string
  altitude?: RationalInput
  /** 0 = above sea level, 1 = below */
  altitudeRef?: number
  imgDirection?: RationalInput
  /** 'T' = true north, 'M' = magnetic north */
  imgDirectionRef?: string
}

export interface DecodedTags {
  /** Undefined when the tag block carries no GPS sub-block at all */
  gps?: GpsFields
  /** EXIF orientation (rotation) tag, 1-8 */
  orientation?: number
  dateTimeOriginal?: string
  offsetTimeOriginal?: string
}

export type CaptureTimeSource = 'exif' | 'file-modified' | 'unknown'

export interface PhotoMetadata {
  /** Signed decimal degrees in [-90, 90] */
  latitude: number
  /** Signed decimal degrees in [-180, 180] */
  longitude: number
  /** Metres, 0 when the photo carries no altitude */
  altitude: number
  /** Bearing in [0, 360), undefined when unknown */
  orientationDegrees?: number
  /** EXIF rotation tag, used by the orientation corrector */
  orientation?: number
  readonly sourceImagePath: string
  capturedAt?: Date
  capturedAtSource: CaptureTimeSource
}

/** A named image handed to the pipeline by whatever front end wraps it */
export interface PhotoInput {
  name: string
  data: Buffer | Uint8Array
  /**
   * Filesystem modification time, used only when the photo has no capture
   * timestamp of its own.
   */
  modifiedAt?: Date
}

export interface GeoTaggedAsset {
  metadata: PhotoMetadata
  /** Archive entry name, the photo's base filename */
  entryName: string
  /** Orientation-corrected (and possibly annotated) image bytes */
  data: Buffer
  width?: number
  height?: number
}

export interface LatLon {
  latitude: number
  longitude: number
}

export interface OverlayBox {
  north: number
  south: number
  east: number
  west: number
  /** bearing - 90, degrees */
  rotation: number
}

export interface FeatureFlags {
  includeFanOverlay: boolean
  annotateImage: boolean
  includeAltitude: boolean
}
