// EXIF rotation-tag correction of embedded photo copies

import sharp from 'sharp'
import { errorToMessage } from '../errors'

/**
 * Clockwise rotation needed for each recognized EXIF orientation value.
 * Mirrored orientations (2, 4, 5, 7) are not in the table and pass through
 * untouched.
 */
const ROTATION_FOR_ORIENTATION: Readonly<Record<number, number>> = {
  3: 180,
  6: 90,
  8: 270
}

export function rotationForOrientation(orientation: number | undefined): number {
  if (orientation === undefined) return 0
  return ROTATION_FOR_ORIENTATION[orientation] ?? 0
}

export interface CorrectedImage {
  data: Buffer
  width?: number
  height?: number
  /** Clockwise degrees applied, 0 when the image was passed through */
  rotation: number
  warning?: string
}

/**
 * Produce a copy whose visual "up" is true vertical. Width and height swap
 * for 90/270 degree corrections. A decode failure returns the input bytes
 * unchanged together with a warning; this function does not throw.
 */
export async function correctOrientation(data: Buffer, orientation: number | undefined): Promise<CorrectedImage> {
  const rotation = rotationForOrientation(orientation)

  try {
    if (rotation === 0) {
      const { width, height } = await sharp(data).metadata()
      return { data, width, height, rotation }
    }

    // Output keeps the input format and drops the EXIF orientation tag
    const { data: rotated, info } = await sharp(data).rotate(rotation).toBuffer({ resolveWithObject: true })
    return { data: rotated, width: info.width, height: info.height, rotation }
  } catch (error) {
    return {
      data,
      rotation: 0,
      warning: `orientation correction failed, embedding original (${errorToMessage(error)})`
    }
  }
}
