/**
 * Overlay geometry for the bearing fan.
 *
 * The fan artwork points east when unrotated, so a ground overlay rotation
 * of (bearing - 90) makes it point along the camera bearing (0 = north,
 * clockwise). That offset belongs to the artwork; a marker drawn pointing
 * north would need an offset of 0.
 */

import type { LatLon, OverlayBox } from '../../types/photo'

export const DEFAULT_OVERLAY_HALF_WIDTH = 0.0002
export const MARKER_HEADING_OFFSET = 90

function clampLatitude(latitude: number): number {
  return Math.max(-90, Math.min(90, latitude))
}

/**
 * Wrap a longitude into [-180, 180]. 180 stays 180.
 */
export function wrapLongitude(longitude: number): number {
  if (longitude >= -180 && longitude <= 180) return longitude
  const wrapped = ((((longitude + 180) % 360) + 360) % 360) - 180
  return wrapped === -180 && longitude > 0 ? 180 : wrapped
}

export function overlayRotation(bearing: number): number {
  return bearing - MARKER_HEADING_OFFSET
}

/**
 * Square box of side 2 * halfWidth centred on the location, plus the
 * rotation that aligns the fan with `bearing`.
 */
export function computeOverlayBox(
  location: LatLon,
  bearing: number,
  halfWidth: number = DEFAULT_OVERLAY_HALF_WIDTH
): OverlayBox {
  if (!(halfWidth > 0)) {
    throw new RangeError(`Overlay half-width must be positive, got ${halfWidth}`)
  }

  return {
    north: clampLatitude(location.latitude + halfWidth),
    south: clampLatitude(location.latitude - halfWidth),
    east: wrapLongitude(location.longitude + halfWidth),
    west: wrapLongitude(location.longitude - halfWidth),
    rotation: overlayRotation(bearing)
  }
}

/**
 * KML's <rotation> takes [-180, 180]; fold an overlay rotation into it
 * (270 -> -90).
 */
export function toKmlRotation(rotation: number): number {
  const folded = ((((rotation + 180) % 360) + 360) % 360) - 180
  return folded === -180 && rotation > 0 ? 180 : folded
}
