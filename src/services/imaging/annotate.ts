// Caption banner burned into the bottom edge of an embedded photo

import sharp from 'sharp'
import { escapeXML } from '../kml/xml'

const MIN_BANNER_HEIGHT = 16
const MAX_BANNER_HEIGHT = 64

export function bannerHeightFor(imageHeight: number): number {
  const preferred = Math.round(imageHeight * 0.08)
  return Math.min(imageHeight, Math.max(MIN_BANNER_HEIGHT, Math.min(MAX_BANNER_HEIGHT, preferred)))
}

function bannerSvg(text: string, width: number, height: number): Buffer {
  const fontSize = Math.max(8, Math.round(height * 0.55))
  return Buffer.from(`<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">
  <rect x="0" y="0" width="${width}" height="${height}" fill="#000000" fill-opacity="0.55"/>
  <text x="${Math.round(height * 0.3)}" y="${Math.round(height * 0.7)}" font-family="sans-serif" font-size="${fontSize}" fill="#ffffff">${escapeXML(text)}</text>
</svg>`)
}

/**
 * Composite a one-line caption across the bottom of the image. Dimensions
 * are unchanged. Throws when sharp cannot decode the image.
 */
export async function annotateImage(data: Buffer, caption: string): Promise<Buffer> {
  const image = sharp(data)
  const { width, height } = await image.metadata()
  if (!width || !height) {
    throw new Error('image has no readable dimensions')
  }

  const bannerHeight = bannerHeightFor(height)
  return image
    .composite([{ input: bannerSvg(caption, width, bannerHeight), gravity: 'south' }])
    .toBuffer()
}
