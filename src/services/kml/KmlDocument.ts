// In-memory KML document: placemarks and ground overlays in insertion order

import type { OverlayBox } from '../../types/photo'
import { toKmlRotation } from './geometry'
import { cdata, entryHref, escapeXML, formatNumber } from './xml'

export const PLACEMARK_STYLE_ID = 'photo-placemark'

export interface PlacemarkDescription {
  /** Plain-text lines, escaped on output */
  lines: string[]
  /** Archive entry of the embedded photo */
  imageEntry: string
  imageWidth: number
}

export interface PlacemarkEntry {
  kind: 'placemark'
  name: string
  latitude: number
  longitude: number
  /** Written as a third coordinate with absolute altitude mode when set */
  altitude?: number
  description: PlacemarkDescription
}

export interface GroundOverlayEntry {
  kind: 'groundOverlay'
  name: string
  /** Archive entry of the marker image */
  iconEntry: string
  box: OverlayBox
}

export type KmlFeature = PlacemarkEntry | GroundOverlayEntry

export interface KmlDocumentOptions {
  placemarkIconHref: string
}

function isAbsoluteUrl(href: string): boolean {
  return /^[a-z][a-z0-9+.-]*:/i.test(href)
}

export class KmlDocument {
  readonly name: string
  private readonly placemarkIconHref: string
  private readonly features: KmlFeature[] = []
  private serialized: string | null = null

  constructor(name: string, options: KmlDocumentOptions) {
    this.name = name
    this.placemarkIconHref = options.placemarkIconHref
  }

  get placemarks(): PlacemarkEntry[] {
    return this.features.filter((f): f is PlacemarkEntry => f.kind === 'placemark')
  }

  get groundOverlays(): GroundOverlayEntry[] {
    return this.features.filter((f): f is GroundOverlayEntry => f.kind === 'groundOverlay')
  }

  get featureCount(): number {
    return this.features.length
  }

  addPlacemark(entry: Omit<PlacemarkEntry, 'kind'>): void {
    this.assertOpen()
    this.features.push({ kind: 'placemark', ...entry })
  }

  addGroundOverlay(entry: Omit<GroundOverlayEntry, 'kind'>): void {
    this.assertOpen()
    this.features.push({ kind: 'groundOverlay', ...entry })
  }

  /**
   * Archive entry names the serialized document points at, in first-use
   * order. External URLs (the placemark icon) are not included.
   */
  referencedEntries(): string[] {
    const names = new Set<string>()
    if (!isAbsoluteUrl(this.placemarkIconHref)) {
      names.add(this.placemarkIconHref)
    }
    for (const feature of this.features) {
      names.add(feature.kind === 'placemark' ? feature.description.imageEntry : feature.iconEntry)
    }
    return Array.from(names)
  }

  /**
   * Render the document. The first call freezes it; later calls return the
   * same text and further adds throw.
   */
  serialize(): string {
    if (this.serialized !== null) {
      return this.serialized
    }

    let kml = `<?xml version="1.0" encoding="UTF-8"?>
<kml xmlns="http://www.opengis.net/kml/2.2">
  <Document>
    <name>${escapeXML(this.name)}</name>
    <Style id="${PLACEMARK_STYLE_ID}">
      <IconStyle>
        <Icon>
          <href>${escapeXML(this.placemarkIconHref)}</href>
        </Icon>
      </IconStyle>
    </Style>
`

    for (const feature of this.features) {
      kml += feature.kind === 'placemark' ? renderPlacemark(feature) : renderGroundOverlay(feature)
    }

    kml += `  </Document>
</kml>
`

    this.serialized = kml
    return kml
  }

  private assertOpen(): void {
    if (this.serialized !== null) {
      throw new Error(`KML document "${this.name}" has already been serialized`)
    }
  }
}

function renderDescription(description: PlacemarkDescription): string {
  const src = escapeXML(entryHref(description.imageEntry))
  const alt = escapeXML(description.imageEntry)
  const lines = description.lines.map(line => `${escapeXML(line)}<br>`)
  lines.push(`<img src="${src}" alt="${alt}" width="${description.imageWidth}" />`)
  return cdata(lines.join(''))
}

function renderPlacemark(placemark: PlacemarkEntry): string {
  const coordinates = [formatNumber(placemark.longitude), formatNumber(placemark.latitude)]
  if (placemark.altitude !== undefined) {
    coordinates.push(formatNumber(placemark.altitude, 3))
  }
  const altitudeMode = placemark.altitude !== undefined
    ? `
        <altitudeMode>absolute</altitudeMode>`
    : ''

  return `    <Placemark>
      <name>${escapeXML(placemark.name)}</name>
      <description>${renderDescription(placemark.description)}</description>
      <styleUrl>#${PLACEMARK_STYLE_ID}</styleUrl>
      <Point>${altitudeMode}
        <coordinates>${coordinates.join(',')}</coordinates>
      </Point>
    </Placemark>
`
}

function renderGroundOverlay(overlay: GroundOverlayEntry): string {
  const { box } = overlay
  return `    <GroundOverlay>
      <name>${escapeXML(overlay.name)}</name>
      <Icon>
        <href>${escapeXML(entryHref(overlay.iconEntry))}</href>
      </Icon>
      <LatLonBox>
        <north>${formatNumber(box.north)}</north>
        <south>${formatNumber(box.south)}</south>
        <east>${formatNumber(box.east)}</east>
        <west>${formatNumber(box.west)}</west>
        <rotation>${formatNumber(toKmlRotation(box.rotation), 6)}</rotation>
      </LatLonBox>
    </GroundOverlay>
`
}
