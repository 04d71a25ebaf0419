import { describe, it, expect } from '@jest/globals'
import { KmlDocument, PLACEMARK_STYLE_ID } from '../KmlDocument'

const ICON = 'http://maps.google.com/mapfiles/kml/paddle/blu-circle.png'

function placemark(name: string, altitude?: number) {
  return {
    name,
    latitude: 40.5,
    longitude: -79.25,
    altitude,
    description: { lines: ['Orientation: 90°', 'a<b'], imageEntry: name, imageWidth: 800 }
  }
}

describe('KmlDocument', () => {
  it('writes a KML 2.2 document with the shared placemark style', () => {
    const kml = new KmlDocument('Trip & <Co>', { placemarkIconHref: ICON }).serialize()

    expect(kml.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<kml xmlns="http://www.opengis.net/kml/2.2">')).toBe(true)
    expect(kml).toContain('<name>Trip &amp; &lt;Co&gt;</name>')
    expect(kml).toContain(`<Style id="${PLACEMARK_STYLE_ID}">`)
    expect(kml).toContain(`<href>${ICON}</href>`)
  })

  it('writes a placemark with an escaped description and embedded image', () => {
    const document = new KmlDocument('trip', { placemarkIconHref: ICON })
    document.addPlacemark(placemark('IMG_1.jpg'))
    const kml = document.serialize()

    expect(kml).toContain('<name>IMG_1.jpg</name>')
    expect(kml).toContain(
      '<description><![CDATA[Orientation: 90°<br>a&lt;b<br><img src="IMG_1.jpg" alt="IMG_1.jpg" width="800" />]]></description>'
    )
    expect(kml).toContain(`<styleUrl>#${PLACEMARK_STYLE_ID}</styleUrl>`)
    expect(kml).toContain('<coordinates>-79.25,40.5</coordinates>')
    expect(kml).not.toContain('<altitudeMode>')
  })

  it('percent-encodes entry names used as URLs but not the alt text', () => {
    const document = new KmlDocument('trip', { placemarkIconHref: ICON })
    document.addPlacemark(placemark('IMG #2 100%.jpg'))
    document.addGroundOverlay({
      name: 'Overlay - IMG #2 100%.jpg',
      iconEntry: 'fan marker.png',
      box: { north: 1, south: 0, east: 1, west: 0, rotation: 0 }
    })
    const kml = document.serialize()

    expect(kml).toContain('<img src="IMG%20%232%20100%25.jpg" alt="IMG #2 100%.jpg" width="800" />')
    expect(kml).toContain('<href>fan%20marker.png</href>')
    expect(document.referencedEntries()).toEqual(['IMG #2 100%.jpg', 'fan marker.png'])
  })

  it('adds absolute altitude only when an altitude is given', () => {
    const document = new KmlDocument('trip', { placemarkIconHref: ICON })
    document.addPlacemark(placemark('IMG_2.jpg', 273.5))
    const kml = document.serialize()

    expect(kml).toContain('<altitudeMode>absolute</altitudeMode>')
    expect(kml).toContain('<coordinates>-79.25,40.5,273.5</coordinates>')
  })

  it('writes ground overlays with the rotation folded into range', () => {
    const document = new KmlDocument('trip', { placemarkIconHref: ICON })
    document.addGroundOverlay({
      name: 'Overlay - IMG_1.jpg',
      iconEntry: 'Fan.png',
      box: { north: 40.5002, south: 40.4998, east: -79.2498, west: -79.2502, rotation: 270 }
    })
    const kml = document.serialize()

    expect(kml).toContain('<name>Overlay - IMG_1.jpg</name>')
    expect(kml).toContain('<href>Fan.png</href>')
    expect(kml).toContain('<north>40.5002</north>')
    expect(kml).toContain('<south>40.4998</south>')
    expect(kml).toContain('<east>-79.2498</east>')
    expect(kml).toContain('<west>-79.2502</west>')
    expect(kml).toContain('<rotation>-90</rotation>')
  })

  it('keeps features in insertion order', () => {
    const document = new KmlDocument('trip', { placemarkIconHref: ICON })
    document.addPlacemark(placemark('b.jpg'))
    document.addGroundOverlay({
      name: 'Overlay - b.jpg',
      iconEntry: 'Fan.png',
      box: { north: 1, south: 0, east: 1, west: 0, rotation: 0 }
    })
    document.addPlacemark(placemark('a.jpg'))
    const kml = document.serialize()

    expect(document.featureCount).toBe(3)
    expect(document.placemarks.map(p => p.name)).toEqual(['b.jpg', 'a.jpg'])
    expect(kml.indexOf('<name>b.jpg</name>')).toBeLessThan(kml.indexOf('<name>Overlay - b.jpg</name>'))
    expect(kml.indexOf('<name>Overlay - b.jpg</name>')).toBeLessThan(kml.indexOf('<name>a.jpg</name>'))
  })

  it('lists referenced archive entries without external URLs', () => {
    const document = new KmlDocument('trip', { placemarkIconHref: ICON })
    document.addPlacemark(placemark('a.jpg'))
    document.addGroundOverlay({ name: 'o1', iconEntry: 'Fan.png', box: { north: 1, south: 0, east: 1, west: 0, rotation: 0 } })
    document.addPlacemark(placemark('b.jpg'))
    document.addGroundOverlay({ name: 'o2', iconEntry: 'Fan.png', box: { north: 1, south: 0, east: 1, west: 0, rotation: 0 } })

    expect(document.referencedEntries()).toEqual(['a.jpg', 'Fan.png', 'b.jpg'])
  })

  it('includes a relative placemark icon in the referenced entries', () => {
    const document = new KmlDocument('trip', { placemarkIconHref: 'icons/pin.png' })
    expect(document.referencedEntries()).toEqual(['icons/pin.png'])
  })

  it('freezes after serialization', () => {
    const document = new KmlDocument('trip', { placemarkIconHref: ICON })
    document.addPlacemark(placemark('a.jpg'))
    const first = document.serialize()

    expect(() => document.addPlacemark(placemark('b.jpg'))).toThrow(/already been serialized/)
    expect(document.serialize()).toBe(first)
  })
})
