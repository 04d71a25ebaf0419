import { describe, it, expect } from '@jest/globals'
import { promises as fs } from 'fs'
import * as os from 'os'
import * as path from 'path'
import { BatchFailureError } from '../../errors'
import type { FetchLike } from '../../imaging/marker'
import { loadConfigFromEnv } from '../../pipeline-config'
import { KmzExportService, exportKmz, sanitizeOutputName } from '../KmzExportService'
import { PITTSBURGH, geotaggedPhoto, kmlReferences, readArchive, readEntryText, untaggedPhoto } from '../../../tests/testUtils'
import type { PhotoInput } from '../../../types/photo'

function photoWithBearing(name: string, bearing: number): Promise<PhotoInput> {
  return geotaggedPhoto(name, { gps: { ...PITTSBURGH, imgDirection: [bearing, 1], imgDirectionRef: 'T' } })
}

describe('sanitizeOutputName', () => {
  it('keeps a safe base name and appends .kmz', () => {
    expect(sanitizeOutputName('trip')).toBe('trip.kmz')
    expect(sanitizeOutputName('Trip 2024.KMZ')).toBe('Trip 2024.kmz')
    expect(sanitizeOutputName('../../etc/holiday-photos')).toBe('holiday-photos.kmz')
  })

  it('replaces unsafe characters', () => {
    expect(sanitizeOutputName('a:b*c?')).toBe('a_b_c_.kmz')
  })

  it('rejects a name with nothing usable left', () => {
    expect(() => sanitizeOutputName('')).toThrow(BatchFailureError)
    expect(() => sanitizeOutputName('***')).toThrow('"***" is not a usable output file name')
    expect(() => sanitizeOutputName('dir/')).toThrow(BatchFailureError)
  })
})

describe('KmzExportService', () => {
  const service = new KmzExportService({})

  it('packages placemarks, photos and fan overlays', async () => {
    const result = await service.export({
      files: [await photoWithBearing('b.jpg', 90), await photoWithBearing('a.jpg', 270), await untaggedPhoto('c.jpg')],
      outputName: 'trip'
    })

    expect(result.success).toBe(true)
    if (!result.success) return
    expect(result.filename).toBe('trip.kmz')
    expect(result.placemarkCount).toBe(2)
    expect(result.overlayCount).toBe(2)
    expect(result.skipped.map(s => s.name)).toEqual(['c.jpg'])
    expect(result.message).toBe('KMZ export completed: 2 placemark(s), 2 overlay(s), 1 skipped')

    const { names, zip } = await readArchive(result.data)
    expect(names).toEqual(['doc.kml', 'a.jpg', 'b.jpg', 'Fan.png'])

    const kml = await readEntryText(zip, 'doc.kml')
    expect(kml).toContain('<name>trip</name>')
    expect(kml).toContain('<rotation>180</rotation>')
    expect(kml).toContain('<rotation>0</rotation>')
    expect(kml.indexOf('<name>a.jpg</name>')).toBeLessThan(kml.indexOf('<name>b.jpg</name>'))
  })

  it('resolves every document reference for batches of any size', async () => {
    for (const size of [1, 2, 7, 20, 50]) {
      const files: PhotoInput[] = []
      for (let i = 0; i < size; i++) {
        files.push(await photoWithBearing(`IMG_${String(i).padStart(3, '0')}.jpg`, (i * 37) % 360))
      }

      const result = await service.export({ files, outputName: `batch-${size}` })
      expect(result.success).toBe(true)
      if (!result.success) return

      const { names, zip } = await readArchive(result.data)
      const references = kmlReferences(await readEntryText(zip, 'doc.kml'))
      expect(references.length).toBe(size * 2)
      for (const reference of references) {
        expect(names).toContain(reference)
      }
    }
  }, 60_000)

  it('resolves references to photos whose names contain URL characters', async () => {
    const names = ['IMG #2.jpg', '100% zoom.jpg', 'what?.jpg', "it's.jpg"]
    const files: PhotoInput[] = []
    for (const name of names) {
      files.push(await photoWithBearing(name, 10))
    }

    const result = await service.export({ files, outputName: 'odd-names' })
    expect(result.success).toBe(true)
    if (!result.success) return

    const archive = await readArchive(result.data)
    const references = kmlReferences(await readEntryText(archive.zip, 'doc.kml'))
    expect(references.filter(reference => reference !== 'Fan.png').sort()).toEqual([...names].sort())
    for (const reference of references) {
      expect(archive.names).toContain(reference)
    }
  })

  it('returns a failure result with no archive when nothing is geotagged', async () => {
    const result = await service.export({ files: [await untaggedPhoto('a.jpg')], outputName: 'trip' })

    expect(result).toEqual({
      success: false,
      kind: 'batch-failure',
      code: 'no-usable-photos',
      message: 'No valid GPS metadata found in the 1 uploaded image(s).',
      filename: ''
    })
  })

  it('reports duplicate names as a batch failure', async () => {
    const result = await service.export({
      files: [await geotaggedPhoto('one/IMG.jpg'), await geotaggedPhoto('two/IMG.jpg')],
      outputName: 'trip'
    })

    expect(result.success).toBe(false)
    if (result.success) return
    expect(result.code).toBe('duplicate-filename')
  })

  it('reports an invalid configuration as a batch failure', async () => {
    const result = await service.export({
      files: [await geotaggedPhoto('a.jpg')],
      outputName: 'trip',
      config: { compressionLevel: 12 }
    })

    expect(result).toMatchObject({ success: false, code: 'invalid-config' })
  })

  it('reports a relative placemark icon as invalid configuration', async () => {
    const result = await new KmzExportService(loadConfigFromEnv({ GEOKMZ_ICON_HREF: 'icons/pin.png' })).export({
      files: [await geotaggedPhoto('a.jpg')],
      outputName: 'trip'
    })

    expect(result).toMatchObject({ success: false, kind: 'batch-failure', code: 'invalid-config' })
  })

  it('fails the batch when a remote marker cannot be fetched', async () => {
    let calls = 0
    const offline: FetchLike = async () => {
      calls++
      throw new Error('getaddrinfo ENOTFOUND example.test')
    }
    const offlineService = new KmzExportService({ markerFetchRetries: 1 }, { fetchImpl: offline, retryDelayMs: 0 })

    const result = await offlineService.export({
      files: [await photoWithBearing('a.jpg', 10)],
      outputName: 'trip',
      marker: { kind: 'url', url: 'https://example.test/fan.png' }
    })

    expect(calls).toBe(2)
    expect(result).toMatchObject({ success: false, kind: 'batch-failure', code: 'marker-unavailable' })
  })

  it('skips the marker entirely when fans are disabled', async () => {
    const result = await service.export({
      files: [await photoWithBearing('a.jpg', 10)],
      outputName: 'trip',
      config: { includeFanOverlay: false }
    })

    expect(result.success).toBe(true)
    if (!result.success) return
    expect(result.overlayCount).toBe(0)
    expect((await readArchive(result.data)).names).toEqual(['doc.kml', 'a.jpg'])
  })

  it('writes the archive into a directory', async () => {
    const directory = await fs.mkdtemp(path.join(os.tmpdir(), 'kmz-export-'))
    try {
      const result = await service.exportToDirectory(
        { files: [await photoWithBearing('a.jpg', 10)], outputName: 'my trip' },
        directory
      )

      expect(result.success).toBe(true)
      if (!result.success) return
      expect(result.path).toBe(path.join(directory, 'my trip.kmz'))
      expect(await fs.readdir(directory)).toEqual(['my trip.kmz'])
      expect((await fs.readFile(path.join(directory, 'my trip.kmz'))).equals(result.data)).toBe(true)
    } finally {
      await fs.rm(directory, { recursive: true, force: true })
    }
  })
})

describe('exportKmz', () => {
  it('is deterministic for the same input', async () => {
    const files = [await photoWithBearing('a.jpg', 45)]
    const first = await exportKmz({ files, outputName: 'trip' })
    const second = await exportKmz({ files, outputName: 'trip' })

    expect(first.success && second.success).toBe(true)
    if (!first.success || !second.success) return
    expect(first.data.equals(second.data)).toBe(true)
  })
})
