// Writes the KML document and its referenced images into one KMZ container

import { promises as fs } from 'fs'
import * as path from 'path'
import JSZip from 'jszip'
import type { GeoTaggedAsset } from '../../types/photo'
import { UnexpectedFaultError, errorToMessage } from '../errors'
import type { MarkerAsset } from '../imaging/marker'
import type { KmlDocument } from '../kml/KmlDocument'
import type { PipelineConfig } from '../pipeline-config'
import { logDebug } from '../pipeline-logger'

export interface PackageInput {
  document: KmlDocument
  assets: readonly GeoTaggedAsset[]
  marker?: MarkerAsset
}

export type PackageConfig = Pick<PipelineConfig, 'documentEntryName' | 'archiveDate' | 'compressionLevel'>

/**
 * Ordered entry list: markup first, then assets in document order, then the
 * marker. Throws if a name would be written twice or the document refers to
 * an entry that is not in the list.
 */
export function planArchiveEntries(input: PackageInput, config: PackageConfig): Map<string, Buffer | string> {
  const entries = new Map<string, Buffer | string>()

  const add = (name: string, data: Buffer | string) => {
    if (entries.has(name)) {
      throw new UnexpectedFaultError('Archive entry would be written twice', { fileName: name })
    }
    entries.set(name, data)
  }

  add(config.documentEntryName, input.document.serialize())
  for (const asset of input.assets) {
    add(asset.entryName, asset.data)
  }
  if (input.marker) {
    add(input.marker.entryName, input.marker.data)
  }

  for (const reference of input.document.referencedEntries()) {
    if (!entries.has(reference)) {
      throw new UnexpectedFaultError('KML document references a missing archive entry', { fileName: reference })
    }
  }

  return entries
}

/**
 * Build the KMZ bytes. Every entry carries config.archiveDate, so the same
 * input always produces the same archive.
 */
export async function packageKmz(input: PackageInput, config: PackageConfig): Promise<Buffer> {
  const entries = planArchiveEntries(input, config)

  const zip = new JSZip()
  for (const [name, data] of entries) {
    zip.file(name, data, { date: config.archiveDate, createFolders: false })
  }

  try {
    const archive = await zip.generateAsync({
      type: 'nodebuffer',
      compression: 'DEFLATE',
      compressionOptions: { level: config.compressionLevel }
    })
    logDebug(`[Package] ${entries.size} entries, ${archive.length} bytes`)
    return archive
  } catch (error) {
    throw new UnexpectedFaultError(`Could not build the KMZ archive: ${errorToMessage(error)}`, { cause: error })
  }
}

async function removeIfPresent(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath)
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return
    throw error
  }
}

/**
 * Write the archive next to its destination under a temporary name, then
 * rename it into place. On failure the temporary file is removed and no file
 * appears at outputPath.
 */
export async function saveKmzFile(outputPath: string, data: Buffer): Promise<void> {
  const directory = path.dirname(outputPath)
  const stagingPath = path.join(directory, `.${path.basename(outputPath)}.${process.pid}.partial`)

  try {
    await fs.writeFile(stagingPath, data)
    await fs.rename(stagingPath, outputPath)
  } catch (error) {
    try {
      await removeIfPresent(stagingPath)
    } catch (cleanupError) {
      throw new UnexpectedFaultError(
        `Could not write the KMZ archive (${errorToMessage(error)}) nor remove the staging file (${errorToMessage(cleanupError)})`,
        { fileName: stagingPath, cause: error }
      )
    }
    throw new UnexpectedFaultError(`Could not write the KMZ archive: ${errorToMessage(error)}`, {
      fileName: outputPath,
      cause: error
    })
  }
}
