/**
 * Marker Asset Loader
 *
 * Resolves the shared fan image once per batch: from bytes handed in by the
 * caller, a local file, a remote URL, or the artwork bundled in assets/.
 * The result is normalized to PNG and optionally pre-rotated, then reused
 * read-only by every ground overlay in the batch.
 */

import { promises as fs } from 'fs'
import * as path from 'path'
import sharp from 'sharp'
import { BatchFailureError, errorToMessage } from '../errors'
import { log, logWarning } from '../pipeline-logger'

export type MarkerSource =
  | { kind: 'builtin' }
  | { kind: 'bytes'; data: Buffer | Uint8Array }
  | { kind: 'file'; path: string }
  | { kind: 'url'; url: string }

export interface FetchResponseLike {
  ok: boolean
  status: number
  arrayBuffer(): Promise<ArrayBuffer>
}

export type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<FetchResponseLike>

export interface MarkerFetchOptions {
  timeoutMs: number
  /** Extra attempts after the first failure */
  retries: number
  retryDelayMs?: number
  fetchImpl?: FetchLike
}

export interface MarkerAsset {
  entryName: string
  data: Buffer
}

export const BUILTIN_MARKER_PATH = path.resolve(__dirname, '../../../assets/fan-marker.svg')

const defaultFetch: FetchLike = (url, init) => fetch(url, init)

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Download the marker with a per-attempt timeout. Throws
 * BatchFailureError('marker-unavailable') once every attempt has failed.
 */
export async function fetchMarkerBytes(url: string, options: MarkerFetchOptions): Promise<Buffer> {
  const fetchImpl = options.fetchImpl ?? defaultFetch
  const retryDelayMs = options.retryDelayMs ?? 250
  const attempts = options.retries + 1
  let lastError: unknown

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const response = await fetchImpl(url, { signal: AbortSignal.timeout(options.timeoutMs) })
      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`)
      }
      return Buffer.from(await response.arrayBuffer())
    } catch (error) {
      lastError = error
      logWarning(`[Marker] attempt ${attempt}/${attempts} for ${url} failed: ${errorToMessage(error)}`)
      if (attempt < attempts && retryDelayMs > 0) {
        await delay(retryDelayMs * attempt)
      }
    }
  }

  throw new BatchFailureError(
    'marker-unavailable',
    `Could not download the fan marker image from ${url} after ${attempts} attempt(s): ${errorToMessage(lastError)}`,
    { cause: lastError }
  )
}

async function readSource(source: MarkerSource, fetchOptions: MarkerFetchOptions): Promise<Buffer> {
  switch (source.kind) {
    case 'bytes':
      return Buffer.from(source.data)
    case 'url':
      return fetchMarkerBytes(source.url, fetchOptions)
    case 'file':
    case 'builtin': {
      const filePath = source.kind === 'file' ? source.path : BUILTIN_MARKER_PATH
      try {
        return await fs.readFile(filePath)
      } catch (error) {
        throw new BatchFailureError(
          'marker-unavailable',
          `Could not read the fan marker image at ${filePath}: ${errorToMessage(error)}`,
          { cause: error }
        )
      }
    }
  }
}

export interface LoadMarkerOptions extends MarkerFetchOptions {
  entryName: string
  preRotationDegrees: number
}

export async function loadMarkerAsset(source: MarkerSource, options: LoadMarkerOptions): Promise<MarkerAsset> {
  const raw = await readSource(source, options)

  try {
    let image = sharp(raw)
    if (options.preRotationDegrees % 360 !== 0) {
      image = image.rotate(options.preRotationDegrees, { background: { r: 0, g: 0, b: 0, alpha: 0 } })
    }
    const data = await image.png().toBuffer()
    log(`[Marker] loaded ${source.kind} marker as ${options.entryName} (${data.length} bytes)`)
    return { entryName: options.entryName, data }
  } catch (error) {
    throw new BatchFailureError(
      'marker-unavailable',
      `The fan marker image could not be decoded: ${errorToMessage(error)}`,
      { cause: error }
    )
  }
}
