/**
 * Google Drive Object Store
 *
 * Drive v3 REST client over fetch. Each database is one `{name}.json` file,
 * optionally inside a configured folder. Upload looks the file up by name and
 * updates its content in place, falling back to a multipart create.
 */

import { randomUUID } from 'node:crypto'
import type { DatabaseName } from '@tabula/core'
import { z } from 'zod'
import { TransientSyncError } from '../errors'
import type { RemoteObject, RemoteObjectStore, RemoteRequestOptions } from './types'

const DRIVE_API = 'https://www.googleapis.com/drive/v3'
const DRIVE_UPLOAD_API = 'https://www.googleapis.com/upload/drive/v3'
const OBJECT_EXTENSION = '.json'
const MIME_TYPE = 'application/json'

const fileSchema = z.object({
  id: z.string(),
  name: z.string(),
  size: z.coerce.number().optional(),
  modifiedTime: z.string().optional(),
})

const fileListSchema = z.object({
  files: z.array(fileSchema).default([]),
  nextPageToken: z.string().optional(),
})

type DriveFile = z.infer<typeof fileSchema>

interface DriveRequest {
  method: 'GET' | 'POST' | 'PATCH'
  headers?: Record<string, string>
  body?: Uint8Array
}

export interface DriveObjectStoreOptions {
  /** Folder that receives uploads. Defaults to the drive root. */
  folderId?: string
  /** Override for tests. */
  fetch?: typeof fetch
  apiUrl?: string
  uploadUrl?: string
}

/**
 * Quote a value for a Drive `q` expression.
 */
export function quoteQueryValue(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`
}

export class DriveObjectStore implements RemoteObjectStore {
  private readonly folderId?: string
  private readonly fetchFn: typeof fetch
  private readonly apiUrl: string
  private readonly uploadUrl: string

  constructor(options: DriveObjectStoreOptions = {}) {
    this.folderId = options.folderId
    this.fetchFn = options.fetch ?? fetch
    this.apiUrl = options.apiUrl ?? DRIVE_API
    this.uploadUrl = options.uploadUrl ?? DRIVE_UPLOAD_API
  }

  async upload(name: DatabaseName, bytes: Uint8Array, options: RemoteRequestOptions): Promise<void> {
    const existing = await this.findFile(name, options)

    if (existing) {
      const res = await this.request(
        `${this.uploadUrl}/files/${encodeURIComponent(existing.id)}?uploadType=media`,
        { method: 'PATCH', headers: { 'Content-Type': MIME_TYPE }, body: bytes },
        options,
      )
      await this.ensureOk(res, `update ${name}`)
      return
    }

    const boundary = `tabula-${randomUUID()}`
    const metadata: Record<string, unknown> = {
      name: `${name}${OBJECT_EXTENSION}`,
      mimeType: MIME_TYPE,
    }
    if (this.folderId) {
      metadata.parents = [this.folderId]
    }

    const body = Buffer.concat([
      Buffer.from(
        `--${boundary}\r\nContent-Type: application/json; charset=UTF-8\r\n\r\n${JSON.stringify(metadata)}\r\n`,
      ),
      Buffer.from(`--${boundary}\r\nContent-Type: ${MIME_TYPE}\r\n\r\n`),
      Buffer.from(bytes),
      Buffer.from(`\r\n--${boundary}--\r\n`),
    ])

    const res = await this.request(
      `${this.uploadUrl}/files?uploadType=multipart`,
      {
        method: 'POST',
        headers: { 'Content-Type': `multipart/related; boundary=${boundary}` },
        body,
      },
      options,
    )
    await this.ensureOk(res, `create ${name}`)
  }

  async download(name: DatabaseName, options: RemoteRequestOptions): Promise<Uint8Array | undefined> {
    const file = await this.findFile(name, options)
    if (!file) return undefined

    const res = await this.request(
      `${this.apiUrl}/files/${encodeURIComponent(file.id)}?alt=media`,
      { method: 'GET' },
      options,
    )
    await this.ensureOk(res, `download ${name}`)
    return new Uint8Array(await res.arrayBuffer())
  }

  async list(options: RemoteRequestOptions): Promise<RemoteObject[]> {
    const objects: RemoteObject[] = []
    let pageToken: string | undefined

    do {
      const page = await this.listFiles(`mimeType=${quoteQueryValue(MIME_TYPE)}`, options, pageToken)
      for (const file of page.files) {
        if (!file.name.endsWith(OBJECT_EXTENSION)) continue
        objects.push({
          name: file.name.slice(0, -OBJECT_EXTENSION.length),
          size: file.size,
          modifiedAt: file.modifiedTime ? new Date(file.modifiedTime) : undefined,
        })
      }
      pageToken = page.nextPageToken
    } while (pageToken)

    return objects.sort((a, b) => a.name.localeCompare(b.name))
  }

  private async findFile(
    name: DatabaseName,
    options: RemoteRequestOptions,
  ): Promise<DriveFile | undefined> {
    const page = await this.listFiles(`name=${quoteQueryValue(`${name}${OBJECT_EXTENSION}`)}`, options)
    return page.files[0]
  }

  private async listFiles(
    clause: string,
    options: RemoteRequestOptions,
    pageToken?: string,
  ): Promise<z.infer<typeof fileListSchema>> {
    const filters = [clause, 'trashed=false']
    if (this.folderId) {
      filters.push(`${quoteQueryValue(this.folderId)} in parents`)
    }

    const params = new URLSearchParams({
      q: filters.join(' and '),
      fields: 'nextPageToken, files(id, name, size, modifiedTime)',
      spaces: 'drive',
      pageSize: '100',
    })
    if (pageToken) {
      params.set('pageToken', pageToken)
    }

    const res = await this.request(`${this.apiUrl}/files?${params}`, { method: 'GET' }, options)
    await this.ensureOk(res, 'list files')

    const parsed = fileListSchema.safeParse(await res.json())
    if (!parsed.success) {
      throw new TransientSyncError('Drive list files: malformed response')
    }
    return parsed.data
  }

  private async request(
    url: string,
    init: DriveRequest,
    options: RemoteRequestOptions,
  ): Promise<Response> {
    return this.fetchFn(url, {
      method: init.method,
      headers: {
        ...init.headers,
        Authorization: `Bearer ${options.accessToken}`,
      },
      body: init.body,
      signal: options.signal,
    })
  }

  private async ensureOk(res: Response, action: string): Promise<void> {
    if (res.ok) return
    const detail = (await res.text()).slice(0, 200)
    throw new TransientSyncError(`Drive ${action} failed (${res.status}): ${detail}`)
  }
}
