/**
 * @fileoverview Vercel Blob Object Store
 *
 * Object storage adapter for analysis artifacts (progress snapshots,
 * results) and uploaded source files. Keys are used verbatim as blob
 * pathnames so `{userId}/{documentId}/status.json` stays addressable by
 * existing polling clients.
 *
 * @module lib/blob
 */

import { readFile, writeFile } from "node:fs/promises"
import { basename } from "node:path"
import { put, del, head, BlobNotFoundError } from "@vercel/blob"
import { ExternalServiceError } from "./errors"
import type { ObjectStore } from "./storage/types"

const CONTENT_TYPES: Record<string, string> = {
  ".json": "application/json",
  ".pdf": "application/pdf",
}

function contentTypeFor(key: string): string {
  const dot = key.lastIndexOf(".")
  const ext = dot === -1 ? "" : key.slice(dot).toLowerCase()
  return CONTENT_TYPES[ext] ?? "application/octet-stream"
}

/**
 * Object store backed by Vercel Blob.
 *
 * Every write overwrites in place (`addRandomSuffix: false`), which gives
 * the last-write-wins semantics the status key relies on.
 */
export class VercelBlobObjectStore implements ObjectStore {
  constructor(
    private readonly token: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async saveJson(data: unknown, key: string): Promise<void> {
    await put(key, JSON.stringify(data), {
      access: "public",
      token: this.token,
      contentType: "application/json",
      addRandomSuffix: false,
      allowOverwrite: true,
    })
  }

  async getJson(key: string): Promise<unknown> {
    const body = await this.fetchBody(key)
    if (body === null) return null
    return JSON.parse(body.toString("utf8"))
  }

  /**
   * Upload a local file.
   *
   * @returns The blob pathname (the key)
   */
  async uploadFile(filePath: string, key: string): Promise<string> {
    const contents = await readFile(filePath)
    const blob = await put(key, contents, {
      access: "public",
      token: this.token,
      contentType: contentTypeFor(key),
      addRandomSuffix: false,
      allowOverwrite: true,
    })
    return blob.pathname
  }

  /**
   * Download a blob to a local path.
   *
   * @throws ExternalServiceError when the blob does not exist
   */
  async downloadFile(key: string, localPath: string): Promise<string> {
    const body = await this.fetchBody(key)
    if (body === null) {
      throw new ExternalServiceError("blob-store", `${basename(key)} not found`)
    }
    await writeFile(localPath, body)
    return localPath
  }

  /** Idempotent: deleting a missing blob does not throw. */
  async deleteFile(key: string): Promise<void> {
    await del(key, { token: this.token })
  }

  private async fetchBody(key: string): Promise<Buffer | null> {
    let url: string
    let version: number
    try {
      const metadata = await head(key, { token: this.token })
      url = metadata.url
      version = metadata.uploadedAt.getTime()
    } catch (error) {
      if (error instanceof BlobNotFoundError) {
        return null
      }
      throw error
    }

    // Public blobs sit behind a CDN; pin the read to the current upload
    const response = await this.fetchImpl(`${url}?v=${version}`)
    if (!response.ok) {
      throw new ExternalServiceError(
        "blob-store",
        `GET ${key} failed with ${response.status}`
      )
    }
    return Buffer.from(await response.arrayBuffer())
  }
}
