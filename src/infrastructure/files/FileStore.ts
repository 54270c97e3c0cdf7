/**
 * File storage for uploaded retailer documents and downloaded challans
 */

import { mkdir, readFile, writeFile } from "fs/promises"
import path from "path"
import { NotFoundError, ValidationError } from "../../shared/errors"
import { isJsonObject } from "../../shared/types"

export interface StoredFile {
  fileName: string
  content: Buffer
  contentType: string
}

export interface FileStore {
  read(filePath: string): Promise<StoredFile>
  /** Returns a location the caller can open */
  write(fileName: string, content: Buffer): Promise<string>
}

const CONTENT_TYPES: Record<string, string> = {
  ".pdf": "application/pdf",
  ".xml": "application/xml",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
}

export function contentTypeFor(fileName: string): string {
  return CONTENT_TYPES[path.extname(fileName).toLowerCase()] ?? "application/octet-stream"
}

export class LocalFileStore implements FileStore {
  constructor(
    private rootDir: string,
    private publicBaseUrl: string | null = null
  ) {}

  async read(filePath: string): Promise<StoredFile> {
    const fullPath = this.resolve(filePath)
    let content: Buffer
    try {
      content = await readFile(fullPath)
    } catch (error) {
      if (isJsonObject(error) && error.code === "ENOENT") {
        throw new NotFoundError(`File ${filePath}`)
      }
      throw error
    }

    const fileName = path.basename(fullPath)
    return { fileName, content, contentType: contentTypeFor(fileName) }
  }

  async write(fileName: string, content: Buffer): Promise<string> {
    const fullPath = this.resolve(fileName)
    await mkdir(path.dirname(fullPath), { recursive: true })
    await writeFile(fullPath, content)

    if (this.publicBaseUrl) {
      return `${this.publicBaseUrl.replace(/\/+$/, "")}/${path.relative(path.resolve(this.rootDir), fullPath)}`
    }
    return fullPath
  }

  private resolve(filePath: string): string {
    const root = path.resolve(this.rootDir)
    const fullPath = path.resolve(root, filePath.replace(/^\/+/, ""))
    if (fullPath !== root && !fullPath.startsWith(root + path.sep)) {
      throw new ValidationError(`File path escapes the file store: ${filePath}`, "filePath")
    }
    return fullPath
  }
}
