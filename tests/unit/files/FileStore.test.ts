/**
 * LocalFileStore Unit Tests
 */

import { mkdir, mkdtemp, rm } from "fs/promises"
import os from "os"
import path from "path"
import { LocalFileStore, contentTypeFor } from "../../../src/infrastructure/files/FileStore"
import { NotFoundError, ValidationError } from "../../../src/shared/errors"

describe("LocalFileStore", () => {
  let rootDir: string

  beforeEach(async () => {
    rootDir = await mkdtemp(path.join(os.tmpdir(), "file-store-"))
  })

  afterEach(async () => {
    await rm(rootDir, { recursive: true, force: true })
  })

  it("should read back a written file with its content type", async () => {
    const store = new LocalFileStore(rootDir)

    const location = await store.write("challans/schallan-CH-1.pdf", Buffer.from("%PDF-1.4"))
    const file = await store.read("challans/schallan-CH-1.pdf")

    expect(location).toBe(path.join(rootDir, "challans", "schallan-CH-1.pdf"))
    expect(file.fileName).toBe("schallan-CH-1.pdf")
    expect(file.contentType).toBe("application/pdf")
    expect(file.content.toString()).toBe("%PDF-1.4")
  })

  it("should answer with a public URL when one is configured", async () => {
    const store = new LocalFileStore(rootDir, "https://files.test/")

    await expect(store.write("schallan-CH-1.xml", Buffer.from("<challan/>"))).resolves.toBe(
      "https://files.test/schallan-CH-1.xml"
    )
  })

  it("should refuse paths outside the store", async () => {
    const store = new LocalFileStore(rootDir)

    await expect(store.read("../secrets.txt")).rejects.toBeInstanceOf(ValidationError)
  })

  it("should report a missing file as not found", async () => {
    const store = new LocalFileStore(rootDir)

    await expect(store.read("missing.pdf")).rejects.toThrow(new NotFoundError("File missing.pdf"))
  })

  it("should pass through file system errors other than a missing file", async () => {
    const store = new LocalFileStore(rootDir)
    await mkdir(path.join(rootDir, "documents"))

    await expect(store.read("documents")).rejects.toMatchObject({ code: "EISDIR" })
  })

  it("should fall back to octet-stream for unknown extensions", () => {
    expect(contentTypeFor("scan.JPG")).toBe("image/jpeg")
    expect(contentTypeFor("notes.bin")).toBe("application/octet-stream")
  })
})
