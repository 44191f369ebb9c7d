import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { loadSamples, SampleError } from "../load-samples"

describe("loadSamples", () => {
  let dir: string

  async function write(file: string, content: string): Promise<void> {
    await fs.writeFile(path.join(dir, file), content)
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "wirecodec-samples-"))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it("reads samples in file name order", async () => {
    await write("sns.second.json", `{"Records":[]}`)
    await write("s3.first.json", `{"Records":[]}`)
    await write("README.md", "not a sample")

    const { samples, skipped } = await loadSamples(dir)

    expect(samples).toEqual([
      { name: "first", family: "s3", file: "s3.first.json", wire: { Records: [] } },
      { name: "second", family: "sns", file: "sns.second.json", wire: { Records: [] } },
    ])
    expect(skipped).toEqual([])
  })

  it("keeps dots after the family in the sample name", async () => {
    await write("apigw-request.v1.get.json", "{}")

    const { samples } = await loadSamples(dir)

    expect(samples.map((sample) => sample.name)).toEqual(["v1.get"])
  })

  it("skips files of unregistered families", async () => {
    await write("kinesis.batch.json", "{}")
    await write("notes.json", "{}")

    const { samples, skipped } = await loadSamples(dir)

    expect(samples).toEqual([])
    expect(skipped).toEqual([
      { file: "kinesis.batch.json", reason: "unknown_family" },
      { file: "notes.json", reason: "unknown_family" },
    ])
  })

  it("skips families that were not selected", async () => {
    await write("s3.first.json", "{}")
    await write("sns.second.json", "{}")

    const { samples, skipped } = await loadSamples(dir, { families: ["sns"] })

    expect(samples.map((sample) => sample.file)).toEqual(["sns.second.json"])
    expect(skipped).toEqual([{ file: "s3.first.json", reason: "not_selected" }])
  })

  it("throws a SampleError naming the file on invalid JSON", async () => {
    await write("s3.broken.json", "{ not json")

    const load = loadSamples(dir)

    await expect(load).rejects.toThrow(SampleError)
    await expect(load).rejects.toThrow("s3.broken.json: is not valid JSON")
  })

  it("throws a SampleError when a sample cannot be read", async () => {
    await fs.mkdir(path.join(dir, "s3.folder.json"))

    const load = loadSamples(dir)

    await expect(load).rejects.toThrow(SampleError)
    await expect(load).rejects.toThrow("s3.folder.json: could not be read")
    await expect(load).rejects.toMatchObject({
      code: "invalid_sample",
      context: { file: "s3.folder.json" },
    })
  })

  it("does not read skipped files", async () => {
    await write("kinesis.broken.json", "{ not json")

    await expect(loadSamples(dir)).resolves.toEqual({
      samples: [],
      skipped: [{ file: "kinesis.broken.json", reason: "unknown_family" }],
    })
  })
})
