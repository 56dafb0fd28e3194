import * as fs from "node:fs/promises"
import { tmpdir } from "node:os"
import path from "node:path"
import { RealVectorStateSpace } from "../../adapters/spaces/real-vector-state-space"
import { sequenceRandom } from "../../tests/utils/sequence-random"
import { captureText } from "../../tests/utils/text-capture"
import { recordBytes, TestStateSpace } from "../../tests/utils/test-state-space"
import { createStateStorage } from "../create-state-storage"

describe("state storage on disk", () => {
  let dir: string

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(tmpdir(), "state-storage-e2e-"))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it("restores generated records in a fresh collection", async () => {
    const file = path.join(dir, "states.bin")
    const written = createStateStorage({ space: new TestStateSpace({ signature: [1, 7] }) })
    written.generateSamples(5)

    const bytesWritten = await written.store(file)

    const space = new TestStateSpace({ signature: [1, 7] })
    const restored = createStateStorage({ space })
    const header = await restored.load(file)
    const out = captureText()
    restored.print(out)

    expect(bytesWritten).toBe((await fs.stat(file)).size)
    expect(header.recordCount).toBe(5)
    expect(recordBytes(restored.getStates())).toEqual(recordBytes(written.getStates()))
    expect(out.lines()).toHaveLength(5)
    expect(space.liveRecords).toBe(5)
  })

  it("reloads into the same collection after a clear", async () => {
    const file = path.join(dir, "states.bin")
    const storage = createStateStorage({ space: new TestStateSpace() })
    storage.generateSamples(3)
    const before = recordBytes(storage.getStates())

    await storage.store(file)
    storage.clear()
    await storage.load(file)

    expect(recordBytes(storage.getStates())).toEqual(before)
  })

  it("refuses an archive written for a different space", async () => {
    const file = path.join(dir, "states.bin")
    const written = createStateStorage({ space: new TestStateSpace({ signature: [1, 7] }) })
    written.generateSamples(2)
    await written.store(file)

    const space = new TestStateSpace({ signature: [2, 7, 3] })
    const result = await createStateStorage({ space }).tryLoad(file)

    expect(!result.success && result.error.code).toBe("signature_mismatch")
    expect(space.allocations).toBe(0)
  })

  it("round-trips real vectors and samples from them", async () => {
    const file = path.join(dir, "vectors.bin")
    const bounds = { low: [0, 0, 0], high: [1, 2, 4] }
    const written = createStateStorage({
      space: new RealVectorStateSpace({
        dimension: 3,
        bounds,
        random: sequenceRandom([0.5, 0.25, 0.75, 0.25, 0.125, 0.5]),
      }),
    })
    written.generateSamples(2)
    await written.store(file)

    const space = new RealVectorStateSpace({ dimension: 3, bounds })
    const restored = createStateStorage({ space, random: sequenceRandom([0.9, 0.1]) })
    await restored.load(file)
    const sampler = restored.getStateSamplerAllocator()(space)
    const second = space.allocRecord()
    const first = space.allocRecord()
    sampler.sampleUniform(second)
    sampler.sampleUniform(first)

    expect(restored.getStates().map((state) => Array.from(state.values))).toEqual([
      [0.5, 0.5, 3],
      [0.25, 0.25, 2],
    ])
    expect(Array.from(second.values)).toEqual([0.25, 0.25, 2])
    expect(Array.from(first.values)).toEqual([0.5, 0.5, 3])
  })
})
