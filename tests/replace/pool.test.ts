import { describe, test, expect } from "vitest"
import { mapWithConcurrency } from "../../tools/lib/replace/pool"

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1))

describe("mapWithConcurrency", () => {
  test("keeps input order", async () => {
    const result = await mapWithConcurrency([30, 10, 20], 3, async (n) => {
      await new Promise((resolve) => setTimeout(resolve, n))
      return n * 2
    })
    expect(result).toEqual([60, 20, 40])
  })

  test("never runs more than the limit at once", async () => {
    let active = 0
    let peak = 0
    await mapWithConcurrency(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      active++
      peak = Math.max(peak, active)
      await tick()
      active--
    })
    expect(peak).toBe(3)
  })

  test("handles an empty list", async () => {
    expect(await mapWithConcurrency([], 4, async (n: number) => n)).toEqual([])
  })

  test("rejects with the first failure", async () => {
    await expect(
      mapWithConcurrency([1, 2, 3], 2, async (n) => {
        if (n === 2) throw new Error("boom")
        return n
      })
    ).rejects.toThrow("boom")
  })
})
