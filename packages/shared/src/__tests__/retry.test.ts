import { describe, expect, it, vi } from "vitest"
import { resolveRetryConfig, retryAsync } from "../retry.js"

const noWait = () => Promise.resolve()

describe("retry utilities", () => {
  describe("resolveRetryConfig", () => {
    it("should return defaults when no overrides", () => {
      expect(resolveRetryConfig()).toEqual({
        attempts: 2,
        minDelayMs: 1000,
        maxDelayMs: 30_000,
      })
    })

    it("should clamp attempts to minimum 1", () => {
      expect(resolveRetryConfig({ attempts: 0 }).attempts).toBe(1)
    })

    it("should ensure maxDelayMs >= minDelayMs", () => {
      const config = resolveRetryConfig({ minDelayMs: 1000, maxDelayMs: 500 })
      expect(config.maxDelayMs).toBe(1000)
    })

    it("should ignore non-finite overrides", () => {
      expect(resolveRetryConfig({ minDelayMs: Number.NaN }).minDelayMs).toBe(1000)
    })
  })

  describe("retryAsync", () => {
    it("should succeed on first attempt", async () => {
      const fn = vi.fn().mockResolvedValue("success")
      await expect(retryAsync(fn, { sleep: noWait })).resolves.toBe("success")
      expect(fn).toHaveBeenCalledTimes(1)
    })

    it("should retry once by default and succeed", async () => {
      const fn = vi.fn().mockRejectedValueOnce(new Error("fail 1")).mockResolvedValue("success")
      await expect(retryAsync(fn, { sleep: noWait })).resolves.toBe("success")
      expect(fn).toHaveBeenCalledTimes(2)
    })

    it("should throw the last error after all attempts", async () => {
      const fn = vi.fn().mockRejectedValueOnce(new Error("fail 1")).mockRejectedValueOnce(new Error("fail 2"))
      await expect(retryAsync(fn, { sleep: noWait })).rejects.toThrow("fail 2")
      expect(fn).toHaveBeenCalledTimes(2)
    })

    it("should double the delay between attempts", async () => {
      const fn = vi.fn().mockRejectedValue(new Error("always fails"))
      const delays: number[] = []

      await expect(
        retryAsync(fn, {
          attempts: 4,
          minDelayMs: 100,
          maxDelayMs: 250,
          sleep: ms => {
            delays.push(ms)
            return Promise.resolve()
          },
        }),
      ).rejects.toThrow("always fails")

      expect(delays).toEqual([100, 200, 250])
    })

    it("should call onRetry with attempt info", async () => {
      const fn = vi.fn().mockRejectedValueOnce(new Error("fail")).mockResolvedValue("ok")
      const onRetry = vi.fn()

      await retryAsync(fn, { attempts: 3, minDelayMs: 5, onRetry, label: "reload", sleep: noWait })

      expect(onRetry).toHaveBeenCalledTimes(1)
      expect(onRetry).toHaveBeenCalledWith(
        expect.objectContaining({ attempt: 1, maxAttempts: 3, delayMs: 5, label: "reload" }),
      )
    })

    it("should respect shouldRetry predicate", async () => {
      const fn = vi.fn().mockRejectedValue(new Error("non-retryable"))
      const shouldRetry = vi.fn().mockReturnValue(false)

      await expect(retryAsync(fn, { attempts: 5, shouldRetry, sleep: noWait })).rejects.toThrow("non-retryable")

      expect(fn).toHaveBeenCalledTimes(1)
      expect(shouldRetry).toHaveBeenCalledWith(expect.any(Error), 1)
    })
  })
})
