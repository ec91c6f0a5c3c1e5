import { BaseError } from "../base-error"
import { serializeError } from "../serialize-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("AppError instances", () => {
    it("serializes all fields", () => {
      const err = new BaseError("Conflicting shapes", {
        code: "config_merge_conflict",
        context: { path: "db", source: "env" },
        isOperational: false,
      })

      expect(serializeError(err)).toEqual({
        name: "BaseError",
        code: "config_merge_conflict",
        message: "Conflicting shapes",
        context: { path: "db", source: "env" },
        isOperational: false,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("includes the stack only when requested", () => {
      const err = new BaseError("test", { code: "test" })

      expect("stack" in serializeError(err)).toBe(false)
      expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
    })

    it("omits an empty stack", () => {
      const err = new BaseError("test", { code: "test" })
      err.stack = ""

      expect("stack" in serializeError(err, { includeStack: true })).toBe(false)
    })

    it("serializes the cause chain", () => {
      const root = new Error("ENOENT")
      const outer = new BaseError("Missing config.json", {
        code: "config_source_failed",
        cause: root,
      })

      const serialized = serializeError(outer)

      expect(serialized.cause?.code).toBe("unknown")
      expect(serialized.cause?.message).toBe("ENOENT")
      expect(serialized.cause?.isOperational).toBe(false)
    })
  })

  describe("standard Error instances", () => {
    it("uses code unknown and keeps the subclass name", () => {
      const serialized = serializeError(new TypeError("not a function"))

      expect(serialized.name).toBe("TypeError")
      expect(serialized.code).toBe("unknown")
      expect(serialized.isOperational).toBe(false)
    })
  })

  describe("non-Error values", () => {
    it("wraps a string as the message", () => {
      const serialized = serializeError("bad flag")

      expect(serialized.name).toBe("NonErrorThrown")
      expect(serialized.message).toBe("bad flag")
    })

    it("keeps other values under context.value", () => {
      const serialized = serializeError({ exitCode: 2 })

      expect(serialized.message).toBe("Unknown error")
      expect(serialized.context).toEqual({ value: { exitCode: 2 } })
    })
  })
})
