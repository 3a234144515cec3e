import { BaseError, isAppError } from "../base-error"

class MissingSectionError extends BaseError<"missing_section"> {
  constructor(section: string) {
    super(`Configuration section "${section}" is missing`, {
      code: "missing_section",
      context: { section },
    })
  }
}

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("creates error with required fields", () => {
      const err = new BaseError("Value could not be converted", { code: "coercion_failed" })

      expect(err.message).toBe("Value could not be converted")
      expect(err.code).toBe("coercion_failed")
    })

    it("applies defaults", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.context).toEqual({})
      expect(err.isRetryable).toBe(false)
      expect(err.isOperational).toBe(true)
      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("accepts context, cause and flags", () => {
      const cause = new Error("root cause")
      const err = new BaseError("wrapped", {
        code: "load_failed",
        context: { source: "json:app.json" },
        cause,
        isRetryable: true,
        isOperational: false,
      })

      expect(err.context).toEqual({ source: "json:app.json" })
      expect(err.cause).toBe(cause)
      expect(err.isRetryable).toBe(true)
      expect(err.isOperational).toBe(false)
    })

    it("freezes context", () => {
      const err = new BaseError("test", { code: "test", context: { key: "Retry:Timeout" } })

      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("does not share the caller's context object", () => {
      const context = { key: "Retry:Timeout" }
      const err = new BaseError("test", { code: "test", context })

      context.key = "changed"

      expect(err.context).toEqual({ key: "Retry:Timeout" })
    })
  })

  describe("subclasses", () => {
    it("take the subclass name", () => {
      const err = new MissingSectionError("Retry")

      expect(err.name).toBe("MissingSectionError")
      expect(err).toBeInstanceOf(BaseError)
      expect(err).toBeInstanceOf(Error)
      expect(err.stack).toContain("MissingSectionError")
    })

    it("keep the narrowed code type", () => {
      const code: "missing_section" = new MissingSectionError("Retry").code

      expect(code).toBe("missing_section")
    })
  })

  describe("toJSON", () => {
    it("returns the serialized error", () => {
      const err = new MissingSectionError("Retry")

      expect(err.toJSON()).toEqual({
        name: "MissingSectionError",
        code: "missing_section",
        message: 'Configuration section "Retry" is missing',
        context: { section: "Retry" },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })

    it("is used by JSON.stringify", () => {
      const parsed = JSON.parse(JSON.stringify({ err: new MissingSectionError("Retry") }))

      expect(parsed.err.code).toBe("missing_section")
    })
  })
})

describe("isAppError", () => {
  it("accepts BaseError instances", () => {
    expect(isAppError(new BaseError("x", { code: "x" }))).toBe(true)
  })

  it("accepts structurally compatible errors", () => {
    const foreign = Object.assign(new Error("foreign"), {
      code: "foreign",
      context: {},
      isRetryable: false,
      isOperational: true,
      timestamp: new Date(),
    })

    expect(isAppError(foreign)).toBe(true)
  })

  it("rejects plain errors and non-objects", () => {
    expect(isAppError(new Error("plain"))).toBe(false)
    expect(isAppError("coercion_failed")).toBe(false)
    expect(isAppError(null)).toBe(false)
  })
})
