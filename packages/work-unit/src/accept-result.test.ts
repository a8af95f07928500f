import { describe, expect, it } from "vitest"
import { normalizeAcceptResult } from "./accept-result.js"

describe("normalizeAcceptResult", () => {
  it("keeps a well-formed result", () => {
    const result = normalizeAcceptResult({
      accepted: true,
      visible: false,
      enabled: true,
      checked: false,
      extraInfo: { reason: "matched *.exr" },
    })

    expect(result).toEqual({
      accepted: true,
      visible: false,
      enabled: true,
      checked: false,
      extraInfo: { reason: "matched *.exr" },
    })
  })

  it("omits flags the strategy left out", () => {
    const result = normalizeAcceptResult({ accepted: true })

    expect(result).toStrictEqual({ accepted: true })
  })

  it("treats a missing accepted flag as a rejection", () => {
    expect(normalizeAcceptResult({ visible: true })).toStrictEqual({
      accepted: false,
      visible: true,
    })
  })

  it("reads accepted by truthiness", () => {
    expect(normalizeAcceptResult({ accepted: 1 }).accepted).toBe(true)
    expect(normalizeAcceptResult({ accepted: "yes" }).accepted).toBe(true)
    expect(normalizeAcceptResult({ accepted: 0 }).accepted).toBe(false)
    expect(normalizeAcceptResult({ accepted: "" }).accepted).toBe(false)
    expect(normalizeAcceptResult({ accepted: null }).accepted).toBe(false)
  })

  it("rejects values that are not objects", () => {
    expect(normalizeAcceptResult(undefined)).toStrictEqual({ accepted: false })
    expect(normalizeAcceptResult(null)).toStrictEqual({ accepted: false })
    expect(normalizeAcceptResult("accepted")).toStrictEqual({
      accepted: false,
    })
  })

  it("coerces present flags that are not booleans", () => {
    const result = normalizeAcceptResult({
      accepted: true,
      visible: null,
      enabled: "no",
      checked: 0,
    })

    expect(result).toStrictEqual({
      accepted: true,
      visible: false,
      enabled: true,
      checked: false,
    })
  })

  it("passes extraInfo through untouched", () => {
    const extraInfo = ["frame 1001 missing"]
    const result = normalizeAcceptResult({ accepted: false, extraInfo })

    expect(result.extraInfo).toBe(extraInfo)
  })
})
