import { describe, expect, it } from "vitest"
import {
  HighlightAttrMap,
  STYLE_BOLD,
  STYLE_ITALIC,
  STYLE_REVERSE,
  STYLE_UNDERLINE,
  rgbFromInt,
  rgbToInt,
} from "../highlightAttrMap.js"

const WHITE = { r: 255, g: 255, b: 255 }
const BLACK = { r: 0, g: 0, b: 0 }

describe("HighlightAttrMap", () => {
  it("starts with white on black and no style", () => {
    const map = new HighlightAttrMap()
    expect(map.resolve(null)).toEqual({ foreground: WHITE, background: BLACK, style: 0 })
    expect(map.resolve(undefined)).toEqual(map.defaults)
  })

  it("merges a definition over the default colours field by field", () => {
    const map = new HighlightAttrMap()
    map.define(5, { bold: true })
    map.setDefaultColors(0x112233, -1, -1)
    expect(map.resolve(5)).toEqual({
      foreground: { r: 0x11, g: 0x22, b: 0x33 },
      background: BLACK,
      style: STYLE_BOLD,
    })
  })

  it("lets a definition's own colours win over the defaults", () => {
    const map = new HighlightAttrMap()
    map.setDefaultColors(0x101010, 0x202020, null)
    map.define(2, { foreground: 0xff0000, reverse: true, underline: true })
    expect(map.resolve(2)).toEqual({
      foreground: { r: 255, g: 0, b: 0 },
      background: { r: 0x20, g: 0x20, b: 0x20 },
      style: STYLE_REVERSE | STYLE_UNDERLINE,
    })
  })

  it("marks itself dirty on change and clean after resolving", () => {
    const map = new HighlightAttrMap()
    map.define(1, { italic: true })
    expect(map.isDirty).toBe(true)
    const first = map.resolve(1)
    expect(map.isDirty).toBe(false)
    expect(map.resolve(1)).toBe(first)
  })

  it("never serves a stale entry after a redefinition", () => {
    const map = new HighlightAttrMap()
    map.define(7, { bold: true })
    expect(map.resolve(7).style).toBe(STYLE_BOLD)
    map.define(7, { italic: true, background: 0x0000ff })
    expect(map.resolve(7)).toEqual({ foreground: WHITE, background: { r: 0, g: 0, b: 255 }, style: STYLE_ITALIC })
  })

  it("resolves unknown ids to the defaults", () => {
    const map = new HighlightAttrMap()
    map.setDefaultColors(0x00ff00, null, null)
    expect(map.resolve(99)).toEqual({ foreground: { r: 0, g: 255, b: 0 }, background: BLACK, style: 0 })
  })

  it("unsets a default colour given a negative value", () => {
    const map = new HighlightAttrMap()
    map.setDefaultColors(0x123456, 0x654321, null)
    map.setDefaultColors(-1, -1, -1)
    expect(map.defaults).toEqual({ foreground: WHITE, background: BLACK, style: 0 })
  })

  it("rejects ids that are not non-negative integers", () => {
    const map = new HighlightAttrMap()
    expect(() => map.define(-1, {})).toThrow(RangeError)
    expect(() => map.define(1.5, {})).toThrow(RangeError)
    expect(map.isDirty).toBe(false)
  })
})

describe("rgb helpers", () => {
  it("splits and joins packed colours", () => {
    expect(rgbFromInt(0xa1b2c3)).toEqual({ r: 0xa1, g: 0xb2, b: 0xc3 })
    expect(rgbToInt({ r: 0xa1, g: 0xb2, b: 0xc3 })).toBe(0xa1b2c3)
  })
})
