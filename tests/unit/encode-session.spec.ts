/**
 * Unit Tests for lib/escpos/codepages/EncodeSession.ts
 *
 * Tests switch emission, fallback substitution, pinned mode and input checks
 * against an in-memory sink.
 */

import CodePage from "../../lib/escpos/codepages/CodePage"
import CodePageProfile from "../../lib/escpos/codepages/CodePageProfile"
import EncodeSession from "../../lib/escpos/codepages/EncodeSession"
import Encoder from "../../lib/escpos/codepages/Encoder"
import {
  ConfigurationError,
  InvalidInputTypeError,
  UnencodableFallbackError,
  UnsupportedEncodingError,
} from "../../lib/escpos/codepages/errors"
import BufferSink from "../../lib/escpos/codepages/sinks"
import {
  SWITCH_TO_CP437,
  SWITCH_TO_CP852,
  makeLatinProfile,
  makePage,
} from "./helpers/pages"

function bytesOf(sink: BufferSink): number[] {
  return Array.from(sink.toBytes())
}

describe("lib/escpos/codepages/EncodeSession", () => {
  let sink: BufferSink
  let profile: CodePageProfile

  beforeEach(() => {
    sink = new BufferSink()
    profile = makeLatinProfile()
  })

  describe("construction", () => {
    it("should start with no active page and emit nothing", () => {
      const session = new EncodeSession(sink, profile)
      expect(session.encoding).toBeUndefined()
      expect(session.pinned).toBe(false)
      expect(sink.length).toBe(0)
    })

    it("should adopt a known initial encoding without emitting", () => {
      const session = new EncodeSession(sink, profile, { encoding: "CP852" })
      expect(session.encoding).toBe("cp852")
      expect(sink.length).toBe(0)
    })

    it("should reject an initial encoding the profile does not offer", () => {
      expect(() => new EncodeSession(sink, profile, { encoding: "cp866" })).toThrow(
        UnsupportedEncodingError,
      )
    })

    it("should throw ConfigurationError when pinned without an encoding", () => {
      expect(() => new EncodeSession(sink, profile, { pinned: true })).toThrow(
        ConfigurationError,
      )
      expect(sink.length).toBe(0)
    })

    it("should reject an empty fallback symbol", () => {
      expect(() => new EncodeSession(sink, profile, { fallbackSymbol: "" })).toThrow(
        ConfigurationError,
      )
    })

    it("should reject an encoder built for another profile", () => {
      const encoder = new Encoder(makeLatinProfile())
      expect(() => new EncodeSession(sink, profile, { encoder })).toThrow(ConfigurationError)
    })

    it("should default the fallback symbol from the environment", () => {
      expect(new EncodeSession(sink, profile).fallbackSymbol).toBe("?")
    })
  })

  describe("write (automatic switching)", () => {
    it("should switch once and then stay on the page that worked", () => {
      const session = new EncodeSession(sink, profile)

      session.write("é")
      expect(bytesOf(sink)).toEqual([...SWITCH_TO_CP852, 0x82])

      sink.clear()
      session.write("à")
      expect(bytesOf(sink)).toEqual([0x85])
      expect(session.encoding).toBe("cp852")
    })

    it("should pick the lowest selector for the first character", () => {
      const session = new EncodeSession(sink, profile)
      session.write("ab")
      expect(bytesOf(sink)).toEqual([...SWITCH_TO_CP437, 0x61, 0x62])
    })

    it("should write the switch command before the first byte of its run", () => {
      const session = new EncodeSession(sink, profile)
      session.write("aé")
      expect(sink.chunks.map((chunk) => Array.from(chunk))).toEqual([
        SWITCH_TO_CP437,
        [0x61],
        SWITCH_TO_CP852,
        [0x82],
      ])
    })

    it("should write the fallback symbol in the current page without switching", () => {
      const session = new EncodeSession(sink, profile, { encoding: "cp437" })
      session.write("€")
      expect(bytesOf(sink)).toEqual([0x3f])
      expect(session.encoding).toBe("cp437")
    })

    it("should search for a page for the fallback symbol too", () => {
      const session = new EncodeSession(sink, profile, { fallbackSymbol: "à" })
      session.write("€")
      expect(bytesOf(sink)).toEqual([...SWITCH_TO_CP852, 0x85])
    })

    it("should fail when the fallback symbol fits no page either", () => {
      const session = new EncodeSession(sink, profile, { fallbackSymbol: "¤" })
      expect(() => session.write("a€b")).toThrow(UnencodableFallbackError)
      expect(bytesOf(sink)).toEqual([...SWITCH_TO_CP437, 0x61])
    })

    it("should emit at most one switch for a single-page profile", () => {
      const single = new CodePageProfile([makePage("cp437", 0)])
      const session = new EncodeSession(sink, single)
      session.write("ab€A")
      expect(bytesOf(sink)).toEqual([...SWITCH_TO_CP437, 0x61, 0x62, 0x3f, 0x41])
    })

    it("should reject raw bytes", () => {
      const session = new EncodeSession(sink, profile)
      const raw: unknown = Uint8Array.of(0x61)
      let caught: unknown
      try {
        session.write(raw as string)
      } catch (err) {
        caught = err
      }
      expect(caught).toBeInstanceOf(InvalidInputTypeError)
      if (caught instanceof InvalidInputTypeError) {
        expect(caught.receivedType).toBe("Uint8Array")
      }
      expect(sink.length).toBe(0)
    })

    it("should share usage memory through an injected encoder", () => {
      const encoder = new Encoder(profile)
      new EncodeSession(new BufferSink(), profile, { encoder }).write("é")

      const session = new EncodeSession(sink, profile, { encoder })
      session.write("a")
      expect(bytesOf(sink)).toEqual([...SWITCH_TO_CP852, 0x61])
    })
  })

  describe("writeWithEncoding", () => {
    it("should emit nothing when the page is already active and there is no text", () => {
      const session = new EncodeSession(sink, profile, { encoding: "cp437" })
      session.writeWithEncoding("cp437")
      expect(sink.length).toBe(0)
    })

    it("should use the page's replacement byte, not the fallback symbol", () => {
      const session = new EncodeSession(sink, profile, { fallbackSymbol: "b" })
      session.writeWithEncoding("cp437", "aé")
      expect(bytesOf(sink)).toEqual([...SWITCH_TO_CP437, 0x61, 0x3f])
    })

    it("should reject pages outside the profile before writing", () => {
      const session = new EncodeSession(sink, profile)
      expect(() => session.writeWithEncoding("cp866", "a")).toThrow(UnsupportedEncodingError)
      expect(sink.length).toBe(0)
    })
  })

  describe("pinned mode", () => {
    it("should encode everything in the fixed page", () => {
      const session = new EncodeSession(sink, profile, {
        encoding: "cp437",
        pinned: true,
        fallbackSymbol: "b",
      })
      session.write("aéb")
      expect(sink.chunks.map((chunk) => Array.from(chunk))).toEqual([[0x61, 0x3f, 0x62]])
    })

    it("should emit the switch immediately when pinning", () => {
      const session = new EncodeSession(sink, profile)
      session.pin("CP852")
      expect(bytesOf(sink)).toEqual(SWITCH_TO_CP852)
      expect(session.pinned).toBe(true)
      expect(session.encoding).toBe("cp852")
    })

    it("should emit nothing when pinning the active page", () => {
      const session = new EncodeSession(sink, profile, { encoding: "cp852" })
      session.pin("cp852")
      expect(sink.length).toBe(0)
      expect(session.pinned).toBe(true)
    })

    it("should resume automatic switching from the pinned page", () => {
      const session = new EncodeSession(sink, profile)
      session.pin("cp852")
      session.pin(null)
      expect(session.pinned).toBe(false)
      expect(session.encoding).toBe("cp852")

      sink.clear()
      session.write("a")
      expect(bytesOf(sink)).toEqual([0x61])
    })

    it("should reject pinning an unsupported page", () => {
      const session = new EncodeSession(sink, profile)
      expect(() => session.pin("cp866")).toThrow(UnsupportedEncodingError)
      expect(session.pinned).toBe(false)
    })
  })

  describe("with registry pages", () => {
    it("should skip a page the registry cannot build", () => {
      const mixed = new CodePageProfile([new CodePage("tcvn3", 0), new CodePage("cp437", 1)])
      const session = new EncodeSession(sink, mixed)
      session.write("a")
      expect(bytesOf(sink)).toEqual([0x1b, 0x74, 1, 0x61])
    })

    it("should switch between latin and cyrillic pages", () => {
      const session = new EncodeSession(sink, CodePageProfile.fromTable({ cp437: 0, cp866: 17 }))
      session.write("AЖ")
      expect(bytesOf(sink)).toEqual([0x1b, 0x74, 0, 0x41, 0x1b, 0x74, 17, 0x86])
    })
  })
})
