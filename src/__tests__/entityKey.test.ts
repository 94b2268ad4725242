import { describe, expect, it } from "vitest";
import {
  formatEntityKey,
  generateLocalId,
  isLocalId,
  keysEqual,
  localKey,
  parseEntityKey,
  remoteKey,
  tryParseEntityKey,
} from "../entityKey";
import { InvalidOperationError } from "../errors";

describe("entity keys", () => {
  it("generates local ids that never look like remote ones", () => {
    for (let i = 0; i < 50; i++) {
      const id = generateLocalId();
      expect(id).toMatch(/^[0-9a-f]{8}$/);
      expect(id).not.toMatch(/^\d+$/);
    }
  });

  it("rejects purely numeric or malformed local ids", () => {
    expect(isLocalId("12345678")).toBe(false);
    expect(isLocalId("abc")).toBe(false);
    expect(isLocalId("ABCDEF12")).toBe(true);
    expect(() => localKey("12345678")).toThrow(InvalidOperationError);
  });

  it("normalizes local ids to lowercase", () => {
    expect(localKey("ABCDEF12")).toEqual({ source: "local", id: "abcdef12" });
  });

  it("accepts only non-negative integer remote ids", () => {
    expect(remoteKey("42")).toEqual({ source: "remote", id: 42 });
    expect(() => remoteKey(-1)).toThrow(InvalidOperationError);
    expect(() => remoteKey("4.2")).toThrow(InvalidOperationError);
  });

  it("compares source and id", () => {
    expect(keysEqual(remoteKey(5), remoteKey(5))).toBe(true);
    expect(keysEqual(remoteKey(5), remoteKey(6))).toBe(false);
    expect(keysEqual(localKey("abcdef12"), localKey("ABCDEF12"))).toBe(true);
  });

  it("formats and parses keys", () => {
    expect(formatEntityKey(remoteKey(17))).toBe("remote:17");
    expect(parseEntityKey("remote:17")).toEqual(remoteKey(17));
    expect(parseEntityKey("local:deadbeef")).toEqual(localKey("deadbeef"));
    expect(parseEntityKey("17")).toEqual(remoteKey(17));
    expect(parseEntityKey("deadbeef")).toEqual(localKey("deadbeef"));
  });

  it("refuses unknown sources", () => {
    expect(() => parseEntityKey("cloud:1")).toThrow("Unknown entity source: cloud");
    expect(tryParseEntityKey("dev")).toBeNull();
  });
});
