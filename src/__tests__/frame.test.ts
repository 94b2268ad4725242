import { describe, expect, it } from "vitest";
import {
  changeFrame,
  createFrame,
  extractIssueKeys,
  frameDuration,
  frameFromRecord,
  frameToRecord,
} from "../frame";
import { InvalidTimeError } from "../errors";
import { isLocalId } from "../entityKey";
import { developer, development, HOUR, NOON } from "./helpers";

describe("frame", () => {
  it("extracts unique issue keys in order", () => {
    expect(extractIssueKeys("Fix ABC-12 and ABC-12, see XY-7")).toEqual([
      "ABC-12",
      "XY-7",
    ]);
    expect(extractIssueKeys("no keys here, a-1 or A-1")).toEqual([]);
  });

  it("refuses a stop before the start", () => {
    expect(() =>
      createFrame(
        {
          startTime: NOON,
          stopTime: NOON - 1,
          activity: development,
          assignment: { kind: "individual" },
        },
        NOON
      )
    ).toThrow(InvalidTimeError);
  });

  it("keeps the uuid and refreshes issue keys on change", () => {
    const frame = createFrame(
      {
        startTime: NOON - HOUR,
        stopTime: NOON,
        activity: development,
        description: "ABC-1",
        assignment: { kind: "role", role: developer },
      },
      NOON
    );
    const changed = changeFrame(frame, { description: "DEF-2 pairing" }, NOON + 5);
    expect(changed.uuid).toBe(frame.uuid);
    expect(changed.issueKeys).toEqual(["DEF-2"]);
    expect(changed.updatedAt).toBe(NOON + 5);
    expect(changed.stopTime).toBe(NOON);
  });

  it("measures a running frame up to now", () => {
    const frame = createFrame(
      { startTime: NOON - 90, activity: development, assignment: { kind: "individual" } },
      NOON
    );
    expect(frame.stopTime).toBeNull();
    expect(isLocalId(frame.uuid)).toBe(true);
    expect(frameDuration(frame, NOON)).toBe(90);
  });

  it("converts to and from the stored record", () => {
    const frame = createFrame(
      {
        startTime: NOON - HOUR,
        stopTime: NOON,
        activity: development,
        description: "ABC-1 review",
        assignment: { kind: "role", role: developer },
      },
      NOON
    );
    const record = frameToRecord(frame);
    expect(record.isIndividual).toBe(false);
    expect(record.role?.id).toBe(7);
    expect(record.issues).toEqual(["ABC-1"]);
    expect(frameFromRecord(record)).toEqual(frame);
  });

  it("drops records without a role or the individual flag", () => {
    const frame = createFrame(
      {
        startTime: NOON - HOUR,
        stopTime: NOON,
        activity: development,
        assignment: { kind: "individual" },
      },
      NOON
    );
    const record = { ...frameToRecord(frame), isIndividual: false, role: null };
    expect(frameFromRecord(record)).toBeNull();
  });
});
