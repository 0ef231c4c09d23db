import { describe, expect, it } from "vitest";
import { PersistError } from "../src/errors.js";
import {
  countSections,
  hasAnySections,
  mergeWithPrevious,
  parseSnapshot,
  serializeSnapshot,
} from "../src/snapshot.js";
import type { Snapshot } from "../src/types.js";
import { course, section } from "./helpers.js";

describe("serializeSnapshot", () => {
  it("writes courses, sections and fields in a stable order", () => {
    const snapshot: Snapshot = {
      CMSC436: course("B", { "0201": section(1, 2, 0, "X"), "0101": section(null, 2, 0, "Y") }),
      CMSC420: course("A", {}, true),
    };
    expect(serializeSnapshot(snapshot)).toBe(
      [
        "{",
        '  "CMSC420": {',
        '    "title": "A",',
        '    "sections": {},',
        '    "fetchError": true',
        "  },",
        '  "CMSC436": {',
        '    "title": "B",',
        '    "sections": {',
        '      "0101": {',
        '        "open": null,',
        '        "total": 2,',
        '        "waitlist": 0,',
        '        "instructor": "Y"',
        "      },",
        '      "0201": {',
        '        "open": 1,',
        '        "total": 2,',
        '        "waitlist": 0,',
        '        "instructor": "X"',
        "      }",
        "    }",
        "  }",
        "}",
        "",
      ].join("\n")
    );
  });

  it("round-trips through parseSnapshot", () => {
    const snapshot: Snapshot = {
      CMSC436: course("Programming Handheld Systems", { "0101": section(0, 5, null, "Alice") }),
      CMSC498A: course("Independent Study", {}, true),
    };
    expect(parseSnapshot(serializeSnapshot(snapshot))).toEqual(snapshot);
  });
});

describe("parseSnapshot", () => {
  it("fills in missing fields and drops unrelated ones", () => {
    const text = JSON.stringify({
      CMSC436: { sections: { "0101": { open: 3, room: "IRB" } }, extra: 1 },
    });
    expect(parseSnapshot(text)).toEqual({
      CMSC436: {
        title: "Unknown Title",
        sections: { "0101": { open: 3, total: null, waitlist: null, instructor: "Unknown" } },
        fetchError: false,
      },
    });
  });

  it("rejects documents that are not snapshots", () => {
    expect(() => parseSnapshot("not json")).toThrow(PersistError);
    expect(() => parseSnapshot('{"CMSC436": {"sections": {"0101": {"open": "3"}}}}')).toThrow(
      /CMSC436\.sections\.0101\.open/
    );
  });
});

describe("mergeWithPrevious", () => {
  const previous: Snapshot = {
    CMSC436: course("Handheld", { "0101": section(1, 5) }),
    CMSC420: course("Data Structures", { "0101": section(2, 5) }),
    CMSC414: course("Security", { "0101": section(3, 5) }),
  };

  it("reuses prior records for errored and missing courses", () => {
    const fetched: Snapshot = {
      CMSC436: course("Handheld", {}, true),
      CMSC420: course("Data Structures", { "0101": section(0, 5) }),
      CMSC451: course("Algorithms", {}, true),
    };
    const { snapshot, staleCourses } = mergeWithPrevious(previous, fetched);
    expect(snapshot).toEqual({
      CMSC436: previous.CMSC436,
      CMSC420: fetched.CMSC420,
      CMSC451: fetched.CMSC451,
      CMSC414: previous.CMSC414,
    });
    expect(staleCourses).toEqual(["CMSC436", "CMSC451", "CMSC414 (missing from fetch)"]);
  });

  it("passes a clean fetch through", () => {
    const { snapshot, staleCourses } = mergeWithPrevious({}, previous);
    expect(snapshot).toEqual(previous);
    expect(staleCourses).toEqual([]);
  });
});

describe("section counts", () => {
  it("counts sections across courses", () => {
    const snapshot: Snapshot = { A: course("A", { "1": section(1, 1), "2": section(1, 1) }), B: course("B", {}) };
    expect(countSections(snapshot)).toBe(2);
    expect(hasAnySections(snapshot)).toBe(true);
    expect(hasAnySections({ B: course("B", {}, true) })).toBe(false);
  });
});
