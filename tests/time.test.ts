import { describe, expect, test } from "vitest";

import { InvalidDateFilterError, InvalidTimezoneError } from "../src/errors.js";
import {
  assertTimeZone,
  formatClock,
  formatDateStamp,
  formatIsoInZone,
  formatShortDate,
  parseDateBound,
  parseTimestamp,
} from "../src/threads/time.js";

const INSTANT = new Date("2018-10-10T20:19:24Z");

describe("parseTimestamp", () => {
  test("reads the archive format", () => {
    expect(parseTimestamp("Wed Oct 10 20:19:24 +0000 2018")?.toISOString()).toBe("2018-10-10T20:19:24.000Z");
  });

  test("applies the archive offset", () => {
    expect(parseTimestamp("Wed Oct 10 22:19:24 +0200 2018")?.toISOString()).toBe("2018-10-10T20:19:24.000Z");
  });

  test("reads ISO-8601", () => {
    expect(parseTimestamp("2018-10-10T20:19:24.250Z")?.toISOString()).toBe("2018-10-10T20:19:24.250Z");
  });

  test("returns null for other text", () => {
    expect(parseTimestamp("Someday")).toBeNull();
  });
});

describe("parseDateBound", () => {
  test("reads dates and times without an offset as UTC", () => {
    expect(parseDateBound("2020-01-01").toISOString()).toBe("2020-01-01T00:00:00.000Z");
    expect(parseDateBound("2020-01-01 12:30").toISOString()).toBe("2020-01-01T12:30:00.000Z");
  });

  test("honors an explicit offset", () => {
    expect(parseDateBound("2020-01-01T12:30:00+02:00").toISOString()).toBe("2020-01-01T10:30:00.000Z");
  });

  test("rejects malformed and impossible dates", () => {
    expect(() => parseDateBound("yesterday")).toThrow(InvalidDateFilterError);
    expect(() => parseDateBound("2020-02-31")).toThrow(InvalidDateFilterError);
  });
});

describe("assertTimeZone", () => {
  test("accepts IANA names", () => {
    expect(assertTimeZone("Europe/Madrid")).toBe("Europe/Madrid");
  });

  test("rejects unknown zones", () => {
    expect(() => assertTimeZone("Mars/Olympus_Mons")).toThrow(InvalidTimezoneError);
  });
});

describe("zone formatting", () => {
  test("prints ISO-8601 with the zone offset", () => {
    expect(formatIsoInZone(INSTANT, "UTC")).toBe("2018-10-10T20:19:24+00:00");
    expect(formatIsoInZone(INSTANT, "America/New_York")).toBe("2018-10-10T16:19:24-04:00");
    expect(formatIsoInZone(INSTANT, "Asia/Kolkata")).toBe("2018-10-11T01:49:24+05:30");
  });

  test("keeps milliseconds when present", () => {
    expect(formatIsoInZone(new Date("2018-10-10T20:19:24.005Z"), "UTC")).toBe("2018-10-10T20:19:24.005+00:00");
  });

  test("prints date stamps, short dates and clock times in the zone", () => {
    expect(formatDateStamp(INSTANT, "Asia/Tokyo")).toBe("20181011");
    expect(formatShortDate(INSTANT, "UTC")).toBe("2018-Oct-10");
    expect(formatClock(INSTANT, "UTC")).toBe("20:19");
  });
});
