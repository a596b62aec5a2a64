import { describe, it, expect } from "vitest";
import { formatDateKey, windowStart } from "../src/digest/dateUtils.js";

describe("windowStart", () => {
  it("should subtract whole days as an absolute instant", () => {
    const now = new Date("2025-11-20T12:00:00Z");
    expect(windowStart(now, 7).toISOString()).toBe("2025-11-13T12:00:00.000Z");
  });

  it("should ignore daylight saving transitions", () => {
    // Europe/London leaves summer time on 2025-10-26
    const now = new Date("2025-10-27T09:30:00Z");
    expect(windowStart(now, 1).toISOString()).toBe("2025-10-26T09:30:00.000Z");
    expect(windowStart(now, 14).toISOString()).toBe("2025-10-13T09:30:00.000Z");
  });
});

describe("formatDateKey", () => {
  it("should format with an ordinal suffix", () => {
    expect(formatDateKey(new Date("2025-11-01T12:00:00Z"), "UTC")).toBe("November 1st 2025");
    expect(formatDateKey(new Date("2025-11-22T12:00:00Z"), "UTC")).toBe("November 22nd 2025");
    expect(formatDateKey(new Date("2025-11-13T12:00:00Z"), "UTC")).toBe("November 13th 2025");
  });

  it("should use the calendar day of the given time zone", () => {
    const lateEvening = new Date("2025-11-20T23:30:00Z");
    expect(formatDateKey(lateEvening, "America/New_York")).toBe("November 20th 2025");
    expect(formatDateKey(lateEvening, "Asia/Tokyo")).toBe("November 21st 2025");
  });
});
