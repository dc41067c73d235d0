import { describe, it, expect } from "vitest";
import { deriveWeekendGroupId } from "../../src/services/business/weekendGroup.js";

const chicago = { timeZone: "America/Chicago", vigilStartHour: 15 };

describe("deriveWeekendGroupId", () => {
  it("groups Sunday Masses by their own date", () => {
    // 9:00 CDT
    expect(deriveWeekendGroupId("2026-10-18T14:00:00Z", chicago)).toBe("2026-10-18");
  });

  it("counts the Saturday vigil toward Sunday", () => {
    // Saturday 17:00 CDT
    expect(deriveWeekendGroupId("2026-10-17T22:00:00Z", chicago)).toBe("2026-10-18");
  });

  it("keeps Saturday morning services on Saturday", () => {
    // Saturday 08:00 CDT
    expect(deriveWeekendGroupId("2026-10-17T13:00:00Z", chicago)).toBe("2026-10-17");
  });

  it("uses the local date, not the UTC date", () => {
    // Sunday 20:00 CDT is already Monday in UTC
    expect(deriveWeekendGroupId(new Date("2026-10-19T01:00:00Z"), chicago)).toBe("2026-10-18");
  });

  it("rolls the vigil over a month boundary", () => {
    // Saturday 2026-10-31 16:00 CDT
    expect(deriveWeekendGroupId("2026-10-31T21:00:00Z", chicago)).toBe("2026-11-01");
  });

  it("rejects invalid timestamps", () => {
    expect(() => deriveWeekendGroupId("not a date", chicago)).toThrow("Invalid service timestamp");
  });
});
