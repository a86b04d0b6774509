import { describe, it, expect } from "vitest";
import { formatTimeAgo } from "./timeAgo";

describe("formatTimeAgo", () => {
  it("shows nothing before the clock has ticked", () => {
    expect(formatTimeAgo(0, 1_000)).toBe("");
  });

  it("uses the largest whole unit", () => {
    const now = 1_700_000_000_000;
    expect(formatTimeAgo(now, now - 1_000)).toBe("1 second ago");
    expect(formatTimeAgo(now, now - 45_000)).toBe("45 seconds ago");
    expect(formatTimeAgo(now, now - 90_000)).toBe("1 minute ago");
    expect(formatTimeAgo(now, now - 7_200_000)).toBe("2 hours ago");
    expect(formatTimeAgo(now, now - 3 * 86_400_000)).toBe("3 days ago");
  });

  it("says just now under a second and for timestamps ahead of the clock", () => {
    const now = 1_700_000_000_000;
    expect(formatTimeAgo(now, now - 999)).toBe("just now");
    expect(formatTimeAgo(now, now + 5_000)).toBe("just now");
  });
});
