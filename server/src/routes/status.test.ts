import { describe, it, expect } from "vitest";
import { formatSuccessRate } from "./status.js";

describe("formatSuccessRate", () => {
  it("formats one decimal place", () => {
    expect(formatSuccessRate(3, 2)).toBe("66.7%");
    expect(formatSuccessRate(4, 4)).toBe("100.0%");
  });

  it("reports 0% when nothing was received", () => {
    expect(formatSuccessRate(0, 0)).toBe("0%");
  });
});
