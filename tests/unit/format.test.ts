import { describe, expect, it } from "vitest";
import { formatBytes, formatEta, formatPercentage, formatSpeed } from "../../src/utils/format.js";

describe("format helpers", () => {
  it("formats byte counts with binary units", () => {
    expect(formatBytes(512)).toBe("512B");
    expect(formatBytes(1536)).toBe("1.50KiB");
    expect(formatBytes(1048576)).toBe("1.00MiB");
    expect(formatBytes(3 * 1024 ** 3)).toBe("3.00GiB");
  });

  it("formats speed per second", () => {
    expect(formatSpeed(2621440)).toBe("2.50MiB/s");
  });

  it("formats eta as mm:ss below an hour and h:mm:ss above", () => {
    expect(formatEta(0)).toBe("00:00");
    expect(formatEta(75)).toBe("01:15");
    expect(formatEta(3725)).toBe("1:02:05");
  });

  it("formats percentages with one decimal", () => {
    expect(formatPercentage(42)).toBe("42.0%");
    expect(formatPercentage(33.333)).toBe("33.3%");
  });
});
