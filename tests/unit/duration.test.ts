import { describe, expect, it } from "vitest";
import { parseDurationMs } from "../../src/core/duration.js";

describe("parseDurationMs", () => {
  it.each([
    ["30s", 30_000],
    ["1m30s", 90_000],
    ["1.5h", 5_400_000],
    ["250ms", 250],
    ["2h45m", 9_900_000],
    ["1500us", 1.5],
    ["0", 0],
    [" 5s ", 5000],
    ["-1s", -1000],
  ])("parses %s", (input, expected) => {
    expect(parseDurationMs(input)).toBe(expected);
  });

  it.each(["", "   ", "5", "abc", "1h1", "s", "1d", "--1s"])("rejects %j", (input) => {
    expect(parseDurationMs(input)).toBeNull();
  });
});
