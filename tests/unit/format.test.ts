import { describe, expect, it } from "vitest";
import { formatBytes, formatDate, formatPercent, shortId, truncateCommand } from "../../src/tui/format.js";

describe("shortId", () => {
  it("strips the digest prefix and keeps 12 characters", () => {
    expect(shortId("sha256:0123456789abcdef0123")).toBe("0123456789ab");
    expect(shortId("abc123def456789")).toBe("abc123def456");
  });

  it("leaves short ids alone", () => {
    expect(shortId("abc")).toBe("abc");
    expect(shortId("")).toBe("");
  });
});

describe("formatBytes", () => {
  it.each([
    [0, "0 B"],
    [1023, "1023 B"],
    [1024, "1.0 KiB"],
    [1536, "1.5 KiB"],
    [1024 * 1024 - 1, "1024.0 KiB"],
    [1024 * 1024, "1.0 MiB"],
    [142 * 1024 * 1024, "142.0 MiB"],
    [1024 ** 3, "1.0 GiB"],
    [1024 ** 4, "1.0 TiB"],
    [1024 ** 5, "1.0 PiB"],
    [1024 ** 6, "1.0 EiB"],
  ])("formats %d as %s", (bytes, expected) => {
    expect(formatBytes(bytes)).toBe(expected);
  });
});

describe("truncateCommand", () => {
  it("drops the shell and nop wrappers", () => {
    expect(truncateCommand("/bin/sh -c #(nop)  EXPOSE 80")).toBe("EXPOSE 80");
    expect(truncateCommand("/bin/sh -c apk add curl")).toBe("apk add curl");
  });

  it("cuts long commands with an ellipsis", () => {
    expect(truncateCommand("a".repeat(20), 10)).toBe("aaaaaaa...");
  });
});

describe("formatDate", () => {
  it("renders local time", () => {
    expect(formatDate(new Date(2024, 0, 15, 9, 5, 7))).toBe("2024-01-15 09:05:07");
  });

  it("uses a dash for missing dates", () => {
    expect(formatDate(null)).toBe("-");
    expect(formatDate(new Date(Number.NaN))).toBe("-");
  });
});

describe("formatPercent", () => {
  it("keeps two decimals", () => {
    expect(formatPercent(4)).toBe("4.00%");
    expect(formatPercent(6.25)).toBe("6.25%");
  });
});
