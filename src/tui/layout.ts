/**
 * Width-aware string layout. Styled strings carry ANSI escapes that take
 * bytes but no columns, so every measure goes through string-width and every
 * cut through cli-truncate.
 */

import cliTruncate from "cli-truncate";
import stringWidth from "string-width";
import { style } from "./theme.js";

export function visibleWidth(s: string): number {
  return stringWidth(s);
}

export function lineCount(s: string): number {
  return s === "" ? 0 : s.split("\n").length;
}

export function truncate(s: string, width: number, ellipsis = ""): string {
  if (width <= 0) return "";
  if (stringWidth(s) <= width) return s;
  return cliTruncate(s, width, { truncationCharacter: ellipsis });
}

/** Truncate or right-pad a single line to exactly width columns. */
export function fit(s: string, width: number): string {
  const cut = truncate(s, width);
  return cut + " ".repeat(Math.max(0, width - stringWidth(cut)));
}

/** Exactly height lines, each exactly width columns. */
export function fitBlock(content: string, width: number, height: number): string[] {
  const lines = content === "" ? [] : content.split("\n");
  const out: string[] = [];
  for (let i = 0; i < height; i++) out.push(fit(lines[i] ?? "", width));
  return out;
}

export function joinHorizontal(blocks: Array<{ lines: string[]; width: number }>): string {
  const height = Math.max(0, ...blocks.map((b) => b.lines.length));
  const out: string[] = [];
  for (let i = 0; i < height; i++) {
    out.push(blocks.map((b) => fit(b.lines[i] ?? "", b.width)).join(""));
  }
  return out.join("\n");
}

export function joinVertical(...parts: string[]): string {
  return parts.filter((p) => p !== "").join("\n");
}

export interface BoxOptions {
  title?: string;
  active?: boolean;
}

/** Rounded border around content; the result is width × height including the border. */
export function box(content: string, width: number, height: number, opts: BoxOptions = {}): string[] {
  if (width < 2 || height < 2) return fitBlock(content, Math.max(0, width), Math.max(0, height));
  const paint = opts.active ? style.activeBorder : style.border;
  const inner = width - 2;

  const title = opts.title ? truncate(` ${opts.title} `, inner) : "";
  const top = paint("╭") + (title ? style.title(title) : "") + paint(`${"─".repeat(inner - stringWidth(title))}╮`);
  const body = fitBlock(content, inner, height - 2).map((line) => paint("│") + line + paint("│"));
  const bottom = paint(`╰${"─".repeat(inner)}╯`);
  return [top, ...body, bottom];
}

/**
 * Place overlay at the right edge of the line lastLineIdx lines from the
 * bottom, truncating that line when there is no room.
 */
export function overlayBottomRight(lastLineIdx: number, content: string, overlay: string, width: number): string {
  const lines = content.split("\n");
  if (lines.length < lastLineIdx) return content;

  const target = lines.length - lastLineIdx;
  const line = lines[target];
  const overlayWidth = stringWidth(overlay);
  const padding = width - stringWidth(line) - overlayWidth;

  if (padding > 0) {
    lines[target] = line + " ".repeat(padding) + overlay;
  } else if (width - overlayWidth > 0) {
    lines[target] = truncate(line, width - overlayWidth) + overlay;
  } else {
    lines[target] = truncate(overlay, width);
  }
  return lines.join("\n");
}
