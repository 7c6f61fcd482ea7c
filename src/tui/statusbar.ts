import type { ResourceKind } from "../types.js";
import { fullHelp, shortHelp, type Binding } from "./keys.js";
import { joinHorizontal, truncate, visibleWidth } from "./layout.js";
import { style } from "./theme.js";

const SEPARATOR = " • ";
const COLUMN_GAP = 4;

function entry(b: Binding): string {
  return `${style.helpKey(b.help.key)} ${style.helpDesc(b.help.desc)}`;
}

/**
 * Key help along the bottom. Contextual bindings (exec, filter) replace the
 * short help while they are set; "?" expands to the full column view.
 */
export class StatusBar {
  private full = false;
  private contextual: Binding[] | null = null;
  private width = 0;

  setWidth(width: number): void {
    this.width = width;
  }

  toggleFull(): void {
    this.full = !this.full;
  }

  setContextual(bindings: Binding[]): void {
    this.contextual = bindings;
  }

  clearContextual(): void {
    this.contextual = null;
  }

  view(kind: ResourceKind): string {
    if (this.contextual) return this.line(this.contextual);
    if (!this.full) return this.line(shortHelp(kind));

    const columns = fullHelp(kind).map((column) => {
      const lines = column.map(entry);
      return { lines, width: Math.max(0, ...lines.map(visibleWidth)) + COLUMN_GAP };
    });
    return joinHorizontal(columns);
  }

  private line(bindings: Binding[]): string {
    return truncate(bindings.map(entry).join(style.muted(SEPARATOR)), this.width, "…");
  }
}
