import { fit } from "../layout.js";
import type { KeyPress } from "../messages.js";
import { style } from "../theme.js";

export interface ListItem {
  title: string;
  description: string;
  /** Text the filter matches against. */
  filterValue: string;
}

export type FilterOutcome = "editing" | "applied" | "cancelled";

const LINES_PER_ITEM = 3;

/** Selectable list with a substring filter. Items render as title + description. */
export class ListWidget<T> {
  private items: T[] = [];
  private cursor = 0;
  private filterText = "";
  private editing = false;
  private width = 0;
  private height = 0;

  constructor(private readonly describe: (item: T) => ListItem) {}

  setItems(items: T[]): void {
    this.items = [...items];
    this.clampCursor();
  }

  allItems(): readonly T[] {
    return this.items;
  }

  setSize(width: number, height: number): void {
    this.width = width;
    this.height = height;
  }

  /** Indexes into allItems() that pass the filter, in order. */
  visibleIndexes(): number[] {
    const needle = this.filterText.toLowerCase();
    const out: number[] = [];
    this.items.forEach((item, i) => {
      if (!needle || this.describe(item).filterValue.toLowerCase().includes(needle)) out.push(i);
    });
    return out;
  }

  /** Index into allItems() of the selection, or -1. */
  selectedIndex(): number {
    return this.visibleIndexes()[this.cursor] ?? -1;
  }

  selectedItem(): T | undefined {
    const index = this.selectedIndex();
    return index === -1 ? undefined : this.items[index];
  }

  moveUp(): void {
    if (this.cursor > 0) this.cursor--;
  }

  moveDown(): void {
    if (this.cursor < this.visibleIndexes().length - 1) this.cursor++;
  }

  removeItem(index: number): void {
    if (index < 0 || index >= this.items.length) return;
    this.items.splice(index, 1);
    this.clampCursor();
  }

  // ---- filter ----

  get isFiltering(): boolean {
    return this.editing;
  }

  get filter(): string {
    return this.filterText;
  }

  startFilter(): void {
    this.editing = true;
  }

  setFilter(text: string): void {
    this.filterText = text;
    this.cursor = 0;
  }

  /** Feed a key while the filter is being edited. */
  handleFilterKey(key: KeyPress): FilterOutcome {
    switch (key.name) {
      case "esc":
        this.editing = false;
        this.setFilter("");
        return "cancelled";
      case "enter":
        this.editing = false;
        return "applied";
      case "up":
        this.moveUp();
        return "editing";
      case "down":
        this.moveDown();
        return "editing";
      case "backspace":
        this.setFilter([...this.filterText].slice(0, -1).join(""));
        return "editing";
      default:
        if (key.text && !key.name.startsWith("ctrl+")) this.setFilter(this.filterText + key.text);
        return "editing";
    }
  }

  view(): string {
    const visible = this.visibleIndexes();
    const lines: string[] = [];

    if (this.editing) {
      lines.push(`${style.prompt("Filter:")} ${this.filterText}█`);
    } else if (this.filterText) {
      lines.push(style.muted(`"${this.filterText}" ${visible.length} of ${this.items.length} items`));
    } else {
      lines.push(style.muted(`${this.items.length} ${this.items.length === 1 ? "item" : "items"}`));
    }
    lines.push("");

    if (visible.length === 0) {
      lines.push(style.muted("No items."));
      return lines.join("\n");
    }

    const perPage = Math.max(1, Math.floor((this.height - 2) / LINES_PER_ITEM));
    const start = Math.max(0, this.cursor - perPage + 1);
    const textWidth = Math.max(0, this.width - 2);

    for (let row = start; row < Math.min(visible.length, start + perPage); row++) {
      const item = this.describe(this.items[visible[row]]);
      if (row === this.cursor) {
        lines.push(style.selectedMarker("│ ") + style.selected(fit(item.title, textWidth).trimEnd()));
        lines.push(style.selectedMarker("│ ") + fit(item.description, textWidth).trimEnd());
      } else {
        lines.push(`  ${fit(item.title, textWidth).trimEnd()}`);
        lines.push(`  ${style.muted(fit(item.description, textWidth).trimEnd())}`);
      }
      lines.push("");
    }
    return lines.join("\n");
  }

  private clampCursor(): void {
    const count = this.visibleIndexes().length;
    if (this.cursor > count - 1) this.cursor = Math.max(0, count - 1);
  }
}

