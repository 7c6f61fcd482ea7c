import { style } from "../theme.js";

const BLOCKS = ["▁", "▂", "▃", "▄", "▅", "▆", "▇", "█"];
const MARKER = "•";

/**
 * Rolling chart of the last `width` samples. The first series draws as bars,
 * an optional second one as markers over them.
 */
export class StreamChart {
  private primary: number[] = [];
  private secondary: number[] = [];
  private width = 10;
  private height = 3;

  constructor(
    readonly label: string,
    private readonly twoSeries = false,
  ) {}

  setSize(width: number, height: number): void {
    this.width = Math.max(1, width);
    this.height = Math.max(1, height);
    this.primary = this.primary.slice(-this.width);
    this.secondary = this.secondary.slice(-this.width);
  }

  push(value: number, second = 0): void {
    this.primary.push(value);
    if (this.twoSeries) this.secondary.push(second);
    if (this.primary.length > this.width) this.primary.shift();
    if (this.secondary.length > this.width) this.secondary.shift();
  }

  get samples(): number {
    return this.primary.length;
  }

  view(): string {
    const max = Math.max(1e-9, ...this.primary, ...this.secondary);
    const rows: string[] = [];
    for (let r = 0; r < this.height; r++) {
      const fromBottom = this.height - 1 - r;
      let row = "";
      for (let c = 0; c < this.width; c++) {
        const second = this.secondary[c];
        if (second !== undefined && second > 0 && this.levelRow(second, max) === fromBottom) {
          row += style.chartAlt(MARKER);
          continue;
        }
        const value = this.primary[c];
        if (value === undefined) {
          row += " ";
          continue;
        }
        const eighths = Math.round((value / max) * this.height * 8);
        const fill = Math.min(8, Math.max(0, eighths - fromBottom * 8));
        row += fill === 0 ? " " : style.chart(BLOCKS[fill - 1]);
      }
      rows.push(row);
    }
    return rows.join("\n");
  }

  private levelRow(value: number, max: number): number {
    return Math.min(this.height - 1, Math.floor((value / max) * this.height * 0.999));
  }
}
