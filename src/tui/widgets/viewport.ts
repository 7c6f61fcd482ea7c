import { fitBlock } from "../layout.js";

/** A scrollable window over multi-line text. */
export class Viewport {
  private lines: string[] = [];
  private yOffset = 0;
  private width = 0;
  private height = 0;

  setSize(width: number, height: number): void {
    this.width = Math.max(0, width);
    this.height = Math.max(0, height);
    this.clamp();
  }

  setContent(content: string): void {
    this.lines = content === "" ? [] : content.split("\n");
    this.clamp();
  }

  get atBottom(): boolean {
    return this.yOffset >= this.maxOffset();
  }

  scrollBy(delta: number): void {
    this.yOffset += delta;
    this.clamp();
  }

  gotoBottom(): void {
    this.yOffset = this.maxOffset();
  }

  view(): string {
    const window = this.lines.slice(this.yOffset, this.yOffset + this.height).join("\n");
    return fitBlock(window, this.width, this.height).join("\n");
  }

  private maxOffset(): number {
    return Math.max(0, this.lines.length - this.height);
  }

  private clamp(): void {
    this.yOffset = Math.min(Math.max(0, this.yOffset), this.maxOffset());
  }
}
