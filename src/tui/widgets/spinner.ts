const DOT_FRAMES = ["⣾", "⣽", "⣻", "⢿", "⡿", "⣟", "⣯", "⣷"];

export const SPINNER_INTERVAL_MS = 80;

export class Spinner {
  private frame = 0;

  tick(): void {
    this.frame = (this.frame + 1) % DOT_FRAMES.length;
  }

  view(): string {
    return DOT_FRAMES[this.frame];
  }
}
