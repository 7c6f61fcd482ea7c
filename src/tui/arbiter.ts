import type { Panel, PanelKind } from "./panels/index.js";

/**
 * Holds the single side panel of a list. Opening a panel always closes the
 * previous one first, so at most one session is alive per list.
 */
export class PanelArbiter {
  private current: Panel | null = null;

  get active(): Panel | null {
    return this.current;
  }

  /**
   * Close the active panel when it is of this kind; otherwise close whatever
   * is open and open a new one. Returns the opened panel, or null when the
   * call closed one.
   */
  toggle(kind: PanelKind, open: () => Panel): Panel | null {
    const previous = this.close();
    if (previous?.kind === kind) return null;
    this.current = open();
    return this.current;
  }

  /** Close the active panel, if any, and return it. */
  close(): Panel | null {
    const previous = this.current;
    this.current = null;
    previous?.close();
    return previous;
  }

  isActive(panelId: number): boolean {
    return this.current?.id === panelId;
  }
}
