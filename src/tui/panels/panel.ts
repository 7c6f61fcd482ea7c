import type { StreamSession } from "../../engine/session.js";
import { settle, type ResourceKind } from "../../types.js";
import type { Msg, PanelEvent } from "../messages.js";
import type { Cmd } from "../program.js";

export type PanelKind = "details" | "file-tree" | "logs" | "stats" | "exec" | "layers";

let lastPanelId = 0;

export function nextPanelId(): number {
  lastPanelId += 1;
  return lastPanelId;
}

/**
 * Shared plumbing for side panels. Every instance gets a fresh id; events it
 * schedules come back addressed to that id, so anything arriving after the
 * panel was replaced can be recognised as stale by the owning list.
 */
export abstract class BasePanel {
  readonly id = nextPanelId();
  abstract readonly kind: PanelKind;
  /** When true the owning list forwards every key here. */
  readonly ownsKeyboard: boolean = false;

  protected width = 0;
  protected height = 0;
  private readonly controller = new AbortController();

  constructor(protected readonly owner: ResourceKind) {}

  abstract init(resourceId: string): Cmd | null;
  abstract update(event: PanelEvent): Cmd | null;
  abstract view(): string;

  setSize(width: number, height: number): void {
    this.width = Math.max(0, width);
    this.height = Math.max(0, height);
    this.resize();
  }

  /** Aborts in-flight engine calls, then releases whatever the panel holds. */
  close(): void {
    if (this.controller.signal.aborted) return;
    this.controller.abort();
    this.release();
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  protected get signal(): AbortSignal {
    return this.controller.signal;
  }

  protected resize(): void {}

  protected release(): void {}

  /** Schedule async work whose event is delivered back to this panel. */
  protected task(run: () => Promise<PanelEvent>): Cmd {
    const { owner, id } = this;
    return async (): Promise<Msg> => ({ type: "panel", owner, panelId: id, event: await run() });
  }

  /** One pull from the session; the panel re-arms it after each chunk. */
  protected readCmd(session: StreamSession): Cmd {
    return this.task(async () => ({ kind: "session-output", result: await settle(() => session.read()) }));
  }

  /** Ask the owning list to close this panel through its arbiter. */
  protected closeRequest(): Cmd {
    return this.task(async () => ({ kind: "close-request" }));
  }
}

/** Release what a stale event carries: a session opened for a panel that is gone. */
export function discardStale(event: PanelEvent): void {
  if (event.kind === "session-started" && event.result.ok) event.result.value.close();
}
