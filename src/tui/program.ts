/**
 * A small Elm-style runtime: messages go through the model's update(), which
 * may return commands; each command is an async task resolving at most one
 * message that is fed back in. view() is re-rendered after every update.
 */

import { errorMessage } from "../core/errors.js";
import { logger } from "../logger.js";
import type { Msg } from "./messages.js";

export type Task = () => Promise<Msg | null>;
export type Cmd = Task | readonly Cmd[];

export interface Model {
  init(): Cmd | null;
  update(msg: Msg): Cmd | null;
  view(): string;
}

/** Combine commands; nulls are dropped. */
export function batch(...cmds: Array<Cmd | null | undefined>): Cmd | null {
  const present = cmds.filter((c): c is Cmd => c != null);
  if (present.length === 0) return null;
  if (present.length === 1) return present[0];
  return present;
}

/** Resolve a message immediately. */
export function send(msg: Msg): Cmd {
  return async () => msg;
}

/** Resolve a message after ms. The timer alone does not keep the process alive. */
export function tick(ms: number, msg: () => Msg): Cmd {
  return () =>
    new Promise<Msg | null>((resolve) => {
      setTimeout(() => resolve(msg()), ms).unref();
    });
}

export interface ProgramOptions {
  onRender?: (view: string) => void;
  onQuit?: () => void;
}

export class Program {
  private running = false;
  private quitting = false;
  private readonly done: Promise<void>;
  private resolveDone: () => void = () => {};

  constructor(
    private readonly model: Model,
    private readonly options: ProgramOptions = {},
  ) {
    this.done = new Promise<void>((resolve) => {
      this.resolveDone = resolve;
    });
  }

  /** Start the loop. The returned promise settles when a quit message is handled. */
  start(): Promise<void> {
    if (!this.running) {
      this.running = true;
      this.run(this.model.init());
      this.render();
    }
    return this.done;
  }

  dispatch(msg: Msg): void {
    if (this.quitting) return;
    if (msg.type === "quit") {
      this.quitting = true;
      this.options.onQuit?.();
      this.resolveDone();
      return;
    }
    const cmd = this.model.update(msg);
    this.render();
    this.run(cmd);
  }

  view(): string {
    return this.model.view();
  }

  private render(): void {
    this.options.onRender?.(this.model.view());
  }

  private run(cmd: Cmd | null): void {
    if (!cmd || this.quitting) return;
    if (typeof cmd !== "function") {
      for (const c of cmd) this.run(c);
      return;
    }
    cmd().then(
      (msg) => {
        if (msg) this.dispatch(msg);
      },
      (err: unknown) => {
        logger.error(`[ui] Command failed: ${errorMessage(err)}`);
        this.dispatch({ type: "banner", text: errorMessage(err), isError: true });
      },
    );
  }
}
