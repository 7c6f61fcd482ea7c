import { ExecSession } from "../../engine/session.js";
import type { ContainerService } from "../../engine/types.js";
import { settle, type ResourceKind } from "../../types.js";
import { execBindings, keys, matches } from "../keys.js";
import { banner, type KeyPress, type PanelEvent } from "../messages.js";
import { batch, send, type Cmd } from "../program.js";
import { TextInput } from "../widgets/text-input.js";
import { Viewport } from "../widgets/viewport.js";
import { BasePanel } from "./panel.js";

/**
 * Interactive shell in a running container. Takes the keyboard while open:
 * Enter sends the line, Up/Down browse history, Esc asks to be closed.
 */
export class ExecPanel extends BasePanel {
  readonly kind = "exec";
  override readonly ownsKeyboard = true;
  private readonly viewport = new Viewport();
  private readonly input = new TextInput("$ ");
  private session: ExecSession | null = null;
  private output = "";
  private history: string[] = [];
  /** history.length means "not browsing". */
  private historyIndex = 0;

  constructor(
    owner: ResourceKind,
    private readonly service: ContainerService,
  ) {
    super(owner);
  }

  get inputValue(): string {
    return this.input.value;
  }

  init(containerId: string): Cmd | null {
    this.history = [];
    this.historyIndex = 0;
    this.output = "";
    return batch(
      send({ type: "contextual-bindings", bindings: execBindings }),
      this.task(async () => ({
        kind: "session-started",
        result: await settle(() => this.service.exec(containerId, this.signal)),
      })),
    );
  }

  update(event: PanelEvent): Cmd | null {
    switch (event.kind) {
      case "session-started": {
        const result = event.result;
        if (!result.ok) return this.fail(result.error.message);
        if (!(result.value instanceof ExecSession)) {
          result.value.close();
          return this.fail("session has no input");
        }
        if (this.closed) {
          result.value.close();
          return null;
        }
        this.session = result.value;
        return this.readCmd(this.session);
      }
      case "session-output":
        if (!this.session) return null;
        if (!event.result.ok) return this.fail(event.result.error.message);
        this.output += event.result.value;
        this.viewport.setContent(this.output);
        this.viewport.gotoBottom();
        return this.readCmd(this.session);
      case "write-done":
        if (event.result.ok || !this.session) return null;
        this.release();
        return batch(send(banner("Exec write failed", true)), this.closeRequest());
      case "key":
        return this.handleKey(event.key);
      case "scroll":
        this.viewport.scrollBy(event.delta);
        return null;
      default:
        return null;
    }
  }

  view(): string {
    return `${this.viewport.view()}\n${this.input.view()}`;
  }

  protected override resize(): void {
    this.viewport.setSize(this.width, Math.max(0, this.height - 1));
  }

  protected override release(): void {
    this.session?.close();
    this.session = null;
    this.output = "";
    this.history = [];
    this.historyIndex = 0;
    this.input.reset();
    this.viewport.setContent("");
  }

  private handleKey(key: KeyPress): Cmd | null {
    if (matches(key, keys.esc)) {
      return batch(this.closeRequest(), send(banner("Exec session closed")));
    }
    if (matches(key, keys.enter)) return this.submit();
    if (matches(key, keys.historyPrev)) {
      this.browseBack();
      return null;
    }
    if (matches(key, keys.historyNext)) {
      this.browseForward();
      return null;
    }
    this.input.handleKey(key);
    return null;
  }

  private submit(): Cmd | null {
    const session = this.session;
    if (!session) return null;
    const line = this.input.value;
    if (line === "") return null;
    if (line.trim() === "clear") {
      this.input.reset();
      this.output = "";
      this.viewport.setContent("");
      return null;
    }
    this.history.push(line);
    this.historyIndex = this.history.length;
    this.input.reset();
    return this.task(async () => ({ kind: "write-done", result: await settle(() => session.write(`${line}\n`)) }));
  }

  private browseBack(): void {
    if (this.history.length === 0) return;
    if (this.historyIndex > 0) this.historyIndex--;
    else if (this.historyIndex === this.history.length) this.historyIndex = this.history.length - 1;
    else return;
    this.input.value = this.history[this.historyIndex];
  }

  private browseForward(): void {
    if (this.history.length === 0 || this.historyIndex === this.history.length) return;
    this.historyIndex++;
    this.input.value = this.historyIndex === this.history.length ? "" : this.history[this.historyIndex];
  }

  private fail(message: string): Cmd | null {
    this.release();
    return batch(send(banner(`Exec session error. Err: ${message}`, true)), this.closeRequest());
  }
}
