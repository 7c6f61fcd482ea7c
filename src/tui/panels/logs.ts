import { EndOfStreamError } from "../../core/errors.js";
import type { StreamSession } from "../../engine/session.js";
import type { ContainerService } from "../../engine/types.js";
import { settle, type ResourceKind } from "../../types.js";
import { banner, type PanelEvent } from "../messages.js";
import { send, type Cmd } from "../program.js";
import { Viewport } from "../widgets/viewport.js";
import { BasePanel } from "./panel.js";

/**
 * Follows a container's log stream. Output is appended chunk by chunk and
 * the view sticks to the bottom unless the user scrolled up. End of stream
 * just stops reading; the collected output stays on screen.
 */
export class LogsPanel extends BasePanel {
  readonly kind = "logs";
  private readonly viewport = new Viewport();
  private session: StreamSession | null = null;
  private output = "";

  constructor(
    owner: ResourceKind,
    private readonly service: ContainerService,
  ) {
    super(owner);
  }

  init(containerId: string): Cmd {
    return this.task(async () => ({
      kind: "session-started",
      result: await settle(() =>
        this.service.logs(containerId, { follow: true, tail: "all", timestamps: false }, this.signal),
      ),
    }));
  }

  update(event: PanelEvent): Cmd | null {
    switch (event.kind) {
      case "session-started":
        if (!event.result.ok) return send(banner(`Logs session error. Err: ${event.result.error.message}`, true));
        if (this.closed) {
          event.result.value.close();
          return null;
        }
        this.session = event.result.value;
        return this.readCmd(this.session);
      case "session-output": {
        if (!this.session) return null;
        if (!event.result.ok) {
          this.dropSession();
          if (event.result.error instanceof EndOfStreamError) return null;
          return send(banner(`Logs session error. Err: ${event.result.error.message}`, true));
        }
        const follow = this.viewport.atBottom;
        this.output += event.result.value;
        this.viewport.setContent(this.output);
        if (follow) this.viewport.gotoBottom();
        return this.readCmd(this.session);
      }
      case "scroll":
        this.viewport.scrollBy(event.delta);
        return null;
      default:
        return null;
    }
  }

  view(): string {
    return this.viewport.view();
  }

  protected override resize(): void {
    this.viewport.setSize(this.width, this.height);
  }

  protected override release(): void {
    this.dropSession();
    this.output = "";
  }

  private dropSession(): void {
    this.session?.close();
    this.session = null;
  }
}
