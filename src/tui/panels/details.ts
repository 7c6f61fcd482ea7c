import type { ContainerService, Container } from "../../engine/types.js";
import { settle, type ResourceKind } from "../../types.js";
import { formatDate, shortId } from "../format.js";
import { banner, type PanelEvent } from "../messages.js";
import { batch, send, type Cmd } from "../program.js";
import { stateIcon, stateStyle, style } from "../theme.js";
import { Viewport } from "../widgets/viewport.js";
import { BasePanel } from "./panel.js";

export function renderContainerDetails(c: Container): string {
  const lines = [
    `Container: ${c.name}`,
    "═══════════════════════",
    "",
    `ID:      ${shortId(c.id)}`,
    `Image:   ${c.image}`,
    `Status:  ${c.status}`,
    `State:   ${stateStyle(c.state)(`${stateIcon(c.state)} ${c.state}`)}`,
    `Created: ${formatDate(c.created)}`,
    "",
  ];
  if (c.ports.length > 0) {
    lines.push("Ports:");
    for (const p of c.ports) lines.push(`  ${p.hostPort}:${p.containerPort}/${p.protocol}`);
    lines.push("");
  }
  if (c.mounts.length > 0) {
    lines.push("Mounts:");
    for (const m of c.mounts) lines.push(`  [${m.type}] ${m.source} -> ${m.destination}`);
    lines.push("");
  }
  return lines.join("\n");
}

/** Labelled block describing one container, fetched fresh on open. */
export class DetailsPanel extends BasePanel {
  readonly kind = "details";
  private readonly viewport = new Viewport();
  private loaded = false;

  constructor(
    owner: ResourceKind,
    private readonly service: ContainerService,
  ) {
    super(owner);
  }

  init(containerId: string): Cmd {
    return this.task(async () => ({
      kind: "details-loaded",
      result: await settle(() => this.service.get(containerId, this.signal)),
    }));
  }

  update(event: PanelEvent): Cmd | null {
    switch (event.kind) {
      case "details-loaded":
        if (!event.result.ok) {
          return batch(
            send(banner(`error getting container details: ${event.result.error.message}`, true)),
            this.closeRequest(),
          );
        }
        this.loaded = true;
        this.viewport.setContent(renderContainerDetails(event.result.value));
        return null;
      case "scroll":
        this.viewport.scrollBy(event.delta);
        return null;
      default:
        return null;
    }
  }

  view(): string {
    return this.loaded ? this.viewport.view() : style.muted("Loading...");
  }

  protected override resize(): void {
    this.viewport.setSize(this.width, this.height);
  }
}
