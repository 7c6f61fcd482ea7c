import type { Image } from "../../engine/types.js";
import type { ResourceKind } from "../../types.js";
import { formatBytes, shortId, truncateCommand } from "../format.js";
import type { PanelEvent } from "../messages.js";
import type { Cmd } from "../program.js";
import { Viewport } from "../widgets/viewport.js";
import { BasePanel } from "./panel.js";

const LAYER_COMMAND_WIDTH = 50;

export function renderLayers(image: Image): string {
  const lines = [`Layers for ${image.repo}:${image.tag}`, "═══════════════════════", ""];
  if (image.layers.length === 0) {
    lines.push("No layer information available");
    return lines.join("\n");
  }
  image.layers.forEach((layer, i) => {
    lines.push(`${String(i + 1).padStart(2)}. ${truncateCommand(layer.command, LAYER_COMMAND_WIDTH)}`);
    lines.push(`    Size: ${formatBytes(layer.size).padEnd(10)}  ID: ${shortId(layer.id)}`);
    lines.push("");
  });
  return lines.join("\n");
}

/** Layer history of an image already held by the list; nothing to fetch. */
export class LayersPanel extends BasePanel {
  readonly kind = "layers";
  private readonly viewport = new Viewport();

  constructor(
    owner: ResourceKind,
    private readonly resolve: (id: string) => Image | undefined,
  ) {
    super(owner);
  }

  init(imageId: string): Cmd | null {
    const image = this.resolve(imageId);
    this.viewport.setContent(image ? renderLayers(image) : "No image selected");
    return null;
  }

  update(event: PanelEvent): Cmd | null {
    if (event.kind === "scroll") this.viewport.scrollBy(event.delta);
    return null;
  }

  view(): string {
    return this.viewport.view();
  }

  protected override resize(): void {
    this.viewport.setSize(this.width, this.height);
  }
}
