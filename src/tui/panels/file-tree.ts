import { renderFileTree } from "../../engine/filetree.js";
import type { FileTree } from "../../engine/types.js";
import { settle, type ResourceKind } from "../../types.js";
import { banner, type PanelEvent } from "../messages.js";
import { batch, send, type Cmd } from "../program.js";
import { style } from "../theme.js";
import { Viewport } from "../widgets/viewport.js";
import { BasePanel } from "./panel.js";

export type FileTreeLoader = (id: string, signal: AbortSignal) => Promise<FileTree>;

/** Scrollable tree of a container's or volume's files. */
export class FileTreePanel extends BasePanel {
  readonly kind = "file-tree";
  private readonly viewport = new Viewport();
  private loaded = false;

  constructor(
    owner: ResourceKind,
    private readonly load: FileTreeLoader,
    private readonly errorPrefix: string,
  ) {
    super(owner);
  }

  init(id: string): Cmd {
    return this.task(async () => ({
      kind: "file-tree-loaded",
      result: await settle(() => this.load(id, this.signal)),
    }));
  }

  update(event: PanelEvent): Cmd | null {
    switch (event.kind) {
      case "file-tree-loaded":
        if (!event.result.ok) {
          return batch(send(banner(`${this.errorPrefix}: ${event.result.error.message}`, true)), this.closeRequest());
        }
        this.loaded = true;
        this.viewport.setContent(renderFileTree(event.result.value));
        return null;
      case "scroll":
        this.viewport.scrollBy(event.delta);
        return null;
      default:
        return null;
    }
  }

  view(): string {
    return this.loaded ? this.viewport.view() : style.muted("Loading files...");
  }

  protected override resize(): void {
    this.viewport.setSize(this.width, this.height);
  }
}
