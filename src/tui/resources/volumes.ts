import type { Volume, VolumeService } from "../../engine/types.js";
import { settle, type Result } from "../../types.js";
import { formatBytes } from "../format.js";
import { keys, matches } from "../keys.js";
import { banner, type KeyPress, type Msg } from "../messages.js";
import { FileTreePanel } from "../panels/index.js";
import { batch, send, type Cmd } from "../program.js";
import { icons, stateStyle } from "../theme.js";
import type { ListItem } from "../widgets/list.js";
import { ResourceView } from "./resource-view.js";

export function describeVolume(v: Volume): ListItem {
  const usage = v.usedCount > 0 ? stateStyle("running")(`${icons.dot} in use`) : "unused";
  return {
    title: v.name,
    description: `${v.driver} ${formatBytes(v.size)} ${usage}`,
    filterValue: v.name,
  };
}

export class VolumesView extends ResourceView<Volume> {
  readonly kind = "volumes";
  readonly title = "Volumes";

  constructor(private readonly service: VolumeService) {
    super(describeVolume);
  }

  protected load(initial: boolean): Cmd {
    return async (): Promise<Msg> => ({
      type: "volumes-loaded",
      owner: "volumes",
      initial,
      result: await settle(() => this.service.list()),
    });
  }

  protected handle(msg: Msg): Cmd | null {
    switch (msg.type) {
      case "volumes-loaded":
        return this.applyLoaded(msg.initial, msg.result);
      case "resource-action":
        return this.removed(msg.id, msg.index, msg.result);
      default:
        return null;
    }
  }

  protected handleBinding(key: KeyPress): Cmd | null {
    const volume = this.selected();
    if (!volume) return null;

    if (matches(key, keys.fileTree)) {
      return this.togglePanel(
        "file-tree",
        volume.name,
        () =>
          new FileTreePanel(this.kind, (name, signal) => this.service.fileTree(name, signal), "error getting volume file tree"),
      );
    }
    if (matches(key, keys.delete)) {
      const index = this.list.selectedIndex();
      return async (): Promise<Msg> => ({
        type: "resource-action",
        owner: "volumes",
        action: "deleting",
        id: volume.name,
        index,
        result: await settle(() => this.service.remove(volume.name, false)),
      });
    }
    return null;
  }

  private removed(name: string, index: number, result: Result<string | void>): Cmd | null {
    if (!result.ok) return send(banner(`Error deleting volume: ${result.error.message}`, true));
    let followUp: Cmd | null = null;
    if (this.items[index]?.name === name) {
      followUp = this.closePanel();
      this.list.removeItem(index);
    }
    return batch(followUp, send(banner(`Volume ${name} deleted`)));
  }
}
