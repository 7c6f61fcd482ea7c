import type { Container, ContainerService } from "../../engine/types.js";
import { settle, type Result } from "../../types.js";
import { shortId } from "../format.js";
import { keys, matches } from "../keys.js";
import { banner, type KeyPress, type Msg, type ResourceAction } from "../messages.js";
import { DetailsPanel, ExecPanel, FileTreePanel, LogsPanel, StatsPanel, type Panel, type PanelKind } from "../panels/index.js";
import { batch, send, type Cmd } from "../program.js";
import { icons, stateStyle } from "../theme.js";
import type { ListItem } from "../widgets/list.js";
import { ResourceView } from "./resource-view.js";

export function describeContainer(c: Container): ListItem {
  return {
    title: c.name,
    description: `${stateStyle(c.state)(`${icons.dot} ${c.state}`)} ${c.image} ${shortId(c.id)}`,
    filterValue: c.name,
  };
}

export class ContainersView extends ResourceView<Container> {
  readonly kind = "containers";
  readonly title = "Containers";

  constructor(private readonly service: ContainerService) {
    super(describeContainer);
  }

  protected load(initial: boolean): Cmd {
    return async (): Promise<Msg> => ({
      type: "containers-loaded",
      owner: "containers",
      initial,
      result: await settle(() => this.service.list()),
    });
  }

  protected handle(msg: Msg): Cmd | null {
    switch (msg.type) {
      case "containers-loaded":
        return this.applyLoaded(msg.initial, msg.result);
      case "resource-action":
        return this.actionDone(msg.action, msg.id, msg.index, msg.result);
      default:
        return null;
    }
  }

  protected handleBinding(key: KeyPress): Cmd | null {
    const container = this.selected();
    if (!container) return null;

    if (matches(key, keys.containerInfo)) {
      return this.togglePanel("details", container.id, () => new DetailsPanel(this.kind, this.service));
    }
    if (matches(key, keys.fileTree)) {
      return this.togglePanel(
        "file-tree",
        container.id,
        () => new FileTreePanel(this.kind, (id, signal) => this.service.fileTree(id, signal), "error getting the file tree"),
      );
    }
    if (matches(key, keys.containerLogs)) {
      return this.toggleRunningPanel("logs", container, () => new LogsPanel(this.kind, this.service));
    }
    if (matches(key, keys.containerStats)) {
      return this.toggleRunningPanel("stats", container, () => new StatsPanel(this.kind, this.service));
    }
    if (matches(key, keys.containerExec)) {
      return this.toggleRunningPanel("exec", container, () => new ExecPanel(this.kind, this.service));
    }
    if (matches(key, keys.containerStartStop)) {
      return container.state === "running"
        ? this.action("stopping", container, () => this.service.stop(container.id))
        : this.action("starting", container, () => this.service.start(container.id));
    }
    if (matches(key, keys.containerRestart)) {
      return this.action("restarting", container, () => this.service.restart(container.id));
    }
    if (matches(key, keys.containerDelete)) {
      return this.action("deleting", container, () => this.service.remove(container.id, true));
    }
    return null;
  }

  /** Panels that need a live container: the state is checked before anything opens. */
  private toggleRunningPanel(kind: PanelKind, container: Container, open: () => Panel): Cmd | null {
    if (this.activePanel?.kind === kind) return this.closePanel();
    if (container.state !== "running") return send(banner("Container is not running", true));
    return this.togglePanel(kind, container.id, open);
  }

  private action(action: ResourceAction, container: Container, run: () => Promise<void>): Cmd {
    const index = this.list.selectedIndex();
    return async (): Promise<Msg> => ({
      type: "resource-action",
      owner: "containers",
      action,
      id: container.id,
      index,
      result: await settle(run),
    });
  }

  private actionDone(action: ResourceAction, id: string, index: number, result: Result<string | void>): Cmd | null {
    if (!result.ok) return send(banner(`Error ${action} container: ${result.error.message}`, true));

    let followUp: Cmd | null = null;
    if (action === "deleting") {
      if (this.items[index]?.id === id) {
        followUp = this.closePanel();
        this.list.removeItem(index);
      }
    } else {
      followUp = this.refresh();
    }
    return batch(followUp, send(banner(`Container ${shortId(id)} ${action}`)));
  }
}
