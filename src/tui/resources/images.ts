import type { ContainerService, Image, ImageService } from "../../engine/types.js";
import { settle, type Result } from "../../types.js";
import { formatBytes, shortId } from "../format.js";
import { keys, matches } from "../keys.js";
import { banner, type KeyPress, type Msg, type ResourceAction } from "../messages.js";
import { LayersPanel } from "../panels/index.js";
import { batch, send, type Cmd } from "../program.js";
import { icons, stateStyle } from "../theme.js";
import type { ListItem } from "../widgets/list.js";
import { ResourceView } from "./resource-view.js";

export function describeImage(image: Image): ListItem {
  const marker = stateStyle(image.containers > 0 ? "running" : "stopped")(icons.dot);
  return {
    title: `${image.repo}:${image.tag}`,
    description: `${marker} ${formatBytes(image.size)}`,
    filterValue: `${image.repo}:${image.tag}`,
  };
}

export class ImagesView extends ResourceView<Image> {
  readonly kind = "images";
  readonly title = "Images";

  constructor(
    private readonly service: ImageService,
    private readonly containers: ContainerService,
  ) {
    super(describeImage);
  }

  protected load(initial: boolean): Cmd {
    return async (): Promise<Msg> => ({
      type: "images-loaded",
      owner: "images",
      initial,
      result: await settle(() => this.service.list()),
    });
  }

  protected handle(msg: Msg): Cmd | null {
    switch (msg.type) {
      case "images-loaded":
        return this.applyLoaded(msg.initial, msg.result);
      case "resource-action":
        return this.actionDone(msg.action, msg.id, msg.index, msg.result);
      default:
        return null;
    }
  }

  protected handleBinding(key: KeyPress): Cmd | null {
    const image = this.selected();
    if (!image) return null;

    if (matches(key, keys.imageLayers)) {
      return this.togglePanel("layers", image.id, () => new LayersPanel(this.kind, (id) => this.items.find((i) => i.id === id)));
    }
    if (matches(key, keys.delete)) {
      return this.action("deleting", image, () => this.service.remove(image.id, false));
    }
    if (matches(key, keys.createAndRun)) {
      return batch(this.startLoading(), this.action("running", image, () => this.containers.run(image)));
    }
    return null;
  }

  private action(action: ResourceAction, image: Image, run: () => Promise<string | void>): Cmd {
    const index = this.list.selectedIndex();
    return async (): Promise<Msg> => ({
      type: "resource-action",
      owner: "images",
      action,
      id: image.id,
      index,
      result: await settle(run),
    });
  }

  private actionDone(action: ResourceAction, id: string, index: number, result: Result<string | void>): Cmd | null {
    if (action === "running") {
      this.loading = false;
      if (!result.ok) return send(banner(result.error.message, true));
      const created = typeof result.value === "string" ? result.value : "";
      return batch(
        send(banner(`Container ${shortId(created)} created`)),
        send({ type: "bubble-up", key: { name: "r", text: "r" }, onlyActive: false }),
      );
    }

    if (!result.ok) return send(banner(`Error deleting image: ${result.error.message}`, true));
    let followUp: Cmd | null = null;
    if (this.items[index]?.id === id) {
      followUp = this.closePanel();
      this.list.removeItem(index);
    }
    return batch(followUp, send(banner(`Image ${shortId(id)} deleted`)));
  }
}
