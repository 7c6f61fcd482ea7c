import type { ResourceKind, Result } from "../../types.js";
import { PanelArbiter } from "../arbiter.js";
import { filterBindings, keys, matches } from "../keys.js";
import { box, fitBlock, joinHorizontal, overlayBottomRight } from "../layout.js";
import { banner, type KeyPress, type Msg } from "../messages.js";
import { discardStale, type Panel, type PanelKind } from "../panels/index.js";
import { batch, send, tick, type Cmd } from "../program.js";
import { ListWidget, type ListItem } from "../widgets/list.js";
import { Spinner, SPINNER_INTERVAL_MS } from "../widgets/spinner.js";

const LIST_SPLIT_RATIO = 0.4;

const PANEL_TITLES: Record<PanelKind, string> = {
  details: "Details",
  "file-tree": "Files",
  logs: "Logs",
  stats: "Stats",
  exec: "Exec",
  layers: "Layers",
};

/**
 * A tab listing one kind of resource, with an optional side panel.
 *
 * Keys are layered: a panel that owns the keyboard gets everything, then an
 * active filter, then navigation and the tab's own bindings.
 */
export abstract class ResourceView<T> {
  abstract readonly kind: ResourceKind;
  abstract readonly title: string;

  protected readonly list: ListWidget<T>;
  protected readonly arbiter = new PanelArbiter();
  protected loading = false;
  private readonly spinner = new Spinner();
  private width = 0;
  private height = 0;

  constructor(describe: (item: T) => ListItem) {
    this.list = new ListWidget(describe);
  }

  /** Load the list and show the spinner until it arrives. */
  refresh(): Cmd | null {
    return batch(this.startLoading(), this.load(false));
  }

  /** First load at startup; a failure becomes a "Failed to load data" banner. */
  init(): Cmd | null {
    return this.load(true);
  }

  /** True while keys must bypass the global bindings. */
  capturesKeyboard(): boolean {
    return this.list.isFiltering || this.arbiter.active?.ownsKeyboard === true;
  }

  get activePanel(): Panel | null {
    return this.arbiter.active;
  }

  get items(): readonly T[] {
    return this.list.allItems();
  }

  selected(): T | undefined {
    return this.list.selectedItem();
  }

  update(msg: Msg): Cmd | null {
    switch (msg.type) {
      case "key":
        return this.handleKey(msg.key);
      case "spinner-tick":
        if (!this.loading) return null;
        this.spinner.tick();
        return this.spinnerTick();
      case "panel": {
        const panel = this.arbiter.active;
        if (!panel || !this.arbiter.isActive(msg.panelId)) {
          discardStale(msg.event);
          return null;
        }
        if (msg.event.kind === "close-request") return this.closePanel();
        return panel.update(msg.event);
      }
      default:
        return this.handle(msg);
    }
  }

  setSize(width: number, height: number): void {
    this.width = width;
    this.height = height;
    this.layout();
  }

  view(): string {
    this.layout();
    const { listWidth, panelWidth } = this.widths();
    const innerHeight = Math.max(0, this.height - 2);

    let listContent = fitBlock(this.list.view(), Math.max(0, listWidth - 2), innerHeight).join("\n");
    if (this.loading) {
      listContent = overlayBottomRight(1, listContent, `${this.spinner.view()} Refreshing...`, Math.max(0, listWidth - 2));
    }
    const panel = this.arbiter.active;
    const listBox = box(listContent, listWidth, this.height, { title: this.title, active: !panel });
    if (!panel) return listBox.join("\n");

    const panelBox = box(panel.view(), panelWidth, this.height, { title: PANEL_TITLES[panel.kind], active: true });
    return joinHorizontal([
      { lines: listBox, width: listWidth },
      { lines: panelBox, width: panelWidth },
    ]);
  }

  /** List the resources; resolves the kind's loaded message. */
  protected abstract load(initial: boolean): Cmd;

  /** Tab-specific bindings, reached once navigation and filter keys are ruled out. */
  protected abstract handleBinding(key: KeyPress): Cmd | null;

  /** Tab-specific messages (loaded lists, action results). */
  protected abstract handle(msg: Msg): Cmd | null;

  /** Show the spinner; the tick chain starts only if it is not already running. */
  protected startLoading(): Cmd | null {
    if (this.loading) return null;
    this.loading = true;
    return this.spinnerTick();
  }

  /** Shared handling of a loaded list. */
  protected applyLoaded(initial: boolean, result: Result<T[]>): Cmd | null {
    this.loading = false;
    if (!result.ok) {
      const text = initial ? `Failed to load data: ${result.error.message}` : `Error loading ${this.kind}: ${result.error.message}`;
      return send(banner(text, true));
    }
    this.list.setItems(result.value);
    return null;
  }

  /** Open a panel of this kind for id, or close it when it is the active one. */
  protected togglePanel(kind: PanelKind, id: string, open: () => Panel): Cmd | null {
    const panel = this.arbiter.toggle(kind, open);
    if (!panel) return null;
    this.layout();
    return panel.init(id);
  }

  protected closePanel(): Cmd | null {
    const closed = this.arbiter.close();
    this.layout();
    return closed?.ownsKeyboard ? send({ type: "contextual-bindings-clear" }) : null;
  }

  private handleKey(key: KeyPress): Cmd | null {
    const panel = this.arbiter.active;
    if (panel?.ownsKeyboard) return panel.update({ kind: "key", key });

    if (this.list.isFiltering) {
      const outcome = this.list.handleFilterKey(key);
      return outcome === "editing" ? null : send({ type: "contextual-bindings-clear" });
    }

    if (matches(key, keys.up, keys.down)) {
      const cmd = this.closePanel();
      if (matches(key, keys.up)) this.list.moveUp();
      else this.list.moveDown();
      return cmd;
    }
    if (matches(key, keys.scrollUp, keys.scrollDown)) {
      panel?.update({ kind: "scroll", delta: matches(key, keys.scrollUp) ? -1 : 1 });
      return null;
    }
    if (matches(key, keys.filter)) {
      const cmd = this.closePanel();
      this.list.startFilter();
      return batch(cmd, send({ type: "contextual-bindings", bindings: filterBindings }));
    }
    return this.handleBinding(key);
  }

  private spinnerTick(): Cmd {
    const owner = this.kind;
    return tick(SPINNER_INTERVAL_MS, () => ({ type: "spinner-tick", owner }));
  }

  private widths(): { listWidth: number; panelWidth: number } {
    if (!this.arbiter.active) return { listWidth: this.width, panelWidth: 0 };
    const listWidth = Math.floor(this.width * LIST_SPLIT_RATIO);
    return { listWidth, panelWidth: this.width - listWidth };
  }

  private layout(): void {
    const { listWidth, panelWidth } = this.widths();
    const innerHeight = Math.max(0, this.height - 2);
    this.list.setSize(Math.max(0, listWidth - 2), innerHeight);
    this.arbiter.active?.setSize(Math.max(0, panelWidth - 2), innerHeight);
  }
}
