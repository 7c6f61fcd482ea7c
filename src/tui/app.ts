import { parseDurationMs } from "../core/duration.js";
import type { EngineClient } from "../engine/types.js";
import { logger } from "../logger.js";
import type { ResourceKind } from "../types.js";
import { Header } from "./header.js";
import { keys, matches } from "./keys.js";
import { joinVertical, lineCount, overlayBottomRight } from "./layout.js";
import { banner, isOwned, type KeyPress, type Msg } from "./messages.js";
import { batch, send, tick, type Cmd, type Model } from "./program.js";
import { ContainersView } from "./resources/containers.js";
import { ImagesView } from "./resources/images.js";
import { VolumesView } from "./resources/volumes.js";
import { StatusBar } from "./statusbar.js";
import { style } from "./theme.js";

export const BANNER_TIMEOUT_MS = 3000;

export interface AppOptions {
  /** Duration string such as "30s"; empty disables auto-refresh. */
  refreshInterval: string;
}

interface Tabs {
  images: ImagesView;
  containers: ContainersView;
  volumes: VolumesView;
}

type Tab = Tabs[ResourceKind];

/**
 * Top-level model: tab header, the three resource tabs, a transient banner
 * and the status bar. Global keys are handled here unless the active tab is
 * capturing the keyboard (filter or exec), in which case only Ctrl-C is.
 */
export class App implements Model {
  private readonly header = new Header();
  private readonly statusBar = new StatusBar();
  private readonly tabs: Tabs;
  private readonly refreshMs: number | null = null;
  private readonly intervalError: string | null = null;

  private bannerText = "";
  private bannerIsError = false;
  private bannerSeq = 0;
  private width = 0;
  private height = 0;

  constructor(engine: EngineClient, options: AppOptions) {
    this.tabs = {
      images: new ImagesView(engine.images, engine.containers),
      containers: new ContainersView(engine.containers),
      volumes: new VolumesView(engine.volumes),
    };

    const raw = options.refreshInterval.trim();
    if (raw !== "") {
      const ms = parseDurationMs(raw);
      if (ms === null || ms <= 0) this.intervalError = `Invalid refresh interval "${raw}"`;
      else this.refreshMs = ms;
    }
  }

  get activeTab(): Tab {
    return this.tabs[this.header.active];
  }

  get currentBanner(): { text: string; isError: boolean } | null {
    return this.bannerText ? { text: this.bannerText, isError: this.bannerIsError } : null;
  }

  tab<K extends ResourceKind>(kind: K): Tabs[K] {
    return this.tabs[kind];
  }

  init(): Cmd | null {
    if (this.intervalError) logger.warn(`[ui] ${this.intervalError}`);
    return batch(
      this.tabs.images.init(),
      this.tabs.containers.init(),
      this.tabs.volumes.init(),
      this.intervalError ? send(banner(this.intervalError, true)) : null,
      this.scheduleRefresh(),
    );
  }

  update(msg: Msg): Cmd | null {
    switch (msg.type) {
      case "key":
        return this.handleKey(msg.key);
      case "window-size":
        this.width = msg.width;
        this.height = msg.height;
        this.layout();
        return null;
      case "banner": {
        this.bannerText = msg.text;
        this.bannerIsError = msg.isError;
        this.bannerSeq += 1;
        const seq = this.bannerSeq;
        return tick(BANNER_TIMEOUT_MS, () => ({ type: "banner-clear", seq }));
      }
      case "banner-clear":
        if (msg.seq === this.bannerSeq) this.bannerText = "";
        return null;
      case "bubble-up":
        if (msg.onlyActive) return this.forwardKey(this.activeTab, msg.key);
        return batch(...this.allTabs().map((tab) => this.forwardKey(tab, msg.key)));
      case "contextual-bindings":
        this.statusBar.setContextual(msg.bindings);
        this.layout();
        return null;
      case "contextual-bindings-clear":
        this.statusBar.clearContextual();
        this.layout();
        return null;
      case "refresh-tick":
        return batch(send({ type: "refresh-all" }), this.scheduleRefresh());
      case "refresh-all":
        return this.refreshAll();
      case "quit":
        return null;
      default:
        return isOwned(msg) ? this.tabs[msg.owner].update(msg) : null;
    }
  }

  view(): string {
    if (this.width === 0) return "Loading...";
    const kind = this.header.active;

    let content = this.activeTab.view();
    if (this.bannerText) {
      const painted = this.bannerIsError ? style.bannerError(this.bannerText) : style.bannerOk(this.bannerText);
      content = overlayBottomRight(2, content, painted, this.width);
    }
    return joinVertical(this.header.view(), content, this.statusBar.view(kind));
  }

  /** Close every open panel and its session. */
  shutdown(): void {
    for (const tab of this.allTabs()) tab.activePanel?.close();
  }

  private handleKey(key: KeyPress): Cmd | null {
    const tab = this.activeTab;
    if (matches(key, keys.forceQuit)) return send({ type: "quit" });
    if (tab.capturesKeyboard()) return tab.update({ type: "key", key });

    if (matches(key, keys.quit)) return send({ type: "quit" });
    if (matches(key, keys.left)) {
      this.header.moveLeft();
      this.layout();
      return null;
    }
    if (matches(key, keys.right)) {
      this.header.moveRight();
      this.layout();
      return null;
    }
    if (matches(key, keys.refresh)) return tab.refresh();
    if (matches(key, keys.refreshAll)) return this.refreshAll();
    if (matches(key, keys.help)) {
      this.statusBar.toggleFull();
      this.layout();
      return null;
    }
    return tab.update({ type: "key", key });
  }

  private forwardKey(tab: Tab, key: KeyPress): Cmd | null {
    return matches(key, keys.refresh) ? tab.refresh() : tab.update({ type: "key", key });
  }

  private refreshAll(): Cmd | null {
    return batch(...this.allTabs().map((tab) => tab.refresh()));
  }

  private scheduleRefresh(): Cmd | null {
    const ms = this.refreshMs;
    if (ms === null) return null;
    return tick(ms, () => ({ type: "refresh-tick" }));
  }

  private allTabs(): Tab[] {
    return [this.tabs.images, this.tabs.containers, this.tabs.volumes];
  }

  private layout(): void {
    this.header.setWidth(this.width);
    this.statusBar.setWidth(this.width);
    const statusHeight = Math.max(1, lineCount(this.statusBar.view(this.header.active)));
    const contentHeight = Math.max(0, this.height - 1 - statusHeight);
    for (const tab of this.allTabs()) tab.setSize(this.width, contentHeight);
  }
}
