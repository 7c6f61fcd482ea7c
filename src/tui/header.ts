import type { ResourceKind } from "../types.js";
import { fit, visibleWidth } from "./layout.js";
import { icons, style } from "./theme.js";

interface Tab {
  kind: ResourceKind;
  icon: string;
  label: string;
}

const TABS: Tab[] = [
  { kind: "images", icon: icons.image, label: "Images" },
  { kind: "containers", icon: icons.container, label: "Containers" },
  { kind: "volumes", icon: icons.volume, label: "Volumes" },
];

const LOGO = `${icons.docker}  Docker Dash`;

/** Tab bar; left/right wrap around. */
export class Header {
  private index = 0;
  private width = 0;

  setWidth(width: number): void {
    this.width = width;
  }

  get active(): ResourceKind {
    return TABS[this.index].kind;
  }

  moveLeft(): void {
    this.index = (this.index + TABS.length - 1) % TABS.length;
  }

  moveRight(): void {
    this.index = (this.index + 1) % TABS.length;
  }

  view(): string {
    const tabs = TABS.map((tab, i) => {
      const text = ` ${tab.icon} ${tab.label} `;
      return i === this.index ? style.activeTab(text) : style.inactiveTab(text);
    }).join(style.border("│"));
    const logo = style.title(LOGO);
    const spacer = " ".repeat(Math.max(0, this.width - visibleWidth(tabs) - visibleWidth(logo)));
    return fit(tabs + spacer + logo, this.width);
  }
}
