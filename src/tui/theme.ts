/**
 * Colours, icons and small style helpers. Icons need a Nerd Font.
 */

import pc from "picocolors";
import type { ContainerState } from "../engine/types.js";

export const icons = {
  docker: "\uf308",
  container: "\uf4b7",
  image: "\ue7ba",
  volume: "\uf7c2",
  running: "\uf04b",
  stopped: "\uf04d",
  paused: "\uf04c",
  error: "\uf00d",
  dot: "●",
};

export const style = {
  title: (s: string) => pc.bold(pc.blue(s)),
  muted: (s: string) => pc.dim(s),
  selected: (s: string) => pc.bold(pc.white(s)),
  selectedMarker: (s: string) => pc.blue(s),
  activeTab: (s: string) => pc.bold(pc.inverse(pc.blue(s))),
  inactiveTab: (s: string) => pc.gray(s),
  border: (s: string) => pc.gray(s),
  activeBorder: (s: string) => pc.blue(s),
  helpKey: (s: string) => pc.bold(pc.white(s)),
  helpDesc: (s: string) => pc.gray(s),
  bannerOk: (s: string) => pc.black(pc.bgGreen(` ${s} `)),
  bannerError: (s: string) => pc.white(pc.bgRed(` ${s} `)),
  chart: (s: string) => pc.cyan(s),
  chartAlt: (s: string) => pc.magenta(s),
  prompt: (s: string) => pc.green(s),
};

export function stateStyle(state: ContainerState | string): (s: string) => string {
  switch (state) {
    case "running":
      return pc.green;
    case "paused":
    case "restarting":
      return pc.yellow;
    case "error":
    case "dead":
      return pc.red;
    default:
      return pc.gray;
  }
}

export function stateIcon(state: ContainerState | string): string {
  switch (state) {
    case "running":
      return icons.running;
    case "paused":
      return icons.paused;
    case "error":
    case "dead":
      return icons.error;
    default:
      return icons.stopped;
  }
}
