import type { ResourceKind } from "../types.js";
import type { KeyPress } from "./messages.js";

export interface Binding {
  keys: string[];
  help: { key: string; desc: string };
}

function binding(keys: string[], key: string, desc: string): Binding {
  return { keys, help: { key, desc } };
}

export function matches(key: KeyPress, ...bindings: Binding[]): boolean {
  return bindings.some((b) => b.keys.includes(key.name));
}

export const keys = {
  up: binding(["up"], "↑", "move up"),
  down: binding(["down"], "↓", "move down"),
  left: binding(["left"], "←", "prev tab"),
  right: binding(["right"], "→", "next tab"),
  esc: binding(["esc"], "esc", "exit"),
  enter: binding(["enter"], "enter", "send"),
  scrollUp: binding(["k"], "k", "scroll up"),
  scrollDown: binding(["j"], "j", "scroll down"),
  refresh: binding(["r"], "r", "refresh"),
  refreshAll: binding(["ctrl+r"], "ctrl+r", "refresh all"),
  filter: binding(["/"], "/", "filter"),
  help: binding(["?"], "?", "help"),
  quit: binding(["q", "ctrl+c"], "q", "quit"),
  forceQuit: binding(["ctrl+c"], "ctrl+c", "quit"),

  delete: binding(["d"], "d", "delete"),
  fileTree: binding(["t"], "t", "show files"),

  imageLayers: binding(["l"], "l", "show layers"),
  createAndRun: binding(["c"], "c", "run container"),

  containerInfo: binding(["d"], "d", "info"),
  containerDelete: binding(["D"], "D", "delete container"),
  containerLogs: binding(["l"], "l", "logs"),
  containerStats: binding(["S"], "S", "stats"),
  containerStartStop: binding(["s"], "s", "start/stop"),
  containerRestart: binding(["R"], "R", "restart"),
  containerExec: binding(["e"], "e", "exec"),

  historyPrev: binding(["up"], "↑", "previous command"),
  historyNext: binding(["down"], "↓", "next command"),
} satisfies Record<string, Binding>;

const globalBindings = [keys.left, keys.right, keys.refresh, keys.refreshAll, keys.help, keys.quit];

const viewBindings: Record<ResourceKind, Binding[]> = {
  images: [keys.up, keys.down, keys.scrollUp, keys.scrollDown, keys.delete, keys.imageLayers, keys.createAndRun, keys.filter],
  containers: [
    keys.up,
    keys.down,
    keys.scrollUp,
    keys.scrollDown,
    keys.containerInfo,
    keys.containerLogs,
    keys.fileTree,
    keys.containerStats,
    keys.containerExec,
    keys.containerStartStop,
    keys.containerRestart,
    keys.containerDelete,
    keys.filter,
  ],
  volumes: [keys.up, keys.down, keys.scrollUp, keys.scrollDown, keys.delete, keys.fileTree, keys.filter],
};

/** One line of the most useful bindings. */
export function shortHelp(kind: ResourceKind): Binding[] {
  return [...viewBindings[kind].filter((b) => b !== keys.scrollUp && b !== keys.scrollDown), keys.help, keys.quit];
}

/** Columns for the expanded help: view bindings, then global ones. */
export function fullHelp(kind: ResourceKind): Binding[][] {
  const view = viewBindings[kind];
  const columns: Binding[][] = [];
  for (let i = 0; i < view.length; i += 4) columns.push(view.slice(i, i + 4));
  columns.push(globalBindings.slice(0, 3), globalBindings.slice(3));
  return columns;
}

export const execBindings: Binding[] = [keys.enter, keys.historyPrev, keys.historyNext, keys.esc];
export const filterBindings: Binding[] = [binding(["enter"], "enter", "apply filter"), binding(["esc"], "esc", "clear filter")];
