import type { DetailsPanel } from "./details.js";
import type { ExecPanel } from "./exec.js";
import type { FileTreePanel } from "./file-tree.js";
import type { LayersPanel } from "./layers.js";
import type { LogsPanel } from "./logs.js";
import type { StatsPanel } from "./stats.js";

export type Panel = DetailsPanel | FileTreePanel | LogsPanel | StatsPanel | ExecPanel | LayersPanel;

export { DetailsPanel, renderContainerDetails } from "./details.js";
export { ExecPanel } from "./exec.js";
export { FileTreePanel, type FileTreeLoader } from "./file-tree.js";
export { LayersPanel, renderLayers } from "./layers.js";
export { LogsPanel } from "./logs.js";
export { computeStats, parseStatsFrame, StatsFrameSchema, StatsPanel, type StatsSample } from "./stats.js";
export { discardStale, type PanelKind } from "./panel.js";
