import type { ExecSession, StreamSession } from "./session.js";

export type ContainerState = "running" | "stopped" | "paused" | "restarting";

export interface PortMapping {
  hostPort: number;
  containerPort: number;
  protocol: string;
}

export interface Mount {
  /** "volume", "bind", "tmpfs", or whatever the daemon reports. */
  type: string;
  /** Volume name, for named volumes. */
  name?: string;
  source: string;
  destination: string;
}

export interface Container {
  id: string;
  name: string;
  image: string;
  status: string;
  state: ContainerState;
  created: Date;
  ports: PortMapping[];
  mounts: Mount[];
}

export interface Layer {
  id: string;
  command: string;
  size: number;
  created: Date;
}

export interface HealthcheckConfig {
  test: string[];
  intervalNs: number;
  timeoutNs: number;
  startPeriodNs: number;
  retries: number;
}

/** Run configuration recorded in an image, reused by create-and-run. */
export interface ImageRunConfig {
  user: string;
  workingDir: string;
  labels: Record<string, string>;
  env: string[];
  cmd: string[];
  entrypoint: string[];
  shell: string[];
  onBuild: string[];
  volumes: string[];
  exposedPorts: string[];
  healthcheck?: HealthcheckConfig;
}

export interface Image {
  id: string;
  repo: string;
  tag: string;
  size: number;
  created: Date;
  dangling: boolean;
  /** Number of containers using this image. */
  containers: number;
  /** Root-first. */
  layers: Layer[];
  config: ImageRunConfig;
}

export interface Volume {
  name: string;
  driver: string;
  mountPath: string;
  /** Bytes; 0 when the daemon did not compute it. */
  size: number;
  usedCount: number;
  created: Date | null;
}

export interface FileTreeNode {
  name: string;
  isDir: boolean;
  /** Indexes into FileTree.nodes. */
  children: number[];
}

export interface FileTree {
  /** Entry paths in archive order. */
  files: string[];
  /** Node 0 is the root. */
  nodes: FileTreeNode[];
}

export interface LogOptions {
  follow: boolean;
  /** "all" or a line count such as "100". */
  tail: string;
  timestamps: boolean;
}

export interface ContainerService {
  list(signal?: AbortSignal): Promise<Container[]>;
  get(id: string, signal?: AbortSignal): Promise<Container>;
  start(id: string, signal?: AbortSignal): Promise<void>;
  stop(id: string, signal?: AbortSignal): Promise<void>;
  restart(id: string, signal?: AbortSignal): Promise<void>;
  remove(id: string, force: boolean, signal?: AbortSignal): Promise<void>;
  logs(id: string, opts: LogOptions, signal?: AbortSignal): Promise<StreamSession>;
  exec(id: string, signal?: AbortSignal): Promise<ExecSession>;
  stats(id: string, signal?: AbortSignal): Promise<StreamSession>;
  fileTree(id: string, signal?: AbortSignal): Promise<FileTree>;
  /** Create and start a container from the image's run configuration. Resolves the new ID. */
  run(image: Image, signal?: AbortSignal): Promise<string>;
}

export interface ImageService {
  list(signal?: AbortSignal): Promise<Image[]>;
  get(id: string, signal?: AbortSignal): Promise<Image>;
  remove(id: string, force: boolean, signal?: AbortSignal): Promise<void>;
}

export interface VolumeService {
  list(signal?: AbortSignal): Promise<Volume[]>;
  remove(name: string, force: boolean, signal?: AbortSignal): Promise<void>;
  fileTree(name: string, signal?: AbortSignal): Promise<FileTree>;
}

export interface EngineClient {
  readonly containers: ContainerService;
  readonly images: ImageService;
  readonly volumes: VolumeService;
  ping(signal?: AbortSignal): Promise<void>;
  close(): void;
}

export function emptyRunConfig(): ImageRunConfig {
  return {
    user: "",
    workingDir: "",
    labels: {},
    env: [],
    cmd: [],
    entrypoint: [],
    shell: [],
    onBuild: [],
    volumes: [],
    exposedPorts: [],
  };
}
