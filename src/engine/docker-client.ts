/**
 * EngineClient backed by dockerode. One Docker instance is shared by every
 * service; docker-modem tolerates concurrent requests.
 */

import { Readable } from "node:stream";
import type Docker from "dockerode";
import { z } from "zod";
import type { DockerConfig } from "../core/config.js";
import { errorMessage, ProtocolError } from "../core/errors.js";
import { fromUnixSeconds, parseRfc3339 } from "../core/time.js";
import { logger } from "../logger.js";
import { createDocker, resolveDockerOptions, type ResolvedTransport } from "./connect.js";
import { demuxDockerStream, destroyStream, toReadable } from "./demux.js";
import { dockerCall } from "./docker-call.js";
import { buildFileTree } from "./filetree.js";
import { ExecSession, StreamSession } from "./session.js";
import type {
  Container,
  ContainerService,
  ContainerState,
  EngineClient,
  FileTree,
  Image,
  ImageRunConfig,
  ImageService,
  Layer,
  LogOptions,
  Mount,
  PortMapping,
  Volume,
  VolumeService,
} from "./types.js";
import { resolveVolumeFileTree } from "./volume-filetree.js";

const NONE = "<none>";
/** Logs start this far back. */
const LOGS_SINCE_MS = 2 * 60 * 60 * 1000;
const EXEC_SHELL = ["/bin/sh"];

// ---------------------------------------------------------------------------
// Mapping helpers
// ---------------------------------------------------------------------------

function listState(state: string): ContainerState {
  switch (state) {
    case "running":
      return "running";
    case "paused":
      return "paused";
    case "restarting":
      return "restarting";
    default:
      return "stopped";
  }
}

function inspectState(state: Docker.ContainerInspectInfo["State"]): ContainerState {
  if (state.Running) return "running";
  if (state.Paused) return "paused";
  if (state.Restarting) return "restarting";
  return "stopped";
}

function splitPortKey(key: string): { port: number; protocol: string } {
  const [port, protocol] = key.split("/");
  return { port: Number(port), protocol: protocol || "tcp" };
}

const MountsSchema = z.array(
  z.object({
    Type: z.string().nullish(),
    Name: z.string().nullish(),
    Source: z.string().default(""),
    Destination: z.string(),
  }),
);

function toMounts(raw: unknown): Mount[] {
  const parsed = MountsSchema.safeParse(raw ?? []);
  if (!parsed.success) return [];
  return parsed.data.map((m) => ({
    type: m.Type ?? "",
    name: m.Name || undefined,
    source: m.Source,
    destination: m.Destination,
  }));
}

const HealthcheckSchema = z.object({
  Test: z.array(z.string()).nullish(),
  Interval: z.number().nullish(),
  Timeout: z.number().nullish(),
  StartPeriod: z.number().nullish(),
  Retries: z.number().nullish(),
});

const RunConfigSchema = z.object({
  User: z.string().nullish(),
  WorkingDir: z.string().nullish(),
  Labels: z.record(z.string()).nullish(),
  Env: z.array(z.string()).nullish(),
  Cmd: z.array(z.string()).nullish(),
  Entrypoint: z.union([z.array(z.string()), z.string()]).nullish(),
  Shell: z.array(z.string()).nullish(),
  OnBuild: z.array(z.string()).nullish(),
  Volumes: z.record(z.unknown()).nullish(),
  ExposedPorts: z.record(z.unknown()).nullish(),
  Healthcheck: HealthcheckSchema.nullish(),
});

const ImageInspectSchema = z.object({
  Id: z.string(),
  RepoTags: z.array(z.string()).nullish(),
  Created: z.string(),
  Size: z.number(),
  Config: RunConfigSchema.nullish(),
});

const HistorySchema = z.array(
  z.object({
    Id: z.string(),
    Created: z.number(),
    CreatedBy: z.string(),
    Size: z.number(),
  }),
);

const DiskUsageSchema = z.object({
  Volumes: z
    .array(
      z.object({
        Name: z.string(),
        Driver: z.string(),
        Mountpoint: z.string(),
        CreatedAt: z.string().nullish(),
        UsageData: z.object({ Size: z.number(), RefCount: z.number() }).nullish(),
      }),
    )
    .nullish(),
});

function toRunConfig(config: z.infer<typeof RunConfigSchema> | null | undefined): ImageRunConfig {
  const entrypoint = config?.Entrypoint;
  const health = config?.Healthcheck;
  return {
    user: config?.User ?? "",
    workingDir: config?.WorkingDir ?? "",
    labels: config?.Labels ?? {},
    env: config?.Env ?? [],
    cmd: config?.Cmd ?? [],
    entrypoint: typeof entrypoint === "string" ? [entrypoint] : (entrypoint ?? []),
    shell: config?.Shell ?? [],
    onBuild: config?.OnBuild ?? [],
    volumes: Object.keys(config?.Volumes ?? {}),
    exposedPorts: Object.keys(config?.ExposedPorts ?? {}),
    healthcheck: health
      ? {
          test: health.Test ?? [],
          intervalNs: health.Interval ?? 0,
          timeoutNs: health.Timeout ?? 0,
          startPeriodNs: health.StartPeriod ?? 0,
          retries: health.Retries ?? 0,
        }
      : undefined,
  };
}

/** repo:tag for named images, the ID otherwise. */
export function imageReference(image: Image): string {
  if (image.repo === NONE || image.tag === NONE) return image.id;
  return `${image.repo}:${image.tag}`;
}

function toRecord(keys: string[]): Record<string, Record<string, never>> {
  return Object.fromEntries(keys.map((k) => [k, {}]));
}

// ---------------------------------------------------------------------------
// Containers
// ---------------------------------------------------------------------------

export class DockerContainerService implements ContainerService {
  constructor(private readonly docker: Docker) {}

  async list(signal?: AbortSignal): Promise<Container[]> {
    const containers = await dockerCall("list containers", () => this.docker.listContainers({ all: true }), signal);
    return containers.map((c) => ({
      id: c.Id,
      name: (c.Names[0] ?? "").replace(/^\//, ""),
      image: c.Image,
      status: c.Status,
      state: listState(c.State),
      created: fromUnixSeconds(c.Created),
      ports: c.Ports.filter((p) => (p.PublicPort ?? 0) > 0).map((p) => ({
        hostPort: p.PublicPort ?? 0,
        containerPort: p.PrivatePort,
        protocol: p.Type,
      })),
      mounts: toMounts(c.Mounts),
    }));
  }

  async get(id: string, signal?: AbortSignal): Promise<Container> {
    const info = await dockerCall("inspect container", () => this.docker.getContainer(id).inspect(), signal);

    const ports: PortMapping[] = [];
    for (const [key, bindings] of Object.entries(info.NetworkSettings?.Ports ?? {})) {
      if (!bindings) continue;
      const { port, protocol } = splitPortKey(key);
      for (const b of bindings) {
        const hostPort = Number(b.HostPort);
        if (hostPort > 0) ports.push({ hostPort, containerPort: port, protocol });
      }
    }

    const created = new Date(info.Created);
    return {
      id: info.Id,
      name: info.Name.replace(/^\//, ""),
      image: info.Config.Image,
      status: info.State.Status,
      state: inspectState(info.State),
      created: Number.isNaN(created.getTime()) ? new Date(0) : created,
      ports,
      mounts: toMounts(info.Mounts),
    };
  }

  async start(id: string, signal?: AbortSignal): Promise<void> {
    await dockerCall("start container", () => this.docker.getContainer(id).start(), signal);
    logger.info(`[engine] Started ${id.slice(0, 12)}`);
  }

  async stop(id: string, signal?: AbortSignal): Promise<void> {
    await dockerCall("stop container", () => this.docker.getContainer(id).stop(), signal);
    logger.info(`[engine] Stopped ${id.slice(0, 12)}`);
  }

  async restart(id: string, signal?: AbortSignal): Promise<void> {
    await dockerCall("restart container", () => this.docker.getContainer(id).restart(), signal);
    logger.info(`[engine] Restarted ${id.slice(0, 12)}`);
  }

  async remove(id: string, force: boolean, signal?: AbortSignal): Promise<void> {
    await dockerCall("remove container", () => this.docker.getContainer(id).remove({ force }), signal);
    logger.info(`[engine] Removed ${id.slice(0, 12)}`);
  }

  async logs(id: string, opts: LogOptions, signal?: AbortSignal): Promise<StreamSession> {
    const container = this.docker.getContainer(id);
    const tail = Number.parseInt(opts.tail, 10);
    const base = {
      stdout: true,
      stderr: true,
      since: Math.floor((Date.now() - LOGS_SINCE_MS) / 1000),
      timestamps: opts.timestamps,
      ...(Number.isNaN(tail) ? {} : { tail }),
    };

    const source: NodeJS.ReadableStream = opts.follow
      ? await dockerCall("container logs", () => container.logs({ ...base, follow: true }), signal)
      : Readable.from([await dockerCall("container logs", () => container.logs({ ...base, follow: false }), signal)]);

    return new StreamSession("logs", demuxDockerStream(source), () => destroyStream(source));
  }

  async exec(id: string, signal?: AbortSignal): Promise<ExecSession> {
    const container = this.docker.getContainer(id);
    const exec = await dockerCall(
      "exec create",
      () =>
        container.exec({
          Cmd: EXEC_SHELL,
          AttachStdin: true,
          AttachStdout: true,
          AttachStderr: true,
          Tty: false,
        }),
      signal,
    );
    const duplex = await dockerCall("exec attach", () => exec.start({ hijack: true, stdin: true }), signal);

    return new ExecSession(demuxDockerStream(duplex), duplex, () => {
      duplex.end();
      duplex.destroy();
    });
  }

  async stats(id: string, signal?: AbortSignal): Promise<StreamSession> {
    const raw = await dockerCall("container stats", () => this.docker.getContainer(id).stats({ stream: true }), signal);
    return new StreamSession("stats", toReadable(raw), () => destroyStream(raw));
  }

  async fileTree(id: string, signal?: AbortSignal): Promise<FileTree> {
    const archive = await dockerCall("export container", () => this.docker.getContainer(id).export(), signal);
    return buildFileTree(archive, signal);
  }

  async run(image: Image, signal?: AbortSignal): Promise<string> {
    const cfg = image.config;
    const options: Docker.ContainerCreateOptions & { Shell?: string[]; OnBuild?: string[] } = {
      Image: imageReference(image),
      User: cfg.user || undefined,
      WorkingDir: cfg.workingDir || undefined,
      Labels: cfg.labels,
      Env: cfg.env,
      Cmd: cfg.cmd.length ? cfg.cmd : undefined,
      Entrypoint: cfg.entrypoint.length ? cfg.entrypoint : undefined,
      Shell: cfg.shell.length ? cfg.shell : undefined,
      OnBuild: cfg.onBuild.length ? cfg.onBuild : undefined,
      Volumes: toRecord(cfg.volumes),
      ExposedPorts: toRecord(cfg.exposedPorts),
      Healthcheck: cfg.healthcheck
        ? {
            Test: cfg.healthcheck.test,
            Interval: cfg.healthcheck.intervalNs,
            Timeout: cfg.healthcheck.timeoutNs,
            StartPeriod: cfg.healthcheck.startPeriodNs,
            Retries: cfg.healthcheck.retries,
          }
        : undefined,
    };

    const container = await dockerCall("create container", () => this.docker.createContainer(options), signal);
    await dockerCall("start container", () => container.start(), signal);
    logger.info(`[engine] Created ${container.id.slice(0, 12)} from ${options.Image}`);
    return container.id;
  }
}

// ---------------------------------------------------------------------------
// Images
// ---------------------------------------------------------------------------

export class DockerImageService implements ImageService {
  constructor(private readonly docker: Docker) {}

  async list(signal?: AbortSignal): Promise<Image[]> {
    const summaries = await dockerCall("list images", () => this.docker.listImages({ all: true }), signal);

    // The daemon reports -1 when it did not count consumers; count them here.
    let consumers: Map<string, number> | null = null;
    if (summaries.some((s) => s.Containers < 0)) {
      const containers = await dockerCall("list containers", () => this.docker.listContainers({ all: true }), signal);
      consumers = new Map();
      for (const c of containers) consumers.set(c.ImageID, (consumers.get(c.ImageID) ?? 0) + 1);
    }

    const images: Image[] = [];
    for (const summary of summaries) {
      const image = await this.get(summary.Id, signal);
      image.containers = summary.Containers >= 0 ? summary.Containers : (consumers?.get(summary.Id) ?? 0);
      images.push(image);
    }
    return images;
  }

  async get(id: string, signal?: AbortSignal): Promise<Image> {
    const raw = await dockerCall("inspect image", () => this.docker.getImage(id).inspect(), signal);
    const parsed = ImageInspectSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProtocolError(`inspect image: unexpected response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    const info = parsed.data;

    let repo = NONE;
    let tag = NONE;
    const repoTags = info.RepoTags ?? [];
    if (repoTags.length > 0) {
      const first = repoTags[0];
      const sep = first.indexOf(":");
      repo = sep < 0 ? first : first.slice(0, sep);
      if (sep >= 0) tag = first.slice(sep + 1);
    }

    return {
      id: info.Id,
      repo,
      tag,
      size: info.Size,
      created: parseRfc3339(info.Created),
      dangling: repoTags.length === 0 || (repo === NONE && tag === NONE),
      containers: 0,
      layers: await this.fetchLayers(info.Id, signal),
      config: toRunConfig(info.Config),
    };
  }

  async remove(id: string, force: boolean, signal?: AbortSignal): Promise<void> {
    await dockerCall("remove image", () => this.docker.getImage(id).remove({ force }), signal);
    logger.info(`[engine] Removed image ${id}`);
  }

  /** Root-first layer history; empty when the daemon will not give one. */
  private async fetchLayers(id: string, signal?: AbortSignal): Promise<Layer[]> {
    let raw: unknown;
    try {
      raw = await dockerCall("image history", () => this.docker.getImage(id).history(), signal);
    } catch (err: unknown) {
      logger.debug(`[engine] No history for ${id}: ${errorMessage(err)}`);
      return [];
    }
    const parsed = HistorySchema.safeParse(raw);
    if (!parsed.success) return [];
    return parsed.data
      .map((h) => ({ id: h.Id, command: h.CreatedBy, size: h.Size, created: fromUnixSeconds(h.Created) }))
      .reverse();
  }
}

// ---------------------------------------------------------------------------
// Volumes
// ---------------------------------------------------------------------------

export class DockerVolumeService implements VolumeService {
  constructor(private readonly docker: Docker) {}

  async list(signal?: AbortSignal): Promise<Volume[]> {
    const raw: unknown = await dockerCall("disk usage", () => this.docker.df(), signal);
    const parsed = DiskUsageSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProtocolError(`disk usage: unexpected response: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }

    return (parsed.data.Volumes ?? []).map((v) => {
      const created = v.CreatedAt ? new Date(v.CreatedAt) : null;
      return {
        name: v.Name,
        driver: v.Driver,
        mountPath: v.Mountpoint,
        size: Math.max(0, v.UsageData?.Size ?? 0),
        usedCount: Math.max(0, v.UsageData?.RefCount ?? 0),
        created: created && !Number.isNaN(created.getTime()) ? created : null,
      };
    });
  }

  async remove(name: string, force: boolean, signal?: AbortSignal): Promise<void> {
    await dockerCall("remove volume", () => this.docker.getVolume(name).remove({ force }), signal);
    logger.info(`[engine] Removed volume ${name}`);
  }

  fileTree(name: string, signal?: AbortSignal): Promise<FileTree> {
    return resolveVolumeFileTree(this.docker, name, signal);
  }
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class DockerEngineClient implements EngineClient {
  readonly containers: DockerContainerService;
  readonly images: DockerImageService;
  readonly volumes: DockerVolumeService;

  constructor(
    private readonly docker: Docker,
    private readonly transport?: ResolvedTransport,
  ) {
    this.containers = new DockerContainerService(docker);
    this.images = new DockerImageService(docker);
    this.volumes = new DockerVolumeService(docker);
  }

  async ping(signal?: AbortSignal): Promise<void> {
    await dockerCall("ping", () => this.docker.ping(), signal);
  }

  close(): void {
    this.transport?.agent?.destroy();
  }
}

/** Build a client for the configured daemon. Throws UserError/AuthError on bad settings. */
export function createEngineClient(config: DockerConfig): DockerEngineClient {
  const transport = resolveDockerOptions(config);
  logger.info(`[engine] Connecting to ${transport.target}`);
  return new DockerEngineClient(createDocker(transport), transport);
}
