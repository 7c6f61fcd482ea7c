/**
 * In-memory EngineClient with sample data. Used when the daemon cannot be
 * reached, and by tests.
 */

import { randomBytes } from "node:crypto";
import { PassThrough, Writable } from "node:stream";
import { ConflictError, NotFoundError, PreconditionError } from "../core/errors.js";
import { FileTreeBuilder, type TarEntry } from "./filetree.js";
import { ExecSession, StreamSession } from "./session.js";
import {
  emptyRunConfig,
  type Container,
  type ContainerService,
  type EngineClient,
  type FileTree,
  type Image,
  type ImageService,
  type LogOptions,
  type Volume,
  type VolumeService,
} from "./types.js";

const HOUR = 60 * 60 * 1000;
const MiB = 1024 * 1024;

const MOCK_LOGS = [
  "2024-01-15T10:30:00Z Starting application...",
  "2024-01-15T10:30:01Z Loading configuration...",
  "2024-01-15T10:30:02Z Connected to database",
  "2024-01-15T10:30:03Z Server listening on port 3000",
  "2024-01-15T10:30:10Z GET /health 200 5ms",
  "2024-01-15T10:30:15Z GET /api/users 200 25ms",
].join("\n");

// One stats frame: CPU (2e8 - 1e8) / (2e10 - 1e10) * 4 * 100 = 4%, memory 512 MiB / 8 GiB = 6.25%.
export const MOCK_STATS_FRAME = JSON.stringify({
  cpu_stats: { cpu_usage: { total_usage: 200_000_000 }, system_cpu_usage: 20_000_000_000, online_cpus: 4 },
  precpu_stats: { cpu_usage: { total_usage: 100_000_000 }, system_cpu_usage: 10_000_000_000 },
  memory_stats: { usage: 536_870_912, limit: 8_589_934_592 },
});

const STATS_INTERVAL_MS = 100;

const CONTAINER_FILES: TarEntry[] = [
  { name: "./", type: "directory" },
  { name: "./bin/", type: "directory" },
  { name: "./bin/busybox", type: "file" },
  { name: "./bin/sh", type: "symlink", linkname: "/bin/busybox" },
  { name: "./etc/", type: "directory" },
  { name: "./etc/hostname", type: "file" },
  { name: "./etc/hosts", type: "file" },
];

const VOLUME_FILES: Record<string, TarEntry[]> = {
  postgres_data: [
    { name: "pgdata/", type: "directory" },
    { name: "pgdata/PG_VERSION", type: "file" },
    { name: "pgdata/postgresql.conf", type: "file" },
    { name: "pgdata/pg_hba.conf", type: "file" },
    { name: "pgdata/base/", type: "directory" },
    { name: "pgdata/base/1", type: "file" },
    { name: "pgdata/base/13067", type: "file" },
  ],
  nginx_config: [
    { name: "nginx.conf", type: "file" },
    { name: "conf.d/", type: "directory" },
    { name: "conf.d/default.conf", type: "file" },
  ],
};

function treeOf(entries: TarEntry[], rootName: string): FileTree {
  const builder = new FileTreeBuilder(rootName);
  for (const entry of entries) builder.add(entry);
  return builder.build();
}

function sampleContainers(now: number): Container[] {
  return [
    {
      id: "abc123def456",
      name: "nginx-proxy",
      image: "nginx:latest",
      status: "Up 2 hours",
      state: "running",
      created: new Date(now - 2 * HOUR),
      ports: [
        { hostPort: 80, containerPort: 80, protocol: "tcp" },
        { hostPort: 443, containerPort: 443, protocol: "tcp" },
      ],
      mounts: [{ type: "volume", name: "nginx_config", source: "nginx_config", destination: "/etc/nginx" }],
    },
    {
      id: "def456ghi789",
      name: "api-server",
      image: "node:18-alpine",
      status: "Up 5 hours",
      state: "running",
      created: new Date(now - 5 * HOUR),
      ports: [{ hostPort: 3000, containerPort: 3000, protocol: "tcp" }],
      mounts: [{ type: "bind", source: "/app/src", destination: "/app" }],
    },
    {
      id: "ghi789jkl012",
      name: "postgres-db",
      image: "postgres:15",
      status: "Up 1 day",
      state: "running",
      created: new Date(now - 24 * HOUR),
      ports: [{ hostPort: 5432, containerPort: 5432, protocol: "tcp" }],
      mounts: [
        { type: "volume", name: "postgres_data", source: "postgres_data", destination: "/var/lib/postgresql/data" },
      ],
    },
    {
      id: "jkl012mno345",
      name: "old-container",
      image: "alpine:3.14",
      status: "Exited (0) 3 days ago",
      state: "stopped",
      created: new Date(now - 72 * HOUR),
      ports: [],
      mounts: [],
    },
  ];
}

function sampleImages(now: number): Image[] {
  const image = (
    id: string,
    repo: string,
    tag: string,
    sizeMiB: number,
    ageHours: number,
    containers: number,
    commands: string[],
  ): Image => ({
    id,
    repo,
    tag,
    size: sizeMiB * MiB,
    created: new Date(now - ageHours * HOUR),
    dangling: repo === "<none>" && tag === "<none>",
    containers,
    layers: commands.map((command, i) => ({
      id: i === commands.length - 1 ? id : "<missing>",
      command,
      size: i === 0 ? Math.round(sizeMiB * 0.6) * MiB : 1024 * (i + 1),
      created: new Date(now - (ageHours + commands.length - i) * HOUR),
    })),
    config: emptyRunConfig(),
  });

  return [
    image("sha256:nginx123", "nginx", "latest", 142, 24, 1, [
      "/bin/sh -c #(nop) ADD file:4b03b5f5 in / ",
      "/bin/sh -c #(nop)  ENV NGINX_VERSION=1.25.3",
      "/bin/sh -c #(nop)  EXPOSE 80",
      '/bin/sh -c #(nop)  CMD ["nginx" "-g" "daemon off;"]',
    ]),
    image("sha256:node456", "node", "18-alpine", 178, 48, 1, [
      "/bin/sh -c #(nop) ADD file:7a1b5c in / ",
      "/bin/sh -c #(nop)  ENV NODE_VERSION=18.19.0",
      '/bin/sh -c #(nop)  CMD ["node"]',
    ]),
    image("sha256:postgres789", "postgres", "15", 379, 72, 1, [
      "/bin/sh -c #(nop) ADD file:9c3d2e in / ",
      "/bin/sh -c #(nop)  ENV PG_MAJOR=15",
      "/bin/sh -c #(nop)  EXPOSE 5432",
      '/bin/sh -c #(nop)  CMD ["postgres"]',
    ]),
    image("sha256:dangling001", "<none>", "<none>", 85, 168, 0, ["/bin/sh -c #(nop) ADD file:0d1e2f in / "]),
  ];
}

function sampleVolumes(now: number): Volume[] {
  return [
    {
      name: "postgres_data",
      driver: "local",
      mountPath: "/var/lib/docker/volumes/postgres_data/_data",
      size: 256 * MiB,
      usedCount: 1,
      created: new Date(now - 24 * HOUR),
    },
    {
      name: "app_data",
      driver: "local",
      mountPath: "/var/lib/docker/volumes/app_data/_data",
      size: 64 * MiB,
      usedCount: 0,
      created: new Date(now - 48 * HOUR),
    },
    {
      name: "nginx_config",
      driver: "local",
      mountPath: "/var/lib/docker/volumes/nginx_config/_data",
      size: MiB,
      usedCount: 1,
      created: new Date(now - 72 * HOUR),
    },
  ];
}

class MockContainerService implements ContainerService {
  constructor(private containers: Container[]) {}

  async list(): Promise<Container[]> {
    return structuredClone(this.containers);
  }

  async get(id: string): Promise<Container> {
    return structuredClone(this.find(id));
  }

  async start(id: string): Promise<void> {
    const c = this.find(id);
    c.state = "running";
    c.status = "Up 1 second";
  }

  async stop(id: string): Promise<void> {
    const c = this.find(id);
    c.state = "stopped";
    c.status = "Exited (0) 1 second ago";
  }

  async restart(id: string): Promise<void> {
    await this.start(id);
  }

  async remove(id: string, force: boolean): Promise<void> {
    const c = this.find(id);
    if (c.state === "running" && !force) throw new ConflictError("container is running, use force to remove");
    this.containers = this.containers.filter((other) => other !== c);
  }

  async logs(_id: string, _opts: LogOptions): Promise<StreamSession> {
    const stream = new PassThrough();
    stream.end(`${MOCK_LOGS}\n`);
    return new StreamSession("logs", stream);
  }

  async exec(id: string): Promise<ExecSession> {
    this.requireRunning(id);
    const out = new PassThrough();
    const writer = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        const cmd = String(chunk).trim();
        out.write(`$ ${cmd}\nmock output for: ${cmd}\n`, callback);
      },
    });
    return new ExecSession(out, writer, () => writer.destroy());
  }

  async stats(id: string): Promise<StreamSession> {
    this.requireRunning(id);
    const stream = new PassThrough();
    const emit = () => stream.write(`${MOCK_STATS_FRAME}\n`);
    emit();
    const timer = setInterval(emit, STATS_INTERVAL_MS);
    timer.unref();
    stream.on("close", () => clearInterval(timer));
    return new StreamSession("stats", stream, () => clearInterval(timer));
  }

  async fileTree(id: string): Promise<FileTree> {
    this.find(id);
    return treeOf(CONTAINER_FILES, ".");
  }

  async run(image: Image): Promise<string> {
    const id = randomBytes(6).toString("hex");
    const repo = image.repo === "<none>" ? image.id : `${image.repo}:${image.tag}`;
    this.containers.push({
      id,
      name: `${image.repo === "<none>" ? "container" : image.repo.replace(/[^a-zA-Z0-9_.-]/g, "-")}-${id.slice(0, 4)}`,
      image: repo,
      status: "Up 1 second",
      state: "running",
      created: new Date(),
      ports: [],
      mounts: [],
    });
    return id;
  }

  private find(id: string): Container {
    const c = this.containers.find((c) => c.id === id || c.name === id);
    if (!c) throw new NotFoundError(`container not found: ${id}`);
    return c;
  }

  private requireRunning(id: string): void {
    if (this.find(id).state !== "running") throw new PreconditionError(`container ${id} is not running`);
  }
}

class MockImageService implements ImageService {
  constructor(private images: Image[]) {}

  async list(): Promise<Image[]> {
    return structuredClone(this.images);
  }

  async get(id: string): Promise<Image> {
    const img = this.images.find((i) => i.id === id);
    if (!img) throw new NotFoundError(`image not found: ${id}`);
    return structuredClone(img);
  }

  async remove(id: string, force: boolean): Promise<void> {
    const img = this.images.find((i) => i.id === id);
    if (!img) throw new NotFoundError(`image not found: ${id}`);
    if (img.containers > 0 && !force) throw new ConflictError(`image is in use by ${img.containers} container(s)`);
    this.images = this.images.filter((other) => other !== img);
  }
}

class MockVolumeService implements VolumeService {
  constructor(private volumes: Volume[]) {}

  async list(): Promise<Volume[]> {
    return structuredClone(this.volumes);
  }

  async remove(name: string, force: boolean): Promise<void> {
    const v = this.volumes.find((v) => v.name === name);
    if (!v) throw new NotFoundError(`volume not found: ${name}`);
    if (v.usedCount > 0 && !force) throw new ConflictError(`volume is in use by ${v.usedCount} container(s)`);
    this.volumes = this.volumes.filter((other) => other !== v);
  }

  async fileTree(name: string): Promise<FileTree> {
    if (!this.volumes.some((v) => v.name === name)) throw new NotFoundError(`volume not found: ${name}`);
    return treeOf(VOLUME_FILES[name] ?? [{ name: "data.bin", type: "file" }], name);
  }
}

export class MockEngineClient implements EngineClient {
  readonly containers: MockContainerService;
  readonly images: MockImageService;
  readonly volumes: MockVolumeService;

  constructor(now: number = Date.now()) {
    this.containers = new MockContainerService(sampleContainers(now));
    this.images = new MockImageService(sampleImages(now));
    this.volumes = new MockVolumeService(sampleVolumes(now));
  }

  async ping(): Promise<void> {}

  close(): void {}
}
