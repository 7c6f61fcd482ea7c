import { PassThrough } from "node:stream";
import type Docker from "dockerode";
import { pack } from "tar-stream";
import { describe, expect, it, vi } from "vitest";

vi.mock("../../src/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const { ConflictError, DashError, NotFoundError, ProtocolError } = await import("../../src/core/errors.js");
const { renderFileTree } = await import("../../src/engine/filetree.js");
const { DockerContainerService, DockerImageService, DockerVolumeService, imageReference } = await import(
  "../../src/engine/docker-client.js"
);
const { HELPER_IMAGE, HELPER_MOUNT_PATH } = await import("../../src/engine/volume-filetree.js");

function asDocker(fake: object): Docker {
  return fake as unknown as Docker;
}

function daemonError(statusCode: number, message: string): Error {
  return Object.assign(new Error(`(HTTP code ${statusCode}) unexpected`), { statusCode, json: { message } });
}

const inspectNginx = {
  Id: "sha256:aaa",
  RepoTags: ["nginx:1.25"],
  Created: "2024-01-02T03:04:05.123456789Z",
  Size: 104_857_600,
  Config: {
    Cmd: ["nginx", "-g", "daemon off;"],
    Env: ["PATH=/usr/bin"],
    ExposedPorts: { "80/tcp": {} },
    Entrypoint: "/docker-entrypoint.sh",
  },
};

describe("DockerContainerService", () => {
  it("maps the container list", async () => {
    const docker = asDocker({
      listContainers: vi.fn(async () => [
        {
          Id: "0123456789abcdef",
          Names: ["/web"],
          Image: "nginx:1.25",
          Status: "Exited (0) 2 hours ago",
          State: "exited",
          Created: 1_700_000_000,
          Ports: [
            { PrivatePort: 80, PublicPort: 8080, Type: "tcp" },
            { PrivatePort: 443, Type: "tcp" },
          ],
          Mounts: [{ Type: "volume", Name: "web_data", Source: "/var/lib/docker/volumes/web_data/_data", Destination: "/data" }],
        },
      ]),
    });

    const [container] = await new DockerContainerService(docker).list();
    expect(container).toEqual({
      id: "0123456789abcdef",
      name: "web",
      image: "nginx:1.25",
      status: "Exited (0) 2 hours ago",
      state: "stopped",
      created: new Date(1_700_000_000_000),
      ports: [{ hostPort: 8080, containerPort: 80, protocol: "tcp" }],
      mounts: [
        { type: "volume", name: "web_data", source: "/var/lib/docker/volumes/web_data/_data", destination: "/data" },
      ],
    });
  });

  it("maps a 404 from inspect to NotFoundError", async () => {
    const docker = asDocker({
      getContainer: () => ({ inspect: vi.fn(async () => Promise.reject(daemonError(404, "No such container: ghost"))) }),
    });
    const err = await new DockerContainerService(docker).get("ghost").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toHaveProperty("message", "inspect container: No such container: ghost");
  });

  it("reads inspected port bindings", async () => {
    const docker = asDocker({
      getContainer: () => ({
        inspect: vi.fn(async () => ({
          Id: "abc",
          Name: "/api",
          Created: "2024-01-02T03:04:05Z",
          Config: { Image: "node:20" },
          State: { Status: "running", Running: true, Paused: false, Restarting: false },
          NetworkSettings: { Ports: { "3000/tcp": [{ HostIp: "0.0.0.0", HostPort: "3000" }], "9229/tcp": null } },
          Mounts: [],
        })),
      }),
    });
    const container = await new DockerContainerService(docker).get("abc");
    expect(container.name).toBe("api");
    expect(container.state).toBe("running");
    expect(container.ports).toEqual([{ hostPort: 3000, containerPort: 3000, protocol: "tcp" }]);
  });

  it("follows logs from the last two hours without a tail limit", async () => {
    const raw = new PassThrough();
    const logs = vi.fn(async (_options: object) => raw);
    const docker = asDocker({ getContainer: () => ({ logs }) });

    const session = await new DockerContainerService(docker).logs("abc", { follow: true, tail: "all", timestamps: false });
    const header = Buffer.alloc(8);
    header[0] = 1;
    header.writeUInt32BE(6, 4);
    raw.write(Buffer.concat([header, Buffer.from("ready\n")]));

    expect(await session.read()).toBe("ready\n");
    const options = logs.mock.calls[0]?.[0];
    expect(options).toMatchObject({ follow: true, stdout: true, stderr: true, timestamps: false });
    expect(options).not.toHaveProperty("tail");
    session.close();
  });

  it("creates and starts a container from the image configuration", async () => {
    const start = vi.fn(async () => undefined);
    const createContainer = vi.fn(async () => ({ id: "fedcba987654", start }));
    const docker = asDocker({
      createContainer,
      getImage: () => ({ inspect: vi.fn(async () => inspectNginx), history: vi.fn(async () => []) }),
    });
    const image = await new DockerImageService(docker).get("sha256:aaa");

    const id = await new DockerContainerService(docker).run(image);
    expect(id).toBe("fedcba987654");
    expect(start).toHaveBeenCalledTimes(1);
    expect(createContainer).toHaveBeenCalledWith(
      expect.objectContaining({
        Image: "nginx:1.25",
        Cmd: ["nginx", "-g", "daemon off;"],
        Entrypoint: ["/docker-entrypoint.sh"],
        Env: ["PATH=/usr/bin"],
        ExposedPorts: { "80/tcp": {} },
      }),
    );
  });
});

describe("DockerImageService", () => {
  it("inspects each image and counts consumers the daemon left out", async () => {
    const history = vi.fn(async () => [
      { Id: "sha256:top", Created: 1_700_000_100, CreatedBy: "CMD [\"nginx\"]", Size: 0 },
      { Id: "sha256:base", Created: 1_700_000_000, CreatedBy: "ADD rootfs.tar /", Size: 80_000_000 },
    ]);
    const docker = asDocker({
      listImages: vi.fn(async () => [
        { Id: "sha256:aaa", Containers: -1 },
        { Id: "sha256:bbb", Containers: 3 },
      ]),
      listContainers: vi.fn(async () => [{ ImageID: "sha256:aaa" }, { ImageID: "sha256:aaa" }, { ImageID: "sha256:ccc" }]),
      getImage: (id: string) => ({
        inspect: vi.fn(async () =>
          id === "sha256:aaa" ? inspectNginx : { Id: "sha256:bbb", RepoTags: [], Created: "2024-01-01T00:00:00Z", Size: 10 },
        ),
        history,
      }),
    });

    const [nginx, dangling] = await new DockerImageService(docker).list();
    expect(nginx.repo).toBe("nginx");
    expect(nginx.tag).toBe("1.25");
    expect(nginx.containers).toBe(2);
    expect(nginx.created).toEqual(new Date("2024-01-02T03:04:05.123Z"));
    expect(nginx.layers.map((l) => l.command)).toEqual(["ADD rootfs.tar /", "CMD [\"nginx\"]"]);
    expect(nginx.config.exposedPorts).toEqual(["80/tcp"]);

    expect(dangling.repo).toBe("<none>");
    expect(dangling.dangling).toBe(true);
    expect(dangling.containers).toBe(3);
    expect(imageReference(dangling)).toBe("sha256:bbb");
  });

  it("splits the first repo-tag on its first colon", async () => {
    const docker = asDocker({
      getImage: () => ({
        inspect: vi.fn(async () => ({ ...inspectNginx, RepoTags: ["localhost:5000/app:1.0", "app:latest"] })),
        history: vi.fn(async () => Promise.reject(new Error("history unavailable"))),
      }),
    });
    const image = await new DockerImageService(docker).get("sha256:aaa");
    expect(image.repo).toBe("localhost");
    expect(image.tag).toBe("5000/app:1.0");
    expect(image.dangling).toBe(false);
    expect(image.layers).toEqual([]);
  });

  it("leaves the tag unset when the repo-tag has no colon", async () => {
    const docker = asDocker({
      getImage: () => ({
        inspect: vi.fn(async () => ({ ...inspectNginx, RepoTags: ["scratch-build"] })),
        history: vi.fn(async () => []),
      }),
    });
    const image = await new DockerImageService(docker).get("sha256:aaa");
    expect(image.repo).toBe("scratch-build");
    expect(image.tag).toBe("<none>");
  });

  it("rejects a malformed inspect body", async () => {
    const docker = asDocker({
      getImage: () => ({ inspect: vi.fn(async () => ({ Id: "sha256:aaa" })), history: vi.fn(async () => []) }),
    });
    await expect(new DockerImageService(docker).get("sha256:aaa")).rejects.toBeInstanceOf(ProtocolError);
  });

  it("maps a removal conflict", async () => {
    const docker = asDocker({
      getImage: () => ({ remove: vi.fn(async () => Promise.reject(daemonError(409, "image is being used by running container"))) }),
    });
    const err = await new DockerImageService(docker).remove("sha256:aaa", false).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ConflictError);
    expect(err).toHaveProperty("message", "remove image: image is being used by running container");
  });
});

describe("DockerVolumeService", () => {
  it("lists volumes from disk usage", async () => {
    const docker = asDocker({
      df: vi.fn(async () => ({
        Volumes: [
          { Name: "pg", Driver: "local", Mountpoint: "/var/lib/docker/volumes/pg/_data", CreatedAt: "2024-01-02T03:04:05Z", UsageData: { Size: 2048, RefCount: 1 } },
          { Name: "cache", Driver: "local", Mountpoint: "/x", UsageData: { Size: -1, RefCount: -1 } },
        ],
      })),
    });
    const [pg, cache] = await new DockerVolumeService(docker).list();
    expect(pg).toEqual({
      name: "pg",
      driver: "local",
      mountPath: "/var/lib/docker/volumes/pg/_data",
      size: 2048,
      usedCount: 1,
      created: new Date("2024-01-02T03:04:05Z"),
    });
    expect(cache.size).toBe(0);
    expect(cache.usedCount).toBe(0);
    expect(cache.created).toBeNull();
  });

  it("reads files through a running container that mounts the volume", async () => {
    const archive = pack();
    archive.entry({ name: "data/", type: "directory" });
    archive.entry({ name: "data/base.db" }, "x");
    archive.finalize();
    const getArchive = vi.fn(async () => archive);
    const docker = asDocker({
      listContainers: vi.fn(async () => [{ Id: "runner" }]),
      getContainer: () => ({
        inspect: vi.fn(async () => ({ State: { Running: true }, Mounts: [{ Name: "pg", Destination: "/var/lib/pg" }] })),
        getArchive,
      }),
    });

    const tree = await new DockerVolumeService(docker).fileTree("pg");
    expect(getArchive).toHaveBeenCalledWith({ path: "/var/lib/pg" });
    expect(renderFileTree(tree)).toBe(".\n└── data\n    └── base.db");
  });

  it("removes the helper container even when the copy fails", async () => {
    const remove = vi.fn(async () => undefined);
    const createContainer = vi.fn(async () => ({ id: "helper000000001", remove }));
    const docker = asDocker({
      listContainers: vi.fn(async () => []),
      getImage: () => ({ inspect: vi.fn(async () => ({ Id: "sha256:alpine" })) }),
      createContainer,
      getContainer: () => ({ getArchive: vi.fn(async () => Promise.reject(new Error("copy failed"))) }),
    });

    const err = await new DockerVolumeService(docker).fileTree("orphan").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DashError);
    expect(err).toHaveProperty("message", "reading volume files: copy from container: copy failed");
    expect(createContainer).toHaveBeenCalledWith({
      Image: HELPER_IMAGE,
      Cmd: ["true"],
      HostConfig: { Binds: [`orphan:${HELPER_MOUNT_PATH}`] },
    });
    expect(remove).toHaveBeenCalledWith({ force: true });
  });
  it("removes a helper whose creation completes after the caller gave up", async () => {
    const remove = vi.fn(async () => undefined);
    let finishCreate = () => {};
    const createContainer = vi.fn(
      () =>
        new Promise<{ id: string; remove: typeof remove }>((resolve) => {
          finishCreate = () => resolve({ id: "helper000000002", remove });
        }),
    );
    const getArchive = vi.fn(async () => pack());
    const docker = asDocker({
      listContainers: vi.fn(async () => []),
      getImage: () => ({ inspect: vi.fn(async () => ({ Id: "sha256:alpine" })) }),
      createContainer,
      getContainer: () => ({ getArchive }),
    });
    const controller = new AbortController();

    const pending = new DockerVolumeService(docker).fileTree("orphan", controller.signal).catch((e: unknown) => e);
    await vi.waitFor(() => expect(createContainer).toHaveBeenCalledTimes(1));
    controller.abort();
    finishCreate();

    const err = await pending;
    expect(err).toBeInstanceOf(DashError);
    expect(err).toHaveProperty("message", expect.stringMatching(/^reading volume files: /));
    expect(getArchive).not.toHaveBeenCalled();
    expect(remove).toHaveBeenCalledWith({ force: true });
  });

  it("pulls the helper image when it is not present", async () => {
    const progress = new PassThrough();
    const pull = vi.fn(async () => progress);
    const followProgress = vi.fn((_stream: NodeJS.ReadableStream, done: (err: Error | null) => void) => done(null));
    const remove = vi.fn(async () => undefined);
    const archive = pack();
    archive.entry({ name: "./", type: "directory" });
    archive.entry({ name: "./notes.txt" }, "hi");
    archive.finalize();
    const docker = asDocker({
      listContainers: vi.fn(async () => []),
      getImage: () => ({ inspect: vi.fn(async () => Promise.reject(daemonError(404, "No such image: alpine:latest"))) }),
      pull,
      modem: { followProgress },
      createContainer: vi.fn(async () => ({ id: "helper000000003", remove })),
      getContainer: () => ({ getArchive: vi.fn(async () => archive) }),
    });

    const tree = await new DockerVolumeService(docker).fileTree("notes");
    expect(pull).toHaveBeenCalledWith(HELPER_IMAGE);
    expect(followProgress).toHaveBeenCalledTimes(1);
    expect(followProgress.mock.calls[0]?.[0]).toBe(progress);
    expect(renderFileTree(tree)).toBe(".\n└── notes.txt");
    expect(remove).toHaveBeenCalledWith({ force: true });
  });

  it("fails when the helper image cannot be pulled", async () => {
    const createContainer = vi.fn();
    const docker = asDocker({
      listContainers: vi.fn(async () => []),
      getImage: () => ({ inspect: vi.fn(async () => Promise.reject(daemonError(404, "No such image: alpine:latest"))) }),
      pull: vi.fn(async () => new PassThrough()),
      modem: {
        followProgress: (_stream: NodeJS.ReadableStream, done: (err: Error | null) => void) => done(new Error("manifest unknown")),
      },
      createContainer,
    });

    const err = await new DockerVolumeService(docker).fileTree("notes").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DashError);
    expect(err).toHaveProperty("message", `pull ${HELPER_IMAGE}: manifest unknown`);
    expect(createContainer).not.toHaveBeenCalled();
  });
});
