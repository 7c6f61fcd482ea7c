import { describe, expect, it, vi } from "vitest";

vi.mock("../../src/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const { ConflictError, EndOfStreamError, NotFoundError, PreconditionError } = await import("../../src/core/errors.js");
const { renderFileTree } = await import("../../src/engine/filetree.js");
const { MOCK_STATS_FRAME, MockEngineClient } = await import("../../src/engine/mock-client.js");

const NOW = Date.UTC(2024, 0, 15, 12, 0, 0);

describe("MockEngineClient", () => {
  it("serves the sample data", async () => {
    const engine = new MockEngineClient(NOW);
    const containers = await engine.containers.list();
    expect(containers.map((c) => c.name)).toEqual(["nginx-proxy", "api-server", "postgres-db", "old-container"]);
    expect(containers[0].created).toEqual(new Date(NOW - 2 * 60 * 60 * 1000));
    expect((await engine.images.list()).map((i) => `${i.repo}:${i.tag}`)).toEqual([
      "nginx:latest",
      "node:18-alpine",
      "postgres:15",
      "<none>:<none>",
    ]);
    expect((await engine.volumes.list()).map((v) => v.name)).toEqual(["postgres_data", "app_data", "nginx_config"]);
  });

  it("hands out copies", async () => {
    const engine = new MockEngineClient(NOW);
    const [first] = await engine.containers.list();
    first.name = "renamed";
    expect((await engine.containers.list())[0].name).toBe("nginx-proxy");
  });

  it("toggles container state", async () => {
    const engine = new MockEngineClient(NOW);
    await engine.containers.stop("abc123def456");
    expect((await engine.containers.get("abc123def456")).state).toBe("stopped");
    await engine.containers.start("nginx-proxy");
    expect((await engine.containers.get("abc123def456")).state).toBe("running");
  });

  it("refuses to remove in-use images and volumes without force", async () => {
    const engine = new MockEngineClient(NOW);
    await expect(engine.images.remove("sha256:nginx123", false)).rejects.toThrow(
      new ConflictError("image is in use by 1 container(s)"),
    );
    await expect(engine.volumes.remove("postgres_data", false)).rejects.toBeInstanceOf(ConflictError);
    await engine.images.remove("sha256:dangling001", false);
    await engine.volumes.remove("app_data", false);
    expect(await engine.images.list()).toHaveLength(3);
    expect(await engine.volumes.list()).toHaveLength(2);
  });

  it("reports unknown resources", async () => {
    const engine = new MockEngineClient(NOW);
    await expect(engine.containers.get("nope")).rejects.toBeInstanceOf(NotFoundError);
    await expect(engine.volumes.fileTree("nope")).rejects.toThrow("volume not found: nope");
  });

  it("only opens sessions on running containers", async () => {
    const engine = new MockEngineClient(NOW);
    await expect(engine.containers.exec("jkl012mno345")).rejects.toBeInstanceOf(PreconditionError);
    await expect(engine.containers.stats("jkl012mno345")).rejects.toBeInstanceOf(PreconditionError);
  });

  it("echoes exec input", async () => {
    const engine = new MockEngineClient(NOW);
    const session = await engine.containers.exec("abc123def456");
    await session.write("ls -la\n");
    expect(await session.read()).toBe("$ ls -la\nmock output for: ls -la\n");
    session.close();
  });

  it("streams stats frames line by line", async () => {
    const engine = new MockEngineClient(NOW);
    const session = await engine.containers.stats("abc123def456");
    expect(await session.read()).toBe(`${MOCK_STATS_FRAME}\n`);
    session.close();
    await expect(session.read()).rejects.toBeInstanceOf(EndOfStreamError);
  });

  it("ends the log stream after the sample lines", async () => {
    const engine = new MockEngineClient(NOW);
    const session = await engine.containers.logs("abc123def456", { follow: true, tail: "all", timestamps: false });
    const text = await session.read();
    expect(text.split("\n")).toHaveLength(7);
    expect(text.startsWith("2024-01-15T10:30:00Z Starting application...\n")).toBe(true);
    await expect(session.read()).rejects.toBeInstanceOf(EndOfStreamError);
  });

  it("runs an image as a new running container", async () => {
    const engine = new MockEngineClient(NOW);
    const [nginx] = await engine.images.list();
    const id = await engine.containers.run(nginx);
    const created = await engine.containers.get(id);
    expect(created.image).toBe("nginx:latest");
    expect(created.state).toBe("running");
    expect(created.name).toBe(`nginx-${id.slice(0, 4)}`);
  });

  it("builds sample file trees", async () => {
    const engine = new MockEngineClient(NOW);
    expect(renderFileTree(await engine.containers.fileTree("abc123def456"))).toBe(
      [".", "├── bin", "│   ├── busybox", "│   └── sh -> /bin/busybox", "└── etc", "    ├── hostname", "    └── hosts"].join("\n"),
    );
    expect(renderFileTree(await engine.volumes.fileTree("nginx_config"))).toBe(
      ["nginx_config", "├── nginx.conf", "└── conf.d", "    └── default.conf"].join("\n"),
    );
  });
});
