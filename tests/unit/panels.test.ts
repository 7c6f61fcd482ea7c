import { PassThrough } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import type { Msg, PanelEvent } from "../../src/tui/messages.js";
import type { Cmd } from "../../src/tui/program.js";
import { bannerTexts, panelEvents, plain, runCmd } from "../support/commands.js";

vi.mock("../../src/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const { ProtocolError } = await import("../../src/core/errors.js");
const { MOCK_STATS_FRAME, MockEngineClient } = await import("../../src/engine/mock-client.js");
const { ExecSession, StreamSession } = await import("../../src/engine/session.js");
const { ok } = await import("../../src/types.js");
const { computeStats, DetailsPanel, ExecPanel, LayersPanel, LogsPanel, parseStatsFrame, StatsFrameSchema, StatsPanel } =
  await import("../../src/tui/panels/index.js");

const NOW = Date.UTC(2024, 0, 15, 12, 0, 0);
const RUNNING = "abc123def456";

/** Deliver every panel event in msgs back to the panel and return what that produced. */
function deliver(panel: { update(event: PanelEvent): Cmd | null }, msgs: Msg[]): Array<Cmd | null> {
  return panelEvents(msgs).map((event) => panel.update(event));
}

describe("computeStats", () => {
  it("derives CPU and memory percentages", () => {
    const sample = parseStatsFrame(MOCK_STATS_FRAME);
    expect(sample.cpuPercent).toBeCloseTo(4, 10);
    expect(sample.memPercent).toBeCloseTo(6.25, 10);
    expect(sample.memUsage).toBe(536_870_912);
  });

  it("falls back to the per-CPU list and subtracts page cache", () => {
    const frame = StatsFrameSchema.parse({
      cpu_stats: { cpu_usage: { total_usage: 300, percpu_usage: [150, 150] }, system_cpu_usage: 2000 },
      precpu_stats: { cpu_usage: { total_usage: 100 }, system_cpu_usage: 1000 },
      memory_stats: { usage: 600, limit: 1000, stats: { cache: 100 } },
      networks: { eth0: { rx_bytes: 10, tx_bytes: 20 }, eth1: { rx_bytes: 5, tx_bytes: 1 } },
      blkio_stats: {
        io_service_bytes_recursive: [
          { op: "Read", value: 7 },
          { op: "write", value: 3 },
          { op: "Write", value: 2 },
          { op: "Total", value: 12 },
        ],
      },
    });
    expect(computeStats(frame)).toEqual({
      cpuPercent: 40,
      memPercent: 50,
      memUsage: 500,
      memLimit: 1000,
      netRx: 15,
      netTx: 21,
      ioRead: 7,
      ioWrite: 5,
    });
  });

  it("reports zero when there is nothing to compare against", () => {
    const sample = computeStats(StatsFrameSchema.parse({}));
    expect(sample.cpuPercent).toBe(0);
    expect(sample.memPercent).toBe(0);
  });

  it("rejects frames that are not JSON", () => {
    expect(() => parseStatsFrame("{oops")).toThrow(ProtocolError);
  });
});

describe("StatsPanel", () => {
  it("shows the latest sample from the stream", async () => {
    const engine = new MockEngineClient(NOW);
    const panel = new StatsPanel("containers", engine.containers);
    panel.setSize(80, 20);
    expect(plain(panel.view())).toBe("Waiting for stats...");

    const started = await runCmd(panel.init(RUNNING));
    const [readCmd] = deliver(panel, started);
    const output = await runCmd(readCmd);
    deliver(panel, output);

    expect(panel.sample?.cpuPercent).toBeCloseTo(4, 10);
    const view = plain(panel.view());
    expect(view).toContain("CPU 4.00%");
    expect(view).toContain("MEM 6.25% (512.0 MiB / 8.0 GiB)");
    expect(view).toContain("NET  rx:0 B tx:0 B");
    panel.close();
  });

  it("joins a frame split across reads", () => {
    const panel = new StatsPanel("containers", new MockEngineClient(NOW).containers);
    panel.update({ kind: "session-started", result: ok(new StreamSession("stats", new PassThrough())) });
    const half = Math.floor(MOCK_STATS_FRAME.length / 2);
    panel.update({ kind: "session-output", result: ok(MOCK_STATS_FRAME.slice(0, half)) });
    expect(panel.sample).toBeNull();
    panel.update({ kind: "session-output", result: ok(`${MOCK_STATS_FRAME.slice(half)}\n`) });
    expect(panel.sample?.memPercent).toBeCloseTo(6.25, 10);
    panel.close();
  });

  it("asks to close with a banner on a bad frame", async () => {
    const panel = new StatsPanel("containers", new MockEngineClient(NOW).containers);
    const session = new StreamSession("stats", new PassThrough());
    panel.update({ kind: "session-started", result: ok(session) });
    const msgs = await runCmd(panel.update({ kind: "session-output", result: ok("not json\n") }));

    expect(bannerTexts(msgs)[0]).toMatch(/^Stats session error\. Err: decoding stats frame: /);
    expect(panelEvents(msgs)).toEqual([{ kind: "close-request" }]);
    expect(session.isClosed).toBe(true);
  });

  it("closes a session that arrives after the panel closed", () => {
    const panel = new StatsPanel("containers", new MockEngineClient(NOW).containers);
    const session = new StreamSession("stats", new PassThrough());
    panel.close();
    expect(panel.update({ kind: "session-started", result: ok(session) })).toBeNull();
    expect(session.isClosed).toBe(true);
  });
});

describe("ExecPanel", () => {
  const type = (panel: InstanceType<typeof ExecPanel>, text: string) => {
    for (const ch of text) panel.update({ kind: "key", key: { name: ch, text: ch } });
  };

  it("announces its bindings and sends lines to the shell", async () => {
    const engine = new MockEngineClient(NOW);
    const panel = new ExecPanel("containers", engine.containers);
    panel.setSize(60, 10);

    const started = await runCmd(panel.init(RUNNING));
    expect(started[0]).toMatchObject({ type: "contextual-bindings" });
    const [readCmd] = deliver(panel, started);
    const pendingRead = runCmd(readCmd);

    type(panel, "ls");
    expect(panel.inputValue).toBe("ls");
    const written = await runCmd(panel.update({ kind: "key", key: { name: "enter", text: "" } }));
    expect(panelEvents(written)).toEqual([{ kind: "write-done", result: { ok: true, value: undefined } }]);
    expect(panel.inputValue).toBe("");

    deliver(panel, await pendingRead);
    const view = plain(panel.view());
    expect(view).toContain("$ ls");
    expect(view).toContain("mock output for: ls");
    expect(view.split("\n").at(-1)).toBe("$ █");
    panel.close();
  });

  it("browses history with up and down", () => {
    const panel = new ExecPanel("containers", new MockEngineClient(NOW).containers);
    const session = new ExecSession(new PassThrough(), new PassThrough());
    panel.update({ kind: "session-started", result: ok(session) });

    for (const line of ["ls", "pwd"]) {
      type(panel, line);
      panel.update({ kind: "key", key: { name: "enter", text: "" } });
    }
    const press = (name: string) => panel.update({ kind: "key", key: { name, text: "" } });
    press("up");
    expect(panel.inputValue).toBe("pwd");
    press("up");
    expect(panel.inputValue).toBe("ls");
    press("up");
    expect(panel.inputValue).toBe("ls");
    press("down");
    expect(panel.inputValue).toBe("pwd");
    press("down");
    expect(panel.inputValue).toBe("");
    panel.close();
  });

  it("ignores an empty line and clears locally on clear", () => {
    const panel = new ExecPanel("containers", new MockEngineClient(NOW).containers);
    panel.setSize(40, 5);
    panel.update({ kind: "session-started", result: ok(new ExecSession(new PassThrough(), new PassThrough())) });
    panel.update({ kind: "session-output", result: ok("old output\n") });

    expect(panel.update({ kind: "key", key: { name: "enter", text: "" } })).toBeNull();
    type(panel, "clear");
    expect(panel.update({ kind: "key", key: { name: "enter", text: "" } })).toBeNull();
    expect(plain(panel.view())).not.toContain("old output");
    panel.close();
  });

  it("asks to close on escape", async () => {
    const panel = new ExecPanel("containers", new MockEngineClient(NOW).containers);
    const msgs = await runCmd(panel.update({ kind: "key", key: { name: "esc", text: "" } }));
    expect(panelEvents(msgs)).toEqual([{ kind: "close-request" }]);
    expect(bannerTexts(msgs)).toEqual(["Exec session closed"]);
  });

  it("reports a failed start", async () => {
    const panel = new ExecPanel("containers", new MockEngineClient(NOW).containers);
    const started = await runCmd(panel.init("jkl012mno345"));
    const [failure] = deliver(panel, started);
    const msgs = await runCmd(failure);
    expect(bannerTexts(msgs)).toEqual(["Exec session error. Err: container jkl012mno345 is not running"]);
    expect(panelEvents(msgs)).toEqual([{ kind: "close-request" }]);
  });
});

describe("LogsPanel", () => {
  it("keeps the output after the stream ends", async () => {
    const panel = new LogsPanel("containers", new MockEngineClient(NOW).containers);
    panel.setSize(80, 4);
    const [readCmd] = deliver(panel, await runCmd(panel.init(RUNNING)));
    const [nextRead] = deliver(panel, await runCmd(readCmd));
    const [afterEof] = deliver(panel, await runCmd(nextRead));

    expect(afterEof).toBeNull();
    const lines = plain(panel.view()).split("\n").map((l) => l.trimEnd());
    expect(lines).toEqual([
      "2024-01-15T10:30:03Z Server listening on port 3000",
      "2024-01-15T10:30:10Z GET /health 200 5ms",
      "2024-01-15T10:30:15Z GET /api/users 200 25ms",
      "",
    ]);
  });
});

describe("DetailsPanel", () => {
  it("renders the container fetched on open", async () => {
    const panel = new DetailsPanel("containers", new MockEngineClient(NOW).containers);
    panel.setSize(60, 30);
    expect(plain(panel.view())).toBe("Loading...");
    deliver(panel, await runCmd(panel.init(RUNNING)));

    const lines = plain(panel.view()).split("\n").map((l) => l.trimEnd());
    expect(lines[0]).toBe("Container: nginx-proxy");
    expect(lines[3]).toBe("ID:      abc123def456");
    expect(lines).toContain("Ports:");
    expect(lines).toContain("  80:80/tcp");
    expect(lines).toContain("  [volume] nginx_config -> /etc/nginx");
  });

  it("reports a lookup failure and asks to close", async () => {
    const panel = new DetailsPanel("containers", new MockEngineClient(NOW).containers);
    const [failure] = deliver(panel, await runCmd(panel.init("missing")));
    const msgs = await runCmd(failure);
    expect(bannerTexts(msgs)).toEqual(["error getting container details: container not found: missing"]);
    expect(panelEvents(msgs)).toEqual([{ kind: "close-request" }]);
  });
});

describe("LayersPanel", () => {
  it("lists the image layers root first", async () => {
    const [nginx] = await new MockEngineClient(NOW).images.list();
    const panel = new LayersPanel("images", (id) => (id === nginx.id ? nginx : undefined));
    panel.setSize(80, 30);
    panel.init(nginx.id);

    const lines = plain(panel.view()).split("\n").map((l) => l.trimEnd());
    expect(lines[0]).toBe("Layers for nginx:latest");
    expect(lines[3]).toBe(" 1. ADD file:4b03b5f5 in /");
    expect(lines[4]).toBe("    Size: 85.0 MiB    ID: <missing>");
  });
});
