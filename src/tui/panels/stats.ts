import { z } from "zod";
import { ProtocolError } from "../../core/errors.js";
import type { StreamSession } from "../../engine/session.js";
import type { ContainerService } from "../../engine/types.js";
import { settle, type ResourceKind } from "../../types.js";
import { formatBytes, formatPercent } from "../format.js";
import { joinHorizontal } from "../layout.js";
import { banner, type PanelEvent } from "../messages.js";
import { batch, send, type Cmd } from "../program.js";
import { style } from "../theme.js";
import { StreamChart } from "../widgets/stream-chart.js";
import { BasePanel } from "./panel.js";

const CpuSchema = z
  .object({
    cpu_usage: z
      .object({
        total_usage: z.number().default(0),
        percpu_usage: z.array(z.number()).nullish(),
      })
      .default({}),
    system_cpu_usage: z.number().default(0),
    online_cpus: z.number().default(0),
  })
  .default({});

export const StatsFrameSchema = z.object({
  cpu_stats: CpuSchema,
  precpu_stats: CpuSchema,
  memory_stats: z
    .object({
      usage: z.number().default(0),
      limit: z.number().default(0),
      stats: z.record(z.unknown()).nullish(),
    })
    .default({}),
  networks: z.record(z.object({ rx_bytes: z.number().default(0), tx_bytes: z.number().default(0) })).nullish(),
  blkio_stats: z
    .object({
      io_service_bytes_recursive: z.array(z.object({ op: z.string(), value: z.number() })).nullish(),
    })
    .nullish(),
});

export type StatsFrame = z.infer<typeof StatsFrameSchema>;

export interface StatsSample {
  cpuPercent: number;
  memPercent: number;
  memUsage: number;
  memLimit: number;
  netRx: number;
  netTx: number;
  ioRead: number;
  ioWrite: number;
}

export function computeStats(frame: StatsFrame): StatsSample {
  const cpu = frame.cpu_stats;
  const pre = frame.precpu_stats;
  const cpuDelta = cpu.cpu_usage.total_usage - pre.cpu_usage.total_usage;
  const systemDelta = cpu.system_cpu_usage - pre.system_cpu_usage;
  const onlineCpus = cpu.online_cpus || cpu.cpu_usage.percpu_usage?.length || 1;
  const cpuPercent = systemDelta > 0 ? (cpuDelta / systemDelta) * onlineCpus * 100 : 0;

  const cache = frame.memory_stats.stats?.cache;
  const memUsage = frame.memory_stats.usage - (typeof cache === "number" ? cache : 0);
  const memLimit = frame.memory_stats.limit;
  const memPercent = memLimit > 0 ? (memUsage / memLimit) * 100 : 0;

  let netRx = 0;
  let netTx = 0;
  for (const iface of Object.values(frame.networks ?? {})) {
    netRx += iface.rx_bytes;
    netTx += iface.tx_bytes;
  }

  let ioRead = 0;
  let ioWrite = 0;
  for (const entry of frame.blkio_stats?.io_service_bytes_recursive ?? []) {
    const op = entry.op.toLowerCase();
    if (op === "read") ioRead += entry.value;
    else if (op === "write") ioWrite += entry.value;
  }

  return { cpuPercent, memPercent, memUsage, memLimit, netRx, netTx, ioRead, ioWrite };
}

export function parseStatsFrame(line: string): StatsSample {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (err: unknown) {
    throw new ProtocolError(`decoding stats frame: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = StatsFrameSchema.safeParse(raw);
  if (!parsed.success) throw new ProtocolError(`decoding stats frame: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  return computeStats(parsed.data);
}

const bytes = (n: number) => formatBytes(Math.max(0, Math.round(n)));

/** Live CPU, memory, network and block I/O charts fed by the stats stream. */
export class StatsPanel extends BasePanel {
  readonly kind = "stats";
  private session: StreamSession | null = null;
  private pending = "";
  private latest: StatsSample | null = null;
  private readonly cpu = new StreamChart("cpu");
  private readonly mem = new StreamChart("mem");
  private readonly net = new StreamChart("net", true);
  private readonly io = new StreamChart("io", true);

  constructor(
    owner: ResourceKind,
    private readonly service: ContainerService,
  ) {
    super(owner);
  }

  get sample(): StatsSample | null {
    return this.latest;
  }

  init(containerId: string): Cmd {
    return this.task(async () => ({
      kind: "session-started",
      result: await settle(() => this.service.stats(containerId, this.signal)),
    }));
  }

  update(event: PanelEvent): Cmd | null {
    switch (event.kind) {
      case "session-started":
        if (!event.result.ok) return this.fail(event.result.error);
        if (this.closed) {
          event.result.value.close();
          return null;
        }
        this.session = event.result.value;
        return this.readCmd(this.session);
      case "session-output": {
        if (!this.session) return null;
        if (!event.result.ok) return this.fail(event.result.error);
        try {
          this.consume(event.result.value);
        } catch (err: unknown) {
          return this.fail(err instanceof Error ? err : new Error(String(err)));
        }
        return this.readCmd(this.session);
      }
      default:
        return null;
    }
  }

  view(): string {
    const sample = this.latest;
    if (!sample) return style.muted("Waiting for stats...");

    const column = Math.floor(this.width / 2);
    const cpuLabel = `CPU ${formatPercent(sample.cpuPercent)}`;
    const memLabel = `MEM ${formatPercent(sample.memPercent)} (${bytes(sample.memUsage)} / ${bytes(sample.memLimit)})`;
    const netLabel = `NET  rx:${bytes(sample.netRx)} tx:${bytes(sample.netTx)}`;
    const ioLabel = `I/O  r:${bytes(sample.ioRead)} w:${bytes(sample.ioWrite)}`;
    const legend = `${style.chart("● read")}  ${style.chartAlt("● write")}`;

    const top = joinHorizontal([
      { lines: [cpuLabel, ...this.cpu.view().split("\n")], width: column },
      { lines: [memLabel, ...this.mem.view().split("\n")], width: column },
    ]);
    const bottom = joinHorizontal([
      { lines: [netLabel, legend, ...this.net.view().split("\n")], width: column },
      { lines: [ioLabel, legend, ...this.io.view().split("\n")], width: column },
    ]);
    return `${top}\n${bottom}`;
  }

  protected override resize(): void {
    const chartWidth = Math.max(1, Math.floor(this.width / 2) - 1);
    const half = Math.floor(this.height / 2);
    this.cpu.setSize(chartWidth, half - 1);
    this.mem.setSize(chartWidth, half - 1);
    this.net.setSize(chartWidth, half - 2);
    this.io.setSize(chartWidth, half - 2);
  }

  protected override release(): void {
    this.session?.close();
    this.session = null;
  }

  /** Frames are newline-delimited JSON; a frame may span several reads. */
  private consume(text: string): void {
    this.pending += text;
    const lines = this.pending.split("\n");
    this.pending = lines.pop() ?? "";
    for (const line of lines) {
      if (line.trim() === "") continue;
      const sample = parseStatsFrame(line);
      this.latest = sample;
      this.cpu.push(sample.cpuPercent);
      this.mem.push(sample.memPercent);
      this.net.push(sample.netRx, sample.netTx);
      this.io.push(sample.ioRead, sample.ioWrite);
    }
  }

  private fail(error: Error): Cmd | null {
    if (!this.session && this.closed) return null;
    this.release();
    return batch(send(banner(`Stats session error. Err: ${error.message}`, true)), this.closeRequest());
  }
}
