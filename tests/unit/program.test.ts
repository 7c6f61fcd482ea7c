import { describe, expect, it, vi } from "vitest";
import type { Msg } from "../../src/tui/messages.js";
import type { Cmd } from "../../src/tui/program.js";
import { flush } from "../support/commands.js";

vi.mock("../../src/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const { batch, Program, send } = await import("../../src/tui/program.js");

class Counter {
  count = 0;
  lastBanner = "";
  constructor(private readonly first: Cmd | null) {}

  init(): Cmd | null {
    return this.first;
  }

  update(msg: Msg): Cmd | null {
    if (msg.type === "refresh-all") this.count += 1;
    if (msg.type === "banner") this.lastBanner = msg.text;
    return null;
  }

  view(): string {
    return String(this.count);
  }
}

describe("batch", () => {
  it("drops nulls and unwraps a single command", () => {
    const a = send({ type: "refresh-all" });
    const b = send({ type: "quit" });
    expect(batch(null, undefined)).toBeNull();
    expect(batch(null, a)).toBe(a);
    expect(batch(a, null, b)).toEqual([a, b]);
  });
});

describe("Program", () => {
  it("renders, runs init commands and re-renders", async () => {
    const views: string[] = [];
    const model = new Counter(batch(send({ type: "refresh-all" }), send({ type: "refresh-all" })));
    const program = new Program(model, { onRender: (v) => views.push(v) });
    void program.start();
    expect(views).toEqual(["0"]);
    await flush();
    expect(views).toEqual(["0", "1", "2"]);
  });

  it("settles start() on quit and ignores later messages", async () => {
    const onQuit = vi.fn();
    const model = new Counter(null);
    const program = new Program(model, { onQuit });
    const done = program.start();
    program.dispatch({ type: "quit" });
    await expect(done).resolves.toBeUndefined();
    program.dispatch({ type: "refresh-all" });
    expect(model.count).toBe(0);
    expect(onQuit).toHaveBeenCalledTimes(1);
  });

  it("turns a failed command into an error banner", async () => {
    const model = new Counter(async () => {
      throw new Error("daemon went away");
    });
    void new Program(model).start();
    await flush();
    expect(model.lastBanner).toBe("daemon went away");
  });
});
