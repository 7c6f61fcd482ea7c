import { stripVTControlCharacters } from "node:util";
import type { Msg, PanelEvent } from "../../src/tui/messages.js";
import type { Cmd } from "../../src/tui/program.js";

/** Run every task in a command tree once and collect the messages, in batch order. */
export async function runCmd(cmd: Cmd | null): Promise<Msg[]> {
  if (!cmd) return [];
  if (typeof cmd !== "function") return (await Promise.all(cmd.map((c) => runCmd(c)))).flat();
  const msg = await cmd();
  return msg ? [msg] : [];
}

/** The panel events among msgs. */
export function panelEvents(msgs: Msg[]): PanelEvent[] {
  return msgs.flatMap((m) => (m.type === "panel" ? [m.event] : []));
}

export function bannerTexts(msgs: Msg[]): string[] {
  return msgs.flatMap((m) => (m.type === "banner" ? [m.text] : []));
}

export function plain(text: string): string {
  return stripVTControlCharacters(text);
}

/** Let pending promise chains and stream callbacks run. */
export async function flush(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) await new Promise((resolve) => setImmediate(resolve));
}
