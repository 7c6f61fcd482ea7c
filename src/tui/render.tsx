import { render, Text, useInput, useStdout, type Key } from "ink";
import { useEffect, useState } from "react";
import type { App } from "./app.js";
import type { KeyPress } from "./messages.js";
import { Program } from "./program.js";

const ENTER_ALT_SCREEN = "\x1b[?1049h";
const LEAVE_ALT_SCREEN = "\x1b[?1049l";

/** Translate Ink's key event into the names the keymap uses. */
export function toKeyPress(input: string, key: Key): KeyPress | null {
  if (key.upArrow) return { name: "up", text: "" };
  if (key.downArrow) return { name: "down", text: "" };
  if (key.leftArrow) return { name: "left", text: "" };
  if (key.rightArrow) return { name: "right", text: "" };
  if (key.return) return { name: "enter", text: "" };
  if (key.escape) return { name: "esc", text: "" };
  if (key.backspace || key.delete) return { name: "backspace", text: "" };
  if (key.tab) return { name: "tab", text: "" };
  if (key.pageUp) return { name: "pgup", text: "" };
  if (key.pageDown) return { name: "pgdown", text: "" };
  if (key.ctrl && input) return { name: `ctrl+${input.toLowerCase()}`, text: "" };
  if (input) return { name: input, text: input };
  return null;
}

interface ScreenProps {
  program: Program;
  subscribe: (listener: (view: string) => void) => void;
}

function Screen({ program, subscribe }: ScreenProps) {
  const [frame, setFrame] = useState(() => program.view());
  const { stdout } = useStdout();

  useEffect(() => {
    subscribe(setFrame);
    // One row short of the terminal: Ink repaints the whole screen when the frame fills it.
    const resize = () => program.dispatch({ type: "window-size", width: stdout.columns, height: stdout.rows - 1 });
    resize();
    stdout.on("resize", resize);
    return () => {
      stdout.off("resize", resize);
    };
  }, [program, subscribe, stdout]);

  useInput((input, key) => {
    const press = toKeyPress(input, key);
    if (press) program.dispatch({ type: "key", key: press });
  });

  return <Text>{frame}</Text>;
}

/** Run the dashboard full-screen until the user quits. */
export async function runTui(app: App): Promise<void> {
  let listener: (view: string) => void = () => {};
  const program = new Program(app, { onRender: (view) => listener(view) });
  const subscribe = (next: (view: string) => void) => {
    listener = next;
  };

  process.stdout.write(ENTER_ALT_SCREEN);
  const instance = render(<Screen program={program} subscribe={subscribe} />, { exitOnCtrlC: false });
  try {
    await program.start();
  } finally {
    app.shutdown();
    instance.unmount();
    process.stdout.write(LEAVE_ALT_SCREEN);
  }
}
