import type { KeyPress } from "../messages.js";
import { style } from "../theme.js";

/** Single-line input with the cursor pinned to the end. */
export class TextInput {
  value = "";

  constructor(private readonly prompt = "$ ") {}

  /** Returns true when the key edited the value. */
  handleKey(key: KeyPress): boolean {
    if (key.name === "backspace") {
      this.value = [...this.value].slice(0, -1).join("");
      return true;
    }
    if (key.name === "ctrl+u") {
      this.value = "";
      return true;
    }
    if (key.text && !key.name.startsWith("ctrl+")) {
      this.value += key.text;
      return true;
    }
    return false;
  }

  reset(): void {
    this.value = "";
  }

  view(): string {
    return `${style.prompt(this.prompt)}${this.value}█`;
  }
}
