import type { ExecSession, StreamSession } from "../engine/session.js";
import type { Container, FileTree, Image, Volume } from "../engine/types.js";
import type { ResourceKind, Result } from "../types.js";
import type { Binding } from "./keys.js";

/** A key press, normalised: name is "up", "enter", "esc", "ctrl+r", "q", "R", ... */
export interface KeyPress {
  name: string;
  /** Printable text the key produced, "" for control keys. */
  text: string;
}

export type PanelEvent =
  | { kind: "key"; key: KeyPress }
  | { kind: "scroll"; delta: number }
  | { kind: "details-loaded"; result: Result<Container> }
  | { kind: "file-tree-loaded"; result: Result<FileTree> }
  | { kind: "session-started"; result: Result<StreamSession | ExecSession> }
  | { kind: "session-output"; result: Result<string> }
  | { kind: "write-done"; result: Result<void> }
  | { kind: "close-request" };

export type ResourceAction = "starting" | "stopping" | "restarting" | "deleting" | "running";

export type Msg =
  | { type: "key"; key: KeyPress }
  | { type: "window-size"; width: number; height: number }
  | { type: "banner"; text: string; isError: boolean }
  | { type: "banner-clear"; seq: number }
  | { type: "bubble-up"; key: KeyPress; onlyActive: boolean }
  | { type: "contextual-bindings"; bindings: Binding[] }
  | { type: "contextual-bindings-clear" }
  | { type: "refresh-tick" }
  | { type: "refresh-all" }
  | { type: "quit" }
  | { type: "spinner-tick"; owner: ResourceKind }
  | { type: "containers-loaded"; owner: "containers"; initial: boolean; result: Result<Container[]> }
  | { type: "images-loaded"; owner: "images"; initial: boolean; result: Result<Image[]> }
  | { type: "volumes-loaded"; owner: "volumes"; initial: boolean; result: Result<Volume[]> }
  | {
      type: "resource-action";
      owner: ResourceKind;
      action: ResourceAction;
      id: string;
      index: number;
      result: Result<string | void>;
    }
  | { type: "panel"; owner: ResourceKind; panelId: number; event: PanelEvent };

/** Messages addressed to a single resource tab. */
export type OwnedMsg = Extract<Msg, { owner: ResourceKind }>;

export function isOwned(msg: Msg): msg is OwnedMsg {
  return "owner" in msg;
}

export function banner(text: string, isError = false): Msg {
  return { type: "banner", text, isError };
}
