import { homedir } from "node:os";
import { join } from "node:path";

export const HOME = homedir();
export const DEFAULT_CONFIG_FILE = join(HOME, ".config", "docker-dash.toml");
export const STATE_DIR = join(process.env.XDG_STATE_HOME || join(HOME, ".local", "state"), "docker-dash");
export const LOG_FILE = join(STATE_DIR, "docker-dash.log");

// Remote daemon socket used when an ssh:// host names no path.
export const DEFAULT_REMOTE_SOCKET = "/var/run/docker.sock";
