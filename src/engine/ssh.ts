/**
 * SSH transport for ssh:// daemon hosts authenticated with a private key.
 *
 * Every dial opens a fresh TCP connection, runs the SSH handshake and forwards
 * a streamlocal channel to the daemon's UNIX socket on the remote host.
 * Closing the returned channel ends that SSH client; nothing is pooled.
 */

import { readFileSync } from "node:fs";
import { Agent, type ClientRequestArgs } from "node:http";
import { connect as connectTcp, type Socket } from "node:net";
import { homedir } from "node:os";
import { join } from "node:path";
import type { Duplex } from "node:stream";
import ssh2, { type Client, type ClientChannel } from "ssh2";
import { AuthError, errorMessage, TransportError, UserError } from "../core/errors.js";
import { logger } from "../logger.js";
import { DEFAULT_REMOTE_SOCKET } from "../paths.js";

const DEFAULT_SSH_PORT = 22;
const HANDSHAKE_TIMEOUT_MS = 20_000;

export interface SshTarget {
  user: string;
  /** host:port */
  address: string;
  host: string;
  port: number;
  socketPath: string;
}

export interface SshDialerOptions {
  user: string;
  host: string;
  port: number;
  keyPath: string;
}

export type SshDialer = (socketPath: string, signal?: AbortSignal) => Promise<ClientChannel>;

export function isSshHost(host: string): boolean {
  return host.startsWith("ssh://");
}

/** Split ssh://[user@]host[:port][/socket] into its parts. */
export function parseSshTarget(raw: string): SshTarget {
  let url: URL;
  try {
    url = new URL(raw);
  } catch (err: unknown) {
    throw new UserError(`invalid ssh host "${raw}": ${errorMessage(err)}`, { cause: err });
  }
  if (url.protocol !== "ssh:" || !url.hostname) {
    throw new UserError(`invalid ssh host "${raw}"`);
  }

  const port = url.port ? Number(url.port) : DEFAULT_SSH_PORT;
  const path = url.pathname;
  return {
    user: decodeURIComponent(url.username),
    address: `${url.hostname}:${port}`,
    host: url.hostname.replace(/^\[(.*)\]$/, "$1"),
    port,
    socketPath: path && path !== "/" ? path : DEFAULT_REMOTE_SOCKET,
  };
}

/** Replace a leading ~ with the home directory. */
export function expandTilde(path: string, home: string = homedir()): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}

function dialTcp(host: string, port: number, signal?: AbortSignal): Promise<Socket> {
  return new Promise<Socket>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const socket = connectTcp({ host, port });
    const onAbort = () => {
      socket.destroy();
      reject(signal?.reason);
    };
    signal?.addEventListener("abort", onAbort, { once: true });
    socket.once("connect", () => {
      signal?.removeEventListener("abort", onAbort);
      socket.removeAllListeners("error");
      resolve(socket);
    });
    socket.once("error", (err) => {
      signal?.removeEventListener("abort", onAbort);
      reject(err);
    });
  });
}

function handshake(client: Client, socket: Socket, username: string, privateKey: Buffer): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    client.once("ready", () => {
      client.removeListener("error", reject);
      resolve();
    });
    client.once("error", reject);
    client.connect({
      sock: socket,
      username,
      privateKey,
      readyTimeout: HANDSHAKE_TIMEOUT_MS,
      // Host keys are not checked.
      hostVerifier: () => true,
    });
  });
}

function forwardLocal(client: Client, socketPath: string): Promise<ClientChannel> {
  return new Promise<ClientChannel>((resolve, reject) => {
    client.openssh_forwardOutStreamLocal(socketPath, (err, channel) => {
      if (err) reject(err);
      else resolve(channel);
    });
  });
}

/**
 * Read and parse the identity file once and return a dialer that reaches the
 * remote socket through a new SSH connection on every call.
 */
export function createSshDialer(opts: SshDialerOptions): SshDialer {
  let privateKey: Buffer;
  try {
    privateKey = readFileSync(opts.keyPath);
  } catch (err: unknown) {
    throw new AuthError(`reading identity file ${opts.keyPath}: ${errorMessage(err)}`, { cause: err });
  }
  const parsed = ssh2.utils.parseKey(privateKey);
  if (parsed instanceof Error) {
    throw new AuthError(`parsing identity file ${opts.keyPath}: ${parsed.message}`, { cause: parsed });
  }

  const address = `${opts.host}:${opts.port}`;

  return async (socketPath, signal) => {
    let socket: Socket;
    try {
      socket = await dialTcp(opts.host, opts.port, signal);
    } catch (err: unknown) {
      throw new TransportError(`ssh tcp dial ${address}: ${errorMessage(err)}`, { cause: err });
    }

    const client = new ssh2.Client();
    try {
      await handshake(client, socket, opts.user, privateKey);
    } catch (err: unknown) {
      client.end();
      socket.destroy();
      throw new TransportError(`ssh handshake ${address}: ${errorMessage(err)}`, { cause: err });
    }
    client.on("error", (err: Error) => logger.warn(`[ssh] ${address}: ${err.message}`));

    let channel: ClientChannel;
    try {
      channel = await forwardLocal(client, socketPath);
    } catch (err: unknown) {
      client.end();
      throw new TransportError(`ssh forward to ${socketPath}: ${errorMessage(err)}`, { cause: err });
    }

    channel.once("close", () => client.end());
    logger.debug(`[ssh] Forwarded ${address} -> ${socketPath}`);
    return channel;
  };
}

/**
 * HTTP agent whose connections are SSH channels to the remote daemon socket.
 * keepAlive stays off, so each request gets its own SSH connection.
 */
export class SshForwardAgent extends Agent {
  constructor(
    private readonly dial: SshDialer,
    private readonly socketPath: string,
  ) {
    super({ keepAlive: false });
  }

  createConnection(
    _options: ClientRequestArgs,
    callback: (err: Error | null, stream?: Duplex) => void,
  ): undefined {
    this.dial(this.socketPath).then(
      (channel) => callback(null, channel),
      (err: unknown) => callback(err instanceof Error ? err : new Error(String(err))),
    );
    return undefined;
  }
}
