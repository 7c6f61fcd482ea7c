import type { Agent } from "node:http";
import Docker from "dockerode";
import type { DockerConfig } from "../core/config.js";
import { errorMessage, UserError } from "../core/errors.js";
import { createSshDialer, expandTilde, isSshHost, parseSshTarget, SshForwardAgent } from "./ssh.js";

// dockerode hands these through to docker-modem.
export type ModemOptions = Docker.DockerOptions & { agent?: Agent; sshAuthAgent?: string };

export interface ResolvedTransport {
  /** undefined: let docker-modem read DOCKER_HOST and friends. */
  options: ModemOptions | undefined;
  /** Human-readable target, for logs. */
  target: string;
  /** Agent owned by this transport, destroyed on close. */
  agent?: Agent;
}

function parseUrl(host: string): URL {
  try {
    return new URL(host);
  } catch (err: unknown) {
    throw new UserError(`invalid docker host "${host}": ${errorMessage(err)}`, { cause: err });
  }
}

/** Map the configured daemon URL onto dockerode connection options. */
export function resolveDockerOptions(config: DockerConfig): ResolvedTransport {
  const host = config.host.trim();
  if (!host) return { options: undefined, target: "environment default" };

  if (isSshHost(host)) {
    const target = parseSshTarget(host);
    if (config.identityFile) {
      const dial = createSshDialer({
        user: target.user,
        host: target.host,
        port: target.port,
        keyPath: expandTilde(config.identityFile),
      });
      const agent = new SshForwardAgent(dial, target.socketPath);
      const options: ModemOptions = { socketPath: target.socketPath, agent };
      return { options, target: `${target.address}${target.socketPath} (identity file)`, agent };
    }
    const options: ModemOptions = {
      protocol: "ssh",
      host: target.host,
      port: target.port,
      username: target.user || undefined,
      sshAuthAgent: process.env.SSH_AUTH_SOCK,
    };
    return { options, target: `${target.address} (ssh agent)` };
  }

  const url = parseUrl(host);
  switch (url.protocol) {
    case "unix:":
      return { options: { socketPath: url.pathname }, target: host };
    case "tcp:":
    case "http:":
      return {
        options: { protocol: "http", host: url.hostname, port: url.port ? Number(url.port) : 2375 },
        target: host,
      };
    case "https:":
      return {
        options: { protocol: "https", host: url.hostname, port: url.port ? Number(url.port) : 2376 },
        target: host,
      };
    default:
      throw new UserError(`unsupported docker host scheme "${url.protocol.replace(/:$/, "")}"`);
  }
}

export function createDocker(transport: ResolvedTransport): Docker {
  return transport.options ? new Docker(transport.options) : new Docker();
}
