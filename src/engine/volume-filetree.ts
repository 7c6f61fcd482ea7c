import type Docker from "dockerode";
import { DashError, errorMessage } from "../core/errors.js";
import { logger } from "../logger.js";
import { dockerCall, ensureImage } from "./docker-call.js";
import { buildFileTree } from "./filetree.js";
import type { FileTree } from "./types.js";

export const HELPER_IMAGE = "alpine:latest";
export const HELPER_MOUNT_PATH = "/mnt/volume";

interface MountedVolume {
  containerId: string;
  destination: string;
}

/** First running container that mounts the volume by name. */
async function findRunningMount(docker: Docker, name: string, signal?: AbortSignal): Promise<MountedVolume | null> {
  const candidates = await dockerCall(
    "list containers",
    () => docker.listContainers({ all: true, filters: { volume: [name] } }),
    signal,
  );

  for (const candidate of candidates) {
    let info: Docker.ContainerInspectInfo;
    try {
      info = await dockerCall("inspect container", () => docker.getContainer(candidate.Id).inspect(), signal);
    } catch (err: unknown) {
      logger.debug(`[volumes] Skipping ${candidate.Id}: ${errorMessage(err)}`);
      continue;
    }
    if (!info.State.Running) continue;
    const mount = info.Mounts.find((m) => m.Name === name);
    if (mount) return { containerId: candidate.Id, destination: mount.Destination };
  }
  return null;
}

async function copyFileTree(docker: Docker, containerId: string, path: string, signal?: AbortSignal): Promise<FileTree> {
  const archive = await dockerCall(
    "copy from container",
    () => docker.getContainer(containerId).getArchive({ path }),
    signal,
  );
  return buildFileTree(archive, signal);
}

/**
 * Tree of the files inside a named volume. Copies from a running container
 * that mounts it, or else from a short-lived helper container created with
 * the volume bound at HELPER_MOUNT_PATH. The helper is force-removed on every
 * exit path.
 */
export async function resolveVolumeFileTree(docker: Docker, name: string, signal?: AbortSignal): Promise<FileTree> {
  const mounted = await findRunningMount(docker, name, signal);
  if (mounted) {
    logger.debug(`[volumes] Reading ${name} through ${mounted.containerId.slice(0, 12)}`);
    return copyFileTree(docker, mounted.containerId, mounted.destination, signal);
  }

  await ensureImage(docker, HELPER_IMAGE, signal);

  // Not raced against the signal, so the handle always reaches the finally below.
  const helper = await dockerCall("create helper container", () =>
    docker.createContainer({
      Image: HELPER_IMAGE,
      Cmd: ["true"],
      HostConfig: { Binds: [`${name}:${HELPER_MOUNT_PATH}`] },
    }),
  );
  logger.debug(`[volumes] Helper ${helper.id.slice(0, 12)} created for ${name}`);

  try {
    signal?.throwIfAborted();
    return await copyFileTree(docker, helper.id, HELPER_MOUNT_PATH, signal);
  } catch (err: unknown) {
    const kind = err instanceof DashError ? err.kind : "engine";
    throw new DashError(`reading volume files: ${errorMessage(err)}`, kind, { cause: err });
  } finally {
    try {
      await helper.remove({ force: true });
    } catch (err: unknown) {
      logger.warn(`[volumes] Removing helper ${helper.id.slice(0, 12)} failed: ${errorMessage(err)}`);
    }
  }
}
