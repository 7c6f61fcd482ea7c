/**
 * Helpers shared by the dockerode-backed services: error classification and
 * pulling images on demand.
 */

import type Docker from "dockerode";
import { classifyDockerError } from "../core/errors.js";
import { logger } from "../logger.js";

function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}

/**
 * Run a docker API call, mapping failures onto the error taxonomy with the
 * label as context. An aborted signal rejects the call without waiting for
 * the daemon.
 */
export async function dockerCall<T>(label: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
  try {
    signal?.throwIfAborted();
    return await (signal ? raceAbort(fn(), signal) : fn());
  } catch (err: unknown) {
    throw classifyDockerError(err, label);
  }
}

/**
 * Pull an image if it is not already present locally.
 * Resolves when the pull stream finishes.
 */
export async function ensureImage(docker: Docker, image: string, signal?: AbortSignal): Promise<void> {
  try {
    await docker.getImage(image).inspect();
    return;
  } catch (err: unknown) {
    logger.debug(`[engine] ${image} not present locally: ${err}`);
  }

  logger.info(`[engine] Pulling image ${image}`);
  const stream = await dockerCall(`pull ${image}`, () => docker.pull(image), signal);
  await dockerCall(
    `pull ${image}`,
    () =>
      new Promise<void>((resolve, reject) => {
        docker.modem.followProgress(stream, (err: Error | null) => {
          if (err) reject(err);
          else resolve();
        });
      }),
    signal,
  );
}
