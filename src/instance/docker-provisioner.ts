import type Docker from "dockerode";
import { logger } from "../config/logger.js";
import {
  type Provisioner,
  ProvisionerRejectedError,
  ProvisionerUnavailableError,
  type WorkloadHandle,
  type WorkloadSpec,
} from "./provisioner.js";

export const MANAGED_LABEL = "challenge-runtime.managed";
export const INSTANCE_LABEL = "challenge-runtime.instance-id";
export const CHALLENGE_LABEL = "challenge-runtime.challenge-id";
export const PRINCIPAL_LABEL = "challenge-runtime.principal-id";

/** Returns the image for a challenge, or null when the challenge has none. */
export type ImageResolver = (challengeId: string) => string | null;

export interface DockerProvisionerOptions {
  /** Pull the image before creating the container. Default true. */
  pullImages?: boolean;
  /** Docker network to attach workloads to. */
  networkMode?: string;
  /** Memory limit in bytes. */
  memoryBytes?: number;
}

const TRANSIENT_SOCKET_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOENT", "ETIMEDOUT", "EPIPE", "EAI_AGAIN"]);

function statusCodeOf(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  return undefined;
}

function socketCodeOf(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

/** Map a Docker Engine error to the provisioner's transient/permanent split. */
export function classifyDockerError(err: unknown, action: string): Error {
  if (err instanceof ProvisionerRejectedError || err instanceof ProvisionerUnavailableError) return err;
  const message = err instanceof Error ? err.message : String(err);
  const status = statusCodeOf(err);
  if (status !== undefined && status >= 400 && status < 500 && status !== 408 && status !== 429) {
    return new ProvisionerRejectedError(`Docker refused to ${action} (HTTP ${status}): ${message}`, { cause: err });
  }
  const code = socketCodeOf(err);
  const detail = status !== undefined ? `HTTP ${status}` : (code ?? "error");
  if (status === undefined && code !== undefined && !TRANSIENT_SOCKET_CODES.has(code)) {
    return new ProvisionerRejectedError(`Docker failed to ${action} (${detail}): ${message}`, { cause: err });
  }
  return new ProvisionerUnavailableError(`Docker unavailable to ${action} (${detail}): ${message}`, { cause: err });
}

/**
 * Runs each instance as a labelled Docker container with the flag in its
 * environment (FLAG).
 */
export class DockerProvisioner implements Provisioner {
  private readonly pullImages: boolean;

  constructor(
    private readonly docker: Docker,
    private readonly resolveImage: ImageResolver,
    private readonly options: DockerProvisionerOptions = {},
  ) {
    this.pullImages = options.pullImages ?? true;
  }

  async start(spec: WorkloadSpec, signal: AbortSignal): Promise<WorkloadHandle> {
    const image = this.resolveImage(spec.challengeId);
    if (!image) {
      throw new ProvisionerRejectedError(`No image configured for challenge ${spec.challengeId}`);
    }

    // Set once the container exists; any later failure removes it.
    let createdId: string | undefined;
    try {
      if (this.pullImages) await this.pullImage(image);
      signal.throwIfAborted();

      const hostConfig: Docker.ContainerCreateOptions["HostConfig"] = {
        PublishAllPorts: true,
        SecurityOpt: ["no-new-privileges"],
        CapDrop: ["ALL"],
        NetworkMode: this.options.networkMode,
        Memory: this.options.memoryBytes,
      };

      const container = await this.docker.createContainer({
        Image: image,
        Env: [
          `FLAG=${spec.flag}`,
          `INSTANCE_ID=${spec.instanceId}`,
          `CHALLENGE_ID=${spec.challengeId}`,
          `EXPIRES_AT=${spec.expiresAt}`,
        ],
        Labels: {
          [MANAGED_LABEL]: "true",
          [INSTANCE_LABEL]: spec.instanceId,
          [CHALLENGE_LABEL]: spec.challengeId,
          [PRINCIPAL_LABEL]: spec.principalId,
        },
        HostConfig: hostConfig,
      });
      createdId = container.id;

      signal.throwIfAborted();
      await container.start();
      logger.info(`Started container ${container.id} for instance ${spec.instanceId}`, {
        challengeId: spec.challengeId,
        image,
      });
      return container.id;
    } catch (err) {
      if (createdId) await this.removeQuietly(createdId);
      if (signal.aborted) throw err;
      throw classifyDockerError(err, "start workload");
    }
  }

  async stop(handle: WorkloadHandle, signal: AbortSignal): Promise<void> {
    signal.throwIfAborted();
    try {
      await this.docker.getContainer(handle).remove({ force: true, v: true });
      logger.info(`Removed container ${handle}`);
    } catch (err) {
      if (statusCodeOf(err) === 404) {
        logger.info(`Container ${handle} already gone`);
        return;
      }
      throw classifyDockerError(err, "stop workload");
    }
  }

  async release(instanceId: string, signal: AbortSignal): Promise<void> {
    let containers: Docker.ContainerInfo[];
    try {
      containers = await this.docker.listContainers({
        all: true,
        filters: { label: [`${INSTANCE_LABEL}=${instanceId}`] },
      });
    } catch (err) {
      throw classifyDockerError(err, "list workloads");
    }
    for (const info of containers) {
      await this.stop(info.Id, signal);
    }
  }

  private async pullImage(image: string): Promise<void> {
    logger.info(`Pulling image ${image}`);
    const stream = await this.docker.pull(image, {});
    await new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  private async removeQuietly(containerId: string): Promise<void> {
    try {
      await this.docker.getContainer(containerId).remove({ force: true });
    } catch (err) {
      logger.warn(`Failed to remove container ${containerId} after a failed start`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
