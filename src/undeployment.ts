import * as core from "@actions/core";
import { composeDown, removeStack } from "./engine.js";
import { fail } from "./errors.js";
import type { Configuration, Settings } from "./settings.js";
import {
  cleanupWorkspace,
  resolveMountPath,
  resolveWorkspace,
} from "./workspace.js";

export interface UndeploymentResult {
  mountPath: string;
  cleanedUp: boolean;
  warnings: string[];
}

type UndeploySettings = Pick<
  Readonly<Settings>,
  "destination" | "keep" | "projectName" | "prune" | "repository"
>;

type SwarmUndeploySettings = Pick<
  Readonly<Settings>,
  "destination" | "keep" | "projectName"
>;

/**
 * Remove a Compose stack from a single Docker engine
 */
export async function undeploy(
  settings: UndeploySettings,
  configuration: Readonly<Configuration>,
): Promise<UndeploymentResult> {
  core.info(`Removing Compose stack "${settings.projectName}"`);

  // Validates the repository URL, as deploy does
  const { mountPath } = resolveWorkspace(
    settings.destination,
    settings.projectName,
    settings.repository,
  );

  try {
    await composeDown(
      settings.projectName,
      { removeOrphans: settings.prune },
      configuration,
    );
  } catch (cause) {
    throw fail("Failed to remove Compose stack", cause);
  }

  return finish(mountPath, settings.keep);
}

/**
 * Remove a stack from a Docker Swarm
 */
export async function swarmUndeploy(
  settings: SwarmUndeploySettings,
  configuration: Readonly<Configuration>,
): Promise<UndeploymentResult> {
  core.info(`Removing Swarm stack "${settings.projectName}"`);

  const mountPath = resolveMountPath(
    settings.destination,
    settings.projectName,
  );

  try {
    await removeStack(settings.projectName, configuration);
  } catch (cause) {
    throw fail("Failed to remove Swarm stack", cause);
  }

  return finish(mountPath, settings.keep);
}

async function finish(
  mountPath: string,
  keep: boolean,
): Promise<UndeploymentResult> {
  const { removed, warning } = await cleanupWorkspace({ mountPath }, keep);

  return {
    mountPath,
    cleanedUp: removed,
    warnings: warning ? [warning] : [],
  };
}
