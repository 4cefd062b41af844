import { join } from "node:path";
import * as core from "@actions/core";
import { composeUp, deployStack } from "./engine.js";
import { fail } from "./errors.js";
import {
  forceUpdateServices,
  intersectServices,
  type ServiceSnapshot,
  shouldForceUpdate,
  snapshotServices,
} from "./reconciliation.js";
import { type RegistrySession, withRegistrySession } from "./registry.js";
import { cloneRepository } from "./repository.js";
import { resolveSecrets } from "./secrets.js";
import type { Configuration, Settings } from "./settings.js";
import type { BatchOutcome } from "./utils.js";
import {
  prepareWorkspace,
  resolveWorkspace,
  type Workspace,
} from "./workspace.js";

export const composeCloneDepth = 1;
export const swarmCloneDepth = 100;

export interface DeploymentResult {
  workspace: Workspace;
  composeFiles: string[];
  decryptedFiles: string[];
  registries: RegistrySession;
  forcedServices?: BatchOutcome<string>;
  warnings: string[];
}

export interface DeploymentOptions {
  /**
   * Kills a running repository clone; later steps run to completion once
   * started
   */
  signal?: AbortSignal;
}

/**
 * Deploy a Compose stack from a Git repository to a single Docker engine
 */
export async function deploy(
  settings: Readonly<Settings>,
  configuration: Readonly<Configuration>,
  { signal }: DeploymentOptions = {},
): Promise<DeploymentResult> {
  core.info(
    `Deploying Compose stack "${settings.projectName}" ` +
      `from ${settings.repository}`,
  );

  const checkout = await checkoutStack(
    settings,
    configuration,
    settings.cloneDepth ?? composeCloneDepth,
    signal,
  );

  const { session } = await withRegistrySession(
    settings.registries,
    configuration,
    async () => {
      try {
        await composeUp(
          checkout.composeFiles,
          {
            projectName: settings.projectName,
            workingDir: checkout.workspace.clonePath,
            variables: settings.variables,
            forceRecreate: settings.forceRecreate,
            removeOrphans: settings.prune,
          },
          configuration,
        );
      } catch (cause) {
        throw fail("Failed to deploy Compose stack", cause);
      }
    },
  );

  core.info("Compose stack deployment complete");

  return {
    ...checkout,
    registries: session,
    warnings: [
      ...checkout.warnings,
      ...session.login.warnings,
      ...session.logout.warnings,
    ],
  };
}

/**
 * Deploy a stack from a Git repository to a Docker Swarm
 *
 * When a redeploy is forced and the stack already has running services,
 * those services are force-updated after the deploy, as `docker stack
 * deploy` leaves services with an unchanged spec alone.
 */
export async function swarmDeploy(
  settings: Readonly<Settings>,
  configuration: Readonly<Configuration>,
  { signal }: DeploymentOptions = {},
): Promise<DeploymentResult> {
  core.info(
    `Deploying Swarm stack "${settings.projectName}" ` +
      `from ${settings.repository}`,
  );

  const before = await takeSnapshot(settings.projectName, configuration);
  const forceUpdate = shouldForceUpdate(settings.forceRecreate, before);

  if (forceUpdate) {
    core.info(
      `Stack has ${before.size} running service(s), ` +
        "which will be force updated",
    );
  }

  const checkout = await checkoutStack(
    settings,
    configuration,
    settings.cloneDepth ?? swarmCloneDepth,
    signal,
  );

  const { result: forcedServices, session } = await withRegistrySession(
    settings.registries,
    configuration,
    async () => {
      try {
        await deployStack(
          checkout.composeFiles,
          {
            projectName: settings.projectName,
            workingDir: checkout.workspace.clonePath,
            variables: settings.variables,
            prune: settings.prune,
          },
          configuration,
        );
      } catch (cause) {
        throw fail("Failed to deploy Swarm stack", cause);
      }

      if (!forceUpdate) {
        return undefined;
      }

      const after = await takeSnapshot(settings.projectName, configuration);

      return forceUpdateServices(
        intersectServices(before, after),
        configuration,
      );
    },
  );

  core.info("Swarm stack deployment complete");

  return {
    ...checkout,
    registries: session,
    forcedServices,
    warnings: [
      ...checkout.warnings,
      ...session.login.warnings,
      ...session.logout.warnings,
      ...(forcedServices?.warnings ?? []),
    ],
  };
}

async function takeSnapshot(
  projectName: string,
  configuration: Readonly<Configuration>,
): Promise<ServiceSnapshot> {
  try {
    return await snapshotServices(projectName, configuration);
  } catch (cause) {
    throw fail(`Failed to list running services of "${projectName}"`, cause);
  }
}

/**
 * Materialize the repository and decrypt its secret files
 *
 * A kept workspace is deployed from the checkout already in place.
 */
async function checkoutStack(
  settings: Readonly<Settings>,
  configuration: Readonly<Configuration>,
  depth: number,
  signal: AbortSignal | undefined,
) {
  const workspace = resolveWorkspace(
    settings.destination,
    settings.projectName,
    settings.repository,
  );

  await prepareWorkspace(workspace, settings.keep);

  if (!settings.keep) {
    await cloneRepository(
      settings.repository,
      workspace.clonePath,
      {
        reference: settings.reference,
        username: settings.username,
        password: settings.password,
        depth,
        skipTlsVerify: settings.skipTlsVerify,
        signal,
      },
      configuration,
    );
  }

  const composeFiles = settings.composeFiles.map((file) =>
    join(workspace.clonePath, file),
  );
  const { decrypted, warnings } = await resolveSecrets(
    composeFiles,
    settings.variables,
    configuration,
  );

  return { workspace, composeFiles, decryptedFiles: decrypted, warnings };
}
