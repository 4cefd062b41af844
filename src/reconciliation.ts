import * as core from "@actions/core";
import { forceUpdateService, listStackServices } from "./engine.js";
import type { Configuration } from "./settings.js";
import { type BatchOutcome, emptyOutcome, errorMessage } from "./utils.js";

export type ServiceSnapshot = ReadonlySet<string>;

/**
 * Snapshot the services currently running for a stack
 */
export async function snapshotServices(
  projectName: string,
  configuration: Readonly<Configuration>,
): Promise<ServiceSnapshot> {
  return new Set(await listStackServices(projectName, configuration));
}

/**
 * Decide whether running services must be recreated after the deploy
 *
 * An existing checkout says little about whether the stack is deployed, as
 * the workspace may have been wiped independently; running services do.
 */
export function shouldForceUpdate(
  forceRecreate: boolean,
  before: ServiceSnapshot,
) {
  return forceRecreate && before.size > 0;
}

/**
 * Services present both before and after the deploy
 *
 * Services that only exist afterwards were just created and need no forcing.
 */
export function intersectServices(
  before: ServiceSnapshot,
  after: ServiceSnapshot,
) {
  return [...after].filter((id) => before.has(id));
}

/**
 * Force-update each service independently
 *
 * A service that fails to update is reported and the rest carry on.
 */
export async function forceUpdateServices(
  serviceIds: readonly string[],
  configuration: Readonly<Configuration>,
): Promise<BatchOutcome<string>> {
  const outcome = emptyOutcome<string>();

  for (const id of serviceIds) {
    try {
      await forceUpdateService(id, configuration);
      outcome.succeeded.push(id);
    } catch (cause) {
      const warning =
        `Failed to force update of service "${id}": ` + errorMessage(cause);
      core.warning(warning);
      outcome.warnings.push(warning);
      outcome.failed.push({
        item: id,
        error: cause instanceof Error ? cause : new Error(String(cause)),
      });
    }
  }

  return outcome;
}
