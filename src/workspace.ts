import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";
import * as core from "@actions/core";
import { fail } from "./errors.js";
import { errorMessage } from "./utils.js";

export interface Workspace {
  /**
   * Per-project directory, `<destination>/stacks/<project>`
   */
  mountPath: string;

  /**
   * Repository checkout inside the mount path
   */
  clonePath: string;
}

/**
 * Infer the repository name from its URL
 *
 * Takes the last path segment and strips a `.git` suffix, so both
 * `https://example.com/org/app.git` and `git@example.com:org/app` yield `app`.
 * Returns `undefined` for URLs without any `/`.
 */
export function inferRepositoryName(url: string) {
  const index = url.lastIndexOf("/");

  if (index === -1) {
    return undefined;
  }

  return url.slice(index + 1).replace(/\.git$/, "");
}

/**
 * Resolve the per-project directory holding a stack's checkout
 */
export function resolveMountPath(destination: string, projectName: string) {
  return join(destination, "stacks", projectName);
}

/**
 * Resolve the workspace paths of a project
 *
 * Two requests for the same destination, project and repository always
 * resolve to the same workspace.
 */
export function resolveWorkspace(
  destination: string,
  projectName: string,
  repository: string,
): Workspace {
  const repositoryName = inferRepositoryName(repository);

  if (repositoryName === undefined) {
    throw fail(`Invalid Git repository URL "${repository}"`);
  }

  const mountPath = resolveMountPath(destination, projectName);

  return { mountPath, clonePath: join(mountPath, repositoryName) };
}

/**
 * Prepare the workspace for a deployment
 *
 * A kept workspace is reused as-is, including any checkout inside it.
 * Otherwise, the directory is wiped and created anew.
 */
export async function prepareWorkspace(
  { mountPath }: Readonly<Workspace>,
  keep: boolean,
) {
  if (keep) {
    core.info(`Reusing existing workspace at "${mountPath}"`);

    return;
  }

  try {
    await rm(mountPath, { recursive: true, force: true });
  } catch (cause) {
    throw fail(`Failed to remove previous directory "${mountPath}"`, cause);
  }

  try {
    await mkdir(mountPath, { recursive: true, mode: 0o755 });
  } catch (cause) {
    throw fail(`Failed to create destination directory "${mountPath}"`, cause);
  }

  core.info(`Created workspace directory at "${mountPath}"`);
}

/**
 * Remove the workspace after a stack has been removed
 *
 * Failures are logged only: by the time this runs, the stack itself is gone.
 *
 * @returns Whether the workspace was removed
 */
export async function cleanupWorkspace(
  { mountPath }: Pick<Readonly<Workspace>, "mountPath">,
  keep: boolean,
): Promise<{ removed: boolean; warning?: string }> {
  if (keep) {
    return { removed: false };
  }

  try {
    await rm(mountPath, { recursive: true, force: true });
  } catch (cause) {
    const warning =
      `Failed to remove project folder "${mountPath}": ` +
      errorMessage(cause);
    core.warning(warning);

    return { removed: false, warning };
  }

  core.info(`Removed workspace directory "${mountPath}"`);

  return { removed: true };
}
