import { readdir } from "node:fs/promises";
import {
  basename,
  dirname,
  isAbsolute,
  join,
  normalize,
  relative,
  sep,
} from "node:path";
import * as core from "@actions/core";
import { executeCommand, resolveBinary } from "./engine.js";
import { fail } from "./errors.js";
import type { Configuration } from "./settings.js";
import { buildProcessEnv, errorMessage } from "./utils.js";

export const secretMarker = ".secret.";

/**
 * Check whether a file name carries the secret marker, as in `app.secret.yml`
 */
export function isSecretFile(name: string) {
  return name.includes(secretMarker);
}

/**
 * Name of the plaintext file a secret file decrypts to
 *
 * `app.secret.yml` becomes `app.yml`.
 */
export function decryptedFileName(name: string) {
  return name.replaceAll(secretMarker, ".");
}

/**
 * Find the minimal set of directories covering all given files
 *
 * Sorting puts every directory right after its ancestors, so walking the
 * list once and dropping anything inside an already kept root leaves only
 * non-overlapping roots.
 */
export function findRootPaths(filePaths: readonly string[]) {
  const folderPaths = filePaths.map((path) => normalize(dirname(path))).sort();
  const rootPaths: string[] = [];

  for (const folderPath of folderPaths) {
    if (!rootPaths.some((root) => isWithin(root, folderPath))) {
      rootPaths.push(folderPath);
    }
  }

  return rootPaths;
}

function isWithin(root: string, path: string) {
  const rel = relative(root, path);

  return (
    rel === "" ||
    (rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel))
  );
}

/**
 * Recursively collect secret files below the given roots
 *
 * Directories that cannot be read are skipped with a warning.
 */
export async function findSecretFiles(rootPaths: readonly string[]) {
  const files: string[] = [];
  const warnings: string[] = [];

  async function walk(path: string) {
    let entries;

    try {
      entries = await readdir(path, { withFileTypes: true });
    } catch (cause) {
      const warning =
        `Failed to scan "${path}" for secret files: ` + errorMessage(cause);
      core.warning(warning);
      warnings.push(warning);

      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const entryPath = join(path, entry.name);

      if (entry.isDirectory()) {
        await walk(entryPath);
      } else if (isSecretFile(entry.name)) {
        core.info(`Found secret file "${entryPath}"`);
        files.push(entryPath);
      }
    }
  }

  for (const rootPath of rootPaths) {
    core.info(`Looking for secret files in "${rootPath}"`);
    await walk(rootPath);
  }

  return { files, warnings };
}

/**
 * Decrypt secret files next to their encrypted originals
 *
 * The first file that fails to decrypt aborts the deployment.
 *
 * @returns Paths of the decrypted files
 */
export async function decryptSecretFiles(
  files: readonly string[],
  variables: ReadonlyMap<string, string>,
  configuration: Pick<Readonly<Configuration>, "binaryPath">,
) {
  const command = resolveBinary(configuration, "sops");
  const env = buildProcessEnv(variables);
  const decrypted: string[] = [];

  for (const file of files) {
    const folder = dirname(file);
    const name = basename(file);
    const outputName = decryptedFileName(name);

    try {
      await executeCommand(
        command,
        ["--output", outputName, "--decrypt", name],
        { cwd: folder, env, silent: true },
      );
    } catch (cause) {
      throw fail(`Failed to decrypt secret file "${file}"`, cause);
    }

    decrypted.push(join(folder, outputName));
  }

  return decrypted;
}

/**
 * Decrypt all secret files living alongside the given compose files
 */
export async function resolveSecrets(
  composeFiles: readonly string[],
  variables: ReadonlyMap<string, string>,
  configuration: Pick<Readonly<Configuration>, "binaryPath">,
) {
  const rootPaths = findRootPaths(composeFiles);
  const { files, warnings } = await findSecretFiles(rootPaths);
  const decrypted = await decryptSecretFiles(files, variables, configuration);

  return { decrypted, warnings };
}
