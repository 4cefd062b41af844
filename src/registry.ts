import * as core from "@actions/core";
import { executeDockerCommand } from "./engine.js";
import type { Configuration } from "./settings.js";
import { type BatchOutcome, emptyOutcome, errorMessage } from "./utils.js";

export interface RegistryCredential {
  username: string;
  password: string;
  server: string;
}

/**
 * Parse a `username:password:server` credential
 *
 * @returns The credential, or `undefined` unless there are exactly three
 *          segments
 */
export function parseRegistryCredential(
  entry: string,
): RegistryCredential | undefined {
  const segments = entry.split(":");

  if (segments.length !== 3) {
    return undefined;
  }

  const [username, password, server] = segments;

  return { username, password, server };
}

/**
 * Parse registry credentials, dropping malformed entries with a warning
 */
export function parseRegistryCredentials(entries: readonly string[]) {
  const credentials: RegistryCredential[] = [];
  const warnings: string[] = [];

  for (const [index, entry] of entries.entries()) {
    const credential = parseRegistryCredential(entry);

    if (!credential) {
      // The entry contains the password, so only its position is logged
      const warning = `Registry entry #${index + 1} is malformed, skipping`;
      core.warning(warning);
      warnings.push(warning);

      continue;
    }

    core.setSecret(credential.password);
    credentials.push(credential);
  }

  return { credentials, warnings };
}

/**
 * Log in to each registry
 *
 * Registry access is optional: stacks may well use public images, so failed
 * logins are reported but never abort the deployment.
 */
export async function loginRegistries(
  registries: readonly string[],
  configuration: Readonly<Configuration>,
) {
  return forEachRegistry(registries, "login", async (credential) => {
    await executeDockerCommand(
      [
        "login",
        "--username",
        credential.username,
        "--password",
        credential.password,
        credential.server,
      ],
      configuration,
      { silent: true, label: `docker login ${credential.server}` },
    );
  });
}

/**
 * Log out of each registry
 */
export async function logoutRegistries(
  registries: readonly string[],
  configuration: Readonly<Configuration>,
) {
  return forEachRegistry(registries, "logout", async (credential) => {
    await executeDockerCommand(
      ["logout", credential.server],
      configuration,
      { silent: true },
    );
  });
}

async function forEachRegistry(
  registries: readonly string[],
  action: "login" | "logout",
  callback: (credential: RegistryCredential) => Promise<void>,
): Promise<BatchOutcome<string>> {
  const { credentials, warnings } = parseRegistryCredentials(registries);
  const outcome = emptyOutcome<string>();
  outcome.warnings.push(...warnings);

  for (const credential of credentials) {
    try {
      await callback(credential);
    } catch (cause) {
      const warning =
        `Docker ${action} to ${credential.server} failed, skipping: ` +
        errorMessage(cause);
      core.warning(warning);
      outcome.warnings.push(warning);
      outcome.failed.push({
        item: credential.server,
        error: cause instanceof Error ? cause : new Error(String(cause)),
      });

      continue;
    }

    core.info(`Docker ${action} to ${credential.server} succeeded`);
    outcome.succeeded.push(credential.server);
  }

  return outcome;
}

export interface RegistrySession {
  login: BatchOutcome<string>;
  logout: BatchOutcome<string>;
}

/**
 * Run a callback while logged in to the given registries
 *
 * Logout runs whether the callback succeeds or not, so credentials never
 * outlive the invocation.
 */
export async function withRegistrySession<T>(
  registries: readonly string[],
  configuration: Readonly<Configuration>,
  callback: () => Promise<T>,
): Promise<{ result: T; session: RegistrySession }> {
  const login = await loginRegistries(registries, configuration);
  let logout: BatchOutcome<string>;
  let result: T;

  try {
    result = await callback();
  } finally {
    logout = await logoutRegistries(registries, configuration);
  }

  return { result, session: { login, logout } };
}
