import * as core from "@actions/core";
import { executeCommand } from "./engine.js";
import { fail } from "./errors.js";
import type { Configuration } from "./settings.js";
import { buildProcessEnv } from "./utils.js";

/**
 * Username sent with token-only credentials
 */
export const tokenUsername = "token";

export interface GitAuth {
  username: string;
  password: string;
}

export interface CloneOptions {
  reference?: string;
  username?: string;
  password?: string;
  depth: number;
  skipTlsVerify?: boolean;
  signal?: AbortSignal;
}

/**
 * Resolve basic authentication credentials
 *
 * Without a password no credentials are sent at all; a password without a
 * username is treated as an access token.
 */
export function resolveGitAuth(
  username: string | undefined,
  password: string | undefined,
): GitAuth | undefined {
  if (!password) {
    return undefined;
  }

  return { username: username || tokenUsername, password };
}

/**
 * Turn a fully qualified branch or tag ref into the short name git clone
 * takes for `--branch`
 */
export function normalizeReference(reference: string | undefined) {
  return reference?.trim().replace(/^refs\/(heads|tags)\//, "") || undefined;
}

/**
 * Build the environment passing credentials and TLS settings to git
 *
 * Credentials travel as an `http.extraHeader` through git's environment
 * configuration, so they never appear on the command line.
 */
export function buildGitEnv(
  auth: GitAuth | undefined,
  skipTlsVerify: boolean,
): Map<string, string> {
  const variables = new Map<string, string>([
    ["GIT_TERMINAL_PROMPT", "0"],
  ]);

  if (auth) {
    const token = Buffer.from(`${auth.username}:${auth.password}`).toString(
      "base64",
    );

    variables.set("GIT_CONFIG_COUNT", "1");
    variables.set("GIT_CONFIG_KEY_0", "http.extraHeader");
    variables.set("GIT_CONFIG_VALUE_0", `Authorization: Basic ${token}`);
  }

  if (skipTlsVerify) {
    variables.set("GIT_SSL_NO_VERIFY", "true");
  }

  return variables;
}

/**
 * Clone a single reference of a repository
 *
 * The clone is shallow and skips tags. A failed clone aborts the deployment;
 * there is no recovery of partial checkouts. Aborting the signal kills a
 * running git process.
 */
export async function cloneRepository(
  url: string,
  path: string,
  {
    reference,
    username,
    password,
    depth,
    skipTlsVerify = false,
    signal,
  }: CloneOptions,
  { gitBinary }: Pick<Readonly<Configuration>, "gitBinary">,
) {
  const auth = resolveGitAuth(username, password);
  const branch = normalizeReference(reference);

  if (auth) {
    core.setSecret(auth.password);
    core.info(`Using Git authentication as "${auth.username}"`);
  }

  core.info(`Cloning ${url} into "${path}" (depth ${depth})`);

  try {
    await executeCommand(
      gitBinary,
      [
        "clone",
        "--depth",
        String(depth),
        "--single-branch",
        "--no-tags",
        ...(branch ? ["--branch", branch] : []),
        "--",
        url,
        path,
      ],
      { env: buildProcessEnv(buildGitEnv(auth, skipTlsVerify)), signal },
    );

    signal?.throwIfAborted();
  } catch (cause) {
    throw fail("Failed to clone Git repository", cause);
  }
}
