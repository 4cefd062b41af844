import { homedir } from "node:os";
import { join } from "node:path";
import * as core from "@actions/core";

export const commands = [
  "deploy",
  "swarm-deploy",
  "undeploy",
  "swarm-undeploy",
] as const;

export type Command = (typeof commands)[number];

/**
 * Deployment request
 */
export interface Settings {
  composeFiles: string[];
  destination: string;
  forceRecreate: boolean;
  keep: boolean;
  password?: string;
  projectName: string;
  prune: boolean;
  reference: string;
  registries: string[];
  repository: string;
  skipTlsVerify: boolean;
  username?: string;
  variables: Map<string, string>;
  cloneDepth?: number;
}

/**
 * Process-wide configuration of the external tools
 */
export interface Configuration {
  /**
   * Directory holding the `docker` and `sops` binaries. Empty to resolve
   * them from `PATH`.
   */
  binaryPath: string;

  /**
   * Docker client configuration directory; registry credentials are stored
   * here between login and logout.
   */
  dockerConfigPath: string;

  gitBinary: string;
}

export function defineSettings<T extends Settings>(settings: T) {
  return settings;
}

export function defineConfiguration<T extends Configuration>(
  configuration: T,
) {
  return configuration;
}

/**
 * Parse the command to run from GitHub Actions inputs
 */
export function parseCommand(input: string): Command {
  const command = commands.find((name) => name === input.trim());

  if (!command) {
    throw new Error(
      `Unknown command "${input}": expected one of ${commands.join(", ")}`,
    );
  }

  return command;
}

/**
 * Parse settings from GitHub Actions inputs
 */
export function parseSettings(env: NodeJS.ProcessEnv) {
  core.debug("Parsing settings from inputs");

  const password = getInput("password") || undefined;

  if (password) {
    core.setSecret(password);
  }

  return defineSettings({
    cloneDepth: parseDepth(getInput("clone-depth")),
    composeFiles: inferComposeFiles(getInput("compose-file"), env),
    destination: getInput("destination", { required: true }),
    forceRecreate: getFlag("force-recreate"),
    keep: getFlag("keep"),
    password,
    projectName: getInput("project-name", { required: true }),
    prune: getFlag("prune"),
    reference: getInput("reference"),
    registries: splitLines(getInput("registries")),
    repository: getInput("repository"),
    skipTlsVerify: getFlag("skip-tls-verify"),
    username: getInput("username") || undefined,
    variables: parseVariableInput(getInput("variables")),
  });
}

/**
 * Parse the tool configuration from GitHub Actions inputs and the environment
 */
export function parseConfiguration(env: NodeJS.ProcessEnv) {
  return defineConfiguration({
    binaryPath:
      getInput("binary-path") || env.STACK_DEPLOYER_BINARY_PATH || "",
    dockerConfigPath:
      getInput("docker-config") ||
      env.DOCKER_CONFIG ||
      join(homedir(), ".docker"),
    gitBinary: env.STACK_DEPLOYER_GIT_BINARY || "git",
  });
}

function getInput(name: string, options?: core.InputOptions) {
  return core.getInput(name, options) ?? "";
}

// Unset boolean inputs count as false instead of failing the parse.
function getFlag(name: string) {
  return getInput(name) ? core.getBooleanInput(name) : false;
}

function parseDepth(input: string) {
  if (!input) {
    return undefined;
  }

  const depth = parseInt(input, 10);

  if (Number.isNaN(depth) || depth < 1) {
    throw new Error(
      `Invalid clone depth "${input}": expected a positive integer`,
    );
  }

  return depth;
}

function splitLines(input: string) {
  return input
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
}

export function inferComposeFiles(
  files: string | undefined,
  env: NodeJS.ProcessEnv,
) {
  const composeFiles = files || env.COMPOSE_FILE;

  // Newlines separate files unless a custom separator is set
  const hasCustomSeparator = env.COMPOSE_PATH_SEPARATOR !== undefined;
  const hasNewlines = composeFiles?.includes("\n") ?? false;
  const separator =
    hasNewlines && !hasCustomSeparator
      ? "\n"
      : env.COMPOSE_PATH_SEPARATOR || ":";

  return (composeFiles?.split(separator) ?? [])
    .map((file) => file.trim())
    .filter(Boolean);
}

/**
 * Parse environment overrides
 *
 * Accepts a JSON object, or `KEY=VALUE` lines with `KEY<<DELIMITER` heredoc
 * blocks for multi-line values. Blank lines and `#` comments are ignored.
 */
export function parseVariableInput(input: string): Map<string, string> {
  const variables = new Map<string, string>();

  if (!input) {
    return variables;
  }

  const trimmedInput = input.trim();

  if (isJsonLike(trimmedInput)) {
    const parsed = parseJsonObject(trimmedInput);

    if (parsed) {
      for (const [key, value] of Object.entries(parsed)) {
        if (value !== null && value !== undefined) {
          variables.set(key, String(value));
        }
      }

      return variables;
    }
  }

  const lines = input.split("\n");
  let i = 0;

  while (i < lines.length) {
    const line = lines[i].trim();

    if (!line || line.startsWith("#")) {
      i++;
      continue;
    }

    const heredocMatch = line.match(
      /^([A-Za-z_][A-Za-z0-9_]*)<<([A-Za-z0-9_]+)$/,
    );

    if (heredocMatch) {
      const [, key, delimiter] = heredocMatch;
      const contentLines: string[] = [];

      i++;

      while (i < lines.length && lines[i] !== delimiter) {
        contentLines.push(lines[i]);
        i++;
      }

      variables.set(key, contentLines.join("\n"));

      // Skip the delimiter line
      i++;
    } else {
      const [key, ...parts] = line.split("=").map((part) => part.trim());
      variables.set(key, parts.join("="));
      i++;
    }
  }

  return variables;
}

function parseJsonObject(input: string): Record<string, unknown> | undefined {
  let parsed: unknown;

  try {
    parsed = JSON.parse(input);
  } catch {
    // Not JSON after all; the caller falls back to KEY=VALUE parsing
    return undefined;
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }

  return Object.fromEntries(Object.entries(parsed));
}

function isJsonLike(input: string): boolean {
  if (!input.startsWith("{") || !input.endsWith("}")) {
    return false;
  }

  // KEY=VALUE lines wrapped in braces by accident
  if (input.includes("=") && !input.includes(":")) {
    return false;
  }

  return true;
}
