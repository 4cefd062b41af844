import { readFile } from "node:fs/promises";
import * as core from "@actions/core";
import { load } from "js-yaml";

/**
 * Request defaults stored in a YAML file
 *
 * ```yaml
 * reference: refs/heads/main
 * composeFiles:
 *   - compose.yaml
 * env:
 *   APP_ENV: production
 * registries:
 *   - deployer:test-secret:registry.example.com
 * forceRecreate: true
 * ```
 */
export interface RequestFile {
  binaryPath?: string;
  cloneDepth?: number;
  composeFiles?: string[];
  dockerConfig?: string;
  env?: Record<string, string>;
  forceRecreate?: boolean;
  keep?: boolean;
  password?: string;
  prune?: boolean;
  reference?: string;
  registries?: string[];
  skipTlsVerify?: boolean;
  username?: string;
}

/**
 * Load request defaults from a YAML file
 */
export async function loadRequestFile(path: string): Promise<RequestFile> {
  let content: string;

  try {
    content = await readFile(path, "utf8");
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : String(cause);
    throw new Error(`Failed to read request file "${path}": ${message}`, {
      cause,
    });
  }

  let data: unknown;

  try {
    data = load(content, {
      filename: path,
      onWarning: (error) => core.warning(error.message),
    });
  } catch (cause) {
    throw new Error(`Failed to parse request file "${path}": ${cause}`, {
      cause,
    });
  }

  return parseRequestFile(data ?? {}, path);
}

export function parseRequestFile(data: unknown, path = "request file") {
  if (!isRecord(data)) {
    throw new Error(`Invalid ${path}: expected a mapping at the top level`);
  }

  const file: RequestFile = {};
  const invalid = (key: string, expected: string) =>
    new Error(`Invalid ${path}: "${key}" must be ${expected}`);

  for (const [key, value] of Object.entries(data)) {
    switch (key) {
      case "binaryPath":
      case "dockerConfig":
      case "password":
      case "reference":
      case "username":
        if (typeof value !== "string") {
          throw invalid(key, "a string");
        }

        file[key] = value;
        break;

      case "forceRecreate":
      case "keep":
      case "prune":
      case "skipTlsVerify":
        if (typeof value !== "boolean") {
          throw invalid(key, "a boolean");
        }

        file[key] = value;
        break;

      case "cloneDepth":
        if (
          typeof value !== "number" ||
          !Number.isInteger(value) ||
          value < 1
        ) {
          throw invalid(key, "a positive integer");
        }

        file.cloneDepth = value;
        break;

      case "composeFiles":
      case "registries":
        if (!isStringArray(value)) {
          throw invalid(key, "a list of strings");
        }

        file[key] = value;
        break;

      case "env":
        if (!isRecord(value)) {
          throw invalid(key, "a mapping");
        }

        file.env = Object.fromEntries(
          Object.entries(value).map(([name, entry]) => [name, String(entry)]),
        );
        break;

      default:
        core.warning(`Ignoring unknown key "${key}" in ${path}`);
    }
  }

  return file;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return (
    Array.isArray(value) && value.every((entry) => typeof entry === "string")
  );
}
