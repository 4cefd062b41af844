import { spawn } from "node:child_process";
import { join } from "node:path";
import { platform, stderr, stdout } from "node:process";
import * as core from "@actions/core";
import { exec } from "@actions/exec";
import type { Configuration } from "./settings.js";
import { buildProcessEnv } from "./utils.js";

export const stackNamespaceLabel = "com.docker.stack.namespace";

/**
 * Resolve an external tool inside the configured binary directory
 *
 * With no binary directory configured, the bare name is returned and the
 * tool is looked up on `PATH`.
 */
export function resolveBinary(
  { binaryPath }: Pick<Readonly<Configuration>, "binaryPath">,
  name: string,
) {
  const executable = platform === "win32" ? `${name}.exe` : name;

  return binaryPath ? join(binaryPath, executable) : executable;
}

interface ComposeOptions {
  projectName: string;
  workingDir: string;
  variables: ReadonlyMap<string, string>;
}

/**
 * Bring up a Compose project on a single Docker engine
 */
export async function composeUp(
  composeFiles: readonly string[],
  {
    projectName,
    workingDir,
    variables,
    forceRecreate = false,
    removeOrphans = false,
  }: ComposeOptions & { forceRecreate?: boolean; removeOrphans?: boolean },
  configuration: Readonly<Configuration>,
) {
  const fileFlags = composeFiles.flatMap((file) => ["--file", file]);

  await executeDockerCommand(
    [
      "compose",
      "--project-name",
      projectName,
      "--project-directory",
      workingDir,
      ...fileFlags,
      "up",
      "--detach",
      forceRecreate ? "--force-recreate" : "",
      removeOrphans ? "--remove-orphans" : "",
    ],
    configuration,
    { cwd: workingDir, env: buildProcessEnv(variables) },
  );

  core.info(`Deployed Compose project ${projectName}`);
}

/**
 * Remove a Compose project from a single Docker engine
 */
export async function composeDown(
  projectName: string,
  { removeOrphans = false }: { removeOrphans?: boolean },
  configuration: Readonly<Configuration>,
) {
  await executeDockerCommand(
    [
      "compose",
      "--project-name",
      projectName,
      "down",
      removeOrphans ? "--remove-orphans" : "",
    ],
    configuration,
  );

  core.info(`Removed Compose project ${projectName}`);
}

/**
 * Deploy the stack to the Swarm
 */
export async function deployStack(
  composeFiles: readonly string[],
  {
    projectName,
    workingDir,
    variables,
    prune = false,
  }: ComposeOptions & { prune?: boolean },
  configuration: Readonly<Configuration>,
) {
  const fileFlags = composeFiles.flatMap((file) => ["--compose-file", file]);

  await executeDockerCommand(
    [
      "stack",
      "deploy",
      "--with-registry-auth",
      prune ? "--prune" : "",
      ...fileFlags,
      projectName,
    ],
    configuration,
    { cwd: workingDir, env: buildProcessEnv(variables) },
  );

  core.info(`Deployed stack ${projectName}`);
}

/**
 * Remove the stack from the Swarm
 */
export async function removeStack(
  projectName: string,
  configuration: Readonly<Configuration>,
) {
  await executeDockerCommand(["stack", "rm", projectName], configuration);

  core.info(`Removed stack ${projectName}`);
}

/**
 * List the IDs of all services belonging to a stack
 */
export async function listStackServices(
  projectName: string,
  configuration: Readonly<Configuration>,
) {
  core.debug(`Listing services of stack ${projectName}`);

  try {
    const output = await executeDockerCommand(
      [
        "service",
        "ls",
        "--format=json",
        "--filter",
        `label=${stackNamespaceLabel}=${projectName}`,
      ],
      configuration,
      { silent: true },
    );

    return parseLineDelimitedJson<ServiceMetadata>(output).map(({ ID }) => ID);
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : String(cause);

    throw new Error(`Failed to list services: ${message}`, { cause });
  }
}

/**
 * Force a service to recreate its tasks, even if its spec is unchanged
 *
 * @param id The ID of the service to update
 */
export async function forceUpdateService(
  id: string,
  configuration: Readonly<Configuration>,
) {
  core.info(`Forcing update of service "${id}"`);

  try {
    await executeDockerCommand(
      ["service", "update", "--force", "--detach=true", id],
      configuration,
      { silent: true },
    );
  } catch (cause) {
    throw new Error(`Failed to update service "${id}": ${cause}`, { cause });
  }
}

/**
 * Execute a Docker command against the configured client configuration
 */
export async function executeDockerCommand(
  args: [string, ...string[]],
  configuration: Readonly<Configuration>,
  options: CommandOptions = {},
) {
  return executeCommand(
    resolveBinary(configuration, "docker"),
    ["--config", configuration.dockerConfigPath, ...args],
    options,
  );
}

export interface CommandOptions {
  env?: Record<string, string>;
  cwd?: string;
  silent?: boolean;
  label?: string;
  signal?: AbortSignal;
}

interface OutputListeners {
  stdout: (data: Buffer) => void;
  stderr: (data: Buffer) => void;
}

/**
 * Execute an external command
 *
 * This function executes a command with the given arguments and options.
 * It captures the output from stdout and returns it as a string. On failure,
 * the captured output is logged and the error message carries stderr.
 *
 * @param command   The executable to run
 * @param args      The arguments to pass to the command
 * @param [env]     Optional environment to run the command with
 * @param [cwd]     Optional working directory
 * @param [silent]  If true, suppresses the output of the command to the log
 * @param [label]   Replaces the command line in the log group title, for
 *                  commands carrying credentials
 * @param [signal]  Kills the process when aborted
 */
export async function executeCommand(
  command: string,
  args: string[],
  {
    env = undefined,
    cwd = undefined,
    silent = false,
    label = undefined,
    signal = undefined,
  }: CommandOptions = {},
) {
  const filteredArgs = args.filter((arg) => arg !== "");
  let output = "";
  let errorOutput = "";
  const listeners: OutputListeners = {
    stdout: (data) => (output += data.toString()),
    stderr: (data) => (errorOutput += data.toString()),
  };

  core.startGroup(label ?? `${command} ${filteredArgs.join(" ")}`);

  try {
    if (signal) {
      signal.throwIfAborted();
      await spawnAbortable(command, filteredArgs, {
        env,
        cwd,
        silent,
        listeners,
        signal,
      });
    } else {
      await exec(command, filteredArgs, { silent, env, cwd, listeners });
    }

    core.debug(output);
  } catch (cause) {
    const message = cause instanceof Error ? cause.message : String(cause);
    core.error(`Command failed: ${message}`);
    core.error(output);
    core.error(errorOutput);

    const detail = errorOutput.trim();

    throw new Error(
      `Failed to execute ${command}: ${
        detail ? `${message}: ${detail}` : message
      }`,
      { cause },
    );
  } finally {
    core.endGroup();
  }

  return output;
}

/**
 * Run a process that is killed as soon as the signal aborts
 *
 * The promise settles on abort without waiting for the process's output
 * streams to close.
 */
function spawnAbortable(
  command: string,
  args: string[],
  {
    env,
    cwd,
    silent,
    listeners,
    signal,
  }: {
    env: Record<string, string> | undefined;
    cwd: string | undefined;
    silent: boolean;
    listeners: OutputListeners;
    signal: AbortSignal;
  },
) {
  return new Promise<number>((resolve, reject) => {
    const child = spawn(command, args, {
      env,
      cwd,
      signal,
      stdio: ["ignore", "pipe", "pipe"],
    });

    child.stdout.on("data", (data: Buffer) => {
      listeners.stdout(data);

      if (!silent) {
        stdout.write(data);
      }
    });
    child.stderr.on("data", (data: Buffer) => {
      listeners.stderr(data);

      if (!silent) {
        stderr.write(data);
      }
    });
    child.once("error", reject);
    child.once("close", (code, exitSignal) => {
      if (code === 0) {
        resolve(code);
      } else {
        reject(
          new Error(
            `The process '${command}' failed with ${
              code === null ? `signal ${exitSignal}` : `exit code ${code}`
            }`,
          ),
        );
      }
    });
  });
}

function parseLineDelimitedJson<T>(data: string): T[] {
  return data
    .trim()
    .split("\n")
    .filter((line) => line.trim() !== "")
    .map((line) => JSON.parse(line) as T);
}

export type ServiceMetadata = {
  ID: string;
  Name: string;
  Mode: "replicated" | "global";
  Replicas: string;
  Image: string;
  Ports: string;
};
