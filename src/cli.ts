import { env } from "node:process";
import * as core from "@actions/core";
import { Command, InvalidArgumentError } from "commander";
import packageJson from "../package.json" with { type: "json" };
import { runCommand } from "./main.js";
import { loadRequestFile, type RequestFile } from "./request-file.js";
import {
  commands,
  type Command as StackCommand,
  type Configuration,
  defineConfiguration,
  defineSettings,
  parseConfiguration,
  parseVariableInput,
  type Settings,
} from "./settings.js";

export interface CliOptions {
  reference?: string;
  user?: string;
  password?: string;
  env: string[];
  registry: string[];
  keep?: boolean;
  forceRecreate?: boolean;
  prune?: boolean;
  skipTlsVerify?: boolean;
  cloneDepth?: number;
  binaryPath?: string;
  dockerConfig?: string;
  config?: string;
}

const descriptions: Record<StackCommand, string> = {
  deploy: "Deploy a Compose stack from a Git repository to a Docker engine",
  "swarm-deploy": "Deploy a stack from a Git repository to a Docker Swarm",
  undeploy: "Remove a Compose stack from a Docker engine",
  "swarm-undeploy": "Remove a stack from a Docker Swarm",
};

/**
 * Build the command line interface
 *
 * @param handler Runs the parsed command; replaced in tests
 * @param signal  Cancels the running command
 */
export function createProgram(handler = runCommand, signal?: AbortSignal) {
  const program = new Command();

  program
    .name("stack-deployer")
    .description("Deploy container stacks straight from Git repositories")
    .version(packageJson.version);

  for (const name of commands) {
    program
      .command(name)
      .description(descriptions[name])
      .argument("<repository>", "Git repository URL")
      .argument("<project-name>", "Stack project name")
      .argument("<destination>", "Root directory for stack workspaces")
      .argument(
        "[compose-files...]",
        "Compose files, relative to the repository root",
      )
      .option("-r, --reference <ref>", "Branch or tag to deploy")
      .option("-u, --user <username>", "Git username")
      .option("-p, --password <password>", "Git password or access token")
      .option(
        "-e, --env <KEY=VALUE>",
        "Environment override, repeatable",
        collect,
        [],
      )
      .option(
        "--registry <user:password:server>",
        "Registry credentials, repeatable",
        collect,
        [],
      )
      .option("-k, --keep", "Reuse the existing workspace")
      .option("--force-recreate", "Recreate containers even if unchanged")
      .option("--prune", "Remove services no longer in the compose files")
      .option("--skip-tls-verify", "Skip TLS verification when cloning")
      .option(
        "--clone-depth <depth>",
        "History depth of the clone",
        parsePositiveInteger,
      )
      .option("--binary-path <path>", "Directory holding docker and sops")
      .option("--docker-config <path>", "Docker client configuration directory")
      .option("-c, --config <file>", "YAML file with request defaults")
      .action(
        async (
          repository: string,
          projectName: string,
          destination: string,
          composeFiles: string[],
          options: CliOptions,
        ) => {
          const file: RequestFile = options.config
            ? await loadRequestFile(options.config)
            : {};
          const settings = buildSettings(
            { repository, projectName, destination, composeFiles },
            options,
            file,
          );
          const configuration = buildConfiguration(options, file);

          try {
            await handler(name, settings, configuration, signal);
          } catch (error) {
            core.setFailed(error instanceof Error ? error : String(error));

            return;
          }

          core.info(`Command ${name} for "${projectName}" completed`);
        },
      );
  }

  return program;
}

export function buildSettings(
  args: Pick<
    Settings,
    "repository" | "projectName" | "destination" | "composeFiles"
  >,
  options: CliOptions,
  file: RequestFile = {},
): Settings {
  const variables = new Map(Object.entries(file.env ?? {}));

  for (const [key, value] of parseVariableInput(options.env.join("\n"))) {
    variables.set(key, value);
  }

  const password = options.password ?? file.password;

  if (password) {
    core.setSecret(password);
  }

  return defineSettings({
    cloneDepth: options.cloneDepth ?? file.cloneDepth,
    composeFiles:
      args.composeFiles.length > 0
        ? args.composeFiles
        : (file.composeFiles ?? []),
    destination: args.destination,
    forceRecreate: options.forceRecreate ?? file.forceRecreate ?? false,
    keep: options.keep ?? file.keep ?? false,
    password,
    projectName: args.projectName,
    prune: options.prune ?? file.prune ?? false,
    reference: options.reference ?? file.reference ?? "",
    registries: [...(file.registries ?? []), ...options.registry],
    repository: args.repository,
    skipTlsVerify: options.skipTlsVerify ?? file.skipTlsVerify ?? false,
    username: options.user ?? file.username,
    variables,
  });
}

export function buildConfiguration(
  options: Pick<CliOptions, "binaryPath" | "dockerConfig">,
  file: RequestFile = {},
): Configuration {
  const defaults = parseConfiguration(env);

  return defineConfiguration({
    ...defaults,
    binaryPath: options.binaryPath ?? file.binaryPath ?? defaults.binaryPath,
    dockerConfigPath:
      options.dockerConfig ?? file.dockerConfig ?? defaults.dockerConfigPath,
  });
}

function collect(value: string, previous: string[]) {
  return [...previous, value];
}

function parsePositiveInteger(value: string) {
  const parsed = parseInt(value, 10);

  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }

  return parsed;
}
