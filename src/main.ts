import { env } from "node:process";
import * as core from "@actions/core";
import { type DeploymentResult, deploy, swarmDeploy } from "./deployment.js";
import {
  type Command,
  type Configuration,
  parseCommand,
  parseConfiguration,
  parseSettings,
  type Settings,
} from "./settings.js";
import {
  swarmUndeploy,
  type UndeploymentResult,
  undeploy,
} from "./undeployment.js";
import { listenForShutdown } from "./utils.js";

export type CommandResult =
  | { command: "deploy"; result: DeploymentResult }
  | { command: "swarm-deploy"; result: DeploymentResult }
  | { command: "undeploy"; result: UndeploymentResult }
  | { command: "swarm-undeploy"; result: UndeploymentResult };

/**
 * Run one of the four stack commands
 */
export async function runCommand(
  command: Command,
  settings: Readonly<Settings>,
  configuration: Readonly<Configuration>,
  signal?: AbortSignal,
): Promise<CommandResult> {
  switch (command) {
    case "deploy":
      return {
        command,
        result: await deploy(settings, configuration, { signal }),
      };

    case "swarm-deploy":
      return {
        command,
        result: await swarmDeploy(settings, configuration, { signal }),
      };

    case "undeploy":
      return { command, result: await undeploy(settings, configuration) };

    case "swarm-undeploy":
      return { command, result: await swarmUndeploy(settings, configuration) };
  }
}

export async function run() {
  let command: Command;
  let settings: Settings;
  let configuration: Configuration;

  try {
    command = parseCommand(core.getInput("command") || "deploy");
    settings = parseSettings(env);
    configuration = parseConfiguration(env);
  } catch (error) {
    core.setFailed(error instanceof Error ? error : String(error));
    core.setOutput("status", "failure");

    return;
  }

  core.setOutput("project-name", settings.projectName);

  const shutdown = listenForShutdown();

  try {
    const outcome = await runCommand(
      command,
      settings,
      configuration,
      shutdown.signal,
    );

    if (outcome.command === "deploy" || outcome.command === "swarm-deploy") {
      core.setOutput("workspace", outcome.result.workspace.mountPath);
      core.setOutput(
        "forced-services",
        outcome.result.forcedServices?.succeeded ?? [],
      );
    } else {
      core.setOutput("workspace", outcome.result.mountPath);
    }

    core.setOutput("status", "success");
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error);
    } else {
      core.setFailed(`An unknown error occurred: ${error}`);
    }

    core.setOutput("status", "failure");
  } finally {
    shutdown.dispose();
  }
}
