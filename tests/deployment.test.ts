import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { exec } from "@actions/exec";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { deploy, swarmDeploy } from "../src/deployment.js";
import { StackDeploymentError } from "../src/errors.js";
import {
  defineConfiguration,
  defineSettings,
  type Settings,
} from "../src/settings.js";
import { exists } from "./helpers.js";

vi.mock("@actions/core");
vi.mock("@actions/exec");

const mockedExec = vi.mocked(exec);

describe("Deployment", () => {
  const configuration = defineConfiguration({
    binaryPath: "",
    dockerConfigPath: "/cfg",
    gitBinary: "git",
  });
  let destination: string;
  let mountPath: string;
  let clonePath: string;
  let serviceListings: string[][];
  let failing: (args: string[]) => boolean;

  function settings(overrides: Partial<Settings> = {}) {
    return defineSettings({
      composeFiles: ["compose.yaml", "compose.prod.yaml"],
      destination,
      forceRecreate: false,
      keep: false,
      projectName: "billing",
      prune: false,
      reference: "main",
      registries: ["deployer:test-secret:registry.example.com"],
      repository: "https://example.com/org/billing-stack.git",
      skipTlsVerify: false,
      variables: new Map([["APP_ENV", "production"]]),
      ...overrides,
    });
  }

  function callsOf(command: string) {
    return mockedExec.mock.calls
      .filter(([name]) => name === command)
      .map(([, args]) => args ?? []);
  }

  // Docker arguments without the leading "--config /cfg"
  function dockerCalls() {
    return callsOf("docker").map((args) => args.slice(2));
  }

  beforeEach(async () => {
    vi.resetAllMocks();
    destination = await mkdtemp(join(tmpdir(), "deployment-test-"));
    mountPath = join(destination, "stacks", "billing");
    clonePath = join(mountPath, "billing-stack");
    serviceListings = [];
    failing = () => false;

    mockedExec.mockImplementation(async (command, args = [], options) => {
      if (failing(args)) {
        throw new Error("exit code 1");
      }

      if (command === "git") {
        const target = args[args.length - 1];
        await mkdir(target, { recursive: true });
        await writeFile(join(target, "compose.yaml"), "services: {}");
        await writeFile(join(target, "compose.prod.yaml"), "services: {}");
      }

      if (command === "docker" && args[2] === "service" && args[3] === "ls") {
        const ids = serviceListings.shift() ?? [];
        options?.listeners?.stdout?.(
          Buffer.from(ids.map((ID) => JSON.stringify({ ID })).join("\n")),
        );
      }

      return 0;
    });
  });

  afterEach(async () => {
    await rm(destination, { recursive: true, force: true });
  });

  describe("deploy", () => {
    it("should perform an orderly deployment", async () => {
      await mkdir(mountPath, { recursive: true });
      await writeFile(join(mountPath, "stale.txt"), "left over");

      const result = await deploy(settings(), configuration);

      expect(callsOf("git")).toEqual([
        [
          "clone",
          "--depth",
          "1",
          "--single-branch",
          "--no-tags",
          "--branch",
          "main",
          "--",
          "https://example.com/org/billing-stack.git",
          clonePath,
        ],
      ]);
      expect(callsOf("sops")).toEqual([]);
      expect(dockerCalls()).toEqual([
        [
          "login",
          "--username",
          "deployer",
          "--password",
          "test-secret",
          "registry.example.com",
        ],
        [
          "compose",
          "--project-name",
          "billing",
          "--project-directory",
          clonePath,
          "--file",
          join(clonePath, "compose.yaml"),
          "--file",
          join(clonePath, "compose.prod.yaml"),
          "up",
          "--detach",
        ],
        ["logout", "registry.example.com"],
      ]);
      await expect(readdir(mountPath)).resolves.toEqual(["billing-stack"]);
      expect(result).toEqual({
        workspace: { mountPath, clonePath },
        composeFiles: [
          join(clonePath, "compose.yaml"),
          join(clonePath, "compose.prod.yaml"),
        ],
        decryptedFiles: [],
        registries: {
          login: {
            succeeded: ["registry.example.com"],
            failed: [],
            warnings: [],
          },
          logout: {
            succeeded: ["registry.example.com"],
            failed: [],
            warnings: [],
          },
        },
        warnings: [],
      });
    });

    it("should pass recreate and orphan flags to compose", async () => {
      await deploy(
        settings({ forceRecreate: true, prune: true, registries: [] }),
        configuration,
      );

      expect(dockerCalls()).toEqual([
        [
          "compose",
          "--project-name",
          "billing",
          "--project-directory",
          clonePath,
          "--file",
          join(clonePath, "compose.yaml"),
          "--file",
          join(clonePath, "compose.prod.yaml"),
          "up",
          "--detach",
          "--force-recreate",
          "--remove-orphans",
        ],
      ]);
    });

    it("should redeploy a kept workspace without cloning", async () => {
      await mkdir(join(clonePath, "secrets"), { recursive: true });
      await writeFile(join(clonePath, "compose.yaml"), "services: {}");
      await writeFile(join(clonePath, "app.secret.env"), "encrypted");
      await writeFile(join(clonePath, "secrets", "db.secret.yml"), "encrypted");

      const result = await deploy(
        settings({ keep: true, composeFiles: ["compose.yaml"] }),
        configuration,
      );

      expect(callsOf("git")).toEqual([]);
      expect(callsOf("sops")).toEqual([
        ["--output", "app.env", "--decrypt", "app.secret.env"],
        ["--output", "db.yml", "--decrypt", "db.secret.yml"],
      ]);
      expect(result.decryptedFiles).toEqual([
        join(clonePath, "app.env"),
        join(clonePath, "secrets", "db.yml"),
      ]);
      await expect(exists(join(clonePath, "app.secret.env"))).resolves.toBe(
        true,
      );
    });

    it("should collect registry warnings without failing", async () => {
      const result = await deploy(
        settings({ registries: ["malformed"] }),
        configuration,
      );

      expect(result.warnings).toEqual([
        "Registry entry #1 is malformed, skipping",
        "Registry entry #1 is malformed, skipping",
      ]);
      expect(dockerCalls()).toHaveLength(1);
    });

    it("should fail on a malformed repository URL before touching anything", async () => {
      await expect(
        deploy(settings({ repository: "billing-stack" }), configuration),
      ).rejects.toThrow(StackDeploymentError);
      expect(mockedExec).not.toHaveBeenCalled();
      await expect(exists(mountPath)).resolves.toBe(false);
    });

    it("should fail when the clone fails", async () => {
      failing = (args) => args[0] === "clone";

      await expect(deploy(settings(), configuration)).rejects.toThrow(
        "stack deployment failure",
      );
      expect(dockerCalls()).toEqual([]);
    });

    it("should fail and log out when the deploy engine fails", async () => {
      failing = (args) => args[2] === "compose";

      const error = await deploy(settings(), configuration).catch(
        (cause: unknown) => cause,
      );

      expect(error).toBeInstanceOf(StackDeploymentError);
      expect(error).toHaveProperty("message", "stack deployment failure");
      expect(dockerCalls().map((args) => args[0])).toEqual([
        "login",
        "compose",
        "logout",
      ]);
    });

    it("should not clone when cancelled", async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        deploy(settings(), configuration, { signal: controller.signal }),
      ).rejects.toThrow(StackDeploymentError);
      expect(callsOf("git")).toEqual([]);
      expect(dockerCalls()).toEqual([]);
    });
  });

  describe("swarmDeploy", () => {
    it("should deploy the stack with a deeper clone", async () => {
      const result = await swarmDeploy(
        settings({ prune: true, registries: [] }),
        configuration,
      );

      expect(callsOf("git")[0].slice(0, 3)).toEqual([
        "clone",
        "--depth",
        "100",
      ]);
      expect(dockerCalls()).toEqual([
        [
          "service",
          "ls",
          "--format=json",
          "--filter",
          "label=com.docker.stack.namespace=billing",
        ],
        [
          "stack",
          "deploy",
          "--with-registry-auth",
          "--prune",
          "--compose-file",
          join(clonePath, "compose.yaml"),
          "--compose-file",
          join(clonePath, "compose.prod.yaml"),
          "billing",
        ],
      ]);
      expect(result.forcedServices).toBeUndefined();
    });

    it("should take the snapshot before wiping the workspace", async () => {
      await swarmDeploy(settings({ registries: [] }), configuration);

      expect(mockedExec.mock.calls.map(([command]) => command)).toEqual([
        "docker",
        "git",
        "docker",
      ]);
    });

    it("should force update services that were already running", async () => {
      serviceListings = [
        ["svc1", "svc2"],
        ["svc2", "svc3", "svc1"],
      ];

      const result = await swarmDeploy(
        settings({ forceRecreate: true }),
        configuration,
      );

      expect(dockerCalls().map((args) => args.slice(0, 2))).toEqual([
        ["service", "ls"],
        ["login", "--username"],
        ["stack", "deploy"],
        ["service", "ls"],
        ["service", "update"],
        ["service", "update"],
        ["logout", "registry.example.com"],
      ]);
      expect(
        dockerCalls()
          .filter((args) => args[1] === "update")
          .map((args) => args[args.length - 1]),
      ).toEqual(["svc2", "svc1"]);
      expect(result.forcedServices).toEqual({
        succeeded: ["svc2", "svc1"],
        failed: [],
        warnings: [],
      });
    });

    it("should not force updates unless recreation is requested", async () => {
      serviceListings = [["svc1"]];

      const result = await swarmDeploy(
        settings({ registries: [] }),
        configuration,
      );

      expect(dockerCalls().map((args) => args.slice(0, 2))).toEqual([
        ["service", "ls"],
        ["stack", "deploy"],
      ]);
      expect(result.forcedServices).toBeUndefined();
    });

    it("should not force updates on a first deployment", async () => {
      serviceListings = [[], ["svc1"]];

      const result = await swarmDeploy(
        settings({ forceRecreate: true, registries: [] }),
        configuration,
      );

      expect(dockerCalls().map((args) => args.slice(0, 2))).toEqual([
        ["service", "ls"],
        ["stack", "deploy"],
      ]);
      expect(result.forcedServices).toBeUndefined();
    });

    it("should keep going when a service fails to update", async () => {
      serviceListings = [
        ["svc1", "svc2"],
        ["svc1", "svc2"],
      ];
      failing = (args) => args[3] === "update" && args.includes("svc1");

      const result = await swarmDeploy(
        settings({ forceRecreate: true, registries: [] }),
        configuration,
      );

      expect(result.forcedServices?.succeeded).toEqual(["svc2"]);
      expect(result.forcedServices?.failed.map(({ item }) => item)).toEqual([
        "svc1",
      ]);
      expect(result.warnings).toHaveLength(1);
    });

    it("should abort when the running services cannot be listed", async () => {
      failing = (args) => args[3] === "ls";

      await expect(swarmDeploy(settings(), configuration)).rejects.toThrow(
        StackDeploymentError,
      );
      expect(callsOf("git")).toEqual([]);
    });

    it("should fail and log out when the stack deploy fails", async () => {
      failing = (args) => args[2] === "stack";

      await expect(swarmDeploy(settings(), configuration)).rejects.toThrow(
        StackDeploymentError,
      );
      expect(dockerCalls().at(-1)).toEqual(["logout", "registry.example.com"]);
    });
  });
});
