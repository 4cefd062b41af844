import { env as processEnv } from "node:process";
import * as core from "@actions/core";

export function mapToObject<T>(map: ReadonlyMap<string, T>): Record<string, T> {
  const object: Record<string, T> = {};

  for (const [key, value] of map) {
    object[key] = value;
  }

  return object;
}

/**
 * Build the environment for an external tool
 *
 * Child processes receive the full process environment with the given
 * variables layered on top, so tools still find `PATH`, `HOME` and friends.
 */
export function buildProcessEnv(
  variables: ReadonlyMap<string, string> = new Map(),
  base: NodeJS.ProcessEnv = processEnv,
): Record<string, string> {
  const env: Record<string, string> = {};

  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }

  return { ...env, ...mapToObject(variables) };
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Outcome of a batch of independent operations
 *
 * Failed items never abort the batch; they are collected here instead, next
 * to any warnings raised for items that were skipped entirely.
 */
export interface BatchOutcome<T> {
  succeeded: T[];
  failed: Array<{ item: T; error: Error }>;
  warnings: string[];
}

export function emptyOutcome<T>(): BatchOutcome<T> {
  return { succeeded: [], failed: [], warnings: [] };
}

export interface ShutdownSignal {
  signal: AbortSignal;
  dispose: () => void;
}

/**
 * Abort a signal when the process is asked to terminate
 *
 * Call `dispose` once the work is done to remove the process listeners.
 */
export function listenForShutdown(
  signals: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"],
): ShutdownSignal {
  const controller = new AbortController();
  const abort = (received: NodeJS.Signals) => {
    core.warning(`Received ${received}, cancelling`);
    controller.abort(new Error(`Interrupted by ${received}`));
  };

  for (const name of signals) {
    process.once(name, abort);
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const name of signals) {
        process.off(name, abort);
      }
    },
  };
}
