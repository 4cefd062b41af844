import * as core from "@actions/core";
import { errorMessage } from "./utils.js";

/**
 * The single failure kind surfaced to callers
 *
 * Whatever went wrong (cloning, decryption, the deploy engine), callers only
 * see this error; the cause is attached and the details are in the log.
 */
export class StackDeploymentError extends Error {
  public constructor(options?: { cause?: unknown }) {
    super("stack deployment failure", options);
    this.name = "StackDeploymentError";
  }
}

/**
 * Log a fatal step failure and produce the error to throw
 *
 * @param message Description of the failed step
 * @param [cause] The underlying error
 */
export function fail(message: string, cause?: unknown) {
  core.error(
    cause === undefined ? message : `${message}: ${errorMessage(cause)}`,
  );

  return new StackDeploymentError({ cause: cause ?? new Error(message) });
}
