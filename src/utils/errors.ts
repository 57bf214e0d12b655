/**
 * Fatal build errors
 * Raised up to the CLI, which reports them and decides on the exit code
 */

import type { PreflightCheck } from "../types";

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * One or more preconditions failed before any page was processed
 */
export class PreconditionError extends Error {
  readonly checks: PreflightCheck[];

  constructor(checks: PreflightCheck[]) {
    super(
      `Preconditions failed: ${checks.map((check) => check.message).join(" ")}`,
    );
    this.name = "PreconditionError";
    this.checks = checks;
  }
}

/**
 * The navigation template could not be loaded, compiled or rendered
 */
export class TemplateRenderError extends Error {
  readonly template: string;
  readonly data: unknown;

  constructor(template: string, data: unknown, cause: unknown) {
    super(
      `Failed to render template ${template} with data ${JSON.stringify(data)}: ${describe(cause)}.`,
      { cause },
    );
    this.name = "TemplateRenderError";
    this.template = template;
    this.data = data;
  }
}
