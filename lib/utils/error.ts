/**
 * Safely extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Raised while wiring the workflow (unknown capability selection, missing
 * setting). Always thrown before any run starts.
 */
export class WorkflowConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WorkflowConfigError";
  }
}

/**
 * Explicit result of a capability call made at a stage boundary.
 */
export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

/**
 * Run `fn` and map any thrown fault into an `Outcome` instead of letting it
 * propagate.
 */
export async function attempt<T>(fn: () => Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, error: getErrorMessage(error) };
  }
}
