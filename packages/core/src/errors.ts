/**
 * Error types shared by the research pipeline
 */

import type { AgentRole } from "./interfaces/agent";

/**
 * Missing or invalid setup detected before a session can start
 * (absent credentials, unknown provider). Fatal.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A researcher/analyst/writer call raised or timed out
 */
export class AgentInvocationError extends Error {
  readonly role: AgentRole;

  constructor(role: AgentRole, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AgentInvocationError";
    this.role = role;
  }
}

export class TimeoutError extends Error {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Coerce an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Race a promise against a deadline. The underlying work is not cancelled;
 * only the wait is bounded.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(
      () => reject(new TimeoutError(label, timeoutMs)),
      timeoutMs
    );
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timeoutId);
  }
}
