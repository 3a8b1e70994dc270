import { SessionCommandInputError } from "./errors/SessionCommandInputError.js";

export interface SessionConfig {
  /** How long a session may sit without participants before it is reclaimed */
  readonly idleTimeoutMs: number;
  /** Period of the idle sweep each session runs */
  readonly idleCheckIntervalMs: number;
  /** Length of generated session identifiers */
  readonly sessionIdLength: number;
  /** Attempts at finding a free session identifier before giving up */
  readonly maxIdAttempts: number;
}

export type SessionConfigOverrides = Partial<SessionConfig>;

export function createSessionConfig(overrides: SessionConfigOverrides = {}): SessionConfig {
  const config: SessionConfig = {
    idleTimeoutMs: overrides.idleTimeoutMs ?? 5 * 60_000,
    idleCheckIntervalMs: overrides.idleCheckIntervalMs ?? 60_000,
    sessionIdLength: overrides.sessionIdLength ?? 6,
    maxIdAttempts: overrides.maxIdAttempts ?? 10,
  };

  const issues = validateSessionConfig(config);
  if (issues.length > 0) {
    throw SessionCommandInputError.because(issues);
  }

  return config;
}

function validateSessionConfig(config: SessionConfig): readonly string[] {
  const issues: string[] = [];

  if (!isPositiveInteger(config.idleTimeoutMs)) {
    issues.push("idleTimeoutMs must be a positive integer");
  }
  if (!isPositiveInteger(config.idleCheckIntervalMs)) {
    issues.push("idleCheckIntervalMs must be a positive integer");
  }
  if (!isPositiveInteger(config.sessionIdLength)) {
    issues.push("sessionIdLength must be a positive integer");
  }
  if (!isPositiveInteger(config.maxIdAttempts)) {
    issues.push("maxIdAttempts must be a positive integer");
  }

  return issues;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
