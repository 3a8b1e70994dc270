import { SessionCommandInputError, createSessionConfig, type SessionConfig } from "./core.js";

export interface BackendConfig {
  readonly port: number;
  readonly session: SessionConfig;
}

const DEFAULT_PORT = 8787;

/** Reads PORT, IDLE_TIMEOUT_MS and IDLE_CHECK_INTERVAL_MS; unset or blank values fall back to defaults. */
export function loadBackendConfig(env: NodeJS.ProcessEnv = process.env): BackendConfig {
  const port = parseNumber(env["PORT"]) ?? DEFAULT_PORT;
  if (!Number.isInteger(port) || port <= 0) {
    throw SessionCommandInputError.because(["PORT must be a positive integer"]);
  }

  return {
    port,
    session: createSessionConfig({
      idleTimeoutMs: parseNumber(env["IDLE_TIMEOUT_MS"]),
      idleCheckIntervalMs: parseNumber(env["IDLE_CHECK_INTERVAL_MS"]),
    }),
  };
}

function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  return Number(raw);
}
