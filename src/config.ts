/**
 * Application configuration loaded from environment variables.
 */

import { config as loadDotenv } from "dotenv";
import { ConfigError } from "./errors";
import { MAX_TIMER_MS } from "./utils/timing";

export interface PortForwardConfig {
  /** Whether to launch `kubectl port-forward` before testing */
  enabled: boolean;
  namespace: string;
  service: string;
  localPort: number;
  remotePort: number;
  /** Time to let the forward establish before the first request (ms) */
  settleMs: number;
}

export interface AppConfig {
  /** Base URL of the inference gateway (e.g. http://localhost:8080) */
  targetBaseUrl: string;
  /** Model identifier; empty means discover via /v1/models */
  targetModel: string;
  /** Completions endpoint path */
  completionsPath: string;
  /** Hard per-request timeout (ms) */
  requestTimeoutMs: number;
  /** Timeout for the model catalog lookup (ms) */
  discoveryTimeoutMs: number;
  portForward: PortForwardConfig;
  /** Preset to run when stdin is not interactive */
  preset: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (env === process.env) loadDotenv();

  const localPort = readInt(env, "LOCAL_PORT", 8080);

  return {
    targetBaseUrl: (env.TARGET_BASE_URL ?? `http://localhost:${localPort}`).replace(/\/+$/, ""),
    targetModel: env.TARGET_MODEL ?? "",
    completionsPath: normalizePath(env.COMPLETIONS_PATH ?? "/v1/completions"),
    requestTimeoutMs: readInt(env, "REQUEST_TIMEOUT_MS", 60_000, MAX_TIMER_MS),
    discoveryTimeoutMs: readInt(env, "DISCOVERY_TIMEOUT_MS", 5_000, MAX_TIMER_MS),
    portForward: {
      enabled: readBool(env, "PORT_FORWARD_ENABLED", true),
      namespace: env.K8S_NAMESPACE ?? "llm-d",
      service: env.K8S_SERVICE ?? "llm-d-inference-gateway-istio",
      localPort,
      remotePort: readInt(env, "REMOTE_PORT", 80),
      settleMs: readInt(env, "PORT_FORWARD_SETTLE_MS", 2_000, MAX_TIMER_MS),
    },
    preset: env.LOADGEN_PRESET ?? "throughput",
  };
}

function readInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  max: number = Number.MAX_SAFE_INTEGER,
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = parseInt(raw, 10);
  if (isNaN(value) || value < 0 || String(value) !== raw.trim()) {
    throw new ConfigError(`${key} must be a non-negative integer, got "${raw}"`);
  }
  if (value > max) {
    throw new ConfigError(`${key} must be at most ${max}, got ${value}`);
  }
  return value;
}

function readBool(env: NodeJS.ProcessEnv, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigError(`${key} must be a boolean, got "${env[key]}"`);
}

function normalizePath(path: string): string {
  return path.startsWith("/") ? path : `/${path}`;
}
