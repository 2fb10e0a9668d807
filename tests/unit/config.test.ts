import { describe, it, expect } from "vitest";
import { loadConfig } from "../../src/config";
import { ConfigError } from "../../src/errors";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      targetBaseUrl: "http://localhost:8080",
      targetModel: "",
      completionsPath: "/v1/completions",
      requestTimeoutMs: 60_000,
      discoveryTimeoutMs: 5_000,
      portForward: {
        enabled: true,
        namespace: "llm-d",
        service: "llm-d-inference-gateway-istio",
        localPort: 8080,
        remotePort: 80,
        settleMs: 2_000,
      },
      preset: "throughput",
    });
  });

  it("reads overrides", () => {
    const cfg = loadConfig({
      TARGET_BASE_URL: "http://gateway.test:9000//",
      TARGET_MODEL: "test-model",
      COMPLETIONS_PATH: "v1/completions",
      REQUEST_TIMEOUT_MS: "1500",
      PORT_FORWARD_ENABLED: "false",
      K8S_NAMESPACE: "serving",
      LOADGEN_PRESET: "latency",
    });

    expect(cfg.targetBaseUrl).toBe("http://gateway.test:9000");
    expect(cfg.targetModel).toBe("test-model");
    expect(cfg.completionsPath).toBe("/v1/completions");
    expect(cfg.requestTimeoutMs).toBe(1500);
    expect(cfg.portForward.enabled).toBe(false);
    expect(cfg.portForward.namespace).toBe("serving");
    expect(cfg.preset).toBe("latency");
  });

  it("derives the default base URL from the local port", () => {
    expect(loadConfig({ LOCAL_PORT: "9090" }).targetBaseUrl).toBe("http://localhost:9090");
  });

  it("rejects malformed integers", () => {
    expect(() => loadConfig({ REQUEST_TIMEOUT_MS: "soon" })).toThrow(ConfigError);
    expect(() => loadConfig({ LOCAL_PORT: "80.5" })).toThrow(
      'LOCAL_PORT must be a non-negative integer, got "80.5"',
    );
  });

  it("rejects timeouts longer than a timer can hold", () => {
    expect(() => loadConfig({ REQUEST_TIMEOUT_MS: "2147483648" })).toThrow(
      "REQUEST_TIMEOUT_MS must be at most 2147483647, got 2147483648",
    );
    expect(loadConfig({ REQUEST_TIMEOUT_MS: "2147483647" }).requestTimeoutMs).toBe(2_147_483_647);
  });

  it("rejects malformed booleans", () => {
    expect(() => loadConfig({ PORT_FORWARD_ENABLED: "maybe" })).toThrow(ConfigError);
  });
});
