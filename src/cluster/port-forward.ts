/**
 * kubectl port-forward as a scoped resource.
 *
 * The forward is owned by the launcher: start() before the first request,
 * stop() on every exit path (normal return, error, SIGINT). Nothing in the
 * driver or reporter knows it exists.
 */

import { spawn } from "node:child_process";
import { setTimeout as delay } from "node:timers/promises";
import type { PortForwardConfig } from "../config";
import { PortForwardError } from "../errors";

/** The parts of a ChildProcess the forward manages */
export interface ForwardProcess {
  readonly pid?: number;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  readonly stderr: { on(event: "data", listener: (chunk: Buffer) => void): unknown } | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: "error", listener: (err: Error) => void): this;
}

export type SpawnFn = (command: string, args: string[]) => ForwardProcess;

const spawnKubectl: SpawnFn = (command, args) =>
  spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });

export function portForwardArgs(cfg: PortForwardConfig): string[] {
  return [
    "port-forward",
    "-n",
    cfg.namespace,
    `svc/${cfg.service}`,
    `${cfg.localPort}:${cfg.remotePort}`,
  ];
}

export class PortForward {
  private child: ForwardProcess | undefined;
  private exited: Promise<void> | undefined;
  private stderrTail = "";

  constructor(
    private readonly cfg: PortForwardConfig,
    private readonly spawnFn: SpawnFn = spawnKubectl,
  ) {}

  get running(): boolean {
    return this.child !== undefined && this.child.exitCode === null && this.child.signalCode === null;
  }

  /**
   * Spawn the forward and wait `settleMs` for it to establish.
   * Rejects with PortForwardError if kubectl is missing or exits early.
   */
  async start(): Promise<void> {
    if (this.running) return;

    console.log(
      `  🔍  [port-forward] Forwarding svc/${this.cfg.service} in namespace ${this.cfg.namespace} ` +
        `to localhost:${this.cfg.localPort}...`,
    );

    const child = this.spawnFn("kubectl", portForwardArgs(this.cfg));
    this.child = child;
    this.stderrTail = "";
    child.stderr?.on("data", (chunk: Buffer) => {
      this.stderrTail = (this.stderrTail + chunk.toString("utf-8")).slice(-500);
    });

    const failed = new Promise<PortForwardError>((resolve) => {
      child.once("error", (err: Error) => {
        const code = "code" in err ? err.code : undefined;
        resolve(
          new PortForwardError(
            code === "ENOENT"
              ? "'kubectl' command not found. Ensure kubectl is installed and on your PATH."
              : `Could not start port-forward: ${err.message}`,
          ),
        );
      });
    });
    this.exited = new Promise<void>((resolve) => {
      child.once("exit", () => resolve());
    });
    const exitedEarly = this.exited.then(
      () =>
        new PortForwardError(
          `kubectl port-forward exited early (code ${child.exitCode ?? child.signalCode}): ` +
            this.stderrTail.trim(),
        ),
    );

    const settled = delay(this.cfg.settleMs).then(() => undefined);
    const error = await Promise.race([failed, exitedEarly, settled]);
    if (error) {
      this.child = undefined;
      throw error;
    }

    console.log(`  ✅  [port-forward] Active on pid ${child.pid ?? "unknown"}.`);
  }

  /** Terminate the forward and wait for it to exit. Safe to call repeatedly. */
  async stop(): Promise<void> {
    const child = this.child;
    if (!child) return;
    this.child = undefined;

    if (child.exitCode === null && child.signalCode === null) {
      console.log("\n  [port-forward] Shutting down...");
      child.kill("SIGTERM");
      await this.exited;
      console.log("  ✅  [port-forward] Stopped.");
    }
  }
}

/** Run `fn` with a port-forward held open, releasing it however `fn` ends */
export async function withPortForward<T>(
  forward: PortForward,
  fn: () => Promise<T>,
): Promise<T> {
  await forward.start();
  try {
    return await fn();
  } finally {
    await forward.stop();
  }
}
