import {spawn} from "node:child_process";
import path from "node:path";
import {createInterface} from "node:readline";
import type {Readable, Writable} from "node:stream";
import {setTimeout as delay} from "node:timers/promises";

import type {CostMcpConfig} from "../config.js";
import {ProcessStartError, toErrorMessage} from "../errors.js";
import {silentLogger, type Logger} from "../utils/logger.js";

// Profile selection is never passed through to the server.
const STRIPPED_ENV_PREFIXES = ["AWS_PROFILE", "AWS_DEFAULT_PROFILE"];

/** The part of a spawned child the supervisor relies on. */
export interface ServerProcess {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "spawn", listener: () => void): unknown;
  once(event: "error", listener: (error: Error) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  off(event: "spawn", listener: () => void): unknown;
  off(event: "error", listener: (error: Error) => void): unknown;
}

export type SpawnServer = (
  command: string,
  args: readonly string[],
  options: {env: NodeJS.ProcessEnv}
) => ServerProcess;

export interface ServerStreams {
  stdin: Writable;
  stdout: Readable;
}

export interface ServerExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export type SupervisorConfig = Pick<CostMcpConfig, "command" | "args" | "region" | "localBinDir" | "startupDelayMs">;

export interface SupervisorOptions {
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  spawn?: SpawnServer;
}

const spawnServer: SpawnServer = (command, args, options) => spawn(command, [...args], options);

export function buildChildEnvironment(
  env: NodeJS.ProcessEnv,
  config: Pick<CostMcpConfig, "region" | "localBinDir">
): NodeJS.ProcessEnv {
  const childEnv: NodeJS.ProcessEnv = {};
  for (const [name, value] of Object.entries(env)) {
    if (STRIPPED_ENV_PREFIXES.some((prefix) => name.startsWith(prefix))) {
      continue;
    }
    childEnv[name] = value;
  }
  childEnv.AWS_REGION = config.region;
  childEnv.PATH = env.PATH ? `${config.localBinDir}${path.delimiter}${env.PATH}` : config.localBinDir;
  return childEnv;
}

/**
 * Owns exactly one MCP server child process. A supervisor is started once;
 * restarting the server means building a new supervisor.
 */
export class ProcessSupervisor {
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;
  private readonly spawnProcess: SpawnServer;
  private child: ServerProcess | undefined;
  private started = false;
  private terminated = false;
  private exitInfo: ServerExit | undefined;
  private readonly exitListeners = new Set<(exit: ServerExit) => void>();
  private resolveExit: (exit: ServerExit) => void = () => undefined;

  /** Settles once the child has exited, or failed to spawn. */
  readonly exited: Promise<ServerExit>;

  constructor(
    private readonly config: SupervisorConfig,
    options: SupervisorOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.env = options.env ?? process.env;
    this.spawnProcess = options.spawn ?? spawnServer;
    this.exited = new Promise((resolve) => {
      this.resolveExit = resolve;
    });
  }

  get running(): boolean {
    return this.child !== undefined && this.exitInfo === undefined;
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  async start(): Promise<ServerStreams> {
    if (this.started) {
      throw new ProcessStartError("MCP server process was already started by this supervisor");
    }
    this.started = true;

    const {command, args} = this.config;
    const commandLine = [command, ...args].join(" ");
    const env = buildChildEnvironment(this.env, this.config);
    this.logger.debug(`Spawning ${commandLine} (AWS_REGION=${this.config.region})`);

    let child: ServerProcess;
    try {
      const spawned = this.spawnProcess(command, args, {env});
      child = spawned;
      await new Promise<void>((resolve, reject) => {
        const onSpawn = () => {
          spawned.off("error", onError);
          resolve();
        };
        const onError = (error: Error) => {
          spawned.off("spawn", onSpawn);
          reject(error);
        };
        spawned.once("spawn", onSpawn);
        spawned.once("error", onError);
      });
    } catch (error) {
      this.recordExit({code: null, signal: null});
      throw new ProcessStartError(`Failed to start MCP server "${commandLine}": ${toErrorMessage(error)}`, {
        cause: error
      });
    }

    this.child = child;
    child.on("error", (error) => {
      this.logger.error(`MCP server process error: ${error.message}`);
    });
    child.on("exit", (code, signal) => {
      this.logger.debug(`MCP server exited (code=${String(code)}, signal=${String(signal)})`);
      this.recordExit({code, signal});
    });
    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    createInterface({input: child.stderr, crlfDelay: Infinity}).on("line", (line) => {
      this.logger.debug(`stderr: ${line}`);
    });

    this.logger.debug(`MCP server started (pid ${String(child.pid)})`);
    if (this.config.startupDelayMs > 0) {
      await delay(this.config.startupDelayMs);
    }
    return {stdin: child.stdin, stdout: child.stdout};
  }

  onExit(listener: (exit: ServerExit) => void): () => void {
    if (this.exitInfo) {
      listener(this.exitInfo);
      return () => undefined;
    }
    this.exitListeners.add(listener);
    return () => {
      this.exitListeners.delete(listener);
    };
  }

  terminate(): void {
    if (this.terminated) {
      return;
    }
    this.terminated = true;
    const child = this.child;
    if (!child || child.exitCode !== null || child.signalCode !== null) {
      return;
    }
    this.logger.debug("Terminating MCP server");
    child.stdin.end();
    child.kill("SIGTERM");
  }

  private recordExit(exit: ServerExit): void {
    if (this.exitInfo) {
      return;
    }
    this.exitInfo = exit;
    this.resolveExit(exit);
    for (const listener of this.exitListeners) {
      listener(exit);
    }
    this.exitListeners.clear();
  }
}
