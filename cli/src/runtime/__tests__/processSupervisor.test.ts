import {EventEmitter} from "node:events";
import path from "node:path";
import {PassThrough} from "node:stream";
import {describe, expect, it, vi} from "vitest";

import type {CostMcpConfig} from "../../config.js";
import {HandshakeError, ProcessStartError} from "../../errors.js";
import {FakeMcpServer} from "../../__tests__/helpers/fakeServer.js";
import {createLogger, type LogLevel} from "../../utils/logger.js";
import {createStdioSession} from "../mcp.js";
import {buildChildEnvironment, ProcessSupervisor, type SpawnServer} from "../processSupervisor.js";

const config: CostMcpConfig = {
  command: "uvx",
  args: ["awslabs.cost-explorer-mcp-server@latest"],
  region: "eu-west-1",
  localBinDir: "/home/tester/.local/bin",
  readTimeoutMs: 1000,
  startupDelayMs: 0,
  verbose: true
};

class FakeChild extends EventEmitter {
  readonly stdin: PassThrough;
  readonly stdout: PassThrough;
  readonly stderr = new PassThrough();
  readonly pid = 4242;
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly kills: Array<NodeJS.Signals | undefined> = [];

  constructor(streams: {stdin: PassThrough; stdout: PassThrough} = {stdin: new PassThrough(), stdout: new PassThrough()}) {
    super();
    this.stdin = streams.stdin;
    this.stdout = streams.stdout;
  }

  kill(signal?: NodeJS.Signals): boolean {
    this.kills.push(signal);
    this.signalCode = signal ?? "SIGTERM";
    this.emit("exit", null, this.signalCode);
    return true;
  }
}

function spawnReturning(child: FakeChild) {
  return vi.fn<SpawnServer>(() => {
    setImmediate(() => child.emit("spawn"));
    return child;
  });
}

describe("buildChildEnvironment", () => {
  it("drops profile overrides, forces the region and extends PATH", () => {
    const env = buildChildEnvironment(
      {
        AWS_PROFILE: "prod-admin",
        AWS_DEFAULT_PROFILE: "prod-admin",
        AWS_PROFILE_OVERRIDE: "x",
        AWS_REGION: "us-west-2",
        AWS_ACCESS_KEY_ID: "test-key",
        PATH: "/usr/bin",
        HOME: "/home/tester"
      },
      config
    );

    expect(env).toEqual({
      AWS_REGION: "eu-west-1",
      AWS_ACCESS_KEY_ID: "test-key",
      PATH: `/home/tester/.local/bin${path.delimiter}/usr/bin`,
      HOME: "/home/tester"
    });
  });

  it("uses the local binary directory alone when PATH is unset", () => {
    expect(buildChildEnvironment({}, config).PATH).toBe("/home/tester/.local/bin");
  });
});

describe("ProcessSupervisor", () => {
  it("spawns the configured command with the child environment", async () => {
    const child = new FakeChild();
    const spawn = spawnReturning(child);
    const supervisor = new ProcessSupervisor(config, {spawn, env: {PATH: "/usr/bin", AWS_PROFILE: "dev"}});

    const streams = await supervisor.start();

    expect(streams.stdin).toBe(child.stdin);
    expect(streams.stdout).toBe(child.stdout);
    expect(supervisor.running).toBe(true);
    expect(supervisor.pid).toBe(4242);
    expect(spawn).toHaveBeenCalledWith("uvx", ["awslabs.cost-explorer-mcp-server@latest"], {
      env: {AWS_REGION: "eu-west-1", PATH: `/home/tester/.local/bin${path.delimiter}/usr/bin`}
    });
  });

  it("rejects with ProcessStartError when the executable is missing", async () => {
    const child = new FakeChild();
    const spawn = vi.fn<SpawnServer>(() => {
      setImmediate(() => child.emit("error", new Error("spawn uvx ENOENT")));
      return child;
    });
    const supervisor = new ProcessSupervisor(config, {spawn, env: {}});

    const start = supervisor.start();

    await expect(start).rejects.toThrow(ProcessStartError);
    await expect(start).rejects.toThrow(
      'Failed to start MCP server "uvx awslabs.cost-explorer-mcp-server@latest": spawn uvx ENOENT'
    );
    expect(await supervisor.exited).toEqual({code: null, signal: null});
  });

  it("rejects with ProcessStartError when spawn throws", async () => {
    const spawn = vi.fn<SpawnServer>(() => {
      throw new TypeError("The argument 'file' cannot be empty");
    });
    const supervisor = new ProcessSupervisor(config, {spawn, env: {}});

    await expect(supervisor.start()).rejects.toThrow(ProcessStartError);
  });

  it("refuses a second start", async () => {
    const supervisor = new ProcessSupervisor(config, {spawn: spawnReturning(new FakeChild()), env: {}});
    await supervisor.start();

    await expect(supervisor.start()).rejects.toThrow("MCP server process was already started by this supervisor");
  });

  it("forwards stderr lines to the debug log", async () => {
    const lines: Array<[LogLevel, string]> = [];
    const child = new FakeChild();
    const supervisor = new ProcessSupervisor(config, {
      spawn: spawnReturning(child),
      env: {},
      logger: createLogger("process", {verbose: true, sink: (level, line) => lines.push([level, line])})
    });
    await supervisor.start();

    child.stderr.write("INFO Starting Cost Explorer MCP Server\n");
    await new Promise((resolve) => setImmediate(resolve));

    expect(lines).toContainEqual(["debug", "[process] stderr: INFO Starting Cost Explorer MCP Server"]);
  });

  it("terminates once and reports the exit", async () => {
    const child = new FakeChild();
    const supervisor = new ProcessSupervisor(config, {spawn: spawnReturning(child), env: {}});
    const exits: unknown[] = [];
    supervisor.onExit((exit) => exits.push(exit));
    await supervisor.start();

    supervisor.terminate();
    supervisor.terminate();

    expect(child.kills).toEqual(["SIGTERM"]);
    expect(await supervisor.exited).toEqual({code: null, signal: "SIGTERM"});
    expect(exits).toEqual([{code: null, signal: "SIGTERM"}]);
    expect(supervisor.running).toBe(false);
  });
});

describe("createStdioSession", () => {
  it("starts the server, completes the handshake and discovers tools", async () => {
    const server = new FakeMcpServer({tools: {get_cost_forecast: () => ({total: 3})}});
    const child = new FakeChild({stdin: server.stdin, stdout: server.stdout});

    const session = await createStdioSession(config, {spawn: spawnReturning(child), env: {}});

    expect(session.tools.map((tool) => tool.name)).toEqual(["get_cost_forecast"]);
    expect(await session.callTool("get_cost_forecast", {})).toEqual({total: 3});
    expect(session.closed).toBe(false);

    session.close();

    expect(session.closed).toBe(true);
    expect(child.kills).toEqual(["SIGTERM"]);
  });

  it("terminates the child when the handshake is rejected", async () => {
    const server = new FakeMcpServer({handlers: {initialize: () => ({error: {message: "bad version"}})}});
    const child = new FakeChild({stdin: server.stdin, stdout: server.stdout});

    await expect(createStdioSession(config, {spawn: spawnReturning(child), env: {}})).rejects.toThrow(HandshakeError);
    expect(child.kills).toEqual(["SIGTERM"]);
  });
});
