import type {CostMcpConfig} from "../config.js";
import {HandshakeError, toErrorMessage} from "../errors.js";
import type {BatchEntry, DispatchResult, ResultEnvelope, ToolArguments, ToolDescriptor} from "../types/mcp.js";
import {silentLogger, type Logger} from "../utils/logger.js";
import {isPlainObject} from "../utils/sanitize.js";
import {ProcessSupervisor, type SpawnServer} from "./processSupervisor.js";
import {ProtocolClient} from "./protocolClient.js";

/** A ready MCP session: handshake done, tools discovered. */
export interface McpSession {
  readonly tools: readonly ToolDescriptor[];
  /** True once the connection broke or was closed. */
  readonly closed: boolean;
  callTool(name: string, args: ToolArguments): Promise<unknown>;
  close(): void;
}

export type SessionFactory = () => Promise<McpSession>;

export interface StdioSessionOptions {
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  spawn?: SpawnServer;
}

/**
 * Start the cost explorer server as a child process, run the MCP handshake
 * over its stdio and discover its tools.
 */
export async function createStdioSession(
  config: CostMcpConfig,
  options: StdioSessionOptions = {}
): Promise<McpSession> {
  const logger = options.logger ?? silentLogger;
  const supervisor = new ProcessSupervisor(config, {
    logger: logger.child("process"),
    env: options.env,
    spawn: options.spawn
  });
  const streams = await supervisor.start();
  const client = new ProtocolClient(streams, {
    readTimeoutMs: config.readTimeoutMs,
    logger: logger.child("rpc")
  });

  try {
    await client.initialize();
    await client.listTools();
  } catch (error) {
    client.close();
    supervisor.terminate();
    if (error instanceof HandshakeError) {
      throw error;
    }
    throw new HandshakeError(`MCP tool discovery failed: ${toErrorMessage(error)}`, {cause: error});
  }
  logger.info(`Connected to MCP server, ${client.tools.length} tools available`);

  return {
    get tools() {
      return client.tools;
    },
    get closed() {
      return client.state === "closed";
    },
    callTool: (name, args) => client.callTool(name, args),
    close: () => {
      client.close();
      supervisor.terminate();
    }
  };
}

export function formatToolList(tools: readonly ToolDescriptor[]): string[] {
  if (tools.length === 0) {
    return ["No tools available."];
  }
  const lines = ["Available tools:"];
  for (const tool of tools) {
    const summary = tool.description.split("\n")[0]?.trim() ?? "";
    lines.push(summary ? `  ${tool.name} - ${summary}` : `  ${tool.name}`);
  }
  return lines;
}

function formatEnvelope(envelope: ResultEnvelope): string[] {
  if (!envelope.success) {
    return [`Error: ${envelope.error ?? "unknown error"}`];
  }
  return [JSON.stringify(envelope.data, null, 2)];
}

function isBatch(result: DispatchResult): result is BatchEntry[] {
  return Array.isArray(result);
}

export function formatDispatchResult(toolName: string, result: DispatchResult): string[] {
  if (!isBatch(result)) {
    return [`Tool "${toolName}" response:`, ...formatEnvelope(result)];
  }
  const lines: string[] = [];
  for (const entry of result) {
    lines.push(`[${entry.index}] ${describeCall(entry.tool_call, toolName)}:`);
    lines.push(...formatEnvelope(entry.result));
  }
  return lines;
}

function describeCall(call: unknown, fallbackName: string): string {
  if (!isPlainObject(call)) {
    return fallbackName;
  }
  const name = typeof call.tool_name === "string" ? call.tool_name : fallbackName;
  const metric = isPlainObject(call.parameters) ? call.parameters.metric : undefined;
  return typeof metric === "string" ? `${name} (${metric})` : name;
}
