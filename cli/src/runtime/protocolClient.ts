import type {Readable, Writable} from "node:stream";

import {
  BrokenPipeError,
  HandshakeError,
  ProtocolError,
  ToolExecutionError,
  toErrorMessage
} from "../errors.js";
import type {
  ClientInfo,
  HandshakeState,
  InitializeResult,
  JsonRpcErrorObject,
  JsonRpcId,
  JsonRpcNotification,
  JsonRpcRequest,
  JsonRpcResponse,
  ToolArguments,
  ToolDescriptor
} from "../types/mcp.js";
import {silentLogger, type Logger} from "../utils/logger.js";
import {isPlainObject} from "../utils/sanitize.js";
import {parseLenientJson} from "./lenientJson.js";
import {LineReader} from "./lineReader.js";

export const MCP_PROTOCOL_VERSION = "2024-11-05";
export const DEFAULT_READ_TIMEOUT_MS = 120_000;
export const DEFAULT_CLIENT_INFO: ClientInfo = {name: "cost-explorer-mcp-cli", version: "0.1.0"};

export interface ProtocolClientOptions {
  readTimeoutMs?: number;
  clientInfo?: ClientInfo;
  logger?: Logger;
}

interface ResponseMessage {
  id: JsonRpcId | string | null;
  result: unknown;
  error?: JsonRpcErrorObject | string;
}

type InboundMessage =
  | {kind: "response"; message: ResponseMessage}
  | {kind: "notification"; method: string}
  | {kind: "request"; id: JsonRpcId | string; method: string};

const METHOD_NOT_FOUND = -32601;

function parseInbound(line: string): InboundMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch (error) {
    throw new ProtocolError(`Failed to parse MCP response: ${toErrorMessage(error)}`, {cause: error});
  }
  if (!isPlainObject(raw)) {
    throw new ProtocolError(`Failed to parse MCP response: expected a JSON object, got ${line.slice(0, 200)}`);
  }
  if (typeof raw.method === "string") {
    if (typeof raw.id === "number" || typeof raw.id === "string") {
      return {kind: "request", id: raw.id, method: raw.method};
    }
    return {kind: "notification", method: raw.method};
  }
  if (!("result" in raw) && !("error" in raw)) {
    throw new ProtocolError("Failed to parse MCP response: message has neither result nor error");
  }
  const id = typeof raw.id === "number" || typeof raw.id === "string" ? raw.id : null;
  return {kind: "response", message: {id, result: raw.result, error: parseErrorField(raw.error)}};
}

function parseErrorField(value: unknown): JsonRpcErrorObject | string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (!isPlainObject(value)) {
    return value === undefined || value === null ? undefined : String(value);
  }
  return {
    code: typeof value.code === "number" ? value.code : undefined,
    message: typeof value.message === "string" ? value.message : undefined,
    data: value.data
  };
}

function describeError(error: JsonRpcErrorObject | string): string {
  if (typeof error === "string") {
    return error;
  }
  return error.message ?? JSON.stringify(error);
}

function toInitializeResult(result: Record<string, unknown>): InitializeResult {
  const {protocolVersion, capabilities, serverInfo} = result;
  return {
    protocolVersion: typeof protocolVersion === "string" ? protocolVersion : undefined,
    capabilities: isPlainObject(capabilities) ? capabilities : undefined,
    serverInfo: isPlainObject(serverInfo)
      ? {
          name: typeof serverInfo.name === "string" ? serverInfo.name : undefined,
          version: typeof serverInfo.version === "string" ? serverInfo.version : undefined
        }
      : undefined
  };
}

function toToolDescriptor(value: unknown): ToolDescriptor[] {
  if (!isPlainObject(value) || typeof value.name !== "string") {
    return [];
  }
  return [
    {
      name: value.name,
      description: typeof value.description === "string" ? value.description : "",
      inputSchema: isPlainObject(value.inputSchema) ? value.inputSchema : undefined
    }
  ];
}

function firstTextContent(content: unknown[]): string | undefined {
  for (const item of content) {
    if (isPlainObject(item) && typeof item.text === "string") {
      return item.text;
    }
  }
  return undefined;
}

/**
 * MCP client over a pair of byte streams. Exactly one request is in flight at
 * a time; concurrent callers wait their turn.
 */
export class ProtocolClient {
  private readonly stdin: Writable;
  private readonly reader: LineReader;
  private readonly readTimeoutMs: number;
  private readonly clientInfo: ClientInfo;
  private readonly logger: Logger;

  private currentState: HandshakeState = "uninitialized";
  private nextId = 1;
  private queue: Promise<unknown> = Promise.resolve();
  private serverResult: InitializeResult | undefined;
  private toolSet: ToolDescriptor[] = [];
  // Requests that failed before their response was read; a late reply to one is discarded.
  private readonly abandonedIds = new Set<JsonRpcId>();

  constructor(streams: {stdin: Writable; stdout: Readable}, options: ProtocolClientOptions = {}) {
    this.stdin = streams.stdin;
    this.reader = new LineReader(streams.stdout);
    this.readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;
    this.clientInfo = options.clientInfo ?? DEFAULT_CLIENT_INFO;
    this.logger = options.logger ?? silentLogger;

    this.stdin.on("error", (error) => {
      this.logger.debug(`stdin error: ${error.message}`);
    });
  }

  get state(): HandshakeState {
    return this.currentState;
  }

  get tools(): readonly ToolDescriptor[] {
    return this.toolSet;
  }

  initialize(): Promise<InitializeResult> {
    return this.enqueue(async () => {
      if (this.currentState === "ready" && this.serverResult) {
        return this.serverResult;
      }
      if (this.currentState !== "uninitialized") {
        throw new HandshakeError("session closed");
      }
      this.currentState = "initializing";

      let server: InitializeResult;
      try {
        const response = await this.request("initialize", {
          protocolVersion: MCP_PROTOCOL_VERSION,
          capabilities: {tools: {}},
          clientInfo: this.clientInfo
        });
        if (response.error !== undefined || !isPlainObject(response.result)) {
          const reason = response.error !== undefined ? describeError(response.error) : "no result";
          throw new HandshakeError(`MCP server rejected initialize: ${reason}`);
        }
        await this.notify("notifications/initialized");
        server = toInitializeResult(response.result);
      } catch (error) {
        this.markClosed();
        if (error instanceof HandshakeError) {
          throw error;
        }
        throw new HandshakeError(`MCP handshake failed: ${toErrorMessage(error)}`, {cause: error});
      }

      this.currentState = "ready";
      this.serverResult = server;
      const {name = "MCP server", version = ""} = server.serverInfo ?? {};
      this.logger.debug(`Handshake complete with ${name} ${version}`.trim());
      return server;
    });
  }

  listTools(): Promise<ToolDescriptor[]> {
    return this.enqueue(async () => {
      this.assertReady();
      const response = await this.request("tools/list");
      if (response.error !== undefined) {
        throw new ToolExecutionError(describeError(response.error));
      }
      const {result} = response;
      if (!isPlainObject(result) || !Array.isArray(result.tools)) {
        throw new ProtocolError("Failed to parse MCP response: tools/list result has no tools");
      }
      this.toolSet = result.tools.flatMap(toToolDescriptor);
      this.logger.debug(`Discovered ${this.toolSet.length} tools`);
      return this.toolSet;
    });
  }

  /**
   * Invoke a tool. Text content is decoded as JSON (non-finite literals
   * included); results without content are returned as they came.
   */
  callTool(name: string, args: ToolArguments): Promise<unknown> {
    return this.enqueue(async () => {
      this.assertReady();
      const response = await this.request("tools/call", {name, arguments: args});
      if (response.error !== undefined) {
        throw new ToolExecutionError(describeError(response.error));
      }
      const {result} = response;
      if (!isPlainObject(result) || !Array.isArray(result.content)) {
        return result;
      }
      const text = firstTextContent(result.content);
      if (result.isError === true) {
        throw new ToolExecutionError(text ?? `Tool ${name} failed`);
      }
      if (text === undefined) {
        throw new ProtocolError(`Failed to parse MCP response: tool ${name} returned no text content`);
      }
      try {
        return parseLenientJson(text);
      } catch (error) {
        throw new ProtocolError(`Failed to parse MCP response: ${toErrorMessage(error)}`, {cause: error});
      }
    });
  }

  close(): void {
    this.markClosed();
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // the tail only orders work; each caller observes its own outcome through run
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private assertReady(): void {
    if (this.currentState === "closed") {
      throw new HandshakeError("session closed");
    }
    if (this.currentState !== "ready") {
      throw new HandshakeError(`session not ready (state: ${this.currentState})`);
    }
  }

  private markClosed(): void {
    if (this.currentState === "closed") {
      return;
    }
    this.currentState = "closed";
    this.reader.close();
  }

  private async request(method: string, params?: Record<string, unknown>): Promise<ResponseMessage> {
    const id = this.nextId++;
    const message: JsonRpcRequest = params ? {jsonrpc: "2.0", id, method, params} : {jsonrpc: "2.0", id, method};
    await this.send(message);
    return this.awaitResponse(id);
  }

  private notify(method: string): Promise<void> {
    const message: JsonRpcNotification = {jsonrpc: "2.0", method};
    return this.send(message);
  }

  private async send(message: JsonRpcRequest | JsonRpcNotification | JsonRpcResponse): Promise<void> {
    const line = `${JSON.stringify(message)}\n`;
    this.logger.debug(`-> ${line.trimEnd()}`);
    if (this.stdin.destroyed || !this.stdin.writable) {
      this.markClosed();
      throw new BrokenPipeError();
    }
    try {
      await new Promise<void>((resolve, reject) => {
        this.stdin.write(line, (error) => {
          if (error) {
            reject(error);
          } else {
            resolve();
          }
        });
      });
    } catch (error) {
      this.markClosed();
      throw new BrokenPipeError(undefined, {cause: error});
    }
  }

  private async awaitResponse(id: JsonRpcId): Promise<ResponseMessage> {
    try {
      return await this.readResponse(id);
    } catch (error) {
      if (this.currentState !== "closed") {
        this.abandonedIds.add(id);
      }
      throw error;
    }
  }

  private async readResponse(id: JsonRpcId): Promise<ResponseMessage> {
    for (;;) {
      const line = await this.readLine();
      this.logger.debug(`<- ${line}`);
      const inbound = parseInbound(line);
      if (inbound.kind === "notification") {
        this.logger.debug(`Skipping server notification ${inbound.method}`);
        continue;
      }
      if (inbound.kind === "request") {
        await this.answerServerRequest(inbound.id, inbound.method);
        continue;
      }
      const responseId = inbound.message.id;
      if (typeof responseId === "number" && this.abandonedIds.delete(responseId)) {
        this.logger.debug(`Discarding late response to request ${responseId}`);
        continue;
      }
      if (responseId !== id) {
        throw new ProtocolError(`Response id ${String(responseId)} does not match request id ${id}`);
      }
      return inbound.message;
    }
  }

  private answerServerRequest(id: JsonRpcId | string, method: string): Promise<void> {
    this.logger.debug(`Answering server request ${method}`);
    const response: JsonRpcResponse =
      method === "ping"
        ? {jsonrpc: "2.0", id, result: {}}
        : {jsonrpc: "2.0", id, error: {code: METHOD_NOT_FOUND, message: `Method not found: ${method}`}};
    return this.send(response);
  }

  private async readLine(): Promise<string> {
    try {
      return await this.reader.next(this.readTimeoutMs);
    } catch (error) {
      // timeouts and broken streams end the session
      this.markClosed();
      throw error;
    }
  }
}
