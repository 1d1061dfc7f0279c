/**
 * MCP Protocol Type Definitions
 *
 * JSON-RPC 2.0 messages exchanged with the cost explorer MCP server over stdio,
 * plus the tool-call and result shapes handed to and from the dispatcher.
 */

export type JsonRpcId = number;

export interface JsonRpcRequest {
  jsonrpc: "2.0";
  id: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcNotification {
  jsonrpc: "2.0";
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcErrorObject {
  code?: number;
  message?: string;
  data?: unknown;
}

export interface JsonRpcResponse {
  jsonrpc: "2.0";
  id: JsonRpcId | string | null;
  result?: unknown;
  error?: JsonRpcErrorObject;
}

export type HandshakeState = "uninitialized" | "initializing" | "ready" | "closed";

export interface ClientInfo {
  name: string;
  version: string;
}

export interface InitializeResult {
  protocolVersion?: string;
  capabilities?: Record<string, unknown>;
  serverInfo?: {name?: string; version?: string};
}

export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema?: Record<string, unknown>;
}

export type ToolArguments = Record<string, unknown>;

export interface ToolCall {
  tool_name: string;
  parameters: ToolArguments;
}

export interface ResultEnvelope {
  success: boolean;
  data: unknown;
  error: string | null;
}

export interface BatchEntry {
  tool_call: unknown;
  result: ResultEnvelope;
  index: number;
}

export type DispatchResult = ResultEnvelope | BatchEntry[];
