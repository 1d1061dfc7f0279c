import {z} from "zod";

import {HandshakeError, InvalidCallError, ProcessStartError, toErrorMessage} from "../errors.js";
import {normalizeParameters} from "../normalize/parameterNormalizer.js";
import {splitMetricRequests, type SplitOptions} from "../normalize/splitMetrics.js";
import type {BatchEntry, DispatchResult, ResultEnvelope, ToolCall, ToolDescriptor} from "../types/mcp.js";
import {silentLogger, type Logger} from "../utils/logger.js";
import {sanitizeResponse} from "../utils/sanitize.js";
import type {McpSession, SessionFactory} from "./mcp.js";

const toolCallSchema = z.object({
  tool_name: z.string({required_error: "tool call is missing tool_name"}).min(1, "tool_name must not be empty"),
  parameters: z.record(z.unknown()).optional()
});

export type InvokeOptions = SplitOptions;

export interface DispatcherOptions {
  sessionFactory: SessionFactory;
  logger?: Logger;
  /** Clock handed to the normalizer's date rules. */
  now?: () => Date;
}

function failure(error: unknown): ResultEnvelope {
  return {success: false, data: null, error: toErrorMessage(error)};
}

export function parseToolCall(input: unknown): ToolCall {
  const parsed = toolCallSchema.safeParse(input);
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new InvalidCallError(`Invalid tool call: ${reason}`);
  }
  return {tool_name: parsed.data.tool_name, parameters: parsed.data.parameters ?? {}};
}

/**
 * Entry point for interpreted tool calls: normalizes parameters, invokes the
 * tool over a lazily started MCP session and wraps every outcome in a result
 * envelope. Nothing thrown by a call escapes invoke().
 */
export class ToolDispatcher {
  private readonly sessionFactory: SessionFactory;
  private readonly logger: Logger;
  private readonly now: (() => Date) | undefined;
  private pendingSession: Promise<McpSession> | undefined;
  private startFailure: Error | undefined;

  constructor(options: DispatcherOptions) {
    this.sessionFactory = options.sessionFactory;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now;
  }

  async invoke(input: unknown, options: InvokeOptions = {}): Promise<DispatchResult> {
    if (Array.isArray(input)) {
      if (input.length === 0) {
        return failure(new InvalidCallError("Empty tool call list"));
      }
      return this.runBatch(input);
    }

    let call: ToolCall;
    try {
      call = parseToolCall(input);
    } catch (error) {
      return failure(error);
    }
    const calls = splitMetricRequests(call, options);
    if (calls.length > 1) {
      this.logger.info(`Splitting ${call.tool_name} into ${calls.length} calls, one per metric`);
      return this.runBatch(calls);
    }
    return this.execute(call);
  }

  async listTools(): Promise<ToolDescriptor[]> {
    const session = await this.session();
    return [...session.tools];
  }

  async close(): Promise<void> {
    const pending = this.pendingSession;
    this.pendingSession = undefined;
    if (!pending) {
      return;
    }
    try {
      (await pending).close();
    } catch (error) {
      this.logger.debug(`No session to close: ${toErrorMessage(error)}`);
    }
  }

  /** Drop the current session and any remembered start failure. */
  async reconnect(): Promise<void> {
    await this.close();
    this.startFailure = undefined;
  }

  private async runBatch(calls: readonly unknown[]): Promise<BatchEntry[]> {
    const entries: BatchEntry[] = [];
    for (const [index, entry] of calls.entries()) {
      let result: ResultEnvelope;
      try {
        result = await this.execute(parseToolCall(entry));
      } catch (error) {
        result = failure(error);
      }
      entries.push({tool_call: entry, result, index});
    }
    return entries;
  }

  private async execute(call: ToolCall): Promise<ResultEnvelope> {
    let session: McpSession | undefined;
    try {
      const {parameters, warnings} = normalizeParameters(call.tool_name, call.parameters, {now: this.now});
      for (const warning of warnings) {
        this.logger.warn(`${call.tool_name}: ${warning.message}`);
      }
      session = await this.session();
      const data = await session.callTool(call.tool_name, parameters);
      return {success: true, data: sanitizeResponse(data), error: null};
    } catch (error) {
      this.logger.error(`${call.tool_name} failed: ${toErrorMessage(error)}`);
      if (session?.closed) {
        // the failed call is not retried; the next one starts a fresh server
        await this.close();
      }
      return failure(error);
    }
  }

  private session(): Promise<McpSession> {
    if (this.startFailure) {
      return Promise.reject(this.startFailure);
    }
    if (!this.pendingSession) {
      this.pendingSession = this.sessionFactory().catch((error: unknown) => {
        this.pendingSession = undefined;
        if (error instanceof ProcessStartError || error instanceof HandshakeError) {
          this.startFailure = error;
        }
        throw error;
      });
    }
    return this.pendingSession;
  }
}
