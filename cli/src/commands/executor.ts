import {parseCommand, type CallCommand} from "../chat/commandParser.js";
import {toErrorMessage} from "../errors.js";
import {normalizeParameters} from "../normalize/parameterNormalizer.js";
import {splitMetricRequests} from "../normalize/splitMetrics.js";
import type {ToolDispatcher} from "../runtime/dispatcher.js";
import {formatDispatchResult, formatToolList} from "../runtime/mcp.js";
import type {DispatchResult, ToolArguments} from "../types/mcp.js";
import {isPlainObject} from "../utils/sanitize.js";

export interface CommandExecutionContext {
  dispatcher: ToolDispatcher;
  /** Print raw JSON instead of formatted text. */
  raw?: boolean;
  now?: () => Date;
}

export interface CommandExecutionResult {
  lines: string[];
  isError?: boolean;
  shouldExit?: boolean;
}

export type ToolRequest = Pick<CallCommand, "tool" | "argsJson" | "query" | "metrics">;

export async function executeSlashCommand(
  input: string,
  context: CommandExecutionContext
): Promise<CommandExecutionResult> {
  const parsed = parseCommand(input);

  switch (parsed.kind) {
    case "help":
      return {lines: [detailedHelpMessage()]};

    case "exit":
      return {lines: ["Goodbye!"], shouldExit: true};

    case "list":
      return executeList(context);

    case "reconnect":
      await context.dispatcher.reconnect();
      return {lines: ["MCP session reset. The server is restarted on the next call."]};

    case "call":
      return executeCall(parsed, context);

    case "normalize":
      return executeNormalize(parsed, context);

    case "unknown":
    default:
      return {lines: [parsed.message], isError: true};
  }
}

export async function executeList(context: CommandExecutionContext): Promise<CommandExecutionResult> {
  try {
    const tools = await context.dispatcher.listTools();
    if (context.raw) {
      return {lines: [JSON.stringify(tools, null, 2)]};
    }
    return {lines: formatToolList(tools)};
  } catch (error) {
    return {lines: [`Failed to list tools: ${toErrorMessage(error)}`], isError: true};
  }
}

export async function executeCall(
  request: ToolRequest,
  context: CommandExecutionContext
): Promise<CommandExecutionResult> {
  if (!request.tool) {
    return {lines: ["Tool name is required for /call."], isError: true};
  }
  const args = parseArgsJson(request.argsJson);
  if ("error" in args) {
    return {lines: [args.error], isError: true};
  }

  const result = await context.dispatcher.invoke(
    {tool_name: request.tool, parameters: args.value},
    {query: request.query, metrics: request.metrics}
  );
  const lines = context.raw ? [JSON.stringify(result, null, 2)] : formatDispatchResult(request.tool, result);
  return {lines, isError: hasFailure(result)};
}

export function executeNormalize(request: ToolRequest, context: CommandExecutionContext): CommandExecutionResult {
  if (!request.tool) {
    return {lines: ["Tool name is required for /normalize."], isError: true};
  }
  const args = parseArgsJson(request.argsJson);
  if ("error" in args) {
    return {lines: [args.error], isError: true};
  }

  const calls = splitMetricRequests(
    {tool_name: request.tool, parameters: args.value},
    {query: request.query, metrics: request.metrics}
  );
  const normalized = calls.map((call) => {
    const {parameters, warnings} = normalizeParameters(call.tool_name, call.parameters, {now: context.now});
    return {tool_name: call.tool_name, parameters, warnings};
  });

  if (context.raw) {
    const output = normalized.length === 1 ? normalized[0] : normalized;
    return {lines: [JSON.stringify(output, null, 2)]};
  }
  const lines: string[] = [];
  for (const [index, call] of normalized.entries()) {
    lines.push(normalized.length > 1 ? `[${index}] ${call.tool_name} parameters:` : `${call.tool_name} parameters:`);
    lines.push(JSON.stringify(call.parameters, null, 2));
    for (const warning of call.warnings) {
      lines.push(`warning (${warning.rule}): ${warning.message}`);
    }
  }
  return {lines};
}

export function parseArgsJson(argsJson: string | undefined): {value: ToolArguments} | {error: string} {
  if (!argsJson) {
    return {value: {}};
  }
  let value: unknown;
  try {
    value = JSON.parse(argsJson);
  } catch (error) {
    return {error: `Invalid JSON for args: ${toErrorMessage(error)}`};
  }
  if (!isPlainObject(value)) {
    return {error: "Tool arguments must be a JSON object."};
  }
  return {value};
}

function hasFailure(result: DispatchResult): boolean {
  if (Array.isArray(result)) {
    return result.some((entry) => !entry.result.success);
  }
  return !result.success;
}

export function overviewMessage(): string {
  return [
    "Invoke AWS Cost Explorer tools through the cost explorer MCP server.",
    "",
    "Essential commands:",
    "  /help       Show help message",
    "  /tools      List available tools",
    "  /call       Invoke a tool with JSON parameters",
    "  /exit       Exit the CLI",
    "",
    "Example:",
    "  /call get_cost_and_usage args='{\"date_range\":{\"start_date\":\"2025-01-01\",\"end_date\":\"2025-02-01\"},\"granularity\":\"MONTHLY\"}'",
    ""
  ].join("\n");
}

export function detailedHelpMessage(): string {
  const basicCommands = [
    {cmd: "/help", desc: "Show this help message"},
    {cmd: "/tools", desc: "List the cost explorer tools (alias: /list)"},
    {cmd: "/exit", desc: "Exit the CLI (aliases: /quit, /q)"}
  ];

  const toolCommands = [
    {cmd: "/call", args: "<tool> args='<json>' [query='<text>'] [metrics=a,b]", desc: "Invoke a tool"},
    {cmd: "/normalize", args: "<tool> args='<json>'", desc: "Show normalized parameters without calling"},
    {cmd: "/reconnect", desc: "Restart the MCP server on the next call"}
  ];

  const formatCommands = (cmds: Array<{cmd: string; args?: string; desc: string}>) => {
    const maxLength = Math.max(...cmds.map((c) => (c.cmd + (c.args ? " " + c.args : "")).length));
    return cmds.map(({cmd, args, desc}) => {
      const full = cmd + (args ? " " + args : "");
      const padding = " ".repeat(maxLength - full.length + 2);
      return `  ${full}${padding}${desc}`;
    });
  };

  return [
    "Cost Explorer MCP CLI",
    "",
    "Parameters are normalized before each call: group_by shapes, metric names,",
    "comparison periods and tag filters are repaired and any rewrite is reported.",
    "",
    "Basic Commands:",
    ...formatCommands(basicCommands),
    "",
    "Tool Commands:",
    ...formatCommands(toolCommands)
  ].join("\n");
}
