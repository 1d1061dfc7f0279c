export type CommandKind = "help" | "list" | "call" | "normalize" | "reconnect" | "exit" | "unknown";

export interface BaseParsedCommand {
  kind: CommandKind;
}

export interface HelpCommand extends BaseParsedCommand {
  kind: "help";
}

export interface ExitCommand extends BaseParsedCommand {
  kind: "exit";
}

export interface SimpleCommand extends BaseParsedCommand {
  kind: "list" | "reconnect";
}

export interface CallCommand extends BaseParsedCommand {
  kind: "call" | "normalize";
  tool?: string;
  argsJson?: string;
  query?: string;
  metrics?: string[];
  rawTokens: string[];
}

export interface UnknownCommand extends BaseParsedCommand {
  kind: "unknown";
  message: string;
}

export type ParsedCommand = HelpCommand | ExitCommand | SimpleCommand | CallCommand | UnknownCommand;

const SIMPLE_COMMANDS: Record<string, SimpleCommand["kind"]> = {
  list: "list",
  tools: "list",
  reconnect: "reconnect",
  restart: "reconnect"
};

export function parseCommand(input: string): ParsedCommand {
  const trimmed = input.trim();
  const withoutSlash = trimmed.startsWith("/") ? trimmed.slice(1).trim() : trimmed;
  if (!withoutSlash) {
    return {kind: "help"};
  }

  const [first, ...tokens] = tokenize(withoutSlash);
  if (first === undefined) {
    return {kind: "help"};
  }
  const keyword = first.toLowerCase();

  if (keyword === "help" || keyword === "?") {
    return {kind: "help"};
  }

  if (keyword === "exit" || keyword === "quit" || keyword === "q") {
    return {kind: "exit"};
  }

  if (keyword === "call" || keyword === "normalize") {
    return parseCall(keyword, tokens);
  }

  const simpleKind = SIMPLE_COMMANDS[keyword];
  if (simpleKind) {
    return {kind: simpleKind};
  }

  return {
    kind: "unknown",
    message: `I don't recognise the command "${keyword}". Try "/help" to see what I can do.`
  };
}

function parseCall(kind: CallCommand["kind"], tokens: string[]): CallCommand {
  const rest = [...tokens];
  let tool: string | undefined;
  let argsJson: string | undefined;
  let query: string | undefined;
  let metrics: string[] | undefined;

  if (rest.length > 0 && !rest[0].includes("=")) {
    tool = rest.shift();
  }

  for (const token of rest) {
    const [key, value] = splitToken(token);
    if (!key || value === undefined) {
      continue;
    }
    if (key === "tool" && !tool) {
      tool = value;
    }
    if (key === "args" || key === "json") {
      argsJson = value;
    }
    if (key === "query") {
      query = value;
    }
    if (key === "metrics") {
      metrics = value
        .split(",")
        .map((metric) => metric.trim())
        .filter((metric) => metric.length > 0);
    }
  }

  return {
    kind,
    tool,
    argsJson,
    query,
    metrics,
    rawTokens: tokens
  };
}

export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  const regex = /(?:[^\s"']+|"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*')+/g;
  let match: RegExpExecArray | null;
  while ((match = regex.exec(text)) !== null) {
    tokens.push(unquote(match[0]));
  }
  return tokens;
}

// Strips one level of quoting, including the quoted value part of key='value'.
function unquote(token: string): string {
  const quoted = /^([^"'=]*=)?(["'])([\s\S]*)\2$/.exec(token);
  if (!quoted) {
    return token;
  }
  const [, prefix = "", , inner] = quoted;
  return prefix + inner.replace(/\\(["'\\])/g, "$1").replace(/\\n/g, "\n").replace(/\\t/g, "\t");
}

export function splitToken(token: string): [string | undefined, string | undefined] {
  const index = token.indexOf("=");
  if (index === -1) {
    return [undefined, token];
  }
  const key = token.slice(0, index).toLowerCase();
  const value = token.slice(index + 1);
  return [key, value];
}
