export type CommandName = "list" | "call" | "normalize";

export interface ParsedArgs {
  command?: CommandName;
  tool?: string;
  args?: string;
  query?: string;
  metrics?: string[];
  region?: string;
  timeoutMs?: number;
  verbose?: boolean;
  json?: boolean;
  interactive: boolean;
  helpRequested?: boolean;
  unknown: string[];
  errors: string[];
}

const COMMANDS: ReadonlySet<string> = new Set<CommandName>(["list", "call", "normalize"]);

export const HELP_TEXT = `
Usage
  cost-mcp [options] [command]

Commands
  list                          Start the cost explorer server and list its tools
  call <tool> [json]            Invoke a tool with a JSON object of parameters
  normalize <tool> [json]       Print the normalized parameters without calling the server

Options
  --tool <name>            Tool name for call and normalize
  --args <json>            JSON object with tool parameters
  --query <text>           Original request text, used to split cost and usage calls per metric
  --metrics <a,b>          Comma-separated metrics to request as separate calls
  --region <region>        AWS region forced on the server (default: AWS_REGION or us-east-1)
  --timeout <ms>           Per-response read timeout in milliseconds (default: 120000)
  --verbose, -v            Log protocol traffic and server stderr
  --json                   Print raw JSON results without formatting
  --interactive            Force interactive mode even when a command is provided
  --no-interactive         Force non-interactive mode
  --help, -h               Show this help message
`.trim();

export function parseArgs(argv: string[]): ParsedArgs {
  const result: ParsedArgs = {
    interactive: true,
    unknown: [],
    errors: []
  };

  const consumeValue = (index: number): string | undefined => {
    const value = argv[index + 1];
    if (value === undefined) {
      result.errors.push(`Missing value for ${argv[index]}`);
      return undefined;
    }
    return value;
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    switch (arg) {
      case "--tool": {
        const value = consumeValue(i);
        if (value !== undefined) {
          result.tool = value;
          i += 1;
        }
        break;
      }
      case "--args": {
        const value = consumeValue(i);
        if (value !== undefined) {
          result.args = value;
          i += 1;
        }
        break;
      }
      case "--query": {
        const value = consumeValue(i);
        if (value !== undefined) {
          result.query = value;
          i += 1;
        }
        break;
      }
      case "--metrics": {
        const value = consumeValue(i);
        if (value !== undefined) {
          result.metrics = value
            .split(",")
            .map((metric) => metric.trim())
            .filter((metric) => metric.length > 0);
          i += 1;
        }
        break;
      }
      case "--region": {
        const value = consumeValue(i);
        if (value !== undefined) {
          result.region = value;
          i += 1;
        }
        break;
      }
      case "--timeout": {
        const value = consumeValue(i);
        if (value !== undefined) {
          const timeoutMs = Number(value);
          if (Number.isInteger(timeoutMs) && timeoutMs > 0) {
            result.timeoutMs = timeoutMs;
          } else {
            result.errors.push(`--timeout expects a positive number of milliseconds, got "${value}"`);
          }
          i += 1;
        }
        break;
      }
      case "--verbose":
      case "-v": {
        result.verbose = true;
        break;
      }
      case "--json": {
        result.json = true;
        break;
      }
      case "--interactive": {
        result.interactive = true;
        break;
      }
      case "--no-interactive": {
        result.interactive = false;
        break;
      }
      case "--help":
      case "-h": {
        result.helpRequested = true;
        result.interactive = false;
        break;
      }
      default: {
        if (arg.startsWith("--")) {
          result.unknown.push(arg);
          break;
        }

        if (!result.command && isCommand(arg)) {
          result.command = arg;
          result.interactive = false;
          break;
        }

        if (result.command === "call" || result.command === "normalize") {
          if (!result.tool) {
            result.tool = arg;
            break;
          }
          if (!result.args) {
            result.args = arg;
            break;
          }
        }

        result.unknown.push(arg);
      }
    }
  }

  return result;
}

function isCommand(value: string): value is CommandName {
  return COMMANDS.has(value);
}
