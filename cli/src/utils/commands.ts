/**
 * Available slash commands for autocomplete
 */

export interface CommandOption {
  command: string;
  description: string;
  category: string;
}

export const AVAILABLE_COMMANDS: CommandOption[] = [
  { command: "/help", description: "Show help message", category: "Basic" },
  { command: "/tools", description: "List available cost explorer tools", category: "Basic" },
  { command: "/exit", description: "Exit the CLI", category: "Basic" },
  { command: "/call", description: "Invoke a tool: /call <tool> args='<json>'", category: "Tools" },
  { command: "/normalize", description: "Show normalized parameters for a tool call", category: "Tools" },
  { command: "/reconnect", description: "Restart the MCP server on the next call", category: "Tools" },
];

/**
 * Get command suggestions based on partial input
 */
export function getCommandSuggestions(input: string): CommandOption[] {
  if (!input.startsWith("/")) {
    return [];
  }

  const normalized = input.toLowerCase();

  return AVAILABLE_COMMANDS.filter(cmd =>
    cmd.command.toLowerCase().startsWith(normalized)
  ).slice(0, 10); // Limit to 10 suggestions
}
