import React, {useCallback, useEffect, useMemo, useRef, useState} from "react";
import {Box, Text, useInput, Static} from "ink";
import TextInput from "ink-text-input";
import Spinner from "ink-spinner";
import {Banner} from "./components/Banner.js";
import {CommandSuggestions} from "./components/CommandSuggestions.js";
import {getCommandSuggestions} from "./utils/commands.js";

import type {CostMcpConfig} from "./config.js";
import {toErrorMessage} from "./errors.js";
import type {ParsedArgs} from "./parseArgs.js";
import {
  executeCall,
  executeList,
  executeNormalize,
  executeSlashCommand,
  overviewMessage,
  type CommandExecutionContext,
  type CommandExecutionResult
} from "./commands/executor.js";
import type {ToolDispatcher} from "./runtime/dispatcher.js";

type ChatRole = "user" | "assistant" | "tool";

interface ChatMessage {
  id: number;
  role: ChatRole;
  text: string;
}

interface AppProps {
  options: ParsedArgs;
  config: CostMcpConfig;
  dispatcher: ToolDispatcher;
  onExit: (code: number) => void;
}

async function runNonInteractive(options: ParsedArgs, context: CommandExecutionContext): Promise<CommandExecutionResult> {
  const request = {tool: options.tool, argsJson: options.args, query: options.query, metrics: options.metrics};
  switch (options.command) {
    case "list":
      return executeList(context);
    case "call":
      return executeCall(request, context);
    case "normalize":
      return executeNormalize(request, context);
    default:
      return {lines: ["No command given."], isError: true};
  }
}

export default function App({options, config, dispatcher, onExit}: AppProps) {
  const interactive = options.interactive !== false;
  const [messages, setMessages] = useState<ChatMessage[]>([]);
  const messageCounter = useRef(1);
  const [inputValue, setInputValue] = useState("");
  const [busy, setBusy] = useState(false);
  const [commandSuggestions, setCommandSuggestions] = useState<ReturnType<typeof getCommandSuggestions>>([]);
  const [selectedSuggestionIndex, setSelectedSuggestionIndex] = useState(0);

  const commandContext = useMemo<CommandExecutionContext>(
    () => ({dispatcher, raw: options.json}),
    [dispatcher, options.json]
  );

  const addMessage = useCallback((role: ChatRole, text: string) => {
    const id = messageCounter.current++;
    setMessages((prev) => [...prev, {id, role, text}]);
  }, []);

  useEffect(() => {
    if (interactive) {
      addMessage("assistant", `Cost explorer server: ${[config.command, ...config.args].join(" ")} (region ${config.region})`);
      addMessage("assistant", overviewMessage());
    }
  }, [interactive, config, addMessage]);

  useEffect(() => {
    if (interactive || !options.command) {
      return;
    }
    runNonInteractive(options, commandContext)
      .then((result) => {
        const output = result.lines.join("\n");
        if (result.isError) {
          // eslint-disable-next-line no-console
          console.error(output);
        } else {
          // eslint-disable-next-line no-console
          console.log(output);
        }
        onExit(result.isError ? 1 : 0);
      })
      .catch((error: unknown) => {
        // eslint-disable-next-line no-console
        console.error(toErrorMessage(error));
        onExit(1);
      });
  }, [commandContext, interactive, onExit, options]);

  // Update command suggestions when input changes
  useEffect(() => {
    if (inputValue.startsWith("/") && !inputValue.includes(" ")) {
      const suggestions = getCommandSuggestions(inputValue);
      setCommandSuggestions(suggestions);
      setSelectedSuggestionIndex(0);
    } else {
      setCommandSuggestions([]);
      setSelectedSuggestionIndex(0);
    }
  }, [inputValue]);

  useInput(
    (input, key) => {
      if (key.ctrl && input === "c") {
        onExit(0);
      }

      // Handle arrow keys for command suggestions
      if (commandSuggestions.length > 0) {
        if (key.upArrow) {
          setSelectedSuggestionIndex((prev) =>
            prev > 0 ? prev - 1 : commandSuggestions.length - 1
          );
        } else if (key.downArrow) {
          setSelectedSuggestionIndex((prev) =>
            prev < commandSuggestions.length - 1 ? prev + 1 : 0
          );
        } else if (key.tab || key.return) {
          const selected = commandSuggestions[selectedSuggestionIndex];
          if (selected) {
            setInputValue(selected.command + " ");
          }
        }
      }
    },
    {isActive: interactive}
  );

  const handleSubmit = useCallback(
    async (value: string) => {
      // Enter completes the highlighted suggestion instead of submitting
      if (commandSuggestions.length > 0) {
        return;
      }

      const trimmed = value.trim();
      if (!trimmed) {
        return;
      }

      setInputValue("");
      addMessage("user", trimmed);

      if (!trimmed.startsWith("/")) {
        addMessage("assistant", "Only slash commands are supported. Try /help or /call <tool> args='<json>'.");
        return;
      }

      setBusy(true);
      try {
        const result = await executeSlashCommand(trimmed, commandContext);
        addMessage(result.isError ? "assistant" : "tool", result.lines.join("\n"));

        if (result.shouldExit) {
          setTimeout(() => onExit(0), 500);
        }
      } catch (error) {
        addMessage("assistant", `Command failed: ${toErrorMessage(error)}`);
      } finally {
        setBusy(false);
      }
    },
    [addMessage, commandContext, commandSuggestions, onExit]
  );

  const renderMessages = () => {
    const items = [{id: 0, type: "banner" as const}, ...messages.map((m) => ({...m, type: "message" as const}))];
    return (
      <Static items={items}>
        {(item) => {
          if (item.type === "banner") {
            return <Banner key="banner" />;
          }
          return (
            <Box key={item.id} flexDirection="column" marginBottom={1}>
              <MessageBubble role={item.role} text={item.text} />
            </Box>
          );
        }}
      </Static>
    );
  };

  const inputPrompt = busy ? (
    <Text color="yellow">
      <Spinner type="dots" /> Working...
    </Text>
  ) : (
    <Text color="cyan">›</Text>
  );

  if (!interactive) {
    return (
      <Box>
        <Text>{options.command === "normalize" ? "Normalizing parameters..." : "Starting cost explorer server..."}</Text>
      </Box>
    );
  }

  const selectedSuggestion = commandSuggestions[selectedSuggestionIndex];
  const ruleWidth = Math.min(process.stdout.columns || 80, 80);

  return (
    <Box flexDirection="column" gap={1}>
      {renderMessages()}
      {commandSuggestions.length > 0 && (
        <CommandSuggestions
          suggestions={commandSuggestions}
          selectedIndex={selectedSuggestionIndex}
        />
      )}
      <Box flexDirection="column" marginTop={1}>
        <Box>
          <Text color="gray">{"═".repeat(ruleWidth)}</Text>
        </Box>
        <Box>
          {inputPrompt}
          <Box marginLeft={1} flexGrow={1}>
            <Box>
              <TextInput
                value={inputValue}
                onChange={setInputValue}
                onSubmit={handleSubmit}
                placeholder="Type /help or /call <tool> args='<json>'"
              />
              {selectedSuggestion && (
                <Text color="gray" dimColor>
                  {selectedSuggestion.command.substring(inputValue.length)}
                </Text>
              )}
            </Box>
          </Box>
        </Box>
        <Box>
          <Text color="gray">{"═".repeat(ruleWidth)}</Text>
        </Box>
        {selectedSuggestion && (
          <Box marginTop={1}>
            <Text color="cyan" dimColor>
              {selectedSuggestion.command}
            </Text>
            <Text color="gray" dimColor>
              {" - "}
              {selectedSuggestion.description}
            </Text>
          </Box>
        )}
      </Box>
    </Box>
  );
}

interface MessageBubbleProps {
  role: ChatRole;
  text: string;
}

function MessageBubble({role, text}: MessageBubbleProps) {
  const color = roleColor(role);

  return (
    <Box flexDirection="column">
      <Box marginBottom={0}>
        <Text bold color={color}>
          {roleLabel(role)}
        </Text>
      </Box>
      <Box paddingLeft={2}>
        <Text>{text}</Text>
      </Box>
    </Box>
  );
}

const ROLE_LABELS: Record<ChatRole, string> = {
  user: "You",
  assistant: "Assistant",
  tool: "Tool"
};

const ROLE_COLORS: Record<ChatRole, string> = {
  user: "green",
  assistant: "cyan",
  tool: "yellow"
};

function roleLabel(role: ChatRole): string {
  return ROLE_LABELS[role];
}

function roleColor(role: ChatRole): string {
  return ROLE_COLORS[role];
}
