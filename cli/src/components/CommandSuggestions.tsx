import React from "react";
import { Box, Text } from "ink";
import type { CommandOption } from "../utils/commands.js";

interface CommandSuggestionsProps {
  suggestions: CommandOption[];
  selectedIndex: number;
}

export function CommandSuggestions({ suggestions, selectedIndex }: CommandSuggestionsProps) {
  if (suggestions.length === 0) {
    return null;
  }

  const width = Math.max(...suggestions.map((s) => s.command.length));

  return (
    <Box flexDirection="column" marginBottom={1} borderStyle="round" borderColor="gray" paddingX={1}>
      {suggestions.map((suggestion, index) => {
        const selected = index === selectedIndex;
        return (
          <Box key={suggestion.command} flexDirection="row">
            <Text color={selected ? "cyan" : "gray"}>{selected ? "› " : "  "}</Text>
            <Text color={selected ? "cyan" : "white"} bold={selected}>
              {suggestion.command.padEnd(width)}
            </Text>
            <Text color="gray">
              {"  "}
              {suggestion.description}
            </Text>
            <Text color="gray" dimColor>
              {`  [${suggestion.category}]`}
            </Text>
          </Box>
        );
      })}
    </Box>
  );
}
