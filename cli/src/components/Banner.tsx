import React from "react";
import { Box, Text } from "ink";

export function Banner() {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Box>
        <Text bold>
          <Text color="green">{" ██████╗ ██████╗ ███████╗████████╗"}</Text>
          <Text color="cyan">{"  ███╗   ███╗ ██████╗██████╗ "}</Text>
        </Text>
      </Box>
      <Box>
        <Text bold>
          <Text color="green">{"██╔════╝██╔═══██╗██╔════╝╚══██╔══╝"}</Text>
          <Text color="cyan">{"  ████╗ ████║██╔════╝██╔══██╗"}</Text>
        </Text>
      </Box>
      <Box>
        <Text bold>
          <Text color="green">{"██║     ██║   ██║███████╗   ██║   "}</Text>
          <Text color="cyan">{"  ██╔████╔██║██║     ██████╔╝"}</Text>
        </Text>
      </Box>
      <Box>
        <Text bold>
          <Text color="green">{"██║     ██║   ██║╚════██║   ██║   "}</Text>
          <Text color="cyan">{"  ██║╚██╔╝██║██║     ██╔═══╝ "}</Text>
        </Text>
      </Box>
      <Box>
        <Text bold>
          <Text color="green">{"╚██████╗╚██████╔╝███████║   ██║   "}</Text>
          <Text color="cyan">{"  ██║ ╚═╝ ██║╚██████╗██║     "}</Text>
        </Text>
      </Box>
      <Box>
        <Text bold>
          <Text color="green">{" ╚═════╝ ╚═════╝ ╚══════╝   ╚═╝   "}</Text>
          <Text color="cyan">{"  ╚═╝     ╚═╝ ╚═════╝╚═╝     "}</Text>
        </Text>
      </Box>
      <Text color="gray">AWS Cost Explorer over MCP</Text>
    </Box>
  );
}
