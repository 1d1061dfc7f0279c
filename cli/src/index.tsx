#!/usr/bin/env node
import "dotenv/config";
import React from "react";
import {render} from "ink";

import App from "./app.js";
import {loadConfig, type CostMcpConfig} from "./config.js";
import {toErrorMessage} from "./errors.js";
import {HELP_TEXT, parseArgs} from "./parseArgs.js";
import {ToolDispatcher} from "./runtime/dispatcher.js";
import {createStdioSession} from "./runtime/mcp.js";
import {createLogger} from "./utils/logger.js";

const parsed = parseArgs(process.argv.slice(2));

if (parsed.helpRequested) {
  // eslint-disable-next-line no-console
  console.log(HELP_TEXT);
  process.exit(0);
}

if (parsed.errors.length > 0) {
  // eslint-disable-next-line no-console
  console.error(parsed.errors.join("\n"));
  process.exit(2);
}

if (parsed.unknown.length > 0) {
  // eslint-disable-next-line no-console
  console.warn(`Ignoring unknown arguments: ${parsed.unknown.join(", ")}`);
}

let config: CostMcpConfig;
try {
  config = loadConfig(process.env, {
    region: parsed.region,
    readTimeoutMs: parsed.timeoutMs,
    verbose: parsed.verbose
  });
} catch (error) {
  // eslint-disable-next-line no-console
  console.error(toErrorMessage(error));
  process.exit(2);
}

const logger = createLogger("cost-mcp", {verbose: config.verbose});
const dispatcher = new ToolDispatcher({
  sessionFactory: () => createStdioSession(config, {logger}),
  logger: logger.child("dispatch")
});

const exit = (code: number) => {
  dispatcher
    .close()
    .catch((error: unknown) => logger.debug(`Shutdown: ${toErrorMessage(error)}`))
    .finally(() => process.exit(code));
};

render(<App options={parsed} config={config} dispatcher={dispatcher} onExit={exit} />, {exitOnCtrlC: false});
