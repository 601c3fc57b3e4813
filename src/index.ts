#!/usr/bin/env node

import dotenv from "dotenv";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config.js";
import { setLogLevel } from "./logger.js";
import { buildRuntime } from "./runtime.js";
import { createServer } from "./server/server.js";

dotenv.config();

const config = loadConfig();
setLogLevel(config.logLevel);
const runtime = buildRuntime(config);
const server = createServer({
  registry: runtime.registry,
  backend: runtime.backend,
  gog: runtime.gog,
});

const transport = new StdioServerTransport();
await server.connect(transport);
