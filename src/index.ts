#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { formatConfigString, loadConfig } from "./config.js";
import { createServer } from "./server.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.resolve(__dirname, "..", ".env") });

const config = loadConfig();
const server = createServer(config);

// ============================================================
// START SERVER
// ============================================================

async function main() {
  // stdout carries the protocol; diagnostics go to stderr
  console.error(`value-toml-mcp starting (${formatConfigString(config)})`);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
