#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { serve } from "./server.js";

try {
  process.exitCode = await serve(process.env, new StdioServerTransport());
} catch (err) {
  console.error("[tasktrack]", err);
  process.exitCode = 1;
}
