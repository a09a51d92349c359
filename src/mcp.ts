/**
 * MCP entry point — serves the label tools over stdio.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { resolveSkipMarker } from "./config.ts";
import { createServer } from "./server.ts";

const server = createServer({ skipMarker: resolveSkipMarker() });
const transport = new StdioServerTransport();
await server.connect(transport);
