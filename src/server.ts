/**
 * MCP server — exposes the label check to editor agents.
 *
 * Tools: latex_check_labels, latex_suggest_label
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { canonicalLabel } from "./application/canonical-label.ts";
import { checkDocument, formatFinding } from "./application/commands/check-document.ts";
import { parseSectionKind } from "./domain/rules.ts";
import { DEFAULT_SKIP_MARKER } from "./domain/types.ts";

export interface ServerOptions {
  skipMarker?: string;
}

function textResult(text: string, isError = false) {
  return { content: [{ type: "text" as const, text }], isError };
}

function stringArg(args: Record<string, unknown> | undefined, key: string): string | null {
  const value = args?.[key];
  return typeof value === "string" ? value : null;
}

export function createServer(options: ServerOptions = {}): Server {
  const skipMarker = options.skipMarker ?? DEFAULT_SKIP_MARKER;

  const server = new Server(
    { name: "latex-labels", version: "1.0.0" },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: [
      {
        name: "latex_check_labels",
        description: "Check that every \\section, \\subsection and \\subsubsection in a LaTeX source is followed by a \\label matching its title.",
        inputSchema: {
          type: "object" as const,
          properties: {
            text: { type: "string", description: "LaTeX source text" },
            path: { type: "string", description: "File name used in reported lines (default: <input>)" },
          },
          required: ["text"],
        },
      },
      {
        name: "latex_suggest_label",
        description: "Compute the label a section with the given kind and title should carry.",
        inputSchema: {
          type: "object" as const,
          properties: {
            kind: { type: "string", description: "section, subsection or subsubsection" },
            title: { type: "string", description: "Raw section title, LaTeX commands allowed" },
          },
          required: ["kind", "title"],
        },
      },
    ],
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      switch (name) {
        case "latex_check_labels": {
          const text = stringArg(args, "text");
          if (text === null) return textResult("Missing required argument: text", true);
          const path = stringArg(args, "path") ?? "<input>";

          const report = checkDocument(text, { skipMarker });
          const lines = report.findings.map((f) => formatFinding(path, f));
          return textResult(JSON.stringify({ ...report, lines }, null, 2));
        }

        case "latex_suggest_label": {
          const kindArg = stringArg(args, "kind");
          const title = stringArg(args, "title");
          if (kindArg === null || title === null) {
            return textResult("Missing required arguments: kind, title", true);
          }
          const kind = parseSectionKind(kindArg);
          if (!kind) return textResult(`Unknown section kind: ${kindArg}`, true);

          return textResult(canonicalLabel(kind, title));
        }

        default:
          return textResult(`Unknown tool: ${name}`, true);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return textResult(`Error: ${message}`, true);
    }
  });

  return server;
}
