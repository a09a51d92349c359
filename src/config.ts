/**
 * Runtime configuration shared by the CLI and the MCP server.
 */

import { DEFAULT_SKIP_MARKER } from "./domain/types.ts";

export const SKIP_MARKER_ENV = "LATEX_LABELS_SKIP_MARKER";

export function resolveSkipMarker(env: NodeJS.ProcessEnv = process.env): string {
  const value = env[SKIP_MARKER_ENV]?.trim();
  return value ? value : DEFAULT_SKIP_MARKER;
}
