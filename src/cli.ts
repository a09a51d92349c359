/**
 * latex-labels CLI.
 *
 * Subcommands: check, unique
 *
 * Started by bin/latex-labels.js.
 */

import { defineCommand } from "citty";
import { checkFiles, hasFailures } from "./application/commands/check-files.ts";
import { formatFinding } from "./application/commands/check-document.ts";
import { findDuplicateLabels, formatDuplicateLabel } from "./application/queries/duplicate-labels.ts";
import { resolveSkipMarker } from "./config.ts";
import { formatErrorChain } from "./domain/errors.ts";
import type { SourceDocument } from "./domain/types.ts";
import { readDocument } from "./infra/document-reader.ts";

// ── Check command ───────────────────────────────────────────────────

export const checkCmd = defineCommand({
  meta: { name: "check", description: "Check that every section is followed by a matching \\label" },
  args: {
    files: { type: "positional", description: "LaTeX files to check", required: false },
    "skip-marker": {
      type: "string",
      description: "Comment text that silences a wrong-label report",
      default: resolveSkipMarker(),
    },
  },
  async run({ args }) {
    const results = await checkFiles(args._, { skipMarker: args["skip-marker"] });

    for (const result of results) {
      if (result.success) {
        for (const finding of result.findings) {
          console.log(formatFinding(result.path, finding));
        }
      } else {
        for (const line of formatErrorChain(result.path, result.error)) {
          console.error(line);
        }
      }
    }

    if (hasFailures(results)) process.exitCode = 1;
  },
});

// ── Unique command ──────────────────────────────────────────────────

export const uniqueCmd = defineCommand({
  meta: { name: "unique", description: "Report labels that are defined more than once" },
  args: {
    files: { type: "positional", description: "LaTeX files to search", required: false },
  },
  async run({ args }) {
    const documents: SourceDocument[] = [];
    let hasError = false;

    for (const path of args._) {
      try {
        documents.push(await readDocument(path));
      } catch (e) {
        hasError = true;
        for (const line of formatErrorChain(path, e)) console.error(line);
      }
    }

    const duplicates = findDuplicateLabels(documents);
    for (const duplicate of duplicates) {
      for (const line of formatDuplicateLabel(duplicate)) console.log(line);
    }

    if (duplicates.length > 0) {
      console.error("Found multiple definitions of the same label");
      hasError = true;
    }
    if (hasError) process.exitCode = 1;
  },
});

// ── Main ────────────────────────────────────────────────────────────

export const main = defineCommand({
  meta: { name: "latex-labels", version: "1.0.0", description: "Section label checks for LaTeX sources" },
  subCommands: {
    check: checkCmd,
    unique: uniqueCmd,
  },
});
