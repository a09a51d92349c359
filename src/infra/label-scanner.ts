/**
 * \label{...} extraction, line by line.
 *
 * Handles: \label{id}, \label{ id } (padding inside the braces is ignored)
 */

import type { LabelOccurrence } from "../domain/types.ts";

const LABEL_RE = /\\label\{\s*([^\s}]*?)\s*\}/g;

export function extractLabelOccurrences(path: string, text: string): LabelOccurrence[] {
  const results: LabelOccurrence[] = [];
  // CRLF input: keep \r out of the reported line text
  const lines = text.split("\n").map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));

  lines.forEach((lineText, idx) => {
    for (const match of lineText.matchAll(LABEL_RE)) {
      results.push({
        label: match[1] ?? "",
        path,
        line: idx + 1,
        column: match.index ?? 0,
        length: match[0].length,
        lineText,
      });
    }
  });

  return results;
}
