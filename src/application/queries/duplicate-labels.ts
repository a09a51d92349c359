/**
 * DuplicateLabels query — labels defined more than once across documents.
 */

import type { DuplicateLabel, LabelOccurrence, SourceDocument } from "../../domain/types.ts";
import { extractLabelOccurrences } from "../../infra/label-scanner.ts";

export function findDuplicateLabels(documents: SourceDocument[]): DuplicateLabel[] {
  const sorted = [...documents].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

  const byLabel = new Map<string, LabelOccurrence[]>();
  for (const doc of sorted) {
    for (const occurrence of extractLabelOccurrences(doc.path, doc.text)) {
      const list = byLabel.get(occurrence.label) ?? [];
      list.push(occurrence);
      byLabel.set(occurrence.label, list);
    }
  }

  const duplicates: DuplicateLabel[] = [];
  for (const [label, occurrences] of byLabel) {
    if (occurrences.length > 1) duplicates.push({ label, occurrences });
  }
  return duplicates;
}

export function formatDuplicateLabel(duplicate: DuplicateLabel): string[] {
  const lines = [`Found multiple definitions for label ${duplicate.label}`];

  let currentPath: string | null = null;
  for (const occ of duplicate.occurrences) {
    // file name only once per run of hits in the same file
    if (occ.path !== currentPath) {
      currentPath = occ.path;
      lines.push(occ.path);
    }
    lines.push(`${String(occ.line).padStart(5)} | ${occ.lineText}`);
    lines.push(`      | ${" ".repeat(occ.column)}${"^".repeat(occ.length)}`);
  }

  lines.push("");
  return lines;
}
