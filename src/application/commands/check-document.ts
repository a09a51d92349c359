/**
 * CheckDocument command.
 *
 * Compares every section of one document against the label it should carry.
 */

import { isOptedOut, offsetToLineNumber } from "../../domain/rules.ts";
import { DEFAULT_SKIP_MARKER, FindingType, type DocumentReport, type Finding } from "../../domain/types.ts";
import { defaultSectionScanner, type SectionScanner } from "../../infra/section-scanner.ts";
import { canonicalLabel } from "../canonical-label.ts";

export interface CheckOptions {
  /** Substring of a trailing comment that silences a wrong-label finding. */
  skipMarker?: string;
  scanner?: SectionScanner;
}

export function checkDocument(text: string, options: CheckOptions = {}): DocumentReport {
  const { scanner = defaultSectionScanner } = options;
  // a blank marker would match every comment
  const skipMarker = options.skipMarker && options.skipMarker.trim() !== "" ? options.skipMarker : DEFAULT_SKIP_MARKER;
  const findings: Finding[] = [];
  let hasMismatch = false;

  for (const match of scanner.scan(text)) {
    const line = offsetToLineNumber(text, match.offset);

    if (match.type === "unparsable") {
      findings.push({ line, type: FindingType.UNPARSABLE, expected: null, observed: null });
      continue;
    }

    const expected = canonicalLabel(match.kind, match.title);

    if (match.label === null) {
      hasMismatch = true;
      findings.push({ line, type: FindingType.MISSING_LABEL, expected, observed: null });
    } else if (match.label !== expected && !isOptedOut(match.comment, skipMarker)) {
      hasMismatch = true;
      findings.push({ line, type: FindingType.WRONG_LABEL, expected, observed: match.label });
    }
  }

  return { hasMismatch, findings };
}

export function formatFinding(path: string, finding: Finding): string {
  const prefix = `${path}:${finding.line}`;
  switch (finding.type) {
    case FindingType.UNPARSABLE:
      return `${prefix} Unprocessable Section`;
    case FindingType.MISSING_LABEL:
      return `${prefix} Missing Label, use \\label{${finding.expected ?? ""}}`;
    case FindingType.WRONG_LABEL:
      return `${prefix} Wrong Label '${finding.observed ?? ""}', use \\label{${finding.expected ?? ""}}`;
  }
}
