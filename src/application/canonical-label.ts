/**
 * Canonical label for a section: kind prefix + slug of the command-free title.
 */

import { labelPrefix, slugify } from "../domain/rules.ts";
import { stripLatexCommands } from "../infra/latex-commands.ts";

export function canonicalLabel(kind: string, title: string): string {
  return `${labelPrefix(kind)}:${slugify(stripLatexCommands(title))}`;
}
