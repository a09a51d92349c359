/**
 * LaTeX command stripping for section titles.
 *
 * Handles: \cmd{arg}, \cmd{arg}{second}, with one brace level inside each argument.
 */

const COMMAND_RE =
  /\\\w+\{([^{}]*(?:\{[^{}]*\}[^{}]*)*)\}(?:\{[^{}]*(?:\{[^{}]*\}[^{}]*)*\})?/g;

/** One rewrite pass: every command invocation becomes its first argument. */
export function replaceCommands(text: string): string {
  return text.replace(COMMAND_RE, (_match, firstArg: string) => firstArg);
}

/**
 * Rewrite until nothing changes. `\texorpdfstring{\acs{knn}}{k-NN}` needs two
 * passes: the outer command yields `\acs{knn}`, which then yields `knn`.
 */
export function stripLatexCommands(text: string): string {
  let current = text;
  // each productive pass removes at least `\x{}`
  for (let pass = 0; pass <= text.length; pass++) {
    const next = replaceCommands(current);
    if (next === current) break;
    current = next;
  }
  return current;
}
