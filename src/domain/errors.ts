/**
 * Error types raised while processing input files.
 */

export class DocumentReadError extends Error {
  constructor(
    readonly path: string,
    cause: unknown,
  ) {
    super(`Could not read file '${path}'`, { cause });
    this.name = "DocumentReadError";
  }
}

/** Message of each error in the `cause` chain, outermost first. */
export function causeChain(error: unknown): string[] {
  const messages: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof Error) {
      messages.push(current.message);
      current = current.cause;
    } else {
      messages.push(String(current));
      break;
    }
  }

  return messages;
}

export function formatErrorChain(path: string, error: unknown): string[] {
  const [message = "Unknown error", ...causes] = causeChain(error);
  return [
    `Error in file ${path}`,
    `  ${message}`,
    ...causes.map((cause) => `  Caused by: ${cause}`),
  ];
}
