/**
 * Error Formatter
 *
 * Splits an error into its primary message and a separate stack trace so log
 * consumers can index the trace under its own `stackTrace` field.
 *
 * The split is a text heuristic: the detailed representation (stack plus cause
 * chain) is cut right after the first occurrence of the error's message. It is
 * only exact when that first occurrence is the boundary between message and
 * trace, which holds for the `Name: message\n    at ...` shape Node produces.
 * Consumers depend on this behaviour; keep it as is.
 */

export interface FormattedError {
  message: string;
  stackTrace: string;
}

/**
 * Full representation of an error: its stack (or `Name: message` when the
 * stack is missing) followed by every `Error` in its cause chain.
 */
export function describeError(err: Error): string {
  const seen = new Set<Error>();
  const parts: string[] = [];

  let current: unknown = err;
  while (current instanceof Error && !seen.has(current)) {
    seen.add(current);
    parts.push(current.stack ?? `${current.name}: ${current.message}`);
    current = current.cause;
  }

  return parts.join('\nCaused by: ');
}

export function formatError(err: Error | null | undefined): FormattedError {
  if (!err) {
    return { message: '', stackTrace: '' };
  }

  const detailed = describeError(err);
  const short = err.message;

  const index = short === '' ? -1 : detailed.indexOf(short);
  if (index === -1) {
    return { message: detailed, stackTrace: '' };
  }

  const boundary = index + short.length;
  return {
    message: detailed.slice(0, boundary),
    stackTrace: detailed.slice(boundary),
  };
}
