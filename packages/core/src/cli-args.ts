/**
 * @module cli-args
 * Command-line surface: `svgview [path-to-svg | -]`.
 */

import { UsageError } from './errors';

/** Printed on standard output when the arity is wrong. */
export const USAGE = 'Usage:\n\tsvgview <path-to-svg>';

/** What the arguments ask for. */
export type CliCommand = { kind: 'file'; path: string } | { kind: 'stdin' };

/**
 * Interpret the positional arguments (without the node and script entries).
 * No argument or a single `-` reads standard input.
 * @throws {UsageError} With {@link USAGE} as its message for more than one argument.
 */
export function parseArgs(args: readonly string[]): CliCommand {
  if (args.length > 1) {
    throw new UsageError(USAGE);
  }
  const [first] = args;
  if (first === undefined || first === '-') {
    return { kind: 'stdin' };
  }
  return { kind: 'file', path: first };
}
