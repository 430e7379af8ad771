/**
 * Diagnostic output and verbosity settings shared by the validator and the
 * tree printer.
 */

/** Receives one diagnostic message (which may span several lines). */
export type DiagnosticSink = (message: string) => void;

/** Name of the environment variable holding the initial verbosity level. */
export const VerbosityEnvVar = 'TWO_FOUR_TREE_VERBOSITY';

const consoleSink: DiagnosticSink = message => console.warn(message);

let defaultSink: DiagnosticSink = consoleSink;
let verbosity: number | undefined;

/**
 * Replaces the sink that diagnostics go to when a call does not supply its
 * own. Passing nothing restores the console sink.
 */
export function setDiagnosticSink(sink?: DiagnosticSink): void {
  defaultSink = sink ?? consoleSink;
}

/** The sink used when a call does not supply its own. */
export function getDiagnosticSink(): DiagnosticSink {
  return defaultSink;
}

/**
 * Reads the verbosity level from the environment. Unset or non-numeric
 * values mean 0.
 *
 * @example
 * ```bash
 * TWO_FOUR_TREE_VERBOSITY=2 npm test
 * ```
 */
function verbosityFromEnv(): number {
  try {
    const raw = typeof process !== 'undefined' ? process.env[VerbosityEnvVar] : undefined;
    const level = raw === undefined ? NaN : parseInt(raw, 10);
    return Number.isNaN(level) ? 0 : level;
  } catch (e) {
    // In browser environments, accessing process may throw an error
    return 0;
  }
}

/** Current verbosity level; the environment is consulted on first use. */
export function getVerbosity(): number {
  if (verbosity === undefined)
    verbosity = verbosityFromEnv();
  return verbosity;
}

/** Overrides the verbosity level for the rest of the process. */
export function setVerbosity(level: number): void {
  verbosity = level;
}

/** Forgets any override, so the next read consults the environment again. */
export function resetVerbosity(): void {
  verbosity = undefined;
}
