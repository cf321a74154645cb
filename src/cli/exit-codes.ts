import { CommanderError } from "commander";

export const EXIT_CODES = {
  clean: 0,
  findings: 1,
  error: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeForOutcome(hasFindings: boolean): ExitCode {
  return hasFindings ? EXIT_CODES.findings : EXIT_CODES.clean;
}

/** Help and version output exit cleanly; every other failure is an operational error. */
export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof CommanderError && error.exitCode === 0) {
    return EXIT_CODES.clean;
  }
  return EXIT_CODES.error;
}
