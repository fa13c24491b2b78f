// packages/transcribe-backend/src/application/job-error-detail.ts
//
// Maps stage failures onto the public error taxonomy attached to failed jobs.
// Public messages never carry filesystem paths, stack frames or multi-line tool output;
// the full diagnostics stay in the logs.
import {
  type JobErrorDetail,
  TranscodeError,
  TranscriptionError,
} from '@media-scribe/contracts';

export const MAX_PUBLIC_MESSAGE_LENGTH = 300;
export const GENERIC_INTERNAL_MESSAGE = 'Internal error while processing the job';

// Any token holding a path separator, absolute or relative. Quotes, parentheses
// and `=` bound the token; a trailing `:` or `,` is kept.
const PATH_TOKEN_PATTERN = /[^\s'"()=]*[\/\\][^\s'"():,]*/g;
const STACK_FRAME_PATTERN = /^\s*at\s/;
const PATH_PLACEHOLDER = '<path>';

function replaceKnownPaths(text: string, knownPaths: readonly string[]): string {
  // Longest first so a directory never pre-empts a file inside it.
  const paths = [...new Set(knownPaths)]
    .filter((path) => path.length > 1)
    .sort((a, b) => b.length - a.length);
  return paths.reduce((current, path) => current.split(path).join(PATH_PLACEHOLDER), text);
}

/**
 * Reduce free text to a single safe line: first non-stack line only, paths
 * replaced by `<path>`, length capped. `knownPaths` are removed verbatim first,
 * which also covers paths containing spaces.
 */
export function redactInternalDetails(text: string, knownPaths: readonly string[] = []): string {
  const firstLine =
    text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .find((line) => line.length > 0 && !STACK_FRAME_PATTERN.test(line)) ?? '';

  const redacted = replaceKnownPaths(firstLine, knownPaths).replace(
    PATH_TOKEN_PATTERN,
    PATH_PLACEHOLDER,
  );

  if (redacted.length <= MAX_PUBLIC_MESSAGE_LENGTH) return redacted;
  return `${redacted.slice(0, MAX_PUBLIC_MESSAGE_LENGTH - 3)}...`;
}

function lastDiagnosticLine(diagnostics: readonly string[]): string | null {
  for (let index = diagnostics.length - 1; index >= 0; index -= 1) {
    const line = diagnostics[index]?.trim();
    if (line) return line;
  }
  return null;
}

// toJobErrorDetail.declaration()
export function toJobErrorDetail(
  error: unknown,
  knownPaths: readonly string[] = [],
): JobErrorDetail {
  if (error instanceof TranscodeError || error instanceof TranscriptionError) {
    const hint = lastDiagnosticLine(error.diagnostics);
    const message = redactInternalDetails(
      hint ? `${error.message}: ${hint}` : error.message,
      knownPaths,
    );
    return {
      code: error instanceof TranscodeError ? 'transcode_error' : 'transcription_error',
      message: message || GENERIC_INTERNAL_MESSAGE,
    };
  }

  return { code: 'internal_error', message: GENERIC_INTERNAL_MESSAGE };
}
