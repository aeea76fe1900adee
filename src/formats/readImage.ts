import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';

const WORD = /^[+-]?\d+$/;

/**
 * Parse image text into words.
 *
 * Accepts comma-separated decimal integers (`1,2,3`) or the same list in brackets (`[1, 2, 3]`). Whitespace
 * and newlines around words are ignored. Empty text is an empty image.
 *
 * On malformed input, appends an `ImageParseError` for each bad word and returns `undefined`.
 */
export function readImage(
  text: string,
  file: string,
  diagnostics: Diagnostic[],
): number[] | undefined {
  let body = text.trim();
  if (body.startsWith('[')) {
    if (!body.endsWith(']')) {
      diagnostics.push({
        id: DiagnosticIds.ImageParseError,
        severity: 'error',
        message: 'Unterminated "[" in image text.',
        file,
      });
      return undefined;
    }
    body = body.slice(1, -1).trim();
  }
  if (body.length === 0) return [];

  const words: number[] = [];
  let ok = true;
  body.split(',').forEach((raw, index) => {
    const token = raw.trim();
    const value = Number(token);
    if (!WORD.test(token) || !Number.isSafeInteger(value)) {
      diagnostics.push({
        id: DiagnosticIds.ImageParseError,
        severity: 'error',
        message: `Image word ${index} is not a decimal integer: "${token}".`,
        file,
      });
      ok = false;
      return;
    }
    words.push(value);
  });
  return ok ? words : undefined;
}
