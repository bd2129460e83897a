import type { ToonError } from './errors';

/** One-line rendering: `[TOON3001] Array size mismatch: ... (line 1, column 6)`. */
export function formatToonError(error: ToonError): string {
  const code = error.code ? `[${error.code}] ` : '';
  return `${code}${error.message} (line ${error.line}, column ${error.column})`;
}

function getSourceLines(source: string): string[] {
  return source.split(/\r\n|\r|\n/);
}

/**
 * Render an error with up to two lines of context on each side and a caret
 * run under its span.
 *
 * @example
 * formatErrorExcerpt('name: Ada\nage 36\ncity: Oslo', error);
 * // Error at line 2, column 5:
 * //
 * //     1 | name: Ada
 * //   > 2 | age 36
 * //       |     ^^
 * //     3 | city: Oslo
 * //   [TOON2002] Expected ':' after property key 'age'. ...
 */
export function formatErrorExcerpt(source: string, error: ToonError, filepath?: string): string {
  const { line, column } = error;
  const allLines = getSourceLines(source);
  const location = filepath
    ? `${filepath}:${line}:${column}:`
    : `Error at line ${line}, column ${column}:`;

  const startLine = Math.max(1, line - 2);
  const endLine = Math.min(allLines.length, line + 2);
  const gutterWidth = String(endLine).length;

  const contextLines: string[] = [];
  for (let i = startLine; i <= endLine; i++) {
    const lineContent = allLines[i - 1];
    const lineNum = String(i).padStart(gutterWidth, ' ');
    const prefix = i === line ? '>' : ' ';
    contextLines.push(`  ${prefix} ${lineNum} | ${lineContent}`);
    if (i === line) {
      const padding = ' '.repeat(gutterWidth);
      // Spans never continue past the end of their line.
      const room = Math.max(1, lineContent.length - column + 1);
      const width = Math.max(1, Math.min(error.length, room));
      const caret = ' '.repeat(Math.max(0, column - 1)) + '^'.repeat(width);
      contextLines.push(`    ${padding} | ${caret}`);
    }
  }

  const code = error.code ? `[${error.code}] ` : '';
  return location + '\n\n' + contextLines.join('\n') + '\n  ' + code + error.message;
}
