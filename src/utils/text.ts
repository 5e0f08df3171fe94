/**
 * Tokenizing helpers for command output
 */

/**
 * Split text into lines, dropping trailing whitespace and blank lines
 */
export function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.trim().length > 0);
}

/**
 * Split a line into whitespace-separated fields
 */
export function splitFields(line: string): string[] {
  const trimmed = line.trim();
  return trimmed.length === 0 ? [] : trimmed.split(/\s+/);
}

/**
 * Parse a decimal number, rejecting anything that is not entirely numeric
 */
export function parseNumber(token: string | undefined): number | undefined {
  if (token === undefined || !/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/.test(token)) {
    return undefined;
  }
  return Number(token);
}

/**
 * Split text on a separator line, e.g. the echo between two chained commands
 */
export function splitSections(text: string, separator: string): string[] {
  const sections: string[][] = [[]];
  for (const line of text.split(/\r?\n/)) {
    if (line.trim() === separator) {
      sections.push([]);
    } else {
      sections[sections.length - 1].push(line);
    }
  }
  return sections.map((lines) => lines.join('\n'));
}
