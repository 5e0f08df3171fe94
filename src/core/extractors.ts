/**
 * Strategies for reading the session token and command output out of web
 * console pages. Firmware builds differ in both, so each target can swap them.
 */
import type { OutputExtractor, TokenExtractor } from '../types/session.types';

// Tomato embeds the token in its nvram object, in links back to itself and
// in the hidden field of its forms
export const DEFAULT_TOKEN_PATTERNS: RegExp[] = [
  /['"]http_id['"]\s*:\s*['"]([A-Za-z0-9]+)['"]/,
  /[?&]_http_id=([A-Za-z0-9]+)/,
  /name=['"]?_http_id['"]?[^>]*?\svalue=['"]?([A-Za-z0-9]+)/i,
];

export function createPatternTokenExtractor(patterns: RegExp[]): TokenExtractor {
  return (body) => {
    for (const pattern of patterns) {
      const token = body.match(pattern)?.[1];
      if (token) {
        return token;
      }
    }
    return undefined;
  };
}

export const defaultTokenExtractor = createPatternTokenExtractor(DEFAULT_TOKEN_PATTERNS);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Output between two literal markers
 */
export function createMarkerExtractor(start: string, end: string): OutputExtractor {
  const pattern = new RegExp(`${escapeRegExp(start)}([\\s\\S]*?)${escapeRegExp(end)}`);
  return (body) => body.match(pattern)?.[1];
}

const NAMED_ENTITIES = new Map([
  ['amp', '&'],
  ['lt', '<'],
  ['gt', '>'],
  ['quot', '"'],
  ['apos', "'"],
  ['nbsp', ' '],
]);

export function decodeHtmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#\d+|[a-zA-Z]+);/g, (entity, code: string) => {
    if (code.startsWith('#')) {
      const point = code.startsWith('#x')
        ? parseInt(code.substring(2), 16)
        : parseInt(code.substring(1), 10);
      return point <= 0x10ffff ? String.fromCodePoint(point) : entity;
    }
    return NAMED_ENTITIES.get(code.toLowerCase()) ?? entity;
  });
}

export function decodeJsString(text: string): string {
  return text.replace(/\\(x[0-9a-fA-F]{2}|u[0-9a-fA-F]{4}|[\s\S])/g, (_, escape: string) => {
    switch (escape[0]) {
      case 'n':
        return '\n';
      case 'r':
        return '\r';
      case 't':
        return '\t';
      case 'x':
      case 'u':
        return escape.length > 1 ? String.fromCharCode(parseInt(escape.substring(1), 16)) : escape;
      default:
        return escape;
    }
  });
}

/**
 * Output rendered into a <pre> block of an HTML page
 */
export const preBlockExtractor: OutputExtractor = (body) => {
  const match = body.match(/<pre[^>]*>([\s\S]*?)<\/pre>/i);
  return match ? decodeHtmlEntities(match[1]) : undefined;
};

/**
 * Output returned as the JavaScript assignment `cmdresult = '...';`
 */
export const cmdResultExtractor: OutputExtractor = (body) => {
  const match = body.match(/cmdresult\s*=\s*'((?:[^'\\]|\\[\s\S])*)'/);
  return match ? decodeJsString(match[1]) : undefined;
};

export const DEFAULT_OUTPUT_EXTRACTORS: OutputExtractor[] = [preBlockExtractor, cmdResultExtractor];

/**
 * Apply extractors in order; a body none of them recognises is taken whole
 */
export function extractOutput(body: string, extractors: OutputExtractor[]): string {
  for (const extractor of extractors) {
    const output = extractor(body);
    if (output !== undefined) {
      return output;
    }
  }
  return body;
}
