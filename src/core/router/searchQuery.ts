import { trimPunctuation, wordRegExp } from '../../utils/text.js';

const SEARCH_PATTERNS: RegExp[] = [
  wordRegExp(
    String.raw`(?:puedes\s+|podrias\s+|podrías\s+|me\s+)?` +
      String.raw`(?:buscar|busca|buscame|búscame|investiga|consulta|averigua)` +
      String.raw`(?:\s+en\s+(?:la\s+)?(?:web|internet|google))?` +
      String.raw`(?:\s+sobre)?\s+(.+)`
  ),
  wordRegExp(String.raw`(?:qu[eé]\s*noticias|noticias\s*(?:sobre|de)|[uú]ltimas\s*noticias)\s+(.+)`),
  wordRegExp(String.raw`(?:qu[eé]\s*(?:es|son|significa)|qui[eé]n\s*es|d[oó]nde\s*(?:queda|est[aá]))\s+(.+)`),
  wordRegExp(String.raw`(?:cu[aá]nto\s*(?:cuesta|vale))\s+(.+)`),
  wordRegExp(String.raw`(?:precio|cotizaci[oó]n|valor)(?:\s+actual)?(?:\s+(?:de|del))?\s+(.+)`),
  wordRegExp(String.raw`(.+?)\s+(?:precio|cotizaci[oó]n|valor)(?:\s+actual)?\b`),
];

const STOP_QUERIES = new Set(['actual', 'hoy', 'ahora', 'de', 'del']);

const POLITE_PREFIX_RE = wordRegExp(String.raw`^(?:puedes|podrias|podrías|me\s+puedes|me\s+podrias|me\s+podrías)\s+`);
const SEARCH_VERB_PREFIX_RE = wordRegExp(String.raw`^(?:buscar|busca|investiga|consulta|averigua|googlea)\s+`);

/** Pulls the search subject out of a message, or undefined when it does not read as a lookup. */
export function extractSearchIntent(text: string): string | undefined {
  const lowered = trimPunctuation(text.toLowerCase());
  for (const pattern of SEARCH_PATTERNS) {
    const match = pattern.exec(lowered);
    if (!match?.[1]) continue;
    const query = trimPunctuation(match[1]);
    if (query && !STOP_QUERIES.has(query)) {
      return query;
    }
  }
  return undefined;
}

export function normalizeQuery(message: string): string {
  const stripped = trimPunctuation(message).replace(POLITE_PREFIX_RE, '').replace(SEARCH_VERB_PREFIX_RE, '');
  return trimPunctuation(stripped);
}
