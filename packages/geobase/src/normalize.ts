/**
 * Street-name normalization for geobase lookups.
 *
 * The city's dataset mixes "St-Denis", "Saint-Denis" and "SAINT DENIS" for the
 * same street, so both the query and every NOM_VOIE go through the same
 * canonical form before they are compared.
 */

const ABBREVIATIONS: ReadonlyMap<string, string> = new Map([
  ['st', 'saint'],
  ['ste', 'sainte'],
  ['av', 'avenue'],
  ['ave', 'avenue'],
  ['boul', 'boulevard'],
  ['blvd', 'boulevard'],
  ['bd', 'boulevard'],
  ['ch', 'chemin'],
  ['pl', 'place'],
  ['mt', 'mont'],
]);

/**
 * Strip diacritics and lowercase a string so that e.g.
 * "Côte-des-Neiges" compares equal to "cote-des-neiges".
 */
export function foldText(s: string): string {
  return s
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/œ/gi, 'oe')
    .toLowerCase();
}

export function normalizeStreetName(raw: string): string {
  const tokens = foldText(raw)
    .replace(/[-'’.,/]/g, ' ')
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .map((token) => ABBREVIATIONS.get(token) ?? token);

  // "rue" is the street type, not part of the name NOM_VOIE carries
  if (tokens.length > 1 && tokens[0] === 'rue') {
    tokens.shift();
  }

  return tokens.join(' ');
}

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}
