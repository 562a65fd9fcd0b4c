import { describe, it, expect } from 'vitest';
import { normalizeStreetName, foldText, levenshtein } from '../normalize.js';

describe('normalizeStreetName', () => {
  const equivalences: Array<[string, string]> = [
    ['St-Denis', 'saint denis'],
    ['Saint-Denis', 'saint denis'],
    ['SAINT DENIS', 'saint denis'],
    ['rue St-Denis', 'saint denis'],
    ['Rue Sainte-Catherine', 'sainte catherine'],
    ['Ste-Catherine', 'sainte catherine'],
    ['Côte-des-Neiges', 'cote des neiges'],
    ["boul. de l'Acadie", 'boulevard de l acadie'],
    ['Blvd René-Lévesque', 'boulevard rene levesque'],
    ['Ave. du Mont-Royal', 'avenue du mont royal'],
    ['ch. de la Côte-Sainte-Catherine', 'chemin de la cote sainte catherine'],
    ['Pl. Ville-Marie', 'place ville marie'],
    ['  St-Laurent  ', 'saint laurent'],
    ['Cœur-Vaillant', 'coeur vaillant'],
    ['Notre-Dame Ouest', 'notre dame ouest'],
  ];

  it.each(equivalences)('normalizes %s to "%s"', (raw, expected) => {
    expect(normalizeStreetName(raw)).toBe(expected);
  });

  it('keeps a lone "rue" since nothing else names the street', () => {
    expect(normalizeStreetName('Rue')).toBe('rue');
  });

  it('only drops "rue" as the leading street type', () => {
    expect(normalizeStreetName('De La Rue')).toBe('de la rue');
  });

  it('returns an empty string for punctuation only', () => {
    expect(normalizeStreetName(' -- ,. ')).toBe('');
  });

  it('does not expand abbreviations inside words', () => {
    expect(normalizeStreetName('Stanley')).toBe('stanley');
    expect(normalizeStreetName('Chambly')).toBe('chambly');
  });
});

describe('foldText', () => {
  it('strips accents and lowercases', () => {
    expect(foldText('Montréal')).toBe('montreal');
    expect(foldText('ÎLE-BIZARD')).toBe('ile-bizard');
  });
});

describe('levenshtein', () => {
  it('computes edit distances', () => {
    expect(levenshtein('acadie', 'acadie')).toBe(0);
    expect(levenshtein('acadie', 'acadia')).toBe(1);
    expect(levenshtein('acadie', 'acadei')).toBe(2);
    expect(levenshtein('', 'abc')).toBe(3);
    expect(levenshtein('kitten', 'sitting')).toBe(3);
  });
});
