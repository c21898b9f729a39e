/**
 * Difficulty label resolution.
 *
 * Labels are free text in config ("Hard", "hoe", "Suicidal+", "4"). A label
 * resolves to the value of the first set, in the order below, holding a
 * synonym the lower-cased label starts with. Anything else is read as a
 * number, and non-numeric text becomes 0.
 */

export interface DifficultySynonyms {
  level: string;
  value: number;
  synonyms: readonly string[];
}

export const DIFFICULTY_SYNONYMS: readonly DifficultySynonyms[] = [
  { level: 'beginner', value: 1, synonyms: ['easy', 'beginer', 'beginner', 'begginer', 'begginner'] },
  { level: 'normal', value: 2, synonyms: ['regular', 'default', 'normal'] },
  { level: 'hard', value: 4, synonyms: ['harder', 'hard'] },
  { level: 'suicidal', value: 5, synonyms: ['suicidal'] },
  { level: 'hell on earth', value: 7, synonyms: ['hoe', 'hell on earth', 'hellonearth'] },
];

export function resolveDifficulty(label: string): number {
  const normalized = label.toLowerCase();
  for (const set of DIFFICULTY_SYNONYMS) {
    if (set.synonyms.some((synonym) => normalized.startsWith(synonym))) {
      return set.value;
    }
  }
  return parseLiteralDifficulty(normalized);
}

// Leading-number parse: "3" -> 3, "6.5x" -> 6.5, "abc" -> 0
function parseLiteralDifficulty(label: string): number {
  const parsed = Number.parseFloat(label.trim());
  return Number.isFinite(parsed) ? parsed : 0;
}
