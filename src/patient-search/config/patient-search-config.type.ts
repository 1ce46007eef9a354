export type PatientSearchConfig = {
  fuzzyThreshold: number; // Minimum Levenshtein similarity for a fuzzy match
  candidateCap: number; // Max candidates scored per query
  defaultMinSimilarity: number;
};
