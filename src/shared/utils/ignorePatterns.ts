import patternGroups from "../data/defaultIgnorePatterns.json";

// Patrones de ignorado clasificados por stack / tipo de fichero.
const groups: Record<string, string[]> = patternGroups;

export const defaultIgnorePatterns: string[] = [
  ...new Set(Object.values(groups).flat()),
];
