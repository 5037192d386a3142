/**
 * Regla de selección de archivos por nombre.
 * - `suffix`: el nombre termina con `pattern` (".py", ".config.json")
 * - `exact`: el nombre es exactamente `pattern` ("Dockerfile")
 */
export type FileTypeRule =
  | { kind: "suffix"; pattern: string }
  | { kind: "exact"; pattern: string };

export const suffixRule = (pattern: string): FileTypeRule => ({
  kind: "suffix",
  pattern,
});

export const exactRule = (pattern: string): FileTypeRule => ({
  kind: "exact",
  pattern,
});

export function matchesRule(fileName: string, rule: FileTypeRule): boolean {
  switch (rule.kind) {
    case "suffix":
      return fileName.endsWith(rule.pattern);
    case "exact":
      return fileName === rule.pattern;
    default: {
      const unreachable: never = rule;
      return unreachable;
    }
  }
}

/** Un archivo se captura si cumple al menos una de las reglas */
export function matchesAnyRule(
  fileName: string,
  rules: readonly FileTypeRule[]
): boolean {
  return rules.some((rule) => matchesRule(fileName, rule));
}

export function describeRule(rule: FileTypeRule): string {
  return rule.kind === "suffix" ? `*${rule.pattern}` : rule.pattern;
}
