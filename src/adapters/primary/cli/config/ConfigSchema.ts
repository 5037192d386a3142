import { z } from "zod";

export const FileTypeRuleConfigSchema = z.object({
  match: z.string().min(1),
  match_type: z.enum(["endswith", "equals"]),
});

/**
 * Archivo de configuración JSON. Las rutas relativas se resuelven
 * respecto del directorio del propio archivo.
 */
export const RepoDigestConfigSchema = z
  .object({
    root: z.string().min(1).optional(),
    output: z.string().min(1).optional(),
    ignoreFile: z.string().min(1).optional(),
    includeGitIgnore: z.boolean().optional(),
    includeDefaultPatterns: z.boolean().optional(),
    customIgnorePatterns: z.array(z.string()).optional(),
    directoriesToSkip: z.array(z.string().min(1)).optional(),
    fileTypes: z.array(FileTypeRuleConfigSchema).optional(),
    topN: z.number().int().nonnegative().optional(),
    includeSummary: z.boolean().optional(),
    includeTree: z.boolean().optional(),
    logFile: z.string().min(1).optional(),
  })
  .strict();

export type FileTypeRuleConfig = z.infer<typeof FileTypeRuleConfigSchema>;
export type RepoDigestConfig = z.infer<typeof RepoDigestConfigSchema>;
