import { z } from "zod";
import { errorMessage } from "../../../shared/errors";

const NotebookCellSchema = z
  .object({
    cell_type: z.string(),
    source: z.union([z.string(), z.array(z.string())]).optional(),
  })
  .passthrough();

const NotebookSchema = z
  .object({
    cells: z.array(NotebookCellSchema).default([]),
  })
  .passthrough();

export type NotebookConversion =
  | { ok: true; script: string }
  | { ok: false; error: string };

export function isNotebook(fileName: string): boolean {
  return fileName.endsWith(".ipynb");
}

/**
 * Convierte un notebook Jupyter en un script plano: las celdas de código bajo
 * `# In[i]:` y las de markdown comentadas con `# `. Las demás celdas se omiten
 * pero conservan su índice.
 */
export function convertNotebook(raw: string): NotebookConversion {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }

  const notebook = NotebookSchema.safeParse(parsed);
  if (!notebook.success) {
    return {
      ok: false,
      error: notebook.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; "),
    };
  }

  const lines: string[] = [];
  notebook.data.cells.forEach((cell, index) => {
    const source = cellLines(cell.source);
    if (cell.cell_type === "code") {
      lines.push(`# In[${index}]:`, ...source, "");
    } else if (cell.cell_type === "markdown") {
      lines.push(
        `# In[${index}] (markdown):`,
        ...source.map((line) => `# ${line}`),
        ""
      );
    }
  });
  return { ok: true, script: lines.join("\n") };
}

function cellLines(source: string | string[] | undefined): string[] {
  const text = Array.isArray(source) ? source.join("") : (source ?? "");
  return text.replace(/\r?\n$/, "").split(/\r?\n/);
}
