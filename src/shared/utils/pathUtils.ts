import * as path from "path";

export function toPosix(relative: string): string {
  return relative.split(path.sep).join("/");
}

export function rel(root: string, absolute: string): string {
  return toPosix(path.relative(root, absolute));
}

/** "./client/src/ui/" → "client/src/ui" */
export function normalizeRelative(relative: string): string {
  return toPosix(relative)
    .replace(/^(\.\/)+/, "")
    .replace(/\/+$/, "");
}

export function fileExtension(fileName: string): string {
  const ext = path.extname(fileName);
  return ext || fileName;
}
