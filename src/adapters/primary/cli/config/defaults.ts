export const DEFAULT_CONFIG_FILE = "repo-digest.config.json";

export const DEFAULTS = {
  root: ".",
  output: "combined_docs.txt",
  logFile: "repo-digest.log",
  directoriesToSkip: ["venv", ".git", "notes", "archive"],
  topN: 5,
} as const;
