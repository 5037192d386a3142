import * as path from "path";
import {
  resolveOptions,
  toFileTypeRule,
} from "../../../../../../src/adapters/primary/cli/config/resolveOptions";
import {
  exactRule,
  suffixRule,
} from "../../../../../../src/domain/model/FileTypeRule";

describe("resolveOptions", () => {
  const cwd = "/home/dev/project";
  const configDir = "/home/dev/configs";

  test("falls back to defaults", () => {
    const { options, logFilePath } = resolveOptions({}, undefined, cwd, cwd);

    expect(options).toEqual({
      rootPath: cwd,
      outputPath: path.join(cwd, "combined_docs.txt"),
      ignoreFilePath: undefined,
      includeGitIgnore: true,
      includeDefaultPatterns: false,
      customIgnorePatterns: [],
      directoriesToSkip: ["venv", ".git", "notes", "archive"],
      fileTypeRules: [],
      topN: 5,
      includeSummary: true,
      includeTree: true,
      excludePaths: [path.join(cwd, "repo-digest.log")],
    });
    expect(logFilePath).toBe(path.join(cwd, "repo-digest.log"));
  });

  test("resolves config file paths against the config directory", () => {
    const { options } = resolveOptions(
      {},
      {
        root: "../project/client",
        output: "out/docs.txt",
        ignoreFile: ".gitignore",
        fileTypes: [
          { match: ".py", match_type: "endswith" },
          { match: "Dockerfile", match_type: "equals" },
        ],
        directoriesToSkip: ["venv", "./client/src/components/ui"],
        topN: 3,
        includeTree: false,
      },
      configDir,
      cwd
    );

    expect(options.rootPath).toBe("/home/dev/project/client");
    expect(options.outputPath).toBe("/home/dev/configs/out/docs.txt");
    expect(options.ignoreFilePath).toBe("/home/dev/configs/.gitignore");
    expect(options.fileTypeRules).toEqual([
      suffixRule(".py"),
      exactRule("Dockerfile"),
    ]);
    expect(options.directoriesToSkip).toEqual([
      "venv",
      "./client/src/components/ui",
    ]);
    expect(options.topN).toBe(3);
    expect(options.includeTree).toBe(false);
  });

  test("command line flags override the config file", () => {
    const { options } = resolveOptions(
      {
        root: "src",
        ext: [".ts"],
        name: ["Makefile"],
        skip: ["dist"],
        top: 10,
        gitignore: false,
        summary: false,
      },
      {
        root: "elsewhere",
        fileTypes: [{ match: ".py", match_type: "endswith" }],
        directoriesToSkip: ["venv"],
        topN: 3,
        includeGitIgnore: true,
      },
      configDir,
      cwd
    );

    expect(options.rootPath).toBe("/home/dev/project/src");
    expect(options.fileTypeRules).toEqual([
      suffixRule(".ts"),
      exactRule("Makefile"),
    ]);
    expect(options.directoriesToSkip).toEqual(["dist"]);
    expect(options.topN).toBe(10);
    expect(options.includeGitIgnore).toBe(false);
    expect(options.includeSummary).toBe(false);
  });

  test("maps match_type values onto rule variants", () => {
    expect(toFileTypeRule({ match: ".json", match_type: "endswith" })).toEqual({
      kind: "suffix",
      pattern: ".json",
    });
    expect(toFileTypeRule({ match: "Dockerfile", match_type: "equals" })).toEqual({
      kind: "exact",
      pattern: "Dockerfile",
    });
  });
});
