import { FileFilter } from "../../../../../src/application/services/filter/FileFilter";
import {
  exactRule,
  suffixRule,
} from "../../../../../src/domain/model/FileTypeRule";

describe("FileFilter", () => {
  const makeFilter = (overrides: Partial<ConstructorParameters<typeof FileFilter>[0]> = {}) =>
    new FileFilter({
      directoriesToSkip: [".git", "venv"],
      fileTypeRules: [suffixRule(".py"), exactRule("Dockerfile")],
      ignorePatterns: [],
      ...overrides,
    });

  describe("skip-list", () => {
    test("skips a directory name at any depth", () => {
      const filter = makeFilter();
      expect(filter.acceptsDirectory(".git")).toBe(false);
      expect(filter.acceptsDirectory("src/venv")).toBe(false);
      expect(filter.acceptsFile("src/venv/lib/site.py")).toBe(false);
      expect(filter.acceptsDirectory("src/venvs")).toBe(true);
    });

    test("treats entries with a slash as root-relative paths", () => {
      const filter = makeFilter({
        directoriesToSkip: ["./client/src/components/ui"],
      });
      expect(filter.acceptsDirectory("client/src/components/ui")).toBe(false);
      expect(filter.acceptsFile("client/src/components/ui/button.py")).toBe(false);
      expect(filter.acceptsDirectory("client/src/components")).toBe(true);
      expect(filter.acceptsDirectory("other/client/src/components/ui")).toBe(true);
    });

    test("a file named like a skipped directory is not skipped by name", () => {
      const filter = makeFilter({
        directoriesToSkip: ["Dockerfile"],
      });
      expect(filter.acceptsFile("Dockerfile")).toBe(true);
    });
  });

  describe("ignore patterns", () => {
    test("applies glob, negation and directory-only patterns", () => {
      const filter = makeFilter({
        fileTypeRules: [suffixRule(".py"), suffixRule(".log")],
        ignorePatterns: ["*.log", "!keep.log", "build/", "/generated.py"],
      });
      expect(filter.acceptsFile("debug.log")).toBe(false);
      expect(filter.acceptsFile("keep.log")).toBe(true);
      expect(filter.acceptsDirectory("build")).toBe(false);
      expect(filter.acceptsDirectory("src/build")).toBe(false);
      expect(filter.acceptsFile("generated.py")).toBe(false);
      expect(filter.acceptsFile("pkg/generated.py")).toBe(true);
    });

    test("a directory-only pattern does not exclude a file with that name", () => {
      const filter = makeFilter({
        fileTypeRules: [exactRule("build")],
        ignorePatterns: ["build/"],
      });
      expect(filter.acceptsFile("build")).toBe(true);
    });

    test("names made only of dots are matched against rules without throwing", () => {
      const filter = makeFilter({
        fileTypeRules: [suffixRule(".py")],
        ignorePatterns: ["*.log"],
      });
      expect(filter.isIgnored("...", false)).toBe(false);
      expect(filter.acceptsFile("...")).toBe(false);
      expect(filter.acceptsDirectory("...")).toBe(true);
      expect(filter.acceptsFile(".../x.py")).toBe(true);
    });
  });

  describe("file type rules", () => {
    test("requires at least one matching rule", () => {
      const filter = makeFilter();
      expect(filter.acceptsFile("src/app.py")).toBe(true);
      expect(filter.acceptsFile("deploy/Dockerfile")).toBe(true);
      expect(filter.acceptsFile("README.md")).toBe(false);
    });

    test("reports whether rules are configured", () => {
      expect(makeFilter().hasFileTypeRules).toBe(true);
      expect(makeFilter({ fileTypeRules: [] }).hasFileTypeRules).toBe(false);
    });
  });

  test("never accepts explicitly excluded files", () => {
    const filter = makeFilter({
      fileTypeRules: [suffixRule(".txt")],
      excludedFiles: ["./combined_docs.txt"],
    });
    expect(filter.acceptsFile("combined_docs.txt")).toBe(false);
    expect(filter.acceptsFile("docs/combined_docs.txt")).toBe(true);
  });

  test("default ignore patterns cover version control and dependencies", () => {
    const defaults = FileFilter.getDefaultIgnorePatterns();
    expect(defaults).toContain(".git/");
    expect(defaults).toContain("node_modules/");
    expect(new Set(defaults).size).toBe(defaults.length);
  });
});
