import {
  IgnoreFileAdapter,
  parseIgnoreFile,
} from "../../../../../src/adapters/secondary/ignore/IgnoreFileAdapter";
import { ConfigError } from "../../../../../src/shared/errors";
import { InMemoryFileSystem } from "../../../../helpers/InMemoryFileSystem";

describe("IgnoreFileAdapter", () => {
  let fsPort: InMemoryFileSystem;
  let adapter: IgnoreFileAdapter;

  beforeEach(() => {
    fsPort = new InMemoryFileSystem("/repo");
    adapter = new IgnoreFileAdapter(fsPort);
  });

  test("parseIgnoreFile drops blank lines and comments", () => {
    expect(
      parseIgnoreFile("# build output\r\ndist/\n\n*.log  \n!keep.log\n\\#literal\n")
    ).toEqual(["dist/", "*.log", "!keep.log", "\\#literal"]);
  });

  test("reads patterns from an explicit file", async () => {
    fsPort.addFile("/repo/.customignore", "*.tmp\nbuild/\n");
    expect(await adapter.readPatterns("/repo/.customignore")).toEqual([
      "*.tmp",
      "build/",
    ]);
  });

  test("a missing explicit file is a configuration error", async () => {
    await expect(adapter.readPatterns("/repo/.nope")).rejects.toThrow(
      new ConfigError("Ignore file not found: /repo/.nope")
    );
  });

  test("a missing .gitignore yields no patterns", async () => {
    expect(await adapter.getGitIgnorePatterns("/repo")).toEqual([]);
  });

  test("reads .gitignore from the root", async () => {
    fsPort.addFile("/repo/.gitignore", "node_modules/\n");
    expect(await adapter.getGitIgnorePatterns("/repo")).toEqual(["node_modules/"]);
  });
});
