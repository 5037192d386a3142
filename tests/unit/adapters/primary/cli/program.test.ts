import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { buildProgram } from "../../../../../src/adapters/primary/cli/program";
import { FsAdapter } from "../../../../../src/adapters/secondary/fs/FsAdapter";

describe("repo-digest CLI", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "repo-digest-cli-"));
    fs.mkdirSync(path.join(tmpDir, "repo", "venv"), { recursive: true });
    fs.writeFileSync(path.join(tmpDir, "repo", "a.py"), "print(1)");
    fs.writeFileSync(path.join(tmpDir, "repo", "venv", "site.py"), "x");
    fs.writeFileSync(path.join(tmpDir, "repo", "notes.md"), "# notes");
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const run = (...args: string[]) =>
    buildProgram(new FsAdapter(), tmpDir).parseAsync(["node", "repo-digest", ...args]);

  test("writes the combined document and the log file", async () => {
    await run("repo", "-e", ".py", "--no-summary", "--no-tree", "-o", "out.txt");

    expect(fs.readFileSync(path.join(tmpDir, "out.txt"), "utf-8")).toBe(
      "=== a.py ===\nprint(1)\n\n"
    );
    const log = fs.readFileSync(path.join(tmpDir, "repo-digest.log"), "utf-8");
    expect(log).toMatch(/ - INFO - Files included: 1\n/);
    expect(process.exitCode).toBeUndefined();
  });

  test("reads rules from a config file", async () => {
    fs.writeFileSync(
      path.join(tmpDir, "digest.json"),
      JSON.stringify({
        root: "repo",
        output: "docs.txt",
        fileTypes: [{ match: ".md", match_type: "endswith" }],
        includeSummary: false,
        includeTree: false,
      })
    );

    await run("--config", "digest.json");

    expect(fs.readFileSync(path.join(tmpDir, "docs.txt"), "utf-8")).toBe(
      "=== notes.md ===\n# notes\n\n"
    );
  });

  test("sets exit code 2 when the root does not exist", async () => {
    await run("missing", "-e", ".py");

    expect(process.exitCode).toBe(2);
    expect(fs.existsSync(path.join(tmpDir, "combined_docs.txt"))).toBe(false);
  });
});
