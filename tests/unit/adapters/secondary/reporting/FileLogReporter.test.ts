import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { FileLogReporter } from "../../../../../src/adapters/secondary/reporting/FileLogReporter";
import { CompositeProgressReporter } from "../../../../../src/adapters/secondary/reporting/CompositeProgressReporter";
import { createMockLogger } from "../../../../helpers/mocks";

describe("FileLogReporter", () => {
  let tmpDir: string;
  let logPath: string;
  const fixedNow = () => new Date("2024-05-01T10:00:00.000Z");

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "repo-digest-log-"));
    logPath = path.join(tmpDir, "logs", "run.log");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  test("writes timestamped lines with their level", () => {
    const reporter = new FileLogReporter(logPath, false, fixedNow);
    reporter.info("started");
    reporter.warn("careful");
    reporter.error("Error reading file a.py: gone");
    reporter.debug("hidden");

    expect(fs.readFileSync(logPath, "utf-8")).toBe(
      "2024-05-01T10:00:00.000Z - INFO - started\n" +
        "2024-05-01T10:00:00.000Z - WARNING - careful\n" +
        "2024-05-01T10:00:00.000Z - ERROR - Error reading file a.py: gone\n"
    );
  });

  test("truncates the previous log on creation", () => {
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    fs.writeFileSync(logPath, "old run\n");

    const reporter = new FileLogReporter(logPath, false, fixedNow);
    reporter.info("new run");

    expect(fs.readFileSync(logPath, "utf-8")).toBe(
      "2024-05-01T10:00:00.000Z - INFO - new run\n"
    );
  });

  test("records debug lines and operation timings when enabled", () => {
    const reporter = new FileLogReporter(logPath, true, fixedNow);
    reporter.startOperation("op");
    reporter.debug("details");
    reporter.endOperation("op");

    expect(fs.readFileSync(logPath, "utf-8")).toBe(
      "2024-05-01T10:00:00.000Z - DEBUG - details\n" +
        "2024-05-01T10:00:00.000Z - DEBUG - op: 0ms\n"
    );
  });
});

describe("CompositeProgressReporter", () => {
  test("forwards every call to all reporters", () => {
    const first = createMockLogger();
    const second = createMockLogger();
    const composite = new CompositeProgressReporter(first, second);

    composite.startOperation("op");
    composite.info("hello");
    composite.warn("warn");
    composite.error("boom", "stack");
    composite.debug("dbg", 1);
    composite.endOperation("op");

    for (const reporter of [first, second]) {
      expect(reporter.startOperation).toHaveBeenCalledWith("op");
      expect(reporter.info).toHaveBeenCalledWith("hello");
      expect(reporter.warn).toHaveBeenCalledWith("warn");
      expect(reporter.error).toHaveBeenCalledWith("boom", "stack");
      expect(reporter.debug).toHaveBeenCalledWith("dbg", 1);
      expect(reporter.endOperation).toHaveBeenCalledWith("op");
    }
  });
});
