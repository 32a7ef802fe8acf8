import * as fs from "fs";
import * as path from "path";
import * as tmp from "tmp";
import { ConsoleLogger, Level } from "../../src/utils/logger";

describe("ConsoleLogger", () => {
  let lines: Array<[string, Level]>;
  const sink = (line: string, level: Level) => {
    lines.push([line, level]);
  };

  beforeEach(() => {
    lines = [];
  });

  it("should format lines with level, time and scope", () => {
    const logger = new ConsoleLogger({ sink });

    logger.info("hello");

    expect(lines).toHaveLength(1);
    expect(lines[0][0]).toMatch(
      /^\[I\|\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\|fs-snapshot\] hello$/
    );
    expect(lines[0][1]).toBe("info");
  });

  it("should drop messages below the threshold", () => {
    const logger = new ConsoleLogger({ level: "warn", sink });

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(lines.map(([, level]) => level)).toEqual(["warn", "error"]);
  });

  it("should drop everything when silent", () => {
    const logger = new ConsoleLogger({ level: "silent", sink });

    logger.error("boom");

    expect(lines).toEqual([]);
  });

  it("should nest child scopes and share the sink", () => {
    const logger = new ConsoleLogger({ level: "debug", scope: "run", sink });

    logger.child("store").child("sql").debug("SELECT 1");

    expect(lines[0][0]).toMatch(/\|run\.store\.sql\] SELECT 1$/);
  });

  it("should create the log file's directory", () => {
    const tmpDir = tmp.dirSync({ unsafeCleanup: true });
    try {
      const file = path.join(tmpDir.name, "logs", "fs-snapshot.log");
      const logger = new ConsoleLogger({ file });

      logger.info("written");

      const content = fs.readFileSync(file, "utf8");
      expect(content).toMatch(/^\[I\|[^\]]+\|fs-snapshot\] written\n$/);
    } finally {
      tmpDir.removeCallback();
    }
  });
});
