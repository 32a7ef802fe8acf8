import * as fs from "fs/promises";
import { unlinkSync } from "fs";
import * as path from "path";
import * as tmp from "tmp";
import { Scanner, scan } from "../../src/core/scanner";
import { ScanIOError } from "../../src/core/errors";
import { archivedPredicate, labelCalculator } from "../../src/core/policy";
import { digestContent } from "../../src/utils/digest";
import { Logger } from "../../src/utils/logger";
import { collect, recordPath, sortedPaths, writeTree } from "../helpers/tree";

const TREE = {
  "A/1.csv": "one",
  "A/2.csv": "two",
  "B/x.txt": "three",
  "notes.md": "four",
};

// permission bits do not stop root
const itUnlessRoot = process.getuid?.() === 0 ? it.skip : it;

const GROUPS = {
  csv: ["{dir}/{num}.csv"],
  txt: ["{dir}/*.txt"],
};

describe("Scanner", () => {
  let tmpDir: tmp.DirResult;
  let root: string;

  beforeEach(async () => {
    tmpDir = tmp.dirSync({ unsafeCleanup: true });
    root = tmpDir.name;
    await writeTree(root, TREE);
  });

  afterEach(() => {
    tmpDir.removeCallback();
  });

  describe("scan", () => {
    it("should classify every file in one walk", async () => {
      const scanner = new Scanner(root, { patternGroups: GROUPS });

      const scanned = await collect(scanner.scan());
      const summary = scanned
        .map(({ category, record }) => [recordPath(record), category, record.metadata])
        .sort(([a], [b]) => String(a).localeCompare(String(b)));

      expect(summary).toEqual([
        ["A/1.csv", "csv", { dir: "A", num: "1" }],
        ["A/2.csv", "csv", { dir: "A", num: "2" }],
        ["B/x.txt", "txt", { dir: "B" }],
        ["notes.md", null, {}],
      ]);
      expect(scanner.errors).toEqual([]);
    });

    it("should fill in stat fields and the digest", async () => {
      const [record] = await collect(
        scan(root, { patternGroups: { txt: GROUPS.txt }, includeUnmatched: false })
      );
      const stats = await fs.stat(path.join(root, "B/x.txt"));

      expect(record.dirName).toBe("B");
      expect(record.baseName).toBe("x.txt");
      expect(record.size).toBe(5);
      expect(record.modified).toBe(stats.mtimeMs / 1000);
      expect(record.archived).toBe(false);
      expect(record.digest.equals(digestContent("three"))).toBe(true);
    });

    it("should leave the digest empty when digesting is off", async () => {
      const records = await collect(scan(root, { digest: false }));

      expect(records).toHaveLength(4);
      expect(records.every((record) => record.digest.length === 0)).toBe(true);
    });

    it("should let the first matching category win", async () => {
      const scanner = new Scanner(root, {
        patternGroups: { anyDir: ["{dir}/*.csv"], onlyA: ["A/{num}.csv"] },
        includeUnmatched: false,
      });

      const scanned = await collect(scanner.scan());

      expect(scanned.map(({ category }) => category)).toEqual(["anyDir", "anyDir"]);
      expect(await collect(scanner.scanCategory("onlyA"))).toEqual([]);
    });

    it("should skip unmatched files when asked", async () => {
      const records = await collect(
        scan(root, { patternGroups: GROUPS, includeUnmatched: false })
      );

      expect(sortedPaths(records)).toEqual(["A/1.csv", "A/2.csv", "B/x.txt"]);
    });

    it("should apply gitignore-style exclude patterns", async () => {
      const records = await collect(
        scan(root, { excludePatterns: ["*.md", "B"] })
      );

      expect(sortedPaths(records)).toEqual(["A/1.csv", "A/2.csv"]);
    });

    it("should derive archive state and labels from metadata", async () => {
      const [record] = await collect(
        scan(root, {
          patternGroups: { txt: GROUPS.txt },
          includeUnmatched: false,
          isArchived: archivedPredicate({
            kind: "has-metadata",
            key: "dir",
            values: ["b"],
          }),
          fileGroupOf: labelCalculator({ kind: "from-metadata", format: "{dir}-files" }),
          fileTypeOf: labelCalculator({ kind: "from-metadata", format: "{missing}" }),
        })
      );

      expect(record.archived).toBe(true);
      expect(record.fileGroup).toBe("B-files");
      expect(record.fileType).toBeUndefined();
    });

    it("should not follow or record symbolic links", async () => {
      await fs.symlink(path.join(root, "A/1.csv"), path.join(root, "link.csv"));
      await fs.symlink(path.join(root, "A"), path.join(root, "linked-dir"));

      const records = await collect(scan(root));

      expect(sortedPaths(records)).toEqual([
        "A/1.csv",
        "A/2.csv",
        "B/x.txt",
        "notes.md",
      ]);
    });

    it("should keep going when one file disappears mid-scan", async () => {
      const logger: Logger = {
        debug: (message) => {
          if (message === "Fetched: B/x.txt") unlinkSync(path.join(root, "B/x.txt"));
        },
        info: () => {},
        warn: () => {},
        error: () => {},
        child: () => logger,
      };
      const scanner = new Scanner(root, { patternGroups: GROUPS, logger });

      const scanned = await collect(scanner.scan());

      expect(sortedPaths(scanned.map(({ record }) => record))).toEqual([
        "A/1.csv",
        "A/2.csv",
        "notes.md",
      ]);
      expect(scanner.errors).toHaveLength(1);
      expect(scanner.errors[0]).toBeInstanceOf(ScanIOError);
      expect(scanner.errors[0].path).toBe("B/x.txt");
    });

    itUnlessRoot("should report an unreadable directory and scan the rest", async () => {
      await writeTree(root, { "locked/x/1.csv": "hidden" });
      await fs.chmod(path.join(root, "locked"), 0o000);
      try {
        const scanner = new Scanner(root, { patternGroups: GROUPS });

        const scanned = await collect(scanner.scan());

        expect(scanned).toHaveLength(4);
        expect(scanner.errors.map((error) => error.path)).toEqual(["locked"]);
      } finally {
        await fs.chmod(path.join(root, "locked"), 0o755);
      }
    });

    it("should fail with ScanIOError when the root is missing", async () => {
      const scanner = new Scanner(path.join(root, "missing"));

      await expect(scanner.scan().next()).rejects.toBeInstanceOf(ScanIOError);
    });

    it("should fail with ScanIOError when the root is a file", async () => {
      const scanner = new Scanner(path.join(root, "notes.md"));

      await expect(scanner.scan().next()).rejects.toThrow(
        `Unable to read '${path.join(root, "notes.md")}'`
      );
    });
  });

  describe("scanCategory", () => {
    it("should walk only the category's files", async () => {
      const scanner = new Scanner(root, { patternGroups: GROUPS });

      const records = await collect(scanner.scanCategory("csv"));

      expect(sortedPaths(records)).toEqual(["A/1.csv", "A/2.csv"]);
      expect(records.map((record) => record.metadata.num).sort()).toEqual(["1", "2"]);
    });

    it("should match case-insensitively", async () => {
      await writeTree(root, { "C/3.CSV": "upper" });
      const scanner = new Scanner(root, { patternGroups: GROUPS });

      const records = await collect(scanner.scanCategory("csv"));

      expect(sortedPaths(records)).toEqual(["A/1.csv", "A/2.csv", "C/3.CSV"]);
    });

    it("should not descend into a linked directory", async () => {
      const outside = tmp.dirSync({ unsafeCleanup: true });
      try {
        await writeTree(outside.name, { "9.csv": "elsewhere" });
        await fs.symlink(outside.name, path.join(root, "linked-dir"));
        const scanner = new Scanner(root, { patternGroups: GROUPS });

        const walked = await collect(scanner.scanCategory("csv"));
        const classified = (await collect(scanner.scan()))
          .filter(({ category }) => category === "csv")
          .map(({ record }) => record);

        expect(sortedPaths(walked)).toEqual(["A/1.csv", "A/2.csv"]);
        expect(sortedPaths(classified)).toEqual(sortedPaths(walked));
      } finally {
        outside.removeCallback();
      }
    });

    itUnlessRoot("should report an unreadable directory", async () => {
      await writeTree(root, { "locked/x/1.csv": "hidden" });
      await fs.chmod(path.join(root, "locked"), 0o000);
      try {
        const scanner = new Scanner(root, { patternGroups: GROUPS });

        const records = await collect(scanner.scanCategory("csv"));

        expect(sortedPaths(records)).toEqual(["A/1.csv", "A/2.csv"]);
        expect(scanner.errors.map((error) => error.path)).toEqual(["locked"]);
      } finally {
        await fs.chmod(path.join(root, "locked"), 0o755);
      }
    });

    it("should reject an unknown category", async () => {
      const scanner = new Scanner(root, { patternGroups: GROUPS });

      await expect(scanner.scanCategory("nope").next()).rejects.toThrow(
        "Unknown match path category: nope"
      );
    });
  });

  describe("scanUnmatched", () => {
    it("should yield only files no category matches", async () => {
      const scanner = new Scanner(root, { patternGroups: GROUPS });

      const records = await collect(scanner.scanUnmatched());

      expect(sortedPaths(records)).toEqual(["notes.md"]);
      expect(records[0].metadata).toEqual({});
    });
  });
});
