import * as fs from "fs/promises";
import * as path from "path";
import * as tmp from "tmp";
import { config, diff, Printer, store } from "../../src/commands";
import { writeTree } from "../helpers/tree";

describe("commands", () => {
  let tmpDir: tmp.DirResult;
  let configPath: string;
  let lines: string[];
  let print: Printer;
  let errorSpy: jest.SpyInstance;

  beforeEach(async () => {
    tmpDir = tmp.dirSync({ unsafeCleanup: true });
    configPath = path.join(tmpDir.name, "fs-snapshot.json");
    await writeTree(tmpDir.name, {
      "root/A/1.csv": "one",
      "root/A/2.csv": "two",
      "root/notes.md": "four",
    });
    await fs.writeFile(
      configPath,
      JSON.stringify({
        defaults: { log_level: "silent", store: { db_file: "db/snapshots.sqlite" } },
        specs: {
          photos: { root_dir: "root", match_paths: { csv: ["{dir}/{num}.csv"] } },
          docs: { root_dir: "root", include_unmatched: false },
        },
      })
    );

    lines = [];
    print = (text) => {
      lines.push(text);
    };
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    errorSpy.mockRestore();
    tmpDir.removeCallback();
  });

  const moveFile = async () => {
    await fs.mkdir(path.join(tmpDir.name, "root/B"));
    await fs.rename(
      path.join(tmpDir.name, "root/A/1.csv"),
      path.join(tmpDir.name, "root/B/1.csv")
    );
  };

  describe("store", () => {
    it("should print the new import id", async () => {
      const id = await store("photos", { config: configPath }, print);

      expect(id).toMatch(/^[0-9a-f]{32}$/);
      expect(lines).toEqual([id]);
    });

    it("should fail for an undefined spec", async () => {
      await expect(store("nope", { config: configPath }, print)).rejects.toThrow(
        "spec 'nope' is not defined (available: photos, docs)"
      );
      expect(lines).toEqual([]);
    });
  });

  describe("diff", () => {
    it("should print one line per action in summary mode", async () => {
      const first = await store("photos", { config: configPath }, print);
      await moveFile();
      await store("photos", { config: configPath }, print);
      lines = [];

      await diff("photos", first, { config: configPath, summary: true }, print);

      expect(lines).toEqual(["Moved A/1.csv -> B/1.csv"]);
    });

    it("should print the diff as JSON", async () => {
      const first = await store("photos", { config: configPath }, print);
      await moveFile();
      const second = await store("photos", { config: configPath }, print);
      lines = [];

      await diff("photos", first, { config: configPath, compact: true }, print);

      expect(lines).toHaveLength(1);
      expect(JSON.parse(lines[0])).toMatchObject({
        originalId: first,
        newId: second,
        actions: [
          {
            type: "Moved",
            original: { fileName: "A/1.csv", metadata: { dir: "A", num: "1" } },
            newDirName: "B",
            newMetadata: { dir: "B", num: "1" },
          },
        ],
      });
    });

    it("should indent JSON unless compact", async () => {
      const first = await store("photos", { config: configPath }, print);
      const second = await store("photos", { config: configPath }, print);
      lines = [];

      await diff("photos", first, { config: configPath }, print);

      expect(lines).toEqual([
        JSON.stringify({ originalId: first, newId: second, actions: [] }, null, 2),
      ]);
    });

    it("should reject a malformed import id", async () => {
      await expect(
        diff("photos", "not-an-id", { config: configPath }, print)
      ).rejects.toThrow("Invalid import id 'not-an-id'");
    });
  });

  describe("config", () => {
    it("should list specs", async () => {
      await config(undefined, { config: configPath }, print);

      expect(lines).toEqual(["photos", "docs"]);
    });

    it("should print resolved settings as JSON", async () => {
      await config("docs", { config: configPath, json: true }, print);

      expect(JSON.parse(lines.join("\n"))).toMatchObject({
        name: "docs",
        rootDir: path.join(tmpDir.name, "root"),
        includeUnmatched: false,
        logLevel: "silent",
      });
    });

    it("should print aligned settings", async () => {
      await config("photos", { config: configPath }, print);

      expect(lines).toHaveLength(17);
      expect(lines[0]).toBe(`${"name".padEnd(19)}photos`);
      expect(lines[2]).toBe(`${"match_paths".padEnd(19)}csv: {dir}/{num}.csv`);
    });
  });
});
