import * as fc from "fast-check";
import * as tmp from "tmp";
import { PathTemplate, compilePattern } from "../../src/core/path-template";
import { PatternError } from "../../src/core/errors";
import { Tags } from "../../src/types";
import { walkFiles } from "../../src/utils/fs";
import { collect, writeTree } from "../helpers/tree";

describe("PathTemplate", () => {
  describe("compile", () => {
    it("should replace variables and stars with globs in the enumeration glob", () => {
      const template = PathTemplate.compile("{study}/data/{site}_*.csv");

      expect(template.glob).toBe("*/data/*_*.csv");
      expect(template.variables).toEqual(["study", "site"]);
    });

    it("should collapse adjacent wildcards within a segment", () => {
      const template = PathTemplate.compile("{protocol}{id}*.CSV");

      expect(template.glob).toBe("*.CSV");
    });

    it("should keep a standalone ** segment", () => {
      const template = PathTemplate.compile("archive/**/{name}.txt");

      expect(template.glob).toBe("archive/**/*.txt");
    });

    it("should widen to ** from a segment that embeds **", () => {
      const template = PathTemplate.compile("data/x**/{name}.csv");

      expect(template.glob).toBe("data/**");
    });

    it("should strip a leading ./ and accept backslashes", () => {
      expect(PathTemplate.compile("./{name}.txt").glob).toBe("*.txt");
      expect(PathTemplate.compile("a\\{name}.txt").glob).toBe("a/*.txt");
    });

    it("should be available as compilePattern", () => {
      expect(compilePattern("{a}/b").pattern).toBe("{a}/b");
    });
  });

  describe("compile errors", () => {
    it.each([
      ["{dir/x.csv", "unbalanced '{' in segment '{dir'"],
      ["dir}/x.csv", "unbalanced '}' in segment 'dir}'"],
      ["{a}/{a}.csv", "duplicate variable '{a}'"],
      ["{bad-name}.csv", "invalid variable name '{bad-name}'"],
      ["{}.csv", "invalid variable name '{}'"],
      ["{__proto__}/x.csv", "reserved variable name '{__proto__}'"],
      ["", "pattern is empty"],
      ["/abs/{x}", "pattern must be relative to the root directory"],
      ["a//{x}", "pattern contains an empty path segment"],
    ])("should reject %j", (pattern, reason) => {
      expect(() => PathTemplate.compile(pattern)).toThrow(PatternError);
      expect(() => PathTemplate.compile(pattern)).toThrow(
        `Invalid path pattern '${pattern}': ${reason}`
      );
    });
  });

  describe("match", () => {
    const template = PathTemplate.compile("{study}/data/{site}_*.csv");

    it("should capture variables from a matching path", () => {
      expect(template.match("S1/data/berlin_01.csv")).toEqual({
        study: "S1",
        site: "berlin",
      });
    });

    it("should match case-insensitively and keep the path's case", () => {
      expect(template.match("s1/DATA/Berlin_01.CSV")).toEqual({
        study: "s1",
        site: "Berlin",
      });
    });

    it("should return null when a literal differs", () => {
      expect(template.match("S1/raw/berlin_01.csv")).toBeNull();
    });

    it("should not let a variable span segments", () => {
      expect(template.match("S1/data/x/berlin_01.csv")).toBeNull();
    });

    it("should require one or more characters for * and variables", () => {
      expect(template.match("S1/data/_01.csv")).toBeNull();
      expect(template.match("S1/data/berlin_.csv")).toBeNull();
    });

    it("should let ** span one or more segments", () => {
      const archive = PathTemplate.compile("archive/**/{name}.txt");

      expect(archive.match("archive/2020/01/report.txt")).toEqual({
        name: "report",
      });
      expect(archive.match("archive/2020/report.txt")).toEqual({
        name: "report",
      });
      expect(archive.match("archive/report.txt")).toBeNull();
    });

    it("should match literal regex characters verbatim", () => {
      const literal = PathTemplate.compile("v1.0 (final)/{name}+.txt");

      expect(literal.match("v1.0 (final)/notes+.txt")).toEqual({ name: "notes" });
      expect(literal.match("v1x0 (final)/notes+.txt")).toBeNull();
    });

    it("should accept Windows separators in the path", () => {
      expect(template.match("S1\\data\\berlin_01.csv")).toEqual({
        study: "S1",
        site: "berlin",
      });
    });

    it("should return an empty map for a template without variables", () => {
      expect(PathTemplate.compile("docs/*.md").match("docs/readme.md")).toEqual(
        {}
      );
    });
  });

  describe("properties", () => {
    const value = fc.stringMatching(/^[A-Za-z0-9]{1,8}$/);

    it("should give back the values substituted into its variables", () => {
      const template = PathTemplate.compile("{study}/raw/{site}-{visit}.dat");

      fc.assert(
        fc.property(value, value, value, (study, site, visit) => {
          const metadata = template.match(`${study}/raw/${site}-${visit}.dat`);
          expect(metadata).toEqual({ study, site, visit });
        })
      );
    });

    it("should enumerate every path it matches", async () => {
      const templates = [
        "{dir}/{num}.csv",
        "data/{site}_*_{visit}.txt",
        "archive/**/{year}/{name}.md",
        "{protocol}-{id}*.CSV",
      ];
      const fill = (pattern: string, values: Tags) =>
        pattern
          .replace(/\{(\w+)\}/g, (_, name: string) => values[name])
          .replace(/\*\*/g, "p/q")
          .replace(/\*/g, "x");

      await fc.assert(
        fc.asyncProperty(fc.constantFrom(...templates), value, value, async (pattern, a, b) => {
          const template = PathTemplate.compile(pattern);
          const values: Tags = Object.fromEntries(
            template.variables.map((name, i) => [name, i === 0 ? a : b])
          );
          const filePath = fill(pattern, values);
          const dir = tmp.dirSync({ unsafeCleanup: true });
          try {
            await writeTree(dir.name, { [filePath]: "" });
            const walked = await collect(walkFiles(dir.name, template.glob));

            expect(template.match(filePath)).toEqual(values);
            expect(walked.map((entry) => entry.relativePath)).toEqual([filePath]);
          } finally {
            dir.removeCallback();
          }
        }),
        { numRuns: 40 }
      );
    });

    it("should capture values in one segment separated by literals", () => {
      const template = PathTemplate.compile("{protocol}_{id}_C_{n}.csv");

      fc.assert(
        fc.property(value, value, value, (protocol, id, n) => {
          const metadata = template.match(`${protocol}_${id}_C_${n}.csv`);
          expect(metadata).toEqual({ protocol, id, n });
        })
      );
    });
  });
});
