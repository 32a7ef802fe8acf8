import * as fc from "fast-check";
import {
  deserializeTags,
  normalizeTagKeys,
  serializeTags,
} from "../../src/utils/tags";
import { TagFormatError } from "../../src/core/errors";

describe("tag serialization", () => {
  it("should serialize entries sorted by key between delimiters", () => {
    expect(serializeTags({ site: "b", project: "p1" })).toBe(
      "/project:p1/site:b/"
    );
  });

  it("should serialize the empty map to the empty string", () => {
    expect(serializeTags({})).toBe("");
  });

  it("should allow ':' and empty strings in values", () => {
    expect(serializeTags({ time: "12:30", note: "" })).toBe("/note:/time:12:30/");
    expect(deserializeTags("/note:/time:12:30/")).toEqual({
      time: "12:30",
      note: "",
    });
  });

  it("should deserialize empty input to an empty map", () => {
    expect(deserializeTags("")).toEqual({});
    expect(deserializeTags(null)).toEqual({});
    expect(deserializeTags(undefined)).toEqual({});
  });

  it("should keep everything after the first ':' as the value", () => {
    expect(deserializeTags("/a:b:c/drive:C:/")).toEqual({ a: "b:c", drive: "C:" });
  });

  it.each([["/novalue/"], ["/:v/"], ["/a:1/broken/"], ["/__proto__:x/"]])(
    "should fail on malformed entry in %j",
    (serialized) => {
      expect(() => deserializeTags(serialized)).toThrow(TagFormatError);
    }
  );

  it("should name the malformed entry", () => {
    expect(() => deserializeTags("/a:1/broken/")).toThrow(
      "Bad tag format 'broken': expected key:value"
    );
  });

  it.each([
    [{ "a/b": "1" }],
    [{ "a:b": "1" }],
    [{ "": "1" }],
    [{ a: "x/y" }],
    [{ ["__proto__"]: "1" }],
  ])("should refuse to serialize %j", (tags) => {
    expect(() => serializeTags(tags)).toThrow(TagFormatError);
  });

  it("should normalize import tag keys", () => {
    expect(normalizeTagKeys({ " Site ": "Berlin", PROJECT: "P1" })).toEqual({
      site: "Berlin",
      project: "P1",
    });
  });

  it("should round-trip any map of valid keys and values", () => {
    const key = fc
      .stringMatching(/^[A-Za-z0-9_.-]{1,10}$/)
      .filter((k) => k !== "__proto__");
    const value = fc.string({ maxLength: 20 }).filter((v) => !v.includes("/"));

    fc.assert(
      fc.property(fc.dictionary(key, value), (tags) => {
        expect(deserializeTags(serializeTags(tags))).toEqual(tags);
      })
    );
  });
});
