import { FileRecord } from "../../src/types";
import { digestContent } from "../../src/utils/digest";
import { splitPath } from "../../src/utils/fs";

/**
 * File record at a relative path whose digest and size come from content
 */
export function record(
  filePath: string,
  content: string,
  overrides: Partial<FileRecord> = {}
): FileRecord {
  const { dirName, baseName } = splitPath(filePath);
  return {
    digest: digestContent(content),
    dirName,
    baseName,
    created: 1000,
    modified: 2000,
    size: content.length,
    archived: false,
    metadata: {},
    ...overrides,
  };
}
