import { ArchivedBy, CalcBy, Tags } from "../types";

export type ArchivedPredicate = (metadata: Tags) => boolean;
export type LabelCalculator = (metadata: Tags) => string | undefined;

const PLACEHOLDER = /\{([A-Za-z0-9_]+)\}/g;

export function assertNever(value: never, what: string): never {
  throw new Error(`Unknown ${what}: ${JSON.stringify(value)}`);
}

/**
 * Turn an archival policy into a predicate over extracted metadata.
 * `has-metadata` compares values case-insensitively.
 */
export function archivedPredicate(policy: ArchivedBy): ArchivedPredicate {
  switch (policy.kind) {
    case "not-archived":
      return () => false;
    case "has-metadata": {
      const values = new Set(policy.values.map((v) => v.toLowerCase()));
      return (metadata) => {
        const value = metadata[policy.key];
        return value !== undefined && values.has(value.toLowerCase());
      };
    }
    default:
      return assertNever(policy, "archived_by policy");
  }
}

/**
 * Turn a label policy into a calculator. `from-metadata` substitutes
 * `{name}` placeholders and yields nothing when any of them is missing.
 */
export function labelCalculator(policy: CalcBy): LabelCalculator {
  switch (policy.kind) {
    case "no-calc":
      return () => undefined;
    case "from-metadata":
      return (metadata) => formatFromMetadata(policy.format, metadata);
    default:
      return assertNever(policy, "calc policy");
  }
}

export function formatFromMetadata(
  format: string,
  metadata: Tags
): string | undefined {
  let missing = false;
  const result = format.replace(PLACEHOLDER, (_, name: string) => {
    const value = metadata[name];
    if (value === undefined) {
      missing = true;
      return "";
    }
    return value;
  });
  return missing ? undefined : result;
}

/**
 * Human readable policy, for the config command
 */
export function describePolicy(policy: ArchivedBy | CalcBy): string {
  switch (policy.kind) {
    case "not-archived":
    case "no-calc":
      return policy.kind;
    case "has-metadata":
      return `has-metadata ${policy.key} ${policy.values.join(",")}`;
    case "from-metadata":
      return `from-metadata "${policy.format}"`;
    default:
      return assertNever(policy, "policy");
  }
}
