import { isAlias, isMap, isScalar, isSeq, parseDocument } from "yaml";
import { parseError } from "./errors";
import type {
  FrontmatterDocument,
  FrontmatterMapping,
  FrontmatterValue,
} from "./types";

const DELIMITER = "---";
const MAX_ALIAS_COUNT = 100;

/**
 * A YAML number whose written form is not what `String(value)` gives back,
 * such as `1.0`, `0x1F` or an integer beyond 2^53. `source` keeps the text
 * as written.
 */
export class YamlNumber {
  constructor(
    readonly source: string,
    readonly value: number,
  ) {}

  toString(): string {
    return this.source;
  }

  toJSON(): number {
    return this.value;
  }
}

/**
 * Parses YAML frontmatter from SKILL.md content.
 *
 * The first line must be `---`, and the header ends at the next line that is
 * exactly `---`. Everything after that line is returned as the body.
 *
 * @param content - Raw content of a SKILL.md file
 * @throws SkillError (kind `parse`) if the frontmatter is missing, unclosed,
 *   not valid YAML, or not a mapping
 *
 * @example
 * ```typescript
 * const { metadata, body } = parseFrontmatter("---\nname: pdf\n---\n# PDF\n");
 * // metadata: { name: "pdf" }
 * // body: "# PDF\n"
 * ```
 */
export function parseFrontmatter(content: string): FrontmatterDocument {
  const lines = content.split("\n");

  if (!isDelimiter(lines[0])) {
    throw parseError("SKILL.md must start with YAML frontmatter (---)");
  }

  const closingIndex = lines.findIndex(
    (line, index) => index > 0 && isDelimiter(line),
  );
  if (closingIndex === -1) {
    throw parseError("SKILL.md frontmatter not properly closed with ---");
  }

  const header = lines.slice(1, closingIndex).join("\n");
  const body = lines.slice(closingIndex + 1).join("\n");

  return { metadata: decodeHeader(header), body };
}

/** A delimiter line is exactly `---` (CRLF files keep a trailing `\r`) */
function isDelimiter(line: string | undefined): boolean {
  return line === DELIMITER || line === `${DELIMITER}\r`;
}

function decodeHeader(header: string): FrontmatterMapping {
  const doc = parseDocument(header);
  if (doc.errors.length > 0) {
    throw parseError(`Invalid YAML in frontmatter: ${doc.errors[0].message}`);
  }

  let aliasCount = 0;

  const fromNode = (node: unknown): FrontmatterValue => {
    if (isAlias(node)) {
      aliasCount += 1;
      if (aliasCount > MAX_ALIAS_COUNT) {
        throw parseError(
          "Invalid YAML in frontmatter: too many alias references",
        );
      }
      return fromNode(node.resolve(doc));
    }

    if (isScalar(node)) {
      return fromScalar(node.value, node.range, header);
    }

    if (isSeq(node)) {
      return node.items.map((item) => fromNode(item));
    }

    if (isMap(node)) {
      // fromEntries defines own keys, so `__proto__` stays a plain field
      return Object.fromEntries(
        node.items.map((pair): [string, FrontmatterValue] => [
          keyToString(fromNode(pair.key)),
          fromNode(pair.value),
        ]),
      );
    }

    // Empty value, as in `key:` with nothing after it
    return null;
  };

  const value = fromNode(doc.contents);

  // Blank or comment-only header
  if (value === null) {
    return {};
  }

  if (!isFrontmatterMapping(value)) {
    throw parseError(
      `Invalid YAML in frontmatter: expected a mapping, got ${describeValue(value)}`,
    );
  }
  return value;
}

function fromScalar(
  value: unknown,
  range: readonly number[] | null | undefined,
  header: string,
): FrontmatterValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;

  if (typeof value === "number") {
    const source = range
      ? header.slice(range[0], range[1]).trim()
      : String(value);
    return source === String(value) ? value : new YamlNumber(source, value);
  }

  return String(value);
}

function keyToString(key: FrontmatterValue): string {
  if (typeof key === "string") return key;
  if (key === null) return "";
  if (key instanceof YamlNumber) return key.source;
  if (typeof key === "object") return JSON.stringify(key);
  return String(key);
}

export function isFrontmatterMapping(
  value: FrontmatterValue | undefined,
): value is FrontmatterMapping {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof YamlNumber)
  );
}

/**
 * Human-readable kind of a value, for error messages.
 */
export function describeValue(value: FrontmatterValue | undefined): string {
  if (value === undefined) return "nothing";
  if (value === null) return "null";
  if (Array.isArray(value)) return "a list";
  if (value instanceof YamlNumber) return "a number";
  if (typeof value === "object") return "a mapping";
  return `a ${typeof value}`;
}
