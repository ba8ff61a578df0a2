import { readFileSync } from "node:fs";
import { basename, resolve } from "node:path";
import { debugEnd, debugStart } from "../utils/debug";
import { parseFrontmatter, isFrontmatterMapping } from "./frontmatter";
import { findSkillMd, statPath } from "./loader";
import type { FrontmatterMapping } from "./types";

/** Maximum length for skill names */
export const MAX_SKILL_NAME_LENGTH = 64;

/** Maximum length for skill descriptions */
export const MAX_DESCRIPTION_LENGTH = 1024;

/** Maximum length for the compatibility field */
export const MAX_COMPATIBILITY_LENGTH = 500;

/** Frontmatter fields allowed by the Agent Skills standard */
export const ALLOWED_FIELDS: readonly string[] = [
  "name",
  "description",
  "license",
  "allowed-tools",
  "metadata",
  "compatibility",
];

const UPPERCASE_LETTER = /[\p{Lu}\p{Lt}]/u;
// Alphabetic covers the vowel signs that Indic scripts attach to letters
const NAME_CHARACTERS = /^[\p{Alphabetic}\p{N}-]*$/u;

/**
 * Validates a skill directory.
 *
 * Directory problems (missing path, not a directory, no SKILL.md, unreadable
 * or unparsable file) are reported alone. Otherwise every frontmatter rule is
 * checked and all violations are returned together.
 *
 * @param skillDir - Path to the skill directory
 * @returns Validation error messages. Empty list means valid.
 *
 * @example
 * ```typescript
 * const errors = validate("./skills/pdf");
 * if (errors.length === 0) {
 *   console.log("Skill is valid!");
 * }
 * ```
 */
export function validate(skillDir: string): string[] {
  const id = debugStart("validate", { path: skillDir });
  const startTime = Date.now();

  const errors = collectDirectoryErrors(skillDir);

  debugEnd(id, "validate", {
    output: errors,
    summary: { errorCount: errors.length },
    duration_ms: Date.now() - startTime,
  });

  return errors;
}

function collectDirectoryErrors(skillDir: string): string[] {
  const stats = statPath(skillDir);
  if (!stats) {
    return [`Path does not exist: ${skillDir}`];
  }

  if (!stats.isDirectory()) {
    return [`Not a directory: ${skillDir}`];
  }

  const skillMd = findSkillMd(skillDir);
  if (!skillMd) {
    return ["Missing required file: SKILL.md"];
  }

  let content: string;
  try {
    content = readFileSync(skillMd, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return [`Failed to read ${skillMd}: ${reason}`];
  }

  let metadata: FrontmatterMapping;
  try {
    metadata = parseFrontmatter(content).metadata;
  } catch (error) {
    return [error instanceof Error ? error.message : String(error)];
  }

  return validateMetadata(metadata, resolve(skillDir));
}

/**
 * Validates an already-parsed frontmatter mapping.
 *
 * @param metadata - Decoded YAML frontmatter
 * @param skillDir - Skill directory path or bare directory name; when given,
 *   the skill name must match its last segment
 * @returns Validation error messages. Empty list means valid.
 */
export function validateMetadata(
  metadata: FrontmatterMapping,
  skillDir?: string,
): string[] {
  const errors: string[] = [];

  if (!("name" in metadata)) {
    errors.push("Missing required field in frontmatter: name");
  } else {
    const name = metadata.name;
    if (typeof name === "string") {
      errors.push(...validateName(name, skillDir));
    } else {
      errors.push("Field 'name' must be a non-empty string");
    }
  }

  if (!("description" in metadata)) {
    errors.push("Missing required field in frontmatter: description");
  } else {
    const description = metadata.description;
    if (typeof description === "string") {
      errors.push(...validateDescription(description));
    } else {
      errors.push("Field 'description' must be a non-empty string");
    }
  }

  const compatibility = metadata.compatibility;
  if (typeof compatibility === "string") {
    errors.push(...validateCompatibility(compatibility));
  }

  const skillMetadata = metadata.metadata;
  if (
    skillMetadata !== undefined &&
    skillMetadata !== null &&
    !isFrontmatterMapping(skillMetadata)
  ) {
    errors.push("Field 'metadata' must be a mapping");
  }

  errors.push(...validateFields(metadata));

  return errors;
}

/**
 * Validates skill name format and directory match.
 * Names may use letters from any script, digits and hyphens, and are
 * compared in NFKC form.
 */
function validateName(rawName: string, skillDir?: string): string[] {
  if (!rawName.trim()) {
    return ["Field 'name' must be a non-empty string"];
  }

  const errors: string[] = [];
  const name = rawName.trim().normalize("NFKC");
  const length = codePointLength(name);

  if (length > MAX_SKILL_NAME_LENGTH) {
    errors.push(
      `Skill name '${name}' exceeds ${MAX_SKILL_NAME_LENGTH} character limit (${length} chars)`,
    );
  }

  if (UPPERCASE_LETTER.test(name)) {
    errors.push(`Skill name '${name}' must be lowercase`);
  }

  if (name.startsWith("-") || name.endsWith("-")) {
    errors.push("Skill name cannot start or end with a hyphen");
  }

  if (name.includes("--")) {
    errors.push("Skill name cannot contain consecutive hyphens");
  }

  if (!NAME_CHARACTERS.test(name)) {
    errors.push(
      `Skill name '${name}' contains invalid characters. Only letters, digits, and hyphens are allowed.`,
    );
  }

  if (skillDir !== undefined) {
    const dirName = basename(skillDir);
    if (dirName.normalize("NFKC") !== name) {
      errors.push(`Directory name '${dirName}' must match skill name '${name}'`);
    }
  }

  return errors;
}

function validateDescription(description: string): string[] {
  if (!description.trim()) {
    return ["Field 'description' must be a non-empty string"];
  }

  const length = codePointLength(description);
  if (length > MAX_DESCRIPTION_LENGTH) {
    return [
      `Description exceeds ${MAX_DESCRIPTION_LENGTH} character limit (${length} chars)`,
    ];
  }

  return [];
}

function validateCompatibility(compatibility: string): string[] {
  const length = codePointLength(compatibility);
  if (length > MAX_COMPATIBILITY_LENGTH) {
    return [
      `Compatibility exceeds ${MAX_COMPATIBILITY_LENGTH} character limit (${length} chars)`,
    ];
  }
  return [];
}

/** Reports every field outside ALLOWED_FIELDS in one message */
function validateFields(metadata: FrontmatterMapping): string[] {
  const extraFields = Object.keys(metadata)
    .filter((field) => !ALLOWED_FIELDS.includes(field))
    .sort();

  if (extraFields.length === 0) {
    return [];
  }

  const allowed = [...ALLOWED_FIELDS].sort().join(", ");
  return [
    `Unexpected fields in frontmatter: ${extraFields.join(", ")}. Only ${allowed} are allowed.`,
  ];
}

function codePointLength(value: string): number {
  return [...value].length;
}
