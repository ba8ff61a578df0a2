import {
  existsSync,
  readFileSync,
  realpathSync,
  type Stats,
  statSync,
} from "node:fs";
import { join, resolve } from "node:path";
import { debugEnd, debugError, debugStart } from "../utils/debug";
import { parseError, validationError } from "./errors";
import {
  isFrontmatterMapping,
  parseFrontmatter,
  YamlNumber,
} from "./frontmatter";
import { createSkillProperties } from "./properties";
import type {
  FrontmatterMapping,
  FrontmatterValue,
  SkillLocation,
  SkillProperties,
} from "./types";

/** Skill file names, in order of preference */
export const SKILL_FILE_NAMES = ["SKILL.md", "skill.md"] as const;

/**
 * True for the errors fs raises when a path, or one of its parents, is absent
 * or is not a directory.
 */
export function isMissingPath(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}

/**
 * Stats a path, or returns undefined when it does not exist. A path that runs
 * through a regular file (`file/sub`) counts as missing.
 */
export function statPath(path: string): Stats | undefined {
  try {
    return statSync(path);
  } catch (error) {
    if (isMissingPath(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Finds the SKILL.md file in a skill directory.
 * Prefers SKILL.md but accepts skill.md.
 *
 * @returns Path to the skill file, or undefined if neither exists
 */
export function findSkillMd(skillDir: string): string | undefined {
  for (const fileName of SKILL_FILE_NAMES) {
    const candidate = join(skillDir, fileName);
    if (existsSync(candidate)) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Reads a skill directory and returns its properties with the resolved path
 * of its SKILL.md file.
 *
 * Only checks that `name` and `description` are present and non-blank.
 * Use `validate()` for the full rule set.
 *
 * @param skillDir - Path to the skill directory
 * @throws SkillError (kind `parse`) if SKILL.md is missing or malformed
 * @throws SkillError (kind `validation`) if required fields are missing or blank
 */
export function readSkill(skillDir: string): SkillLocation {
  const id = debugStart("read", { path: skillDir });
  const startTime = Date.now();

  try {
    const skillMd = findSkillMd(skillDir);
    if (!skillMd) {
      throw parseError(`SKILL.md not found in ${skillDir}`);
    }

    const content = readFileSync(skillMd, "utf-8");
    const { metadata } = parseFrontmatter(content);
    const properties = propertiesFromMetadata(metadata);

    debugEnd(id, "read", {
      summary: { name: properties.name },
      duration_ms: Date.now() - startTime,
    });

    return { properties, location: realpathSync(resolve(skillMd)) };
  } catch (error) {
    debugError(id, "read", error);
    throw error;
  }
}

/**
 * Reads skill properties from SKILL.md frontmatter.
 * See `readSkill` for the errors thrown.
 *
 * @example
 * ```typescript
 * const props = readProperties("./skills/pdf");
 * console.log(props.name); // "pdf"
 * ```
 */
export function readProperties(skillDir: string): SkillProperties {
  return readSkill(skillDir).properties;
}

/**
 * Maps a decoded frontmatter header into SkillProperties.
 * Unknown fields are ignored here.
 */
export function propertiesFromMetadata(
  metadata: FrontmatterMapping,
): SkillProperties {
  const name = requireString(metadata, "name");
  const description = requireString(metadata, "description");

  return createSkillProperties({
    name,
    description,
    license: optionalString(metadata.license),
    compatibility: optionalString(metadata.compatibility),
    allowedTools: optionalString(metadata["allowed-tools"]),
    metadata: extractMetadata(metadata.metadata),
  });
}

function requireString(metadata: FrontmatterMapping, field: string): string {
  if (!(field in metadata)) {
    throw validationError(`Missing required field in frontmatter: ${field}`);
  }

  const value = metadata[field];
  if (typeof value !== "string" || !value.trim()) {
    throw validationError(`Field '${field}' must be a non-empty string`);
  }
  return value;
}

/** Scalars become strings; null and collections count as absent */
function optionalString(
  value: FrontmatterValue | undefined,
): string | undefined {
  if (typeof value === "string") return value;
  if (value instanceof YamlNumber) return value.source;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return undefined;
}

/**
 * Stringifies every metadata value. Nested lists and mappings are rendered
 * as compact JSON. A null or empty mapping counts as absent.
 */
function extractMetadata(
  value: FrontmatterValue | undefined,
): Record<string, string> | undefined {
  if (value === undefined || value === null) return undefined;

  if (!isFrontmatterMapping(value)) {
    throw validationError("Field 'metadata' must be a mapping");
  }

  const entries = Object.entries(value);
  if (entries.length === 0) return undefined;

  return Object.fromEntries(
    entries.map(([key, item]): [string, string] => [
      key,
      stringifyMetadataValue(item),
    ]),
  );
}

/** Numbers keep their written form (`1.0` stays "1.0") */
export function stringifyMetadataValue(value: FrontmatterValue): string {
  if (value instanceof YamlNumber) return value.source;
  if (value !== null && typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}
