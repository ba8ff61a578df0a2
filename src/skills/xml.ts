import { realpathSync } from "node:fs";
import { resolve } from "node:path";
import {
  debugEnd,
  debugError,
  debugStart,
  popParent,
  pushParent,
} from "../utils/debug";
import { readSkill } from "./loader";
import type { SkillLocation } from "./types";

const EMPTY_SKILLS_XML = "<available_skills>\n</available_skills>";

/**
 * Generates the `<available_skills>` XML block for system prompts.
 *
 * Every tag and every text value sits on its own line. Name, description and
 * location are HTML-escaped.
 *
 * @param skills - Skills with their resolved SKILL.md locations, in output order
 * @returns XML string to inject into a prompt
 *
 * @example
 * ```typescript
 * const xml = skillsToXml(discoverSkills());
 * // <available_skills>
 * // <skill>
 * // <name>
 * // pdf-processing
 * // </name>
 * // <description>
 * // Extract text from PDFs...
 * // </description>
 * // <location>
 * // /path/to/.skills/pdf-processing/SKILL.md
 * // </location>
 * // </skill>
 * // </available_skills>
 * ```
 */
export function skillsToXml(skills: SkillLocation[]): string {
  if (skills.length === 0) {
    return EMPTY_SKILLS_XML;
  }

  const lines = ["<available_skills>"];

  for (const { properties, location } of skills) {
    lines.push(
      "<skill>",
      "<name>",
      escapeHtml(properties.name),
      "</name>",
      "<description>",
      escapeHtml(properties.description),
      "</description>",
      "<location>",
      escapeHtml(location),
      "</location>",
      "</skill>",
    );
  }

  lines.push("</available_skills>");
  return lines.join("\n");
}

/**
 * Reads each skill directory and renders the `<available_skills>` block.
 * Directory symlinks are resolved before reading.
 *
 * @param skillDirs - Paths to skill directories
 * @throws SkillError if any directory cannot be read
 */
export function toPrompt(skillDirs: string[]): string {
  const id = debugStart("to-prompt", { paths: skillDirs });
  const startTime = Date.now();
  pushParent(id);

  try {
    const skills = skillDirs.map((skillDir) => readSkill(resolveDir(skillDir)));
    const xml = skillsToXml(skills);

    debugEnd(id, "to-prompt", {
      summary: { skillCount: skills.length },
      duration_ms: Date.now() - startTime,
    });
    return xml;
  } catch (error) {
    debugError(id, "to-prompt", error);
    throw error;
  } finally {
    popParent();
  }
}

/** Canonical path when the directory exists, plain absolute path otherwise */
function resolveDir(skillDir: string): string {
  const absolute = resolve(skillDir);
  try {
    return realpathSync(absolute);
  } catch {
    // Missing directories are reported by readSkill
    return absolute;
  }
}

/**
 * Escapes HTML special characters. `&` goes first so entities are not
 * escaped twice.
 */
export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#x27;");
}
