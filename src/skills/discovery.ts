import { type Dirent, readdirSync } from "node:fs";
import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";
import {
  debugEnd,
  debugError,
  debugStart,
  popParent,
  pushParent,
} from "../utils/debug";
import { findSkillMd, isMissingPath, readSkill } from "./loader";
import type { DiscoverSkillsOptions, SkillLocation } from "./types";

/** Default paths to search for skills */
export const DEFAULT_SKILL_PATHS = [".skills", "~/.skills"];

/**
 * Discovers skills from configured directories.
 * Each subfolder holding a SKILL.md (or skill.md) is read for its metadata.
 *
 * Earlier paths win when two skills share a name. Subfolders that fail to
 * read are skipped with a warning.
 *
 * @param options - Discovery options
 * @returns Skills with their locations (empty if none found)
 */
export function discoverSkills(
  options?: DiscoverSkillsOptions,
): SkillLocation[] {
  const cwd = options?.cwd ?? process.cwd();
  const searchPaths = options?.paths ?? DEFAULT_SKILL_PATHS;

  const id = debugStart("discover", { paths: searchPaths, cwd });
  const startTime = Date.now();
  pushParent(id);

  const skills: SkillLocation[] = [];
  const seenNames = new Set<string>();

  try {
    for (const searchPath of searchPaths) {
      for (const skill of scanDirectory(resolvePath(searchPath, cwd))) {
        // First occurrence wins (project skills override global)
        if (!seenNames.has(skill.properties.name)) {
          seenNames.add(skill.properties.name);
          skills.push(skill);
        }
      }
    }
  } catch (error) {
    debugError(id, "discover", error);
    throw error;
  } finally {
    popParent();
  }

  debugEnd(id, "discover", {
    summary: { skillCount: skills.length },
    duration_ms: Date.now() - startTime,
  });

  return skills;
}

/**
 * Resolves a path, expanding ~ to home directory.
 */
function resolvePath(path: string, cwd: string): string {
  if (path === "~") {
    return homedir();
  }
  if (path.startsWith("~/")) {
    return join(homedir(), path.slice(2));
  }
  if (isAbsolute(path)) {
    return path;
  }
  return resolve(cwd, path);
}

/**
 * Scans a directory for skill folders.
 * A missing search directory yields no skills.
 */
function scanDirectory(dirPath: string): SkillLocation[] {
  let entries: Dirent[];
  try {
    entries = readdirSync(dirPath, { withFileTypes: true });
  } catch (error) {
    if (isMissingPath(error)) {
      return [];
    }
    throw error;
  }

  const skills: SkillLocation[] = [];

  // readdir order depends on the filesystem
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (!entry.isDirectory()) {
      continue;
    }

    const skillDir = join(dirPath, entry.name);
    if (!findSkillMd(skillDir)) {
      continue;
    }

    try {
      const skill = readSkill(skillDir);

      if (skill.properties.name !== entry.name) {
        console.warn(
          `Skill name "${skill.properties.name}" does not match folder name "${entry.name}" in ${skill.location}`,
        );
      }

      skills.push(skill);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`Skipping skill in ${skillDir}: ${reason}`);
    }
  }

  return skills;
}
