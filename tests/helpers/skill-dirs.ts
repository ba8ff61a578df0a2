/**
 * Temporary skill directories for filesystem tests
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

/** Create a unique temporary directory for test isolation */
export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "skills-ref-test-"));
}

export function removeTmpDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Create `<basePath>/<name>/<fileName>` with the given content.
 * @returns The skill directory path
 */
export function createSkillDir(
  basePath: string,
  name: string,
  content: string,
  fileName = "SKILL.md",
): string {
  const dir = join(basePath, name);
  mkdirSync(dir, { recursive: true });
  writeFileSync(join(dir, fileName), content, "utf-8");
  return dir;
}

/**
 * Build SKILL.md content from frontmatter lines and a body.
 *
 * @example
 * ```typescript
 * skillMd(["name: pdf", "description: PDF tools"], "# PDF\n");
 * // "---\nname: pdf\ndescription: PDF tools\n---\n# PDF\n"
 * ```
 */
export function skillMd(frontmatter: string[], body = "# Skill\n"): string {
  return `---\n${frontmatter.join("\n")}\n---\n${body}`;
}

/** SKILL.md with just a name and description */
export function minimalSkillMd(name: string, description = "A test skill"): string {
  return skillMd([`name: ${name}`, `description: ${description}`]);
}
