import { readFileSync } from "node:fs";
import { tool, zodSchema } from "ai";
import { z } from "zod";
import { parseFrontmatter } from "../skills/frontmatter";
import type { SkillLocation } from "../skills/types";

export interface SkillOutput {
  name: string;
  instructions: string;
  allowed_tools?: string[];
  message: string;
}

export interface SkillToolError {
  error: string;
}

const skillInputSchema = z.object({
  name: z
    .string()
    .describe("The name of the skill to activate (from available skills list)"),
});

type SkillInput = z.infer<typeof skillInputSchema>;

const SKILL_DESCRIPTION = `Activate a skill to get specialized instructions for a task.

**How skills work:**
1. Skills are listed in the system prompt (name, description, location)
2. Calling this tool loads the full skill instructions from SKILL.md
3. Follow the returned instructions to complete the task
4. Some skills restrict which tools you can use (allowed_tools)

**When to use:**
- A task matches a skill's description
- You need specialized knowledge for a domain (e.g., PDF processing, web research)
- The skill provides step-by-step guidance you should follow`;

export interface SkillToolConfig {
  /** Available skills (from discoverSkills or readSkill) */
  skills: SkillLocation[];
  /** Callback when a skill is activated */
  onActivate?: (
    skill: SkillLocation,
    instructions: string,
  ) => void | Promise<void>;
}

/**
 * Creates a tool for activating skills.
 * Returns the markdown body of the skill's SKILL.md as instructions.
 *
 * @param config - Available skills and an optional activation callback
 */
export function createSkillTool(config: SkillToolConfig) {
  const { onActivate } = config;
  const skills = new Map<string, SkillLocation>();
  for (const skill of config.skills) {
    // First occurrence wins, as in discoverSkills
    if (!skills.has(skill.properties.name)) {
      skills.set(skill.properties.name, skill);
    }
  }

  return tool({
    description: SKILL_DESCRIPTION,
    inputSchema: zodSchema(skillInputSchema),
    execute: async ({
      name,
    }: SkillInput): Promise<SkillOutput | SkillToolError> => {
      try {
        const skill = skills.get(name);
        if (!skill) {
          const available = [...skills.keys()];
          if (available.length === 0) {
            return { error: "No skills are available." };
          }
          return {
            error: `Skill '${name}' not found. Available skills: ${available.join(
              ", ",
            )}`,
          };
        }

        const content = readFileSync(skill.location, "utf-8");
        const instructions = parseFrontmatter(content).body.trim();

        if (onActivate) {
          await onActivate(skill, instructions);
        }

        const toolList = skill.properties.allowedTools
          ?.split(/\s+/)
          .filter(Boolean);
        const allowedTools =
          toolList && toolList.length > 0 ? toolList : undefined;

        return {
          name: skill.properties.name,
          instructions,
          allowed_tools: allowedTools,
          message: allowedTools
            ? `Skill '${name}' activated. Restricted to tools: ${allowedTools.join(
                ", ",
              )}`
            : `Skill '${name}' activated. Follow the instructions below.`,
        };
      } catch (error) {
        return {
          error: error instanceof Error ? error.message : "Unknown error",
        };
      }
    },
  });
}
