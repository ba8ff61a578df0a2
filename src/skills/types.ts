import type { YamlNumber } from "./frontmatter";

/**
 * A decoded YAML frontmatter value.
 * Built from the `yaml` node tree so every field has a known shape.
 */
export type FrontmatterValue =
  | string
  | number
  | YamlNumber
  | boolean
  | null
  | FrontmatterValue[]
  | FrontmatterMapping;

/** A decoded frontmatter mapping (the header block of a SKILL.md file) */
export interface FrontmatterMapping {
  [key: string]: FrontmatterValue;
}

/**
 * A SKILL.md file split into its decoded header and markdown body.
 */
export interface FrontmatterDocument {
  /** Decoded YAML header */
  metadata: FrontmatterMapping;
  /** Everything after the closing `---` line, verbatim */
  body: string;
}

/**
 * Properties parsed from a skill's SKILL.md frontmatter.
 * Build with `createSkillProperties` so `name` and `description` are never blank.
 */
export interface SkillProperties {
  // Required (per Agent Skills standard)
  /** Skill identifier in kebab-case, matches folder name */
  readonly name: string;
  /** What the skill does and when to use it */
  readonly description: string;

  // Optional (per Agent Skills standard)
  /** License name or reference to bundled license file */
  readonly license?: string;
  /** Environment requirements (intended product, system packages, network access, etc.) */
  readonly compatibility?: string;
  /** Space-delimited list of pre-approved tools (experimental) */
  readonly allowedTools?: string;
  /** Arbitrary key-value mapping for additional metadata */
  readonly metadata?: Readonly<Record<string, string>>;
}

/**
 * Serialized form of SkillProperties, using the frontmatter field names.
 * Absent optional fields are omitted rather than emitted as null.
 */
export interface SkillPropertiesDict {
  name: string;
  description: string;
  license?: string;
  compatibility?: string;
  "allowed-tools"?: string;
  metadata?: Record<string, string>;
}

/**
 * A skill's properties paired with the file they were read from.
 */
export interface SkillLocation {
  properties: SkillProperties;
  /** Absolute, symlink-resolved path to the SKILL.md file */
  location: string;
}

/**
 * Options for discovering skills from the filesystem.
 */
export interface DiscoverSkillsOptions {
  /** Override default discovery paths. Default: [".skills", "~/.skills"] */
  paths?: string[];
  /** Working directory for resolving relative paths. Default: process.cwd() */
  cwd?: string;
}
