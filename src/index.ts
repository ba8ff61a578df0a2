// Main exports

// Skills (Agent Skills standard support)
export type {
  DiscoverSkillsOptions,
  FrontmatterDocument,
  FrontmatterMapping,
  FrontmatterValue,
  SkillErrorDetail,
  SkillLocation,
  SkillProperties,
  SkillPropertiesDict,
} from "./skills";
export {
  ALLOWED_FIELDS,
  createSkillProperties,
  DEFAULT_SKILL_PATHS,
  discoverSkills,
  escapeHtml,
  findSkillMd,
  isParseError,
  isValidationError,
  MAX_COMPATIBILITY_LENGTH,
  MAX_DESCRIPTION_LENGTH,
  MAX_SKILL_NAME_LENGTH,
  parseError,
  parseFrontmatter,
  propertiesFromMetadata,
  readProperties,
  readSkill,
  SKILL_FILE_NAMES,
  SkillError,
  skillsToXml,
  toDict,
  toPrompt,
  validate,
  validateMetadata,
  validationError,
  validationErrors,
  YamlNumber,
} from "./skills";

// Skill tool (AI SDK)
export type { SkillOutput, SkillToolConfig, SkillToolError } from "./tools";
export { createSkillTool } from "./tools";

// Debug tracing
export type { DebugEvent } from "./utils";
export {
  clearDebugLogs,
  DEBUG_ENV_VAR,
  getDebugLogs,
  isDebugEnabled,
  reinitDebugMode,
} from "./utils";

// CLI
export type { CliIO } from "./cli";
export { run, VERSION } from "./cli";
