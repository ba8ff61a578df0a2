// Re-export types
export type {
  DiscoverSkillsOptions,
  FrontmatterDocument,
  FrontmatterMapping,
  FrontmatterValue,
  SkillLocation,
  SkillProperties,
  SkillPropertiesDict,
} from "./types";
export type { SkillErrorDetail } from "./errors";

// Re-export functions
export { DEFAULT_SKILL_PATHS, discoverSkills } from "./discovery";
export {
  isParseError,
  isValidationError,
  parseError,
  SkillError,
  validationError,
  validationErrors,
} from "./errors";
export { parseFrontmatter, YamlNumber } from "./frontmatter";
export {
  findSkillMd,
  propertiesFromMetadata,
  readProperties,
  readSkill,
  SKILL_FILE_NAMES,
} from "./loader";
export { createSkillProperties, toDict } from "./properties";
export {
  ALLOWED_FIELDS,
  MAX_COMPATIBILITY_LENGTH,
  MAX_DESCRIPTION_LENGTH,
  MAX_SKILL_NAME_LENGTH,
  validate,
  validateMetadata,
} from "./validator";
export { escapeHtml, skillsToXml, toPrompt } from "./xml";
