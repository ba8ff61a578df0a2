export {
  createSkillTool,
  type SkillOutput,
  type SkillToolConfig,
  type SkillToolError,
} from "./skill";
