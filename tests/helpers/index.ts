/**
 * Test helpers barrel export
 */

export {
  createSkillDir,
  makeTmpDir,
  minimalSkillMd,
  removeTmpDir,
  skillMd,
} from "./skill-dirs";

export {
  assertError,
  assertSuccess,
  executeTool,
  isErrorResult,
} from "./tool-executor";
