import { validationError } from "./errors";
import type { SkillProperties, SkillPropertiesDict } from "./types";

/**
 * Creates a SkillProperties record.
 * `name` and `description` are trimmed and must not be blank.
 *
 * @throws SkillError (kind `validation`) if `name` or `description` is blank
 */
export function createSkillProperties(input: SkillProperties): SkillProperties {
  const name = input.name.trim();
  if (!name) {
    throw validationError("Field 'name' must be a non-empty string");
  }

  const description = input.description.trim();
  if (!description) {
    throw validationError("Field 'description' must be a non-empty string");
  }

  return Object.freeze({
    name,
    description,
    license: input.license,
    compatibility: input.compatibility,
    allowedTools: input.allowedTools,
    metadata: input.metadata ? Object.freeze({ ...input.metadata }) : undefined,
  });
}

/**
 * Converts properties to their serialized form, dropping absent fields.
 *
 * @example
 * ```typescript
 * JSON.stringify(toDict(props), null, 2);
 * // {
 * //   "name": "pdf",
 * //   "description": "Extract text from PDFs",
 * //   "allowed-tools": "Bash(python:*)"
 * // }
 * ```
 */
export function toDict(props: SkillProperties): SkillPropertiesDict {
  const dict: SkillPropertiesDict = {
    name: props.name,
    description: props.description,
  };

  if (props.license !== undefined) dict.license = props.license;
  if (props.compatibility !== undefined) {
    dict.compatibility = props.compatibility;
  }
  if (props.allowedTools !== undefined) {
    dict["allowed-tools"] = props.allowedTools;
  }
  if (props.metadata !== undefined) dict.metadata = { ...props.metadata };

  return dict;
}
