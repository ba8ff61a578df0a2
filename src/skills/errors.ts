/**
 * What went wrong with a skill.
 * - `parse`: the file is missing or its frontmatter is malformed
 * - `validation`: the frontmatter parsed but its content breaks one or more rules
 */
export type SkillErrorDetail =
  | { kind: "parse" }
  | { kind: "validation"; errors: string[] };

/**
 * Error thrown by the skill reader and parser.
 * Switch on `detail.kind` instead of subclassing.
 */
export class SkillError extends Error {
  readonly detail: SkillErrorDetail;

  constructor(message: string, detail: SkillErrorDetail) {
    super(message);
    this.name = "SkillError";
    this.detail = detail;
  }
}

export function parseError(message: string): SkillError {
  return new SkillError(message, { kind: "parse" });
}

/**
 * Builds a validation error. With no `errors`, the message is the only entry.
 */
export function validationError(
  message: string,
  errors: string[] = [message],
): SkillError {
  return new SkillError(message, { kind: "validation", errors });
}

export function isParseError(error: unknown): error is SkillError {
  return error instanceof SkillError && error.detail.kind === "parse";
}

export function isValidationError(error: unknown): error is SkillError {
  return error instanceof SkillError && error.detail.kind === "validation";
}

/**
 * The rule violations carried by a validation error, or an empty list.
 */
export function validationErrors(error: SkillError): string[] {
  return error.detail.kind === "validation" ? [...error.detail.errors] : [];
}
