import { basename, dirname } from "node:path";
import { readProperties, statPath } from "../skills/loader";
import { toDict } from "../skills/properties";
import { validate } from "../skills/validator";
import { toPrompt } from "../skills/xml";

export const VERSION = "0.1.0";

/** Where command output goes. Each call is one line. */
export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const processIO: CliIO = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

const USAGE = `Usage: skills-ref <command> [options]

Reference tool for Agent Skills.

Commands:
  validate <skill_path>              Validate a skill directory
  read-properties <skill_path>       Print skill properties as JSON
  to-prompt <skill_path>...          Print <available_skills> XML for agent prompts

A skill path may point at the skill directory or at its SKILL.md file.

Options:
  -h, --help                         Show this help
  -v, --version                      Show version`;

/**
 * Check if a path points directly to a SKILL.md or skill.md file
 */
function isSkillMdFile(path: string): boolean {
  const stats = statPath(path);
  return (
    stats !== undefined &&
    stats.isFile() &&
    basename(path).toLowerCase() === "skill.md"
  );
}

/**
 * Resolve a skill path - a SKILL.md file becomes its parent directory
 */
export function resolveSkillPath(path: string): string {
  return isSkillMdFile(path) ? dirname(path) : path;
}

function usageError(io: CliIO, message: string): number {
  io.stderr(`Error: ${message}`);
  io.stderr("");
  io.stderr(USAGE);
  return 2;
}

function runValidate(args: string[], io: CliIO): number {
  if (args.length !== 1) {
    return usageError(io, "validate takes exactly one skill path");
  }

  try {
    const skillPath = resolveSkillPath(args[0]);
    const errors = validate(skillPath);

    if (errors.length === 0) {
      io.stdout(`Valid skill: ${skillPath}`);
      return 0;
    }

    io.stderr(`Validation failed for ${skillPath}:`);
    for (const error of errors) {
      io.stderr(`  - ${error}`);
    }
    return 1;
  } catch (error) {
    io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

function runReadProperties(args: string[], io: CliIO): number {
  if (args.length !== 1) {
    return usageError(io, "read-properties takes exactly one skill path");
  }

  try {
    const props = readProperties(resolveSkillPath(args[0]));
    io.stdout(JSON.stringify(toDict(props), null, 2));
    return 0;
  } catch (error) {
    io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

function runToPrompt(args: string[], io: CliIO): number {
  if (args.length === 0) {
    return usageError(io, "to-prompt requires at least one skill path");
  }

  try {
    io.stdout(toPrompt(args.map(resolveSkillPath)));
    return 0;
  } catch (error) {
    io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

/**
 * Runs the skills-ref command line.
 *
 * @param argv - Arguments after the executable and script (process.argv.slice(2))
 * @param io - Output sinks (default: process stdout/stderr)
 * @returns Process exit code: 0 success, 1 failure, 2 usage error
 *
 * @example
 * ```typescript
 * process.exitCode = run(["validate", "./skills/pdf"]);
 * ```
 */
export function run(argv: string[], io: CliIO = processIO): number {
  const [command, ...args] = argv;

  switch (command) {
    case undefined:
      io.stderr(USAGE);
      return 2;
    case "-h":
    case "--help":
      io.stdout(USAGE);
      return 0;
    case "-v":
    case "--version":
      io.stdout(VERSION);
      return 0;
    case "validate":
      return runValidate(args, io);
    case "read-properties":
      return runReadProperties(args, io);
    case "to-prompt":
      return runToPrompt(args, io);
    default:
      return usageError(io, `Unknown command '${command}'`);
  }
}
