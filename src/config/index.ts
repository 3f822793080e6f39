import { readFileSync } from "node:fs";
import { parse } from "yaml";
import type { ZodIssue } from "zod";
import { errorMessage } from "../errors";
import { appConfigSchema, portSchema } from "./schema";
import type { AppConfig, ProviderName } from "./schema";

export const DEFAULT_PORT = 3000;

function formatIssues(issues: ReadonlyArray<ZodIssue>): string {
  return issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`).join("\n");
}

/**
 * Validates YAML text against the config schema. `source` names the text in
 * error messages.
 */
export function parseConfig(text: string, source: string): AppConfig {
  let document: unknown;
  try {
    document = parse(text);
  } catch (err) {
    throw new Error(`failed to parse YAML in ${source}: ${errorMessage(err)}`);
  }

  const result = appConfigSchema.safeParse(document);
  if (!result.success) {
    throw new Error(
      `invalid configuration in ${source}:\n${formatIssues(result.error.issues)}`,
    );
  }

  return result.data;
}

export function loadConfig(configPath: string): AppConfig {
  let text: string;
  try {
    text = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw new Error(`failed to read config file at ${configPath}: ${errorMessage(err)}`);
  }

  return parseConfig(text, configPath);
}

/**
 * Reads the listen port from `PORT`. Unset or blank means {@link DEFAULT_PORT};
 * anything that is not a TCP port number throws.
 */
export function parsePort(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === "") {
    return DEFAULT_PORT;
  }

  const result = portSchema.safeParse(raw.trim());
  if (!result.success) {
    throw new Error(`invalid PORT "${raw}": expected an integer between 1 and 65535`);
  }

  return result.data;
}

export { appConfigSchema, providerNames } from "./schema";
export type { AppConfig, ProviderName };
