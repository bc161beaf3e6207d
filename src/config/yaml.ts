import * as fs from "node:fs";
import * as yaml from "js-yaml";
import { ConfigError } from "./errors.js";
import type { EducationConfig } from "./types.js";
import { validateShape } from "./validate.js";

/**
 * Parse a YAML string into an EducationConfig. Only the document's shape is
 * checked here (every section present, as a mapping or list); call
 * validateConfig() on the result to check the values themselves.
 *
 * @throws ConfigError naming each missing or malformed section
 */
export function parseConfig(yamlString: string): EducationConfig {
  const raw: unknown = yaml.load(yamlString);
  const errors = validateShape(raw);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
  return raw as EducationConfig;
}

export function serializeConfig(config: EducationConfig): string {
  return yaml.dump(config, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
    sortKeys: false,
    quotingType: '"',
  });
}

export function loadConfig(filePath: string): EducationConfig {
  const content = fs.readFileSync(filePath, "utf-8");
  return parseConfig(content);
}

export function saveConfig(config: EducationConfig, filePath: string): void {
  const content = serializeConfig(config);
  fs.writeFileSync(filePath, content, "utf-8");
}
