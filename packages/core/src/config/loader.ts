import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as parseJsonc, type ParseError } from "jsonc-parser";
import { consoleReporter } from "../status/reporter";
import type { StatusReporter } from "../status/types";
import { DEFAULT_CONFIG, type KeybotConfig, KeybotConfigSchema } from "./schema";

export const CONFIG_FILENAME = "keybot.jsonc";

export interface LoadConfigOptions {
  /** Home directory holding the global config; defaults to os.homedir() */
  home?: string;
  reporter?: StatusReporter;
}

/** Load and merge config from all sources: defaults < global < project < env */
export async function loadKeybotConfig(
  cwd: string,
  env: Record<string, string | undefined> = process.env,
  options: LoadConfigOptions = {},
): Promise<{ config: KeybotConfig; sources: string[] }> {
  const reporter = options.reporter ?? consoleReporter;
  const sources: string[] = [];

  const globalPath = join(options.home ?? homedir(), ".config", "keybot", CONFIG_FILENAME);
  const globalConfig = await loadConfigFile(globalPath, env, reporter);
  if (globalConfig) sources.push(globalPath);

  const projectPath = join(cwd, CONFIG_FILENAME);
  const projectConfig = await loadConfigFile(projectPath, env, reporter);
  if (projectConfig) sources.push(projectPath);

  let merged: KeybotConfig = mergeConfig({}, DEFAULT_CONFIG);
  if (globalConfig) merged = mergeConfig(merged, globalConfig);
  if (projectConfig) merged = mergeConfig(merged, projectConfig);

  return { config: applyEnvOverrides(merged, env), sources };
}

/** Parse a JSONC file and validate it. Missing or unparsable files yield null. */
async function loadConfigFile(
  path: string,
  env: Record<string, string | undefined>,
  reporter: StatusReporter,
): Promise<KeybotConfig | null> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch {
    return null;
  }

  const errors: ParseError[] = [];
  const parsed: unknown = parseJsonc(text, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    reporter.warn(`Config warning: ${path}\nInvalid JSONC (${errors.length} parse error(s))`);
    return null;
  }

  const result = KeybotConfigSchema.safeParse(substituteTemplates(parsed, env));
  if (!result.success) {
    reporter.warn(`Config warning: ${path}\n${result.error.message}`);
    return null;
  }
  return result.data;
}

/** Later layers win; the knowledge and log sections merge key by key. */
export function mergeConfig(base: KeybotConfig, override: KeybotConfig): KeybotConfig {
  return {
    $schema: override.$schema ?? base.$schema,
    botName: override.botName ?? base.botName,
    knowledge: {
      path: override.knowledge?.path ?? base.knowledge?.path,
      autoLoad: override.knowledge?.autoLoad ?? base.knowledge?.autoLoad,
      saveOnAdd: override.knowledge?.saveOnAdd ?? base.knowledge?.saveOnAdd,
    },
    log: {
      path: override.log?.path ?? base.log?.path,
    },
  };
}

function applyEnvOverrides(config: KeybotConfig, env: Record<string, string | undefined>): KeybotConfig {
  const result = { ...config };
  if (env.KEYBOT_BOT_NAME) {
    result.botName = env.KEYBOT_BOT_NAME;
  }
  if (env.KEYBOT_KNOWLEDGE_FILE) {
    result.knowledge = { ...result.knowledge, path: env.KEYBOT_KNOWLEDGE_FILE };
  }
  if (env.KEYBOT_LOG_FILE) {
    result.log = { ...result.log, path: env.KEYBOT_LOG_FILE };
  }
  return result;
}

/** Template substitution: {env:VAR_NAME} → env[VAR_NAME] */
function substituteTemplates(obj: unknown, env: Record<string, string | undefined>): unknown {
  if (typeof obj === "string") {
    return obj.replace(/\{env:([^}]+)\}/g, (_, varName: string) => env[varName] ?? "");
  }
  if (Array.isArray(obj)) return obj.map((item) => substituteTemplates(item, env));
  if (typeof obj === "object" && obj !== null) {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      result[k] = substituteTemplates(v, env);
    }
    return result;
  }
  return obj;
}
