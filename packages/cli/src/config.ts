import { resolve } from "node:path";
import type { StatusReporter } from "@keybot/core";
import { DEFAULT_KNOWLEDGE_FILE, DEFAULT_LOG_FILE, loadKeybotConfig } from "@keybot/core";

export interface AppConfig {
  botName: string;
  /** Default knowledge file: auto-load source and save target */
  knowledgePath: string;
  /** Default target for "Save Logs" */
  logPath: string;
  autoLoad: boolean;
  saveOnAdd: boolean;
  /** Config files that contributed, lowest precedence first */
  sources: string[];
}

/** Command-line flags that take precedence over every config layer */
export interface ConfigOverrides {
  knowledgePath?: string;
  logPath?: string;
}

export async function loadConfig(
  cwd: string = process.cwd(),
  overrides: ConfigOverrides = {},
  reporter?: StatusReporter,
  env: Record<string, string | undefined> = process.env,
): Promise<AppConfig> {
  const { config, sources } = await loadKeybotConfig(cwd, env, { reporter });

  const knowledgePath = overrides.knowledgePath ?? config.knowledge?.path ?? DEFAULT_KNOWLEDGE_FILE;
  const logPath = overrides.logPath ?? config.log?.path ?? DEFAULT_LOG_FILE;

  return {
    botName: config.botName ?? "MiniBot",
    knowledgePath: resolve(cwd, knowledgePath),
    logPath: resolve(cwd, logPath),
    autoLoad: config.knowledge?.autoLoad ?? true,
    saveOnAdd: config.knowledge?.saveOnAdd ?? true,
    sources,
  };
}

/** Effective settings and where they came from, for `keybot --config` */
export function describeConfig(config: AppConfig): string[] {
  return [
    `Bot name: ${config.botName}`,
    `Knowledge file: ${config.knowledgePath}`,
    `Log file: ${config.logPath}`,
    `Auto-load: ${config.autoLoad ? "on" : "off"}`,
    `Save on add: ${config.saveOnAdd ? "on" : "off"}`,
    config.sources.length > 0 ? `Config sources: ${config.sources.join(", ")}` : "Config sources: (defaults only)",
  ];
}
