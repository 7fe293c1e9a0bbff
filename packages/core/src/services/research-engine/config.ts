/**
 * Research Configuration System
 *
 * Loads and manages configuration from research-config.yaml
 * Provides strongly typed access to all configurable settings.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { logger } from "../../logger";
import type { AgentRole } from "../../interfaces/agent";
import type { SearchBackendName } from "../../interfaces/search-provider";
import { isLanguage } from "./language";
import type { Language } from "./types";

const log = logger.child("config");

// =============================================================================
// Type Definitions
// =============================================================================

/**
 * LLM model configuration for one agent role
 */
export interface ModelConfig {
  model: string;
  temperature: number;
  maxTokens: number;
}

export type LLMProvider = "openai" | "deepseek";
export type TavilySearchDepth = "basic" | "advanced";

/**
 * LLM provider configuration
 */
export interface LLMConfig {
  // Checked against LLM_PROVIDERS when the chat client is created
  provider: string;
  // Empty string means the provider's default endpoint
  baseUrl: string;
  // false for models that embed tool calls in generated text
  nativeToolCalls: boolean;
  maxToolRounds: number;
  models: Record<AgentRole, ModelConfig>;
}

/**
 * Search resolver configuration
 */
export interface SearchConfig {
  backends: SearchBackendName[];
  defaultResultCount: number;
  requestTimeoutMs: number;
  tavilySearchDepth: TavilySearchDepth;
}

/**
 * Length ceilings applied after sanitization
 */
export interface SanitizationConfig {
  titleMaxLength: number;
  snippetMaxLength: number;
  sourceMaxLength: number;
  linkMaxLength: number;
  summaryMaxLength: number;
}

/**
 * Page fetching configuration
 */
export interface ExtractionConfig {
  maxChars: number;
  timeoutMs: number;
  userAgent: string;
}

/**
 * Research pipeline configuration
 */
export interface ResearchPipelineConfig {
  maxResearchLoops: number;
  language: Language | "auto";
}

/**
 * Bounded waits on external calls
 */
export interface LimitsConfig {
  agentTimeoutMs: number;
  streamIdleTimeoutMs: number;
}

/**
 * Complete research configuration
 */
export interface ResearchConfig {
  llm: LLMConfig;
  search: SearchConfig;
  sanitization: SanitizationConfig;
  extraction: ExtractionConfig;
  research: ResearchPipelineConfig;
  limits: LimitsConfig;
}

// =============================================================================
// Default Configuration
// =============================================================================

export const SEARCH_BACKEND_NAMES: readonly SearchBackendName[] = [
  "tavily",
  "brave",
  "serpapi",
  "google",
  "duckduckgo",
  "wikipedia",
];

export const LLM_PROVIDERS: readonly LLMProvider[] = ["openai", "deepseek"];

const TAVILY_SEARCH_DEPTHS: readonly TavilySearchDepth[] = ["basic", "advanced"];

/**
 * Default configuration values (used when config file is not found)
 */
export const DEFAULT_CONFIG: ResearchConfig = {
  llm: {
    provider: "openai",
    baseUrl: "",
    nativeToolCalls: true,
    maxToolRounds: 6,
    models: {
      researcher: { model: "gpt-4o-mini", temperature: 0.3, maxTokens: 4000 },
      analyst: { model: "gpt-4o-mini", temperature: 0.2, maxTokens: 2000 },
      writer: { model: "gpt-4o", temperature: 0.4, maxTokens: 8000 },
    },
  },
  search: {
    backends: [...SEARCH_BACKEND_NAMES],
    defaultResultCount: 10,
    requestTimeoutMs: 10000,
    tavilySearchDepth: "advanced",
  },
  sanitization: {
    titleMaxLength: 200,
    snippetMaxLength: 500,
    sourceMaxLength: 100,
    linkMaxLength: 2048,
    summaryMaxLength: 2500,
  },
  extraction: {
    maxChars: 4000,
    timeoutMs: 10000,
    userAgent:
      "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
  },
  research: {
    maxResearchLoops: 2,
    language: "auto",
  },
  limits: {
    agentTimeoutMs: 180000,
    streamIdleTimeoutMs: 60000,
  },
};

// =============================================================================
// Configuration Loader
// =============================================================================

let cachedConfig: ResearchConfig | null = null;
let configPath: string | null = null;

/**
 * Find the research-config.yaml file by searching upward from a starting directory
 */
function findConfigFile(startDir?: string): string | null {
  const filename = "research-config.yaml";
  let currentDir = startDir || process.cwd();

  // Search up to 10 levels up
  for (let i = 0; i < 10; i++) {
    const configFilePath = path.join(currentDir, filename);
    if (fs.existsSync(configFilePath)) {
      return configFilePath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached root
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge parsed YAML over typed defaults. Keys unknown to the defaults
 * are ignored, and a value whose kind differs from the default is skipped.
 */
function deepMerge<T extends object>(target: T, source: unknown): T {
  if (!isPlainObject(source)) {
    return target;
  }

  const result = { ...target };

  for (const key of Object.keys(target) as Array<keyof T & string>) {
    const sourceValue = source[key];
    const targetValue = target[key];

    if (sourceValue === undefined) {
      continue;
    }

    if (isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (
      Array.isArray(targetValue) === Array.isArray(sourceValue) &&
      typeof targetValue === typeof sourceValue
    ) {
      result[key] = sourceValue as T[keyof T & string];
    } else {
      log.warn("Ignoring config value with unexpected type", { key });
    }
  }

  return result;
}

function isSearchBackendName(value: unknown): value is SearchBackendName {
  return SEARCH_BACKEND_NAMES.some((name) => name === value);
}

export function isLLMProvider(value: unknown): value is LLMProvider {
  return LLM_PROVIDERS.some((provider) => provider === value);
}

function isTavilySearchDepth(value: unknown): value is TavilySearchDepth {
  return TAVILY_SEARCH_DEPTHS.some((depth) => depth === value);
}

/**
 * Drop unknown backend names, reset unknown enum values to their defaults
 * and keep numeric settings in range
 */
function normalizeConfig(config: ResearchConfig): ResearchConfig {
  const { language } = config.research;
  const validLanguage = language === "auto" || isLanguage(language);
  if (!validLanguage) {
    log.warn("Unknown research language in config, using auto", { language });
  }

  const depth = config.search.tavilySearchDepth;
  const validDepth = isTavilySearchDepth(depth);
  if (!validDepth) {
    log.warn("Unknown Tavily search depth in config, using default", { depth });
  }

  const backends = config.search.backends.filter((name) => {
    if (!isSearchBackendName(name)) {
      log.warn("Unknown search backend in config, skipping", { name });
      return false;
    }
    return true;
  });

  return {
    ...config,
    search: {
      ...config.search,
      backends,
      tavilySearchDepth: validDepth
        ? depth
        : DEFAULT_CONFIG.search.tavilySearchDepth,
    },
    research: {
      ...config.research,
      language: validLanguage ? language : "auto",
      maxResearchLoops: Math.max(
        1,
        Math.floor(config.research.maxResearchLoops)
      ),
    },
  };
}

/**
 * Load configuration from YAML file
 */
export function loadConfig(customPath?: string): ResearchConfig {
  // Return cached config if available and no custom path specified
  if (cachedConfig && !customPath) {
    return cachedConfig;
  }

  // Find config file
  const filePath = customPath || findConfigFile();

  if (!filePath) {
    log.warn("research-config.yaml not found, using default configuration");
    cachedConfig = DEFAULT_CONFIG;
    return DEFAULT_CONFIG;
  }

  try {
    const fileContents = fs.readFileSync(filePath, "utf8");
    const rawConfig: unknown = yaml.load(fileContents);

    // Merge with defaults to ensure all fields are present
    const config = normalizeConfig(deepMerge(DEFAULT_CONFIG, rawConfig));

    // Cache the config
    cachedConfig = config;
    configPath = filePath;

    log.info("Loaded research config", { path: filePath });
    return config;
  } catch (error) {
    log.error("Error loading config, using default configuration", {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    cachedConfig = DEFAULT_CONFIG;
    return DEFAULT_CONFIG;
  }
}

/**
 * Get the currently loaded configuration
 * Loads from file if not yet loaded
 */
export function getConfig(): ResearchConfig {
  if (!cachedConfig) {
    return loadConfig();
  }
  return cachedConfig;
}

/**
 * Clear the cached configuration (useful for testing or reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
  configPath = null;
}

/**
 * Get the path to the loaded config file
 */
export function getConfigPath(): string | null {
  return configPath;
}

/**
 * Override specific configuration values at runtime
 * Useful for testing or per-request customization
 */
export function withConfigOverrides(overrides: unknown): ResearchConfig {
  return normalizeConfig(deepMerge(getConfig(), overrides));
}

// =============================================================================
// Convenience Getters
// =============================================================================

export function getExtractionConfig(): ExtractionConfig {
  return getConfig().extraction;
}
