import type { Redis } from "ioredis";

import { ConfigurationError } from "../../errors.js";
import type { FilterStage, LogLevel } from "../../types.js";
import { CompositeFilter, type CompositeMode } from "./composite-filter.js";
import {
  ContentFilter,
  DEFAULT_SENSITIVE_KEYS,
  DEFAULT_SENSITIVE_PATTERNS,
  type ContentFilterMode,
  type ContentPattern,
} from "./content-filter.js";
import { FilterChain } from "./filter-chain.js";
import { LevelFilter } from "./level-filter.js";
import {
  MemoryRateLimitStore,
  RateLimitFilter,
  RedisRateLimitStore,
  type RateLimitStore,
  type RateLimitStrategy,
} from "./rate-limit-filter.js";
import { ServiceFilter, type ServiceFilterMode } from "./service-filter.js";

export { CompositeFilter } from "./composite-filter.js";
export {
  ContentFilter,
  DEFAULT_REPLACEMENT,
  DEFAULT_SENSITIVE_KEYS,
  DEFAULT_SENSITIVE_PATTERNS,
} from "./content-filter.js";
export { FilterChain } from "./filter-chain.js";
export { LevelFilter } from "./level-filter.js";
export {
  MemoryRateLimitStore,
  RateLimitFilter,
  RedisRateLimitStore,
  type RateLimitStore,
  type RateLimitResult,
} from "./rate-limit-filter.js";
export { ServiceFilter } from "./service-filter.js";

// ---------------------------------------------------------------------------
// Stage configuration
// ---------------------------------------------------------------------------

export interface ContentPatternConfig {
  name: string;
  pattern: string;
  flags?: string;
}

export type FilterStageConfig =
  | { type: "level"; name?: string; threshold: LogLevel }
  | { type: "service"; name?: string; mode: ServiceFilterMode; services: string[] }
  | {
      type: "rate-limit";
      name?: string;
      maxRecords: number;
      windowMs: number;
      strategy?: RateLimitStrategy;
      store?: "memory" | "redis";
    }
  | {
      type: "content";
      name?: string;
      mode: ContentFilterMode;
      patterns?: ContentPatternConfig[];
      /** Metadata key names whose values are sensitive. */
      sensitiveKeys?: string[];
      /** Keep the built-in patterns and keys alongside custom ones. Default: true */
      includeDefaults?: boolean;
      replacement?: string;
    }
  | { type: "composite"; name?: string; mode: CompositeMode; children: FilterStageConfig[] };

export interface FilterDependencies {
  /** Required by rate-limit stages with `store: "redis"`. */
  redis?: Redis;
  now?: () => number;
}

function includeDefaults(config: Extract<FilterStageConfig, { type: "content" }>): boolean {
  return config.includeDefaults ?? true;
}

function compilePatterns(config: Extract<FilterStageConfig, { type: "content" }>): ContentPattern[] {
  const custom = (config.patterns ?? []).map((p) => {
    try {
      return { name: p.name, regex: new RegExp(p.pattern, p.flags ?? "g") };
    } catch (err) {
      throw new ConfigurationError(
        `Invalid content pattern "${p.name}": ${err instanceof Error ? err.message : String(err)}`,
      );
    }
  });
  return includeDefaults(config) ? [...DEFAULT_SENSITIVE_PATTERNS, ...custom] : custom;
}

/** Build one stage from configuration. */
export function createFilterStage(config: FilterStageConfig, deps: FilterDependencies = {}): FilterStage {
  switch (config.type) {
    case "level":
      return new LevelFilter(config.threshold, config.name);

    case "service":
      return new ServiceFilter(config.mode, config.services, config.name);

    case "rate-limit": {
      if (config.maxRecords < 1 || config.windowMs < 1) {
        throw new ConfigurationError("rate-limit stages need maxRecords >= 1 and windowMs >= 1");
      }
      let store: RateLimitStore;
      if (config.store === "redis") {
        if (!deps.redis) {
          throw new ConfigurationError("rate-limit store \"redis\" requires REDIS_URL");
        }
        if (config.strategy === "sliding") {
          throw new ConfigurationError('rate-limit store "redis" supports only the "fixed" strategy');
        }
        store = new RedisRateLimitStore(deps.redis);
      } else {
        store = new MemoryRateLimitStore(config.strategy ?? "fixed", deps.now);
      }
      return new RateLimitFilter({
        maxRecords: config.maxRecords,
        windowMs: config.windowMs,
        store,
        name: config.name,
      });
    }

    case "content": {
      const patterns = compilePatterns(config);
      const customKeys = config.sensitiveKeys ?? [];
      const sensitiveKeys = includeDefaults(config) ? [...DEFAULT_SENSITIVE_KEYS, ...customKeys] : customKeys;
      if (patterns.length === 0 && sensitiveKeys.length === 0) {
        throw new ConfigurationError("content stages need at least one pattern or sensitive key");
      }
      return new ContentFilter({
        mode: config.mode,
        patterns,
        sensitiveKeys,
        replacement: config.replacement,
        name: config.name,
      });
    }

    case "composite":
      return new CompositeFilter(
        config.mode,
        config.children.map((child) => createFilterStage(child, deps)),
        config.name,
      );
  }
}

export function createFilterChain(configs: FilterStageConfig[], deps: FilterDependencies = {}): FilterChain {
  return new FilterChain(configs.map((config) => createFilterStage(config, deps)));
}
