import type { FilterDecision, FilterStage, JsonValue, LogMetadata, LogRecord } from "../../types.js";
import { freezeRecord } from "../record.js";
import { admit, reject } from "./decision.js";

export interface ContentPattern {
  name: string;
  regex: RegExp;
}

export type ContentFilterMode = "reject" | "redact";

export const DEFAULT_REPLACEMENT = "[REDACTED]";

export const DEFAULT_SENSITIVE_PATTERNS: readonly ContentPattern[] = [
  { name: "password", regex: /\b(?:password|passwd|pwd|secret)\s*[=:]\s*\S+/gi },
  { name: "bearer-token", regex: /\bBearer\s+[A-Za-z0-9\-._~+/]+=*/g },
  { name: "aws-access-key", regex: /\bAKIA[0-9A-Z]{16}\b/g },
  { name: "email", regex: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g },
  { name: "card-number", regex: /\b(?:\d[ -]?){15}\d\b/g },
];

/** Metadata keys whose values are sensitive whatever they hold. */
export const DEFAULT_SENSITIVE_KEYS: readonly string[] = [
  "password",
  "passwd",
  "pwd",
  "secret",
  "clientSecret",
  "token",
  "accessToken",
  "refreshToken",
  "apiKey",
  "authorization",
  "privateKey",
];

/** `api_key`, `API-Key` and `apiKey` all compare equal. */
function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[-_]/g, "");
}

function withGlobalFlag(regex: RegExp): RegExp {
  return regex.flags.includes("g") ? regex : new RegExp(regex.source, `${regex.flags}g`);
}

export interface ContentFilterOptions {
  mode: ContentFilterMode;
  patterns?: readonly ContentPattern[];
  /** Metadata key names checked at any depth. Default: DEFAULT_SENSITIVE_KEYS */
  sensitiveKeys?: readonly string[];
  replacement?: string;
  name?: string;
}

/**
 * Scans `message`, every string inside `metadata`, and the metadata key
 * names. Reject mode turns a match into a rejection; redact mode admits a
 * copy with matches replaced and the values under sensitive keys blanked.
 * The record passed in is never modified.
 */
export class ContentFilter implements FilterStage {
  readonly name: string;
  readonly mode: ContentFilterMode;
  private readonly patterns: ContentPattern[];
  private readonly sensitiveKeys: ReadonlySet<string>;
  private readonly replacement: string;

  constructor(options: ContentFilterOptions) {
    this.name = options.name ?? "content";
    this.mode = options.mode;
    this.replacement = options.replacement ?? DEFAULT_REPLACEMENT;
    this.patterns = (options.patterns ?? DEFAULT_SENSITIVE_PATTERNS).map((p) => ({
      name: p.name,
      regex: withGlobalFlag(p.regex),
    }));
    this.sensitiveKeys = new Set((options.sensitiveKeys ?? DEFAULT_SENSITIVE_KEYS).map(normalizeKey));
  }

  async evaluate(record: LogRecord): Promise<FilterDecision> {
    if (this.mode === "reject") {
      const key = record.metadata ? this.findSensitiveKey(record.metadata) : null;
      if (key !== null) return reject(this.name, `sensitive key: ${key}`);
      const hit = this.findMatch(record);
      return hit ? reject(this.name, `sensitive content: ${hit}`) : admit(record);
    }

    const message = this.redact(record.message);
    const metadata = record.metadata ? this.redactMetadata(record.metadata) : undefined;
    const changed =
      message !== record.message ||
      (metadata !== undefined && JSON.stringify(metadata) !== JSON.stringify(record.metadata));

    if (!changed) return admit(record);

    return admit(freezeRecord({ ...record, message, metadata }));
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private isSensitiveKey(key: string): boolean {
    return this.sensitiveKeys.has(normalizeKey(key));
  }

  private findSensitiveKey(value: JsonValue): string | null {
    if (Array.isArray(value)) {
      for (const item of value) {
        const found = this.findSensitiveKey(item);
        if (found !== null) return found;
      }
      return null;
    }
    if (value === null || typeof value !== "object") return null;
    for (const [key, inner] of Object.entries(value)) {
      if (this.isSensitiveKey(key)) return key;
      const found = this.findSensitiveKey(inner);
      if (found !== null) return found;
    }
    return null;
  }

  private findMatch(record: LogRecord): string | null {
    const texts = [record.message, ...collectStrings(record.metadata ?? {})];
    for (const pattern of this.patterns) {
      // search() ignores lastIndex, so shared global regexes stay safe
      if (texts.some((text) => text.search(pattern.regex) !== -1)) {
        return pattern.name;
      }
    }
    return null;
  }

  private redact(text: string): string {
    return this.patterns.reduce(
      (current, pattern) => current.replace(pattern.regex, this.replacement),
      text,
    );
  }

  private redactMetadata(metadata: Readonly<LogMetadata>): LogMetadata {
    const out: LogMetadata = {};
    for (const [key, value] of Object.entries(metadata)) {
      out[key] = this.isSensitiveKey(key) ? this.replacement : this.redactValue(value);
    }
    return out;
  }

  private redactValue(value: JsonValue): JsonValue {
    if (typeof value === "string") return this.redact(value);
    if (Array.isArray(value)) return value.map((item) => this.redactValue(item));
    if (value !== null && typeof value === "object") return this.redactMetadata(value);
    return value;
  }
}

function collectStrings(value: JsonValue): string[] {
  if (typeof value === "string") return [value];
  if (Array.isArray(value)) return value.flatMap(collectStrings);
  if (value !== null && typeof value === "object") return Object.values(value).flatMap(collectStrings);
  return [];
}
