export const REDACTION_NOTICE = '[sensitive information has been redacted]';

/**
 * A known API Gateway log signature and the Knowledge Center articles that
 * explain how to fix it.
 */
export interface ErrorPattern {
  readonly id: string;
  readonly name: string;
  /** Regular expression source, matched against one log line at a time. */
  readonly pattern: string;
  readonly articles: readonly string[];
  readonly redact: boolean;
  /**
   * Capture groups of this expression replace the matched line when
   * `redact` is set.
   */
  readonly redactedMessagePattern?: string;
}

export interface CompiledErrorPattern {
  readonly definition: ErrorPattern;
  readonly matcher: RegExp;
  readonly redactor?: RegExp;
}

export function compileErrorPattern(definition: ErrorPattern): CompiledErrorPattern {
  return {
    definition,
    matcher: new RegExp(definition.pattern),
    redactor: definition.redact && definition.redactedMessagePattern
      ? new RegExp(definition.redactedMessagePattern)
      : undefined,
  };
}
