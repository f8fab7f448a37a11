import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import type { ErrorPatternRepositoryPort } from '../../../ports/outbound/error-pattern-repository-port.js';
import type { ErrorPattern } from '../../../domain/entities/error-pattern.js';

interface RawYamlPattern {
  id: string;
  name: string;
  pattern: string;
  articles: string[];
  redact?: boolean;
  redacted_message_pattern?: string;
}

export class ErrorPatternFileError extends Error {
  constructor(filePath: string, detail: string) {
    super(`Invalid error pattern file ${filePath}: ${detail}`);
    this.name = 'ErrorPatternFileError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isValidRegex(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

export class YamlErrorPatternRepository implements ErrorPatternRepositoryPort {
  private filePath: string;
  private patterns: readonly ErrorPattern[] | null = null;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async loadPatterns(): Promise<readonly ErrorPattern[]> {
    if (!this.patterns) {
      this.patterns = await this.loadPatternsFromDisk();
    }
    return this.patterns;
  }

  getSourcePath(): string {
    return this.filePath;
  }

  private async loadPatternsFromDisk(): Promise<readonly ErrorPattern[]> {
    const content = await readFile(this.filePath, 'utf-8');
    const document: unknown = parseYaml(content);

    const entries: unknown = isRecord(document) ? document['patterns'] : undefined;
    if (!Array.isArray(entries)) {
      throw new ErrorPatternFileError(this.filePath, 'expected a top-level "patterns" list');
    }

    const seen = new Set<string>();
    const patterns: ErrorPattern[] = [];

    entries.forEach((entry: unknown, index: number) => {
      const raw = this.validateEntry(entry, index);
      if (seen.has(raw.id)) {
        throw new ErrorPatternFileError(this.filePath, `duplicate pattern id "${raw.id}"`);
      }
      seen.add(raw.id);
      patterns.push(this.parsePattern(raw));
    });

    return Object.freeze(patterns);
  }

  private validateEntry(entry: unknown, index: number): RawYamlPattern {
    const fail = (detail: string): never => {
      throw new ErrorPatternFileError(this.filePath, `entry ${index}: ${detail}`);
    };

    if (!isRecord(entry)) {
      return fail('expected a mapping');
    }

    const { id, name, pattern, articles, redact } = entry;
    const redactedMessagePattern = entry['redacted_message_pattern'];

    if (typeof id !== 'string' || id.length === 0) return fail('"id" must be a non-empty string');
    if (typeof name !== 'string') return fail('"name" must be a string');
    if (typeof pattern !== 'string' || !isValidRegex(pattern)) return fail('"pattern" must be a valid regular expression');
    if (!isStringArray(articles) || articles.length === 0) return fail('"articles" must be a non-empty list of links');
    if (redact !== undefined && typeof redact !== 'boolean') return fail('"redact" must be a boolean');
    if (redactedMessagePattern !== undefined
      && (typeof redactedMessagePattern !== 'string' || !isValidRegex(redactedMessagePattern))) {
      return fail('"redacted_message_pattern" must be a valid regular expression');
    }
    if (redact === true && redactedMessagePattern === undefined) {
      return fail('"redact" requires "redacted_message_pattern"');
    }

    return {
      id,
      name,
      pattern,
      articles,
      redact,
      redacted_message_pattern: redactedMessagePattern,
    };
  }

  private parsePattern(raw: RawYamlPattern): ErrorPattern {
    return {
      id: raw.id,
      name: raw.name,
      pattern: raw.pattern,
      articles: Object.freeze([...raw.articles]),
      redact: raw.redact ?? false,
      redactedMessagePattern: raw.redacted_message_pattern,
    };
  }
}

export function createYamlErrorPatternRepository(filePath: string): ErrorPatternRepositoryPort {
  return new YamlErrorPatternRepository(filePath);
}
