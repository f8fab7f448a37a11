import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, test, expect } from 'vitest';
import { ErrorPatternFileError, YamlErrorPatternRepository } from './yaml-error-pattern-repository.js';

const SHIPPED_PATTERNS = fileURLToPath(new URL('../../../../patterns/api-gateway-errors.yaml', import.meta.url));

describe('YamlErrorPatternRepository', () => {
  describe('shipped pattern table', () => {
    const repository = new YamlErrorPatternRepository(SHIPPED_PATTERNS);

    test('loads every pattern in file order', async () => {
      const patterns = await repository.loadPatterns();

      expect(patterns).toHaveLength(19);
      expect(patterns[0]?.id).toBe('network-endpoint-error');
      expect(patterns[18]?.id).toBe('lambda-integration-misconfiguration');
    });

    test('maps snake_case keys and defaults redact to false', async () => {
      const patterns = await repository.loadPatterns();
      const unauthorized = patterns.find(p => p.id === 'unauthorized-401');
      const timeout = patterns.find(p => p.id === 'integration-timeout');

      expect(unauthorized?.redact).toBe(true);
      expect(unauthorized?.redactedMessagePattern).toBe(
        '(\\([0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\\)).*(401 Unauthorized).*'
      );
      expect(unauthorized?.articles).toEqual([
        'https://repost.aws/knowledge-center/api-gateway-cognito-401-unauthorized',
        'https://repost.aws/knowledge-center/api-gateway-401-error-lambda-authorizer',
      ]);
      expect(timeout?.redact).toBe(false);
    });

    test('reports where the table was read from', () => {
      expect(repository.getSourcePath()).toBe(SHIPPED_PATTERNS);
    });

    test('caches the parsed table', async () => {
      const first = await repository.loadPatterns();
      const second = await repository.loadPatterns();

      expect(second).toBe(first);
      expect(Object.isFrozen(first)).toBe(true);
    });
  });

  describe('validation', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'error-patterns-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    async function load(content: string): Promise<unknown> {
      const filePath = join(dir, 'patterns.yaml');
      await writeFile(filePath, content, 'utf-8');
      return new YamlErrorPatternRepository(filePath).loadPatterns();
    }

    test('rejects a file without a patterns list', async () => {
      const error = await load('rules: []\n').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ErrorPatternFileError);
      expect(error).toMatchObject({
        message: `Invalid error pattern file ${join(dir, 'patterns.yaml')}: expected a top-level "patterns" list`,
      });
    });

    test('rejects an invalid regular expression', async () => {
      const error = await load([
        'patterns:',
        '  - id: broken',
        '    name: Broken',
        "    pattern: '(unclosed'",
        '    articles:',
        '      - https://example.com/article',
        '',
      ].join('\n')).catch((e: unknown) => e);

      expect(error).toMatchObject({
        message: `Invalid error pattern file ${join(dir, 'patterns.yaml')}: entry 0: "pattern" must be a valid regular expression`,
      });
    });

    test('requires a redaction expression when redact is set', async () => {
      const error = await load([
        'patterns:',
        '  - id: secret',
        '    name: Secret',
        "    pattern: 'token'",
        '    articles: ["https://example.com/article"]',
        '    redact: true',
        '',
      ].join('\n')).catch((e: unknown) => e);

      expect(error).toMatchObject({
        message: `Invalid error pattern file ${join(dir, 'patterns.yaml')}: entry 0: "redact" requires "redacted_message_pattern"`,
      });
    });

    test('rejects duplicate ids', async () => {
      const entry = [
        '  - id: twice',
        '    name: Twice',
        "    pattern: 'twice'",
        '    articles: ["https://example.com/article"]',
      ];
      const error = await load(['patterns:', ...entry, ...entry, ''].join('\n')).catch((e: unknown) => e);

      expect(error).toMatchObject({
        message: `Invalid error pattern file ${join(dir, 'patterns.yaml')}: duplicate pattern id "twice"`,
      });
    });

    test('rejects an entry without articles', async () => {
      const error = await load([
        'patterns:',
        '  - id: bare',
        '    name: Bare',
        "    pattern: 'bare'",
        '    articles: []',
        '',
      ].join('\n')).catch((e: unknown) => e);

      expect(error).toMatchObject({
        message: `Invalid error pattern file ${join(dir, 'patterns.yaml')}: entry 0: "articles" must be a non-empty list of links`,
      });
    });
  });
});
