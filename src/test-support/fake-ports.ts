/**
 * In-memory stand-ins for the outbound ports, shared by the application and
 * inbound adapter tests.
 */

import type {
  ApiGatewayPort,
  MethodSummary,
  ResourceSummary,
  RestApiSummary,
  StageSummary,
} from '../ports/outbound/api-gateway-port.js';
import type {
  LogsInsightsPort,
  LogsInsightsQuery,
  LogsInsightsQueryResult,
} from '../ports/outbound/logs-insights-port.js';
import type { ErrorPatternRepositoryPort } from '../ports/outbound/error-pattern-repository-port.js';
import type { LoggerPort } from '../ports/outbound/logger-port.js';
import type { ErrorPattern } from '../domain/entities/error-pattern.js';
import type { HttpMethod } from '../domain/entities/api-target.js';

export interface FakeResource {
  id: string;
  path: string;
  methods: string[];
}

export interface FakeApiDefinition {
  restApiId: string;
  name?: string;
  stages: Array<{ stageName: string; accessLogDestinationArn?: string }>;
  resources: FakeResource[];
}

export class FakeApiGateway implements ApiGatewayPort {
  readonly calls: string[] = [];
  private apis = new Map<string, FakeApiDefinition>();

  constructor(apis: FakeApiDefinition[]) {
    for (const api of apis) {
      this.apis.set(api.restApiId, api);
    }
  }

  async getRestApi(restApiId: string): Promise<RestApiSummary | null> {
    this.calls.push(`getRestApi:${restApiId}`);
    const api = this.apis.get(restApiId);
    return api ? { id: api.restApiId, name: api.name } : null;
  }

  async getStage(restApiId: string, stageName: string): Promise<StageSummary | null> {
    this.calls.push(`getStage:${restApiId}/${stageName}`);
    const stage = this.apis.get(restApiId)?.stages.find(s => s.stageName === stageName);
    return stage ? { ...stage } : null;
  }

  async findResourceByPath(restApiId: string, resourcePath: string): Promise<ResourceSummary | null> {
    this.calls.push(`findResourceByPath:${restApiId}${resourcePath}`);
    const resource = this.apis.get(restApiId)?.resources.find(r => r.path === resourcePath);
    return resource ? { id: resource.id, path: resource.path } : null;
  }

  async getMethod(restApiId: string, resourceId: string, httpMethod: HttpMethod): Promise<MethodSummary | null> {
    this.calls.push(`getMethod:${restApiId}/${resourceId}/${httpMethod}`);
    const resource = this.apis.get(restApiId)?.resources.find(r => r.id === resourceId);
    return resource?.methods.includes(httpMethod) ? { httpMethod } : null;
  }
}

export class FakeLogsInsights implements LogsInsightsPort {
  readonly queries: LogsInsightsQuery[] = [];
  private groups = new Map<string, LogsInsightsQueryResult>();

  withGroup(logGroupName: string, lines: string[], status: LogsInsightsQueryResult['status'] = 'Complete'): this {
    this.groups.set(logGroupName, { status, lines });
    return this;
  }

  async runQuery(query: LogsInsightsQuery): Promise<LogsInsightsQueryResult | null> {
    this.queries.push(query);
    return this.groups.get(query.logGroupName) ?? null;
  }
}

export class InMemoryErrorPatternRepository implements ErrorPatternRepositoryPort {
  constructor(private patterns: readonly ErrorPattern[]) {}

  async loadPatterns(): Promise<readonly ErrorPattern[]> {
    return this.patterns;
  }

  getSourcePath(): string {
    return 'memory';
  }
}

export class RecordingLogger implements LoggerPort {
  readonly messages: Array<{ level: 'info' | 'warn' | 'error'; message: string }> = [];

  info(message: string): void {
    this.messages.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.messages.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.messages.push({ level: 'error', message });
  }
}

export function createSampleApi(overrides: Partial<FakeApiDefinition> = {}): FakeApiDefinition {
  return {
    restApiId: 'abc123',
    name: 'users-api',
    stages: [{ stageName: 'prod' }],
    resources: [
      { id: 'root1', path: '/', methods: [] },
      { id: 'res42', path: '/users', methods: ['GET', 'POST'] },
    ],
    ...overrides,
  };
}

export function pattern(id: string, source: string, articles: string[], extra: Partial<ErrorPattern> = {}): ErrorPattern {
  return { id, name: id, pattern: source, articles, redact: false, ...extra };
}
