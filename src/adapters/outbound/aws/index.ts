export { ApiGatewayAdapter, createApiGatewayAdapter } from './api-gateway-adapter.js';
export { LogsInsightsAdapter, createLogsInsightsAdapter, type LogsInsightsAdapterOptions } from './logs-insights-adapter.js';
export { StsCredentialsChecker, createStsCredentialsChecker, type AwsCredentialsStatus } from './credentials-checker.js';
