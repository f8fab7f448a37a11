export const EXECUTION_LOG_QUERY = 'fields @message | sort @timestamp desc';

// Access logs record the integration status; anything starting with 5 is a server error
export const ACCESS_LOG_5XX_QUERY = 'fields @message | filter status like "5" | sort @timestamp desc';

function quoteQueryLiteral(value: string): string {
  return `"${value.replace(/["\\]/g, '\\$&')}"`;
}

/**
 * Execution log lines start with the request id in parentheses, so a single
 * request can be isolated by parsing it out of the message.
 */
export function buildExecutionLogQuery(requestId?: string): string {
  const trimmed = requestId?.trim();
  if (!trimmed) {
    return EXECUTION_LOG_QUERY;
  }
  return `fields @message | parse @message "(*) *" as rid, msg | filter rid = ${quoteQueryLiteral(trimmed)} | sort @timestamp desc`;
}
