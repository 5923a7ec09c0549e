// -----------------------------------------------------------------------------
// LOGGING UTILITY
// -----------------------------------------------------------------------------
// stdout carries the MCP stdio transport, so every log line goes to stderr.

export function log(message: string, data?: unknown): void {
  const timestamp = new Date().toISOString();
  const logMessage = data !== undefined
    ? `[${timestamp}] ${message}: ${JSON.stringify(data)}`
    : `[${timestamp}] ${message}`;
  console.error(logMessage);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
