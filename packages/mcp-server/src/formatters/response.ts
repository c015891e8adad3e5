/**
 * Serialize a tool result as pretty-printed JSON text content.
 */
export function wrapResponse(data: unknown) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(data, null, 2) }],
  };
}

/**
 * Report a failure as an MCP error result. Typed index errors carry their kind
 * so clients can tell bad input from an unreachable backend.
 */
export function wrapError(err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  const kind =
    typeof err === "object" && err !== null && "kind" in err && typeof err.kind === "string"
      ? err.kind
      : undefined;
  return {
    content: [{ type: "text" as const, text: JSON.stringify(kind ? { error: message, kind } : { error: message }) }],
    isError: true,
  };
}
