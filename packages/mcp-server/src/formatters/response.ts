/**
 * Recursively coerce string values that look like numbers into actual numbers.
 * The MCP SDK sometimes passes numeric arguments as strings.
 */
export function coerceNumbers(obj: unknown): unknown {
  if (typeof obj === "string") {
    if (obj === "" || obj === "true" || obj === "false" || obj === "null") return obj;
    const n = Number(obj);
    if (!isNaN(n) && obj.trim() !== "") return n;
    return obj;
  }
  if (Array.isArray(obj)) return obj.map(coerceNumbers);
  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      result[k] = coerceNumbers(v);
    }
    return result;
  }
  return obj;
}

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

export function wrapResponse(result: unknown): ToolResponse {
  if (result instanceof Error) {
    return errorResponse({ error: result.message });
  }
  return {
    content: [{ type: "text" as const, text: typeof result === "string" ? result : JSON.stringify(result, null, 2) }],
  };
}

export function errorResponse(body: Record<string, unknown>): ToolResponse {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(body) }],
    isError: true,
  };
}
