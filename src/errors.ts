export type ToolErrorKind = "not_found" | "no_content" | "validation" | "upstream";

/**
 * A failure that ends a tool call. Tools never throw across their boundary:
 * `toErrorEnvelope` turns this (or anything else thrown) into `{ error }`.
 */
export class ToolError extends Error {
  constructor(readonly kind: ToolErrorKind, message: string) {
    super(message);
    this.name = "ToolError";
  }
}

export type ErrorEnvelope = { error: string };

// Single line, no stack or provider payloads
export function toErrorEnvelope(err: unknown): ErrorEnvelope {
  const message = err instanceof Error ? err.message : String(err);
  return { error: message.split("\n")[0].trim() || "Unknown error" };
}
