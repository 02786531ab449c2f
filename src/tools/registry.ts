import type { z } from "zod";
import { ToolError, toErrorEnvelope } from "../errors.js";
import type { Logger } from "../utils/logger.js";

export type ToolResult = Record<string, unknown>;

export interface ToolDefinition<Shape extends z.ZodRawShape, Args> {
  name: string;
  description: string;
  schema: z.ZodObject<Shape, "strip", z.ZodTypeAny, Args>;
  handler(args: Args): Promise<ToolResult>;
}

/** A tool as the transports see it: arguments in, JSON object out, never throws. */
export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly shape: z.ZodRawShape;
  invoke(args: unknown): Promise<ToolResult>;
}

function validationMessage(issue: z.ZodIssue): string {
  if (issue.code === "too_small" || issue.code === "too_big" || issue.code === "custom") {
    return issue.message;
  }
  const field = issue.path.join(".");
  return field ? `Invalid ${field}: ${issue.message}` : issue.message;
}

export function defineTool<Shape extends z.ZodRawShape, Args>(
  def: ToolDefinition<Shape, Args>,
  logger: Logger
): Tool {
  return {
    name: def.name,
    description: def.description,
    shape: def.schema.shape,
    async invoke(args: unknown): Promise<ToolResult> {
      const parsed = def.schema.safeParse(args ?? {});
      if (!parsed.success) {
        const [issue] = parsed.error.issues;
        return toErrorEnvelope(
          new ToolError("validation", issue ? validationMessage(issue) : "Invalid arguments")
        );
      }

      try {
        return await def.handler(parsed.data);
      } catch (err) {
        if (err instanceof ToolError) {
          logger.warn({ tool: def.name, kind: err.kind, message: err.message }, "Tool call failed");
        } else {
          logger.error({ err, tool: def.name }, "Tool call failed");
        }
        return toErrorEnvelope(err);
      }
    },
  };
}
