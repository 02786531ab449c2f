import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import type { Tool } from "./tools/index.js";

export interface McpOptions {
  name: string;
  version: string;
  tools: Tool[];
}

/**
 * Field names and descriptions only. The SDK rejects input that fails the
 * registered schema with a protocol error, so bounds, defaults and required
 * fields are left to `tool.invoke`, which answers with `{ error }`.
 */
export function permissiveShape(shape: z.ZodRawShape): z.ZodRawShape {
  const loose: z.ZodRawShape = {};
  for (const [key, field] of Object.entries(shape)) {
    loose[key] = field.description ? z.unknown().describe(field.description) : z.unknown();
  }
  return loose;
}

/** Registers every tool; results are returned as pretty-printed JSON text. */
export function buildMcpServer(opts: McpOptions): McpServer {
  const server = new McpServer({ name: opts.name, version: opts.version });
  for (const tool of opts.tools) {
    server.registerTool(
      tool.name,
      { description: tool.description, inputSchema: permissiveShape(tool.shape) },
      async (args) => {
        const result = await tool.invoke(args);
        return {
          content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
          isError: "error" in result,
        };
      }
    );
  }
  return server;
}

export async function startStdio(server: McpServer): Promise<void> {
  await server.connect(new StdioServerTransport());
}
