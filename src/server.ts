import Fastify from "fastify";
import type { Tool } from "./tools/index.js";
import type { Logger } from "./utils/logger.js";

export interface HttpServerOptions {
  tools: Tool[];
  logger: Logger;
  apiKey?: string;
}

/**
 * Tool calls over HTTP:
 *   GET  /v1/tools        list tool names and descriptions
 *   POST /v1/tools/:name  invoke a tool with a JSON argument object
 */
export function buildServer(opts: HttpServerOptions) {
  const tools = new Map(opts.tools.map((t) => [t.name, t]));
  const app = Fastify({
    logger: opts.logger,
    // Summarizing a batch can take many minutes
    connectionTimeout: 0,
    keepAliveTimeout: 72000,
    requestTimeout: 0,
  });

  app.addHook("preHandler", async (request, reply) => {
    const toolRoute = request.routeOptions.url?.startsWith("/v1/tools") ?? false;
    if (toolRoute && opts.apiKey) {
      const apiKey = request.headers["x-api-key"];
      if (!apiKey || apiKey !== opts.apiKey) {
        return reply.code(401).send({ error: "Unauthorized: Invalid or missing API key" });
      }
    }
  });

  app.get("/v1/tools", async () => ({
    tools: opts.tools.map((t) => ({ name: t.name, description: t.description })),
  }));

  app.post<{ Params: { name: string } }>("/v1/tools/:name", async (req, reply) => {
    const tool = tools.get(req.params.name);
    if (!tool) {
      return reply.code(404).send({ error: `Unknown tool: ${req.params.name}` });
    }
    req.log.info({ tool: tool.name }, "Tool call");
    const result = await tool.invoke(req.body ?? {});
    return reply.code(200).send(result);
  });

  app.get("/healthz", async () => ({ ok: true }));

  return app;
}
