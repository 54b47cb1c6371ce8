import type { FastifyInstance, FastifyPluginOptions } from "fastify";
import type { PipelineRunner } from "../pipeline.js";
import { httpError } from "../lib/httpError.js";

export interface PipelineRouteOptions extends FastifyPluginOptions {
  runner: PipelineRunner;
}

export async function pipelineRoutes(fastify: FastifyInstance, options: PipelineRouteOptions) {
  const { runner } = options;

  fastify.post("/v1/pipeline/runs", async () => {
    return runner.run();
  });

  fastify.get("/v1/pipeline/runs/latest", async (_request, reply) => {
    const summary = runner.lastSummary;
    if (!summary) {
      throw httpError(404, "not_found", "No pipeline run has completed yet");
    }
    reply.header("Cache-Control", "no-store");
    return summary;
  });
}
