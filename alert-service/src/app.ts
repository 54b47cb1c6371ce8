import Fastify from "fastify";
import compress from "@fastify/compress";
import cors from "@fastify/cors";
import type { ServiceConfig } from "./config.js";
import { toHttpError } from "./lib/httpError.js";
import type { PipelineRunner } from "./pipeline.js";
import { loggerOptions } from "./logger.js";
import { pipelineRoutes } from "./routes/pipeline.js";

export type BuildAppOptions = {
  runner: PipelineRunner;
  /** Omit to build without request logging. */
  logLevel?: ServiceConfig["LOG_LEVEL"];
};

export async function buildApp(options: BuildAppOptions) {
  const fastify = Fastify({
    logger: options.logLevel ? loggerOptions({ LOG_LEVEL: options.logLevel }) : false
  });

  await fastify.register(cors, { origin: true });
  await fastify.register(compress);

  fastify.setErrorHandler((err, request, reply) => {
    const normalized = toHttpError(err);
    if (normalized.statusCode >= 500) {
      request.log.error({ err }, "Request failed");
    }
    reply.code(normalized.statusCode).send(normalized.body);
  });

  fastify.get("/healthz", async () => {
    return { ok: true, timestamp: new Date().toISOString() };
  });

  await fastify.register(pipelineRoutes, { runner: options.runner });
  return fastify;
}
