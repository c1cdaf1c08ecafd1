import { FastifyPluginAsync, FastifyReply } from "fastify";
import {
  HeaderSvIntegrityError,
  HeaderSvUnavailableError,
  UpstreamResult,
} from "../headersv/client";
import {
  HeaderFormat,
  HeaderParamsSchema,
  HeadersByHeightQuery,
  HeadersByHeightQuerySchema,
} from "../protocol/schemas";

const BINARY_TYPE = "application/octet-stream";

function formatFor(accept: string | undefined): HeaderFormat {
  return accept === BINARY_TYPE ? "binary" : "json";
}

function relay(reply: FastifyReply, result: UpstreamResult<unknown>, format: HeaderFormat) {
  if (!result.ok) {
    return reply.code(result.status).send({ error: result.reason });
  }
  if (format === "binary") {
    return reply.code(result.status).type(BINARY_TYPE).send(result.body);
  }
  return reply.code(result.status).send(result.body);
}

/**
 * Read-only pass-through to HeaderSV. No state: every request maps to one
 * upstream request and the answer is relayed as is. A non-success answer
 * keeps its status but not its body: the client gets `{ error: <reason> }`
 * with HeaderSV's status text, the same shape as every other error here.
 *
 *   GET /api/v1/headers/tips
 *   GET /api/v1/headers/by-height?height=&count=
 *   GET /api/v1/headers/:hash
 *   GET /api/v1/network/peers
 */
const headerSvRouter: FastifyPluginAsync = async (fastify) => {
  const headerSv = fastify.headerSv;

  fastify.setErrorHandler((err, req, reply) => {
    if (err instanceof HeaderSvUnavailableError) {
      req.log.error(err.message);
      return reply.code(503).send({ error: "Service Unavailable" });
    }
    if (err instanceof HeaderSvIntegrityError) {
      req.log.error({ err }, "bad data from HeaderSV");
      return reply.code(502).send({ error: "Bad Gateway" });
    }
    req.log.error({ err }, "header proxy failed");
    return reply.code(err.statusCode ?? 500).send({ error: err.message });
  });

  fastify.get("/api/v1/headers/tips", async (_req, reply) => {
    const result = await headerSv.fetchChainTips();
    return relay(reply, result, "json");
  });

  fastify.get("/api/v1/headers/by-height", async (req, reply) => {
    const parsed = HeadersByHeightQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    const { height, count }: HeadersByHeightQuery = parsed.data;
    const format = formatFor(req.headers.accept);
    const result = await headerSv.fetchHeadersByHeight(height, count, format);
    return relay(reply, result, format);
  });

  fastify.get("/api/v1/headers/:hash", async (req, reply) => {
    const parsed = HeaderParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.flatten() });
    }

    const format = formatFor(req.headers.accept);
    const result = await headerSv.fetchHeader(parsed.data.hash, format);
    return relay(reply, result, format);
  });

  fastify.get("/api/v1/network/peers", async (_req, reply) => {
    const result = await headerSv.fetchPeers();
    return relay(reply, result, "json");
  });
};

export default headerSvRouter;
