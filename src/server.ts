import Fastify, { FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import websocketPlugin from "@fastify/websocket";
import { AppConfig } from "./config";
import { HeaderSvClient } from "./headersv/client";
import { TipMonitor } from "./jobs/tipMonitor";
import { ClientRegistry } from "./ws/clientRegistry";
import { TipSession } from "./ws/tipSession";
import healthRouter from "./routes/healthRouter";
import headerSvRouter from "./routes/headerSvRouter";
import wsRouter from "./routes/wsRouter";

declare module "fastify" {
  interface FastifyInstance {
    headerSv: HeaderSvClient;
    tipRegistry: ClientRegistry<TipSession>;
    tipMonitor: TipMonitor;
  }
}

export async function buildServer(config: AppConfig): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      transport: !config.production
        ? { target: "pino-pretty", options: { colorize: true } }
        : undefined,
    },
  });

  const headerSv = new HeaderSvClient(config.headerSvUrl);
  const tipRegistry = new ClientRegistry<TipSession>();
  const tipMonitor = new TipMonitor({ headerSv, registry: tipRegistry, log: fastify.log });

  fastify.decorate("headerSv", headerSv);
  fastify.decorate("tipRegistry", tipRegistry);
  fastify.decorate("tipMonitor", tipMonitor);
  fastify.addHook("onClose", async () => tipMonitor.stop());

  await fastify.register(cors, { origin: true });
  await fastify.register(websocketPlugin);

  await fastify.register(healthRouter);
  await fastify.register(wsRouter);
  if (config.exposeHeaderSvApis) {
    await fastify.register(headerSvRouter);
  }

  return fastify;
}
