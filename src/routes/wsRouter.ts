import { FastifyPluginAsync } from "fastify";
import { SocketStream } from "@fastify/websocket";
import { TipSession } from "../ws/tipSession";

function toBuffer(data: Buffer | ArrayBuffer | Buffer[]): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * GET /api/v1/headers/tips/websocket
 *
 * One-way tip notifications: an 84-byte binary frame on connect and on every
 * new best tip. Client messages are ignored.
 */
const wsRouter: FastifyPluginAsync = async (fastify) => {
  fastify.get(
    "/api/v1/headers/tips/websocket",
    { websocket: true },
    async (connection: SocketStream, req) => {
      const ws = connection.socket;
      const session = new TipSession(ws, {
        registry: fastify.tipRegistry,
        headerSv: fastify.headerSv,
        log: req.log,
      });

      // Listeners go on before the first await: a close that lands while the
      // tip is being fetched must still tear the session down.
      ws.on("message", (data, isBinary) => session.onMessage(toBuffer(data), isBinary));
      ws.on("error", (err: Error) => session.onError(err));
      ws.on("close", () => session.close());
      // Messages are read off the raw socket; keep the duplex draining
      connection.resume();

      req.log.info({ ws_id: session.id, host: req.hostname }, "[ws] headers client connected");
      await session.start();
    }
  );
};

export default wsRouter;
