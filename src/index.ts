import "dotenv/config";
import { loadConfig } from "./config";
import { buildServer } from "./server";

async function main() {
  const config = loadConfig();
  const server = await buildServer(config);

  await server.listen({ host: config.host, port: config.port });
  console.log(`[server] listening on http://${config.host}:${config.port}`);
  console.log(`[server] HeaderSV at ${config.headerSvUrl}`);

  // Poll for new tips only once clients can connect
  if (config.tipPollIntervalMs > 0) {
    server.tipMonitor.start(config.tipPollIntervalMs);
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      console.log(`[server] ${signal} received, shutting down`);
      server.close().then(
        () => process.exit(0),
        (err) => {
          console.error("[server] shutdown failed", err);
          process.exit(1);
        }
      );
    });
  }
}

main().catch((err) => {
  console.error("[server] fatal", err);
  process.exit(1);
});
