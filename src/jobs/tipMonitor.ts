import type { FastifyBaseLogger } from "fastify";
import { HeaderSvClient, Tip } from "../headersv/client";
import { encodeTip } from "../protocol/tipFrame";
import { ClientRegistry } from "../ws/clientRegistry";

export interface TipMonitorDeps {
  headerSv: Pick<HeaderSvClient, "fetchCurrentTip">;
  registry: ClientRegistry;
  log: FastifyBaseLogger;
}

/**
 * Watches HeaderSV for a new best tip and fans it out to every connected
 * headers websocket.
 */
export class TipMonitor {
  private lastHash: string | null = null;
  private handle: NodeJS.Timeout | null = null;
  private checking = false;

  constructor(private readonly deps: TipMonitorDeps) {}

  // ---------------------------------------------------------------------------
  // Push one tip to all registered sessions
  // ---------------------------------------------------------------------------

  async broadcast(tip: Tip): Promise<number> {
    const frame = encodeTip(tip.rawHeader, tip.height);
    const clients = this.deps.registry.values();
    const results = await Promise.all(clients.map((client) => client.notify(frame)));
    const delivered = results.filter(Boolean).length;

    this.deps.log.info(
      { height: tip.height, hash: tip.hash, delivered, clients: clients.length },
      "[tipMonitor] tip pushed"
    );
    return delivered;
  }

  // ---------------------------------------------------------------------------
  // Poll once; broadcast only when the best hash moved
  // ---------------------------------------------------------------------------

  async check(): Promise<number> {
    let tip: Tip;
    try {
      tip = await this.deps.headerSv.fetchCurrentTip();
    } catch (err) {
      // Sessions that connected during the outage got no initial frame:
      // the first good poll afterwards re-sends even an unchanged tip
      this.lastHash = null;
      throw err;
    }
    if (tip.hash === this.lastHash) return 0;

    const delivered = await this.broadcast(tip);
    this.lastHash = tip.hash;
    return delivered;
  }

  // ---------------------------------------------------------------------------
  // Start / stop the polling loop
  // ---------------------------------------------------------------------------

  start(intervalMs: number): void {
    if (this.handle) return;
    this.deps.log.info(`[tipMonitor] Starting, interval=${intervalMs}ms`);

    this.handle = setInterval(async () => {
      if (this.checking) return;
      this.checking = true;
      try {
        await this.check();
      } catch (err) {
        this.deps.log.error({ err }, "[tipMonitor] check failed");
      } finally {
        this.checking = false;
      }
    }, intervalMs);
  }

  stop(): void {
    if (!this.handle) return;
    clearInterval(this.handle);
    this.handle = null;
  }

  get running(): boolean {
    return this.handle !== null;
  }
}
