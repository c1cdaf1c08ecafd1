import { randomUUID } from "crypto";
import type { FastifyBaseLogger } from "fastify";
import {
  HeaderSvClient,
  HeaderSvIntegrityError,
  HeaderSvStatusError,
  HeaderSvUnavailableError,
  Tip,
} from "../headersv/client";
import { encodeTip } from "../protocol/tipFrame";
import { ClientRegistry, TipClient } from "./clientRegistry";

// Subset of ws.WebSocket the session touches; tests hand in a fake
export type TipSocket = {
  readonly readyState: number;
  readonly OPEN: number;
  send(data: Buffer, options: { binary: boolean }, cb: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
};

export type TipSessionState = "connecting" | "active" | "closing" | "closed";

export interface TipSessionDeps {
  registry: ClientRegistry;
  headerSv: Pick<HeaderSvClient, "fetchCurrentTip">;
  log: FastifyBaseLogger;
}

/**
 * One headers-websocket client. The channel is one-way: the session pushes
 * the current tip on connect and whatever the tip monitor broadcasts after
 * that, and drops anything the client sends.
 *
 * Pushes go through a per-session promise chain, so the initial tip always
 * reaches the client before a broadcast does.
 */
export class TipSession implements TipClient {
  readonly id = randomUUID();
  private _state: TipSessionState = "connecting";
  private registered = false;
  private outbox: Promise<void> = Promise.resolve();
  private readonly log: FastifyBaseLogger;

  constructor(
    private readonly socket: TipSocket,
    private readonly deps: TipSessionDeps
  ) {
    this.log = deps.log.child({ ws_id: this.id });
  }

  get state(): TipSessionState {
    return this._state;
  }

  /** Registers the session and queues the initial tip push. */
  start(): Promise<void> {
    // Peer already went away
    if (this._state === "closed") return Promise.resolve();
    if (this._state !== "connecting") {
      return Promise.reject(new Error(`Session ${this.id} already started`));
    }

    this.deps.registry.insert(this.id, this);
    this.registered = true;
    this._state = "active";
    this.log.debug("headers websocket connected");

    this.outbox = this.sendCurrentTip().catch((err: unknown) => this.fail(err));
    return this.outbox;
  }

  notify(frame: Buffer): Promise<boolean> {
    const delivery = this.outbox.then(() => this.deliver(frame)).then(
      (sent) => sent,
      (err: unknown) => {
        this.fail(err);
        return false;
      }
    );
    this.outbox = delivery.then(() => undefined);
    return delivery;
  }

  /** Settles once every queued push has been attempted. */
  whenIdle(): Promise<void> {
    return this.outbox;
  }

  onMessage(data: Buffer, isBinary: boolean): void {
    if (isBinary) {
      this.log.debug({ bytes: data.length }, "ignoring binary client message");
      return;
    }
    this.log.debug({ text: data.toString("utf8").slice(0, 80) }, "ignoring client message");
  }

  onError(err: Error): void {
    this.log.error({ err }, "headers websocket error");
    this.close();
  }

  close(): void {
    if (this._state === "closing" || this._state === "closed") return;
    this._state = "closing";

    try {
      this.socket.close();
    } catch (err) {
      this.log.error({ err }, "failed to close headers websocket");
    } finally {
      if (this.registered) {
        this.deps.registry.remove(this.id);
        this.registered = false;
      }
      this._state = "closed";
      this.log.debug("removed headers websocket");
    }
  }

  // -------------------------------------------------------------------------

  private async sendCurrentTip(): Promise<void> {
    let tip: Tip;
    try {
      tip = await this.deps.headerSv.fetchCurrentTip();
    } catch (err) {
      if (err instanceof HeaderSvUnavailableError) {
        // A compensating broadcast follows once HeaderSV is back
        this.log.error(err.message);
        return;
      }
      if (err instanceof HeaderSvStatusError || err instanceof HeaderSvIntegrityError) {
        this.log.error({ err }, "could not fetch current chain tip");
        return;
      }
      throw err;
    }

    const frame = encodeTip(tip.rawHeader, tip.height);
    this.log.debug({ height: tip.height }, "sending tip to new websocket connection");
    await this.deliver(frame);
  }

  private deliver(frame: Buffer): Promise<boolean> {
    if (this._state !== "active" || this.socket.readyState !== this.socket.OPEN) {
      return Promise.resolve(false);
    }
    return new Promise((resolve, reject) => {
      this.socket.send(frame, { binary: true }, (err) => (err ? reject(err) : resolve(true)));
    });
  }

  private fail(err: unknown): void {
    this.log.error({ err }, "headers websocket session failed");
    this.close();
  }
}
