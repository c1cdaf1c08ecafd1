/** Anything the registry can push a tip frame to. */
export interface TipClient {
  readonly id: string;
  /** Resolves true when the frame was written to the socket. */
  notify(frame: Buffer): Promise<boolean>;
}

/**
 * Registry of the live headers-websocket sessions, keyed by session id.
 * Owned by the server instance (`fastify.tipRegistry`) and handed to each
 * session, so the tip monitor can push to every connected client without
 * going through an HTTP request.
 *
 * Iteration always walks a snapshot: sessions may remove themselves while a
 * broadcast is in flight.
 */
export class ClientRegistry<T extends TipClient = TipClient> {
  private clients = new Map<string, T>();

  insert(id: string, client: T): void {
    if (this.clients.has(id)) {
      throw new Error(`Client ${id} is already registered`);
    }
    this.clients.set(id, client);
  }

  remove(id: string): boolean {
    return this.clients.delete(id);
  }

  has(id: string): boolean {
    return this.clients.has(id);
  }

  values(): T[] {
    return [...this.clients.values()];
  }

  forEach(fn: (client: T) => void): void {
    for (const client of this.values()) {
      fn(client);
    }
  }

  get size(): number {
    return this.clients.size;
  }
}
