import { ChainTip, ChainTipsSchema, HeaderFormat, LONGEST_CHAIN } from "../protocol/schemas";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** HeaderSV could not be reached at all (refused, DNS, reset). */
export class HeaderSvUnavailableError extends Error {
  constructor(readonly baseUrl: string, options?: { cause?: unknown }) {
    super(`HeaderSV service is unavailable on ${baseUrl}`, options);
    this.name = "HeaderSvUnavailableError";
  }
}

/** HeaderSV answered, but with a non-success status. */
export class HeaderSvStatusError extends Error {
  constructor(readonly status: number, readonly reason: string) {
    super(`HeaderSV responded ${status} ${reason}`);
    this.name = "HeaderSvStatusError";
  }
}

/** HeaderSV answered 2xx with data we cannot trust. */
export class HeaderSvIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HeaderSvIntegrityError";
  }
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type UpstreamResult<T> =
  | { ok: true; status: number; body: T }
  | { ok: false; status: number; reason: string };

export type Tip = {
  hash: string;
  height: number;
  rawHeader: Buffer;
};

const JSON_TYPE = "application/json";
const BINARY_TYPE = "application/octet-stream";

/**
 * Thin HTTP client for the HeaderSV chain API.
 *
 * Pass-through lookups hand back the upstream status instead of throwing,
 * so route handlers can relay it. Only a network-level failure throws
 * (`HeaderSvUnavailableError`).
 */
export class HeaderSvClient {
  constructor(readonly baseUrl: string) {}

  /**
   * Single header by hash. HeaderSV picks the representation from
   * `Content-Type` on this endpoint rather than `Accept`.
   */
  fetchHeader(hash: string, format: "binary"): Promise<UpstreamResult<Buffer>>;
  fetchHeader(hash: string, format: "json"): Promise<UpstreamResult<unknown>>;
  fetchHeader(hash: string, format: HeaderFormat): Promise<UpstreamResult<unknown>>;
  async fetchHeader(hash: string, format: HeaderFormat): Promise<UpstreamResult<unknown>> {
    const path = `/api/v1/chain/header/${encodeURIComponent(hash)}`;
    const res = await this.get(path, {
      "Content-Type": format === "binary" ? BINARY_TYPE : JSON_TYPE,
    });
    return format === "binary" ? this.readBinary(res) : this.readJson(res);
  }

  fetchHeadersByHeight(height: number, count: number, format: "binary"): Promise<UpstreamResult<Buffer>>;
  fetchHeadersByHeight(height: number, count: number, format: "json"): Promise<UpstreamResult<unknown>>;
  fetchHeadersByHeight(height: number, count: number, format: HeaderFormat): Promise<UpstreamResult<unknown>>;
  async fetchHeadersByHeight(
    height: number,
    count: number,
    format: HeaderFormat
  ): Promise<UpstreamResult<unknown>> {
    const path = `/api/v1/chain/header/byHeight?height=${height}&count=${count}`;
    const res = await this.get(path, {
      Accept: format === "binary" ? BINARY_TYPE : JSON_TYPE,
    });
    return format === "binary" ? this.readBinary(res) : this.readJson(res);
  }

  async fetchChainTips(): Promise<UpstreamResult<unknown>> {
    const res = await this.get("/api/v1/chain/tips", { Accept: JSON_TYPE });
    return this.readJson(res);
  }

  async fetchPeers(): Promise<UpstreamResult<unknown>> {
    const res = await this.get("/api/v1/network/peers", { Accept: JSON_TYPE });
    return this.readJson(res);
  }

  /**
   * Current best tip: the single LONGEST_CHAIN entry of /chain/tips plus its
   * raw 80-byte header. Never cached.
   */
  async fetchCurrentTip(): Promise<Tip> {
    const tips = await this.fetchChainTips();
    if (!tips.ok) throw new HeaderSvStatusError(tips.status, tips.reason);

    const parsed = ChainTipsSchema.safeParse(tips.body);
    if (!parsed.success) {
      throw new HeaderSvIntegrityError(
        `Malformed chain tips: ${parsed.error.issues[0]?.message ?? "unknown issue"}`
      );
    }

    const longest: ChainTip[] = parsed.data.filter((tip) => tip.state === LONGEST_CHAIN);
    if (longest.length !== 1) {
      throw new HeaderSvIntegrityError(
        `Expected exactly one ${LONGEST_CHAIN} tip, got ${longest.length}`
      );
    }

    const { header, height } = longest[0];
    const raw = await this.fetchHeader(header.hash, "binary");
    if (!raw.ok) throw new HeaderSvStatusError(raw.status, raw.reason);

    return { hash: header.hash, height, rawHeader: raw.body };
  }

  // -------------------------------------------------------------------------

  private async get(path: string, headers: Record<string, string>): Promise<Response> {
    try {
      return await fetch(`${this.baseUrl}${path}`, { headers });
    } catch (err) {
      throw new HeaderSvUnavailableError(this.baseUrl, { cause: err });
    }
  }

  private async readJson(res: Response): Promise<UpstreamResult<unknown>> {
    if (!res.ok) return this.failed(res);

    const text = await this.readBody(res, () => res.text());
    try {
      return { ok: true, status: res.status, body: JSON.parse(text) };
    } catch {
      throw new HeaderSvIntegrityError(`HeaderSV returned invalid JSON for ${res.url}`);
    }
  }

  private async readBinary(res: Response): Promise<UpstreamResult<Buffer>> {
    if (!res.ok) return this.failed(res);

    const body = await this.readBody(res, () => res.arrayBuffer());
    return { ok: true, status: res.status, body: Buffer.from(body) };
  }

  private async failed(res: Response): Promise<UpstreamResult<never>> {
    // Release the connection; the error body is not relayed
    await res.body?.cancel();
    return { ok: false, status: res.status, reason: res.statusText };
  }

  private async readBody<T>(res: Response, read: () => Promise<T>): Promise<T> {
    try {
      return await read();
    } catch (err) {
      // Connection dropped mid-body
      throw new HeaderSvUnavailableError(this.baseUrl, { cause: err });
    }
  }
}
