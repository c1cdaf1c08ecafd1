import { afterEach, beforeEach, describe, it } from "node:test";
import assert from "node:assert";
import {
  HeaderSvClient,
  HeaderSvIntegrityError,
  HeaderSvStatusError,
  HeaderSvUnavailableError,
} from "../src/headersv/client";
import { FakeHeaderSv, binary, json, status, unreachableUrl } from "./helpers/fakeHeaderSv";
import {
  RAW_HEADER,
  STALE_HASH,
  TIP_HASH,
  TIP_HEIGHT,
  header,
  tip,
  withHealthyChain,
} from "./helpers/fixtures";

describe("HeaderSvClient", () => {
  let fake: FakeHeaderSv;
  let client: HeaderSvClient;

  beforeEach(async () => {
    fake = new FakeHeaderSv();
    client = new HeaderSvClient(await fake.start());
  });

  afterEach(async () => {
    await fake.stop();
  });

  describe("fetchCurrentTip", () => {
    it("combines the LONGEST_CHAIN tip with its raw header", async () => {
      withHealthyChain(fake);

      const current = await client.fetchCurrentTip();

      assert.strictEqual(current.hash, TIP_HASH);
      assert.strictEqual(current.height, TIP_HEIGHT);
      assert.deepStrictEqual(current.rawHeader, RAW_HEADER);
    });

    it("asks for tips with Accept and for the raw header with Content-Type", async () => {
      withHealthyChain(fake);

      await client.fetchCurrentTip();

      const [tipsReq, headerReq] = fake.requests;
      assert.strictEqual(tipsReq.url, "/api/v1/chain/tips");
      assert.strictEqual(tipsReq.headers.accept, "application/json");
      assert.strictEqual(headerReq.url, `/api/v1/chain/header/${TIP_HASH}`);
      assert.strictEqual(headerReq.headers["content-type"], "application/octet-stream");
    });

    it("fails when no tip is on the longest chain", async () => {
      fake.on("/api/v1/chain/tips", json([tip(STALE_HASH, 117, "STALE")]));

      await assert.rejects(client.fetchCurrentTip(), (err: unknown) => {
        assert.ok(err instanceof HeaderSvIntegrityError);
        assert.strictEqual(err.message, "Expected exactly one LONGEST_CHAIN tip, got 0");
        return true;
      });
      assert.strictEqual(fake.requests.length, 1);
    });

    it("fails when more than one tip claims the longest chain", async () => {
      fake.on("/api/v1/chain/tips", json([tip(TIP_HASH, 120), tip(STALE_HASH, 120)]));

      await assert.rejects(client.fetchCurrentTip(), /got 2$/);
    });

    it("fails on tips that do not match the expected shape", async () => {
      fake.on("/api/v1/chain/tips", json([{ state: "LONGEST_CHAIN", height: 1 }]));

      await assert.rejects(client.fetchCurrentTip(), HeaderSvIntegrityError);
    });

    it("fails on a body that is not JSON", async () => {
      fake.on("/api/v1/chain/tips", (_req, res) => {
        res.writeHead(200, { "Content-Type": "application/json" }).end("{not json");
      });

      await assert.rejects(client.fetchCurrentTip(), HeaderSvIntegrityError);
    });

    it("reports an upstream error status", async () => {
      fake.on("/api/v1/chain/tips", status(500));

      await assert.rejects(client.fetchCurrentTip(), (err: unknown) => {
        assert.ok(err instanceof HeaderSvStatusError);
        assert.strictEqual(err.status, 500);
        assert.strictEqual(err.reason, "Internal Server Error");
        return true;
      });
    });

    it("reports a missing raw header as a status error", async () => {
      fake.on("/api/v1/chain/tips", json([tip(TIP_HASH, TIP_HEIGHT)]));

      await assert.rejects(client.fetchCurrentTip(), (err: unknown) => {
        assert.ok(err instanceof HeaderSvStatusError);
        assert.strictEqual(err.status, 404);
        return true;
      });
    });
  });

  describe("pass-through lookups", () => {
    it("returns a header as JSON", async () => {
      withHealthyChain(fake);

      const result = await client.fetchHeader(TIP_HASH, "json");

      assert.deepStrictEqual(result, { ok: true, status: 200, body: header(TIP_HASH) });
      assert.strictEqual(fake.requests[0].headers["content-type"], "application/json");
    });

    it("asks for headers by height with Accept", async () => {
      const raw = Buffer.concat([RAW_HEADER, RAW_HEADER]);
      fake.on("/api/v1/chain/header/byHeight?height=5&count=2", binary(raw));

      const result = await client.fetchHeadersByHeight(5, 2, "binary");

      assert.deepStrictEqual(result, { ok: true, status: 200, body: raw });
      assert.strictEqual(fake.requests[0].headers.accept, "application/octet-stream");
    });

    it("hands back a non-success status instead of throwing", async () => {
      fake.on("/api/v1/network/peers", status(500));

      const result = await client.fetchPeers();

      assert.deepStrictEqual(result, { ok: false, status: 500, reason: "Internal Server Error" });
    });

    it("relays chain tips untouched", async () => {
      const tips = [{ anything: "goes" }];
      fake.on("/api/v1/chain/tips", json(tips));

      assert.deepStrictEqual(await client.fetchChainTips(), { ok: true, status: 200, body: tips });
    });
  });

  it("throws HeaderSvUnavailableError when nothing listens", async () => {
    const url = await unreachableUrl();
    const offline = new HeaderSvClient(url);

    for (const call of [
      () => offline.fetchCurrentTip(),
      () => offline.fetchPeers(),
      () => offline.fetchHeader(TIP_HASH, "binary"),
    ]) {
      await assert.rejects(call(), (err: unknown) => {
        assert.ok(err instanceof HeaderSvUnavailableError);
        assert.strictEqual(err.message, `HeaderSV service is unavailable on ${url}`);
        return true;
      });
    }
  });
});
