import { describe, it, expect, vi, afterEach } from "vitest";
import { UnsecuredJWT } from "jose";
import { createLogger, type LogEntry } from "@tapline/observability";
import type { FetchLike, InboundIdentity } from "@tapline/request-context";
import { CancelledError, CircuitOpenError } from "@tapline/resilience";

import {
  ACCESS_TOKEN_TYPE,
  cacheKey,
  createExchangePolicy,
  createTokenExchangeClient,
  createTokenExchanger,
  ExchangeError,
  MemoryExchangeCache,
  TOKEN_EXCHANGE_GRANT,
  type ExchangedToken,
} from "../src/index.ts";

const ENDPOINT = "https://idp.test/realms/tapline/protocol/openid-connect/token";
const SUBJECT_TOKEN = "subject-token-value";

function manualClock(start = 1_000_000) {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

function tokenResponse(accessToken: string, expiresIn = 600): Response {
  return json({
    access_token: accessToken,
    token_type: "Bearer",
    expires_in: expiresIn,
    issued_token_type: ACCESS_TOKEN_TYPE,
  });
}

type Responder = (form: URLSearchParams, call: number, signal?: AbortSignal) => Promise<Response>;

function fakeIdp(respond: Responder) {
  const forms: URLSearchParams[] = [];
  const inits: RequestInit[] = [];
  const fetchImpl: FetchLike = async (_url, init = {}) => {
    const form = new URLSearchParams(typeof init.body === "string" ? init.body : "");
    forms.push(form);
    inits.push(init);
    return respond(form, forms.length, init.signal ?? undefined);
  };
  return { fetchImpl, forms, inits };
}

/** Issues "<audience>-token-<n>" for every call. */
const issuing: Responder = async (form, call) =>
  tokenResponse(`${form.get("audience") ?? ""}-token-${call}`);

function identity(rawToken = SUBJECT_TOKEN): InboundIdentity {
  return {
    subject: "user-1",
    issuer: "https://idp.test/realms/tapline",
    tenantId: "tenant-a",
    roles: ["Organizer"],
    scopes: [],
    expiresAt: 0,
    rawToken,
    claims: {},
  };
}

function client(fetchImpl: FetchLike, now: () => number = Date.now) {
  return createTokenExchangeClient({
    tokenEndpoint: ENDPOINT,
    clientId: "gateway",
    clientSecret: "test-secret",
    fetchImpl,
    now,
  });
}

async function failure(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error("expected a failure");
}

describe("createTokenExchangeClient", () => {
  it("posts an RFC 8693 form and computes expiry from expires_in", async () => {
    const clock = manualClock();
    const idp = fakeIdp(async () => tokenResponse("exchanged-1", 600));

    const token = await client(idp.fetchImpl, clock.now).exchange(
      SUBJECT_TOKEN,
      "competition-service"
    );

    expect(token).toEqual({
      accessToken: "exchanged-1",
      tokenType: "Bearer",
      expiresAt: 1_000_000 + 600_000,
      issuedTokenType: ACCESS_TOKEN_TYPE,
      scope: undefined,
    });

    const form = idp.forms[0];
    expect(form?.get("grant_type")).toBe(TOKEN_EXCHANGE_GRANT);
    expect(form?.get("client_id")).toBe("gateway");
    expect(form?.get("client_secret")).toBe("test-secret");
    expect(form?.get("subject_token")).toBe(SUBJECT_TOKEN);
    expect(form?.get("subject_token_type")).toBe(ACCESS_TOKEN_TYPE);
    expect(form?.get("requested_token_type")).toBe(ACCESS_TOKEN_TYPE);
    expect(form?.get("audience")).toBe("competition-service");
    expect(idp.inits[0]?.method).toBe("POST");
    expect(idp.inits[0]?.headers).toMatchObject({
      "content-type": "application/x-www-form-urlencoded",
    });
  });

  it("falls back to the token's exp claim", async () => {
    const exp = 2_000_000;
    const jwt = new UnsecuredJWT({}).setExpirationTime(exp).encode();
    const idp = fakeIdp(async () => json({ access_token: jwt, token_type: "Bearer" }));

    const token = await client(idp.fetchImpl).exchange(SUBJECT_TOKEN, "competition-service");
    expect(token.expiresAt).toBe(exp * 1000);
  });

  it("treats a token without any lifetime as malformed", async () => {
    const idp = fakeIdp(async () => json({ access_token: "opaque" }));
    const err = await failure(client(idp.fetchImpl).exchange(SUBJECT_TOKEN, "competition-service"));

    expect(err).toBeInstanceOf(ExchangeError);
    expect(err instanceof ExchangeError ? [err.kind, err.status] : []).toEqual([
      "MalformedResponse",
      502,
    ]);
  });

  it.each([
    ["invalid JSON", () => new Response("<html>", { status: 200 })],
    ["no access_token", () => json({ token_type: "Bearer", expires_in: 600 })],
  ])("reports %s as malformed", async (_label, make) => {
    const idp = fakeIdp(async () => make());
    const err = await failure(client(idp.fetchImpl).exchange(SUBJECT_TOKEN, "competition-service"));
    expect(err instanceof ExchangeError ? err.kind : undefined).toBe("MalformedResponse");
  });

  it("maps a 4xx to a rejection", async () => {
    const idp = fakeIdp(async () => json({ error: "invalid_grant" }, 400));
    const err = await failure(client(idp.fetchImpl).exchange(SUBJECT_TOKEN, "competition-service"));

    expect(err).toBeInstanceOf(ExchangeError);
    if (!(err instanceof ExchangeError)) return;
    expect(err.kind).toBe("IdentityProviderRejected");
    expect(err.status).toBe(401);
    expect(err.code).toBe("unauthorized");
    expect(err.upstreamStatus).toBe(400);
    expect(err.message).toBe("token endpoint returned 400 (invalid_grant)");
  });

  it("maps a 5xx to a network failure", async () => {
    const idp = fakeIdp(async () => new Response("down", { status: 503 }));
    const err = await failure(client(idp.fetchImpl).exchange(SUBJECT_TOKEN, "competition-service"));
    expect(err instanceof ExchangeError ? [err.kind, err.status] : []).toEqual([
      "NetworkFailure",
      503,
    ]);
  });

  it("maps a transport error to a network failure", async () => {
    const fetchImpl: FetchLike = async () => {
      throw new TypeError("fetch failed");
    };
    const err = await failure(client(fetchImpl).exchange(SUBJECT_TOKEN, "competition-service"));
    expect(err instanceof ExchangeError ? err.kind : undefined).toBe("NetworkFailure");
  });

  it("rejects empty input without calling the identity provider", async () => {
    const idp = fakeIdp(issuing);
    const err = await failure(client(idp.fetchImpl).exchange(SUBJECT_TOKEN, ""));

    expect(err).toBeInstanceOf(TypeError);
    expect(err).not.toBeInstanceOf(ExchangeError);
    expect(idp.forms).toHaveLength(0);
  });

  it("never logs token values", async () => {
    const entries: LogEntry[] = [];
    const idp = fakeIdp(async () => tokenResponse("exchanged-secret-token"));
    const logged = createTokenExchangeClient({
      tokenEndpoint: ENDPOINT,
      clientId: "gateway",
      clientSecret: "test-secret",
      fetchImpl: idp.fetchImpl,
      logger: createLogger({ level: "debug", sink: (e) => entries.push(e) }),
    });

    await logged.exchange(SUBJECT_TOKEN, "competition-service");

    expect(entries.map((e) => e.event)).toEqual(["token_exchange.succeeded"]);
    const text = JSON.stringify(entries);
    expect(text).not.toContain(SUBJECT_TOKEN);
    expect(text).not.toContain("exchanged-secret-token");
    expect(text).not.toContain("test-secret");
  });
});

describe("MemoryExchangeCache", () => {
  const token = (expiresAt: number, accessToken = "t"): ExchangedToken => ({
    accessToken,
    tokenType: "Bearer",
    expiresAt,
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("keys by subject token and audience without exposing the token", () => {
    const a = cacheKey(SUBJECT_TOKEN, "competition-service");
    expect(a).not.toContain(SUBJECT_TOKEN);
    expect(a.endsWith(":competition-service")).toBe(true);
    expect(a).not.toBe(cacheKey(SUBJECT_TOKEN, "judging-service"));
    expect(a).not.toBe(cacheKey("other-token", "competition-service"));
    expect(a).toBe(cacheKey(SUBJECT_TOKEN, "competition-service"));
  });

  it("serves a token until it enters the refresh buffer", () => {
    const clock = manualClock();
    const cache = new MemoryExchangeCache({ now: clock.now, refreshBufferMs: 300_000 });
    const stored = token(clock.now() + 600_000);

    expect(cache.put("k", stored)).toBe(true);
    clock.advance(299_999);
    expect(cache.get("k")).toEqual({ hit: true, token: stored });

    clock.advance(1);
    expect(cache.get("k")).toEqual({ hit: false });
    expect(cache.size()).toBe(0);
  });

  it("does not store a token already inside the refresh buffer", () => {
    const clock = manualClock();
    const cache = new MemoryExchangeCache({ now: clock.now });
    expect(cache.put("k", token(clock.now() + 200_000))).toBe(false);
    expect(cache.size()).toBe(0);
  });

  it("invalidates and clears", () => {
    const clock = manualClock();
    const cache = new MemoryExchangeCache({ now: clock.now });
    cache.put("a", token(clock.now() + 600_000));
    cache.put("b", token(clock.now() + 600_000));

    expect(cache.invalidate("a")).toBe(true);
    expect(cache.invalidate("a")).toBe(false);
    expect(cache.size()).toBe(1);
    cache.clear();
    expect(cache.size()).toBe(0);
  });

  it("sweeps stale entries in the background", () => {
    vi.useFakeTimers();
    const clock = manualClock();
    const cache = new MemoryExchangeCache({ now: clock.now });
    cache.put("short", token(clock.now() + 400_000));
    cache.put("long", token(clock.now() + 900_000));

    const stop = cache.startSweep(1_000);
    clock.advance(200_000);
    vi.advanceTimersByTime(1_000);
    expect(cache.size()).toBe(1);
    expect(cache.get("long").hit).toBe(true);
    stop();
  });

  it("shares one load between concurrent misses", async () => {
    const clock = manualClock();
    const cache = new MemoryExchangeCache({ now: clock.now });
    let loads = 0;
    let release: (t: ExchangedToken) => void = () => undefined;
    const loader = () => {
      loads += 1;
      return new Promise<ExchangedToken>((resolve) => {
        release = resolve;
      });
    };

    const pending = Array.from({ length: 10 }, () => cache.getOrLoad("k", loader));
    await Promise.resolve();
    await Promise.resolve();
    release(token(clock.now() + 600_000, "shared"));
    const results = await Promise.all(pending);

    expect(loads).toBe(1);
    expect(results.every((r) => r.token.accessToken === "shared" && !r.cacheHit)).toBe(true);
    await expect(cache.getOrLoad("k", loader)).resolves.toMatchObject({ cacheHit: true });
    expect(loads).toBe(1);
  });

  it("lets a cancelled waiter leave without disturbing the others", async () => {
    const clock = manualClock();
    const cache = new MemoryExchangeCache({ now: clock.now });
    let loadSignal: AbortSignal | undefined;
    let release: (t: ExchangedToken) => void = () => undefined;
    const loader = (signal: AbortSignal) => {
      loadSignal = signal;
      return new Promise<ExchangedToken>((resolve) => {
        release = resolve;
      });
    };

    const leaving = new AbortController();
    const first = cache.getOrLoad("k", loader, leaving.signal);
    const second = cache.getOrLoad("k", loader);

    leaving.abort();
    await expect(first).rejects.toBeInstanceOf(CancelledError);
    expect(loadSignal?.aborted).toBe(false);

    release(token(clock.now() + 600_000, "kept"));
    await expect(second).resolves.toMatchObject({ token: { accessToken: "kept" } });
  });

  it("aborts the load once every waiter is gone", async () => {
    const cache = new MemoryExchangeCache();
    let loadSignal: AbortSignal | undefined;
    const loader = (signal: AbortSignal) => {
      loadSignal = signal;
      return new Promise<ExchangedToken>((_resolve, reject) => {
        signal.addEventListener("abort", () => reject(new CancelledError("load")));
      });
    };

    const a = new AbortController();
    const b = new AbortController();
    const first = cache.getOrLoad("k", loader, a.signal);
    const second = cache.getOrLoad("k", loader, b.signal);
    await Promise.resolve();
    await Promise.resolve();

    a.abort();
    await expect(first).rejects.toBeInstanceOf(CancelledError);
    expect(loadSignal?.aborted).toBe(false);

    b.abort();
    await expect(second).rejects.toBeInstanceOf(CancelledError);
    expect(loadSignal?.aborted).toBe(true);
  });

  it("does not cache a failed load", async () => {
    const cache = new MemoryExchangeCache();
    let loads = 0;
    const failing = async (): Promise<ExchangedToken> => {
      loads += 1;
      throw new Error("idp down");
    };

    const results = await Promise.allSettled([
      cache.getOrLoad("k", failing),
      cache.getOrLoad("k", failing),
    ]);
    expect(results.map((r) => r.status)).toEqual(["rejected", "rejected"]);
    expect(loads).toBe(1);

    await expect(cache.getOrLoad("k", failing)).rejects.toThrow("idp down");
    expect(loads).toBe(2);
  });
});

describe("createTokenExchanger", () => {
  const noDelay = { maxRetries: 3, baseDelayMs: 0, maxDelayMs: 0 };

  it("exchanges once, then serves the cache until the refresh buffer", async () => {
    const clock = manualClock();
    const idp = fakeIdp(issuing);
    const exchanger = createTokenExchanger({
      cache: new MemoryExchangeCache({ now: clock.now }),
      client: client(idp.fetchImpl, clock.now),
    });

    const first = await exchanger.getToken(identity(), "competition-service");
    expect(first).toMatchObject({ token: "competition-service-token-1", cacheHit: false });

    clock.advance(10_000);
    const second = await exchanger.getToken(identity(), "competition-service");
    expect(second).toMatchObject({ token: "competition-service-token-1", cacheHit: true });

    clock.advance(585_000);
    const third = await exchanger.getToken(identity(), "competition-service");
    expect(third).toMatchObject({ token: "competition-service-token-2", cacheHit: false });
    expect(idp.forms).toHaveLength(2);
  });

  it("isolates audiences", async () => {
    const idp = fakeIdp(issuing);
    const exchanger = createTokenExchanger({
      cache: new MemoryExchangeCache(),
      client: client(idp.fetchImpl),
    });

    const a = await exchanger.getToken(identity(), "competition-service");
    const b = await exchanger.getToken(identity(), "judging-service");

    expect(a.token).toBe("competition-service-token-1");
    expect(b.token).toBe("judging-service-token-2");
    expect(idp.forms.map((f) => f.get("audience"))).toEqual([
      "competition-service",
      "judging-service",
    ]);
  });

  it("makes a single exchange call for concurrent misses", async () => {
    const idp = fakeIdp(issuing);
    const exchanger = createTokenExchanger({
      cache: new MemoryExchangeCache(),
      client: client(idp.fetchImpl),
      policy: createExchangePolicy({ retry: noDelay }),
    });

    const results = await Promise.all(
      Array.from({ length: 8 }, () => exchanger.getToken(identity(), "competition-service"))
    );

    expect(idp.forms).toHaveLength(1);
    expect(new Set(results.map((r) => r.token))).toEqual(new Set(["competition-service-token-1"]));
  });

  it("retries a 5xx and succeeds", async () => {
    const idp = fakeIdp(async (form, call) =>
      call === 1 ? new Response("busy", { status: 503 }) : issuing(form, call)
    );
    const exchanger = createTokenExchanger({
      cache: new MemoryExchangeCache(),
      client: client(idp.fetchImpl),
      policy: createExchangePolicy({ retry: noDelay }),
    });

    const result = await exchanger.getToken(identity(), "competition-service");
    expect(result.token).toBe("competition-service-token-2");
    expect(idp.forms).toHaveLength(2);
  });

  it("does not retry a rejection", async () => {
    const idp = fakeIdp(async () => json({ error: "invalid_grant" }, 400));
    const exchanger = createTokenExchanger({
      cache: new MemoryExchangeCache(),
      client: client(idp.fetchImpl),
      policy: createExchangePolicy({ retry: noDelay }),
    });

    const err = await failure(exchanger.getToken(identity(), "competition-service"));
    expect(err instanceof ExchangeError ? err.kind : undefined).toBe("IdentityProviderRejected");
    expect(idp.forms).toHaveLength(1);
  });

  it("reports an exhausted timeout as a network failure", async () => {
    const idp = fakeIdp(
      (_form, _call, signal) =>
        new Promise<Response>((_resolve, reject) => {
          signal?.addEventListener("abort", () => reject(new Error("aborted")));
        })
    );
    const exchanger = createTokenExchanger({
      cache: new MemoryExchangeCache(),
      client: client(idp.fetchImpl),
      policy: createExchangePolicy({
        attemptTimeoutMs: 20,
        retry: { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0 },
      }),
    });

    const err = await failure(exchanger.getToken(identity(), "competition-service"));
    expect(err).toBeInstanceOf(ExchangeError);
    expect(err instanceof ExchangeError ? [err.kind, err.status] : []).toEqual([
      "NetworkFailure",
      503,
    ]);
  });

  it("fails fast once the breaker opens", async () => {
    const clock = manualClock();
    const idp = fakeIdp(async () => new Response("down", { status: 500 }));
    const exchanger = createTokenExchanger({
      cache: new MemoryExchangeCache({ now: clock.now }),
      client: client(idp.fetchImpl, clock.now),
      policy: createExchangePolicy({
        retry: { maxRetries: 0, baseDelayMs: 0, maxDelayMs: 0 },
        circuitBreaker: {
          failureRatio: 0.5,
          minimumThroughput: 2,
          samplingDurationMs: 10_000,
          breakDurationMs: 30_000,
        },
        now: clock.now,
      }),
    });

    await expect(exchanger.getToken(identity(), "competition-service")).rejects.toBeInstanceOf(
      ExchangeError
    );
    await expect(exchanger.getToken(identity(), "competition-service")).rejects.toBeInstanceOf(
      ExchangeError
    );
    expect(idp.forms).toHaveLength(2);

    await expect(exchanger.getToken(identity(), "competition-service")).rejects.toBeInstanceOf(
      CircuitOpenError
    );
    expect(idp.forms).toHaveLength(2);

    clock.advance(30_000);
    await expect(exchanger.getToken(identity(), "competition-service")).rejects.toBeInstanceOf(
      ExchangeError
    );
    expect(idp.forms).toHaveLength(3);
  });
});
