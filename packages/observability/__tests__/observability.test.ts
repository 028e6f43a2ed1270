import { describe, it, expect, vi } from "vitest";
import express from "express";
import request from "supertest";
import { runWithGatewayContext, updateGatewayContext } from "@tapline/request-context";

import {
  correlationMiddleware,
  corsMiddleware,
  createLogger,
  healthRoutes,
  redactForLog,
  requestLoggingMiddleware,
  type LogEntry,
} from "../src/index.ts";

describe("createLogger", () => {
  it("writes one JSON line with service metadata", () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

    const logger = createLogger({
      serviceName: "test-service",
      environment: "test-env",
      component: "exchange",
    });
    logger.info("token_exchange.succeeded", { audience: "competition-service" });

    expect(logSpy).toHaveBeenCalledTimes(1);
    const [tag, line] = logSpy.mock.calls[0] ?? [];
    expect(tag).toBe("[exchange]");

    expect(JSON.parse(String(line))).toMatchObject({
      service: "test-service",
      environment: "test-env",
      level: "info",
      event: "token_exchange.succeeded",
      audience: "competition-service",
    });

    logSpy.mockRestore();
  });

  it("drops entries below the configured level", () => {
    const sink = vi.fn<(entry: LogEntry) => void>();
    const logger = createLogger({ level: "warn", sink });

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");

    expect(sink.mock.calls.map(([entry]) => entry.event)).toEqual(["c", "d"]);
  });

  it("stamps correlation id, tenant and subject from the request context", () => {
    const sink = vi.fn<(entry: LogEntry) => void>();
    const logger = createLogger({ sink });

    runWithGatewayContext({ request: { correlationId: "corr-9" } }, () => {
      updateGatewayContext({
        identity: {
          subject: "user-1",
          issuer: "https://idp.test",
          tenantId: "tenant-a",
          roles: [],
          scopes: [],
          expiresAt: 0,
          rawToken: "raw-token-value",
          claims: {},
        },
      });
      logger.info("stage.done");
    });

    const entry = sink.mock.calls[0]?.[0];
    expect(entry?.correlationId).toBe("corr-9");
    expect(entry?.tenantId).toBe("tenant-a");
    expect(entry?.subject).toBe("user-1");
    expect(JSON.stringify(entry)).not.toContain("raw-token-value");
  });

  it("keeps traffic flowing when the sink throws", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = createLogger({
      sink: () => {
        throw new Error("sink failure");
      },
    });

    expect(() => logger.error("x")).not.toThrow();
    expect(errorSpy).toHaveBeenCalledWith("[logger_error]", "sink failure");

    errorSpy.mockRestore();
  });
});

describe("redactForLog", () => {
  it("masks token and secret values at any depth", () => {
    expect(
      redactForLog({
        audience: "svc",
        subject_token: "s",
        nested: { client_secret: "c", rawToken: "r", Authorization: "Bearer x" },
        list: [{ access_token: "a" }],
      })
    ).toEqual({
      audience: "svc",
      subject_token: "[REDACTED]",
      nested: { client_secret: "[REDACTED]", rawToken: "[REDACTED]", Authorization: "[REDACTED]" },
      list: [{ access_token: "[REDACTED]" }],
    });
  });
});

describe("correlationMiddleware", () => {
  it("preserves an inbound correlation id on the response", async () => {
    const app = express();
    app.use(correlationMiddleware());
    app.get("/x", (_req, res) => res.json({ ok: true }));

    const res = await request(app).get("/x").set("X-Correlation-ID", "abc-123").expect(200);
    expect(res.headers["x-correlation-id"]).toBe("abc-123");
  });

  it("generates one when absent", async () => {
    const app = express();
    app.use(correlationMiddleware({ generate: () => "generated-1" }));
    app.get("/x", (_req, res) => res.json({ ok: true }));

    const res = await request(app).get("/x").expect(200);
    expect(res.headers["x-correlation-id"]).toBe("generated-1");
  });
});

describe("requestLoggingMiddleware", () => {
  it("emits a single gateway.request event with routing details", async () => {
    const sink = vi.fn<(entry: LogEntry) => void>();
    const logger = createLogger({ sink });

    const app = express();
    app.use(correlationMiddleware({ generate: () => "corr-1" }));
    app.use(requestLoggingMiddleware(logger));
    app.get("/api/competitions", (_req, res) => {
      updateGatewayContext({
        routing: { destinationId: "competition", audience: "competition-service", mode: "exchange" },
        exchange: { cacheHit: true },
      });
      res.status(201).json({ ok: true });
    });

    await request(app).get("/api/competitions?page=2").expect(201, { ok: true });

    expect(sink).toHaveBeenCalledTimes(1);
    const entry = sink.mock.calls[0]?.[0];
    expect(entry?.event).toBe("gateway.request");
    expect(entry?.correlationId).toBe("corr-1");
    expect(entry?.method).toBe("GET");
    expect(entry?.path).toBe("/api/competitions");
    expect(entry?.status).toBe(201);
    expect(entry?.destination).toBe("competition");
    expect(entry?.cacheHit).toBe(true);
    expect(typeof entry?.latencyMs).toBe("number");
  });
});

describe("healthRoutes", () => {
  it("answers liveness", async () => {
    const app = express();
    app.use(healthRoutes());
    await request(app).get("/health").expect(200, { status: "ok" });
  });
});

describe("corsMiddleware", () => {
  const build = () => {
    const app = express();
    app.use(corsMiddleware({ allowedOrigins: ["https://app.example.test"] }));
    app.get("/x", (_req, res) => res.json({ ok: true }));
    return app;
  };

  it("answers preflight for an allowed origin", async () => {
    const res = await request(build())
      .options("/x")
      .set("Origin", "https://app.example.test")
      .set("Access-Control-Request-Method", "POST")
      .expect(204);

    expect(res.headers["access-control-allow-origin"]).toBe("https://app.example.test");
    expect(res.headers["access-control-allow-credentials"]).toBe("true");
    expect(res.headers["access-control-expose-headers"]).toBe("X-Correlation-ID, X-Tenant-ID");
  });

  it("adds no CORS headers for other origins", async () => {
    const res = await request(build()).get("/x").set("Origin", "https://evil.test").expect(200);
    expect(res.headers["access-control-allow-origin"]).toBeUndefined();
  });
});
