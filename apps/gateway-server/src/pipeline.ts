// apps/gateway-server/src/pipeline.ts
import type { Request, RequestHandler, Response } from "express";
import type { AudienceResolution, AudienceResolver, RouteMatch, RouteTable } from "@tapline/audience-routing";
import { buildOutboundRequest, relayResponse, type Forwarder } from "@tapline/forwarding";
import {
  getGatewayContext,
  GatewayError,
  updateGatewayContext,
  type InboundIdentity,
  type StageOutcome,
} from "@tapline/request-context";
import type { TokenExchanger } from "@tapline/token-exchange";

/**
 * What earlier stages hand to later ones, for one request.
 */
export interface PipelineState {
  /** Aborted when the caller goes away. */
  signal: AbortSignal;
  match?: RouteMatch;
  resolution?: AudienceResolution;
  credential?: string;
}

export type Stage = (req: Request, res: Response, state: PipelineState) => Promise<StageOutcome>;

export class RouteNotFoundError extends GatewayError {
  constructor(path: string) {
    super("not_found", `no route for ${path}`, 404);
  }
}

class PipelineStateError extends GatewayError {
  constructor(stage: string, missing: string) {
    super("internal_error", `${stage} stage ran without ${missing}`, 500);
  }
}

/**
 * Run stages in order. A stage either continues, answers the request
 * ("handled"), or throws; errors go to the Express error handler.
 * Falls through to `next()` when every stage continues.
 */
export function composeStages(stages: readonly Stage[]): RequestHandler {
  return (req, res, next) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    const state: PipelineState = { signal: controller.signal };

    const run = async () => {
      for (const stage of stages) {
        if ((await stage(req, res, state)) === "handled") return;
      }
      next();
    };
    run().catch(next);
  };
}

/** Adapt an Express middleware into a stage; it must call next. */
export function middlewareStage(middleware: RequestHandler): Stage {
  return (req, res) =>
    new Promise<StageOutcome>((resolve, reject) => {
      middleware(req, res, (err?: unknown) => {
        if (err) reject(err);
        else resolve("continue");
      });
    });
}

export function routeStage(table: RouteTable): Stage {
  return async (req, _res, state) => {
    const match = table.match(req.path);
    if (!match) throw new RouteNotFoundError(req.path);

    state.match = match;
    updateGatewayContext({
      routing: { destinationId: match.route.id, target: match.route.target },
    });
    return "continue";
  };
}

export function resolveStage(resolver: AudienceResolver): Stage {
  return async (_req, _res, state) => {
    if (!state.match) throw new PipelineStateError("resolve", "a route");

    const resolution = resolver.resolve(state.match.route.id);
    state.resolution = resolution;
    updateGatewayContext({
      routing:
        resolution.kind === "exchange"
          ? { audience: resolution.audience, mode: "exchange" }
          : { mode: "passthrough" },
    });
    return "continue";
  };
}

function requireIdentity(req: Request, stage: string): InboundIdentity {
  const identity = req.identity ?? getGatewayContext()?.identity;
  if (!identity) throw new PipelineStateError(stage, "an identity");
  return identity;
}

export function exchangeStage(exchanger: TokenExchanger, now: () => number = Date.now): Stage {
  return async (req, _res, state) => {
    const identity = requireIdentity(req, "exchange");
    const resolution = state.resolution;
    if (!resolution) throw new PipelineStateError("exchange", "an audience resolution");

    if (resolution.kind === "passthrough") {
      state.credential = identity.rawToken;
      return "continue";
    }

    const started = now();
    const outcome = await exchanger.getToken(identity, resolution.audience, state.signal);
    state.credential = outcome.token;
    updateGatewayContext({ exchange: { cacheHit: outcome.cacheHit, latencyMs: now() - started } });
    return "continue";
  };
}

function searchOf(originalUrl: string): string {
  const q = originalUrl.indexOf("?");
  return q >= 0 ? originalUrl.slice(q) : "";
}

export function forwardStage(forwarder: Forwarder): Stage {
  return async (req, res, state) => {
    const identity = requireIdentity(req, "forward");
    const { match, credential } = state;
    if (!match || credential === undefined) {
      throw new PipelineStateError("forward", "a route and credential");
    }

    const correlationId = getGatewayContext()?.request.correlationId ?? "";
    const body: unknown = req.body;

    const outbound = buildOutboundRequest({
      target: match.route.target,
      path: match.upstreamPath,
      search: searchOf(req.originalUrl),
      method: req.method,
      headers: req.headers,
      body: Buffer.isBuffer(body) ? new Uint8Array(body) : undefined,
      credential,
      correlationId,
      subject: identity.subject,
      tenantId: identity.tenantId,
    });

    const upstream = await forwarder.forward(match.route.id, outbound, state.signal);
    relayResponse(res, upstream, correlationId);
    return "handled";
  };
}
