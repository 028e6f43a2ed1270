import { decodeJwt } from "jose";
import { z } from "zod";
import { createNoopLogger, type Logger } from "@tapline/observability";
import type { FetchLike } from "@tapline/request-context";
import { abortReason } from "@tapline/resilience";

import { ExchangeError } from "./errors";

export const TOKEN_EXCHANGE_GRANT = "urn:ietf:params:oauth:grant-type:token-exchange";
export const ACCESS_TOKEN_TYPE = "urn:ietf:params:oauth:token-type:access_token";

export interface ExchangedToken {
  accessToken: string;
  tokenType: string;
  /** Epoch milliseconds. */
  expiresAt: number;
  issuedTokenType?: string;
  scope?: string;
}

export interface TokenExchangeClientConfig {
  tokenEndpoint: string;
  clientId: string;
  clientSecret: string;
  subjectTokenType?: string;
  requestedTokenType?: string;
  fetchImpl?: FetchLike;
  logger?: Logger;
  now?: () => number;
}

export interface TokenExchangeClient {
  exchange(subjectToken: string, audience: string, signal?: AbortSignal): Promise<ExchangedToken>;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().positive().optional(),
  issued_token_type: z.string().optional(),
  scope: z.string().optional(),
});

const OAuthErrorSchema = z.object({ error: z.string() });

// The OAuth error code ("invalid_grant", ...) is safe to log; descriptions may echo input.
async function readOAuthError(res: Response): Promise<string | undefined> {
  try {
    const parsed = OAuthErrorSchema.safeParse(JSON.parse(await res.text()));
    return parsed.success ? parsed.data.error : undefined;
  } catch {
    return undefined;
  }
}

function lifetimeFromJwt(token: string): number | undefined {
  try {
    const { exp } = decodeJwt(token);
    return typeof exp === "number" ? exp * 1000 : undefined;
  } catch {
    // opaque token
    return undefined;
  }
}

/**
 * RFC 8693 token exchange against the identity provider's token endpoint.
 *
 * One call, no retries: the resilience policy wrapped around it decides
 * whether a NetworkFailure is attempted again.
 */
export function createTokenExchangeClient(config: TokenExchangeClientConfig): TokenExchangeClient {
  const fetchImpl: FetchLike = config.fetchImpl ?? ((input, init) => fetch(input, init));
  const logger = config.logger ?? createNoopLogger();
  const now = config.now ?? Date.now;
  const subjectTokenType = config.subjectTokenType ?? ACCESS_TOKEN_TYPE;
  const requestedTokenType = config.requestedTokenType ?? ACCESS_TOKEN_TYPE;

  return {
    async exchange(subjectToken, audience, signal) {
      if (!subjectToken || !audience) {
        throw new TypeError("subject token and audience are required");
      }

      const started = now();
      const body = new URLSearchParams({
        grant_type: TOKEN_EXCHANGE_GRANT,
        client_id: config.clientId,
        client_secret: config.clientSecret,
        subject_token: subjectToken,
        subject_token_type: subjectTokenType,
        requested_token_type: requestedTokenType,
        audience,
      });

      let res: Response;
      try {
        res = await fetchImpl(config.tokenEndpoint, {
          method: "POST",
          headers: {
            "content-type": "application/x-www-form-urlencoded",
            accept: "application/json",
          },
          body: body.toString(),
          signal,
        });
      } catch (err) {
        if (signal?.aborted) throw abortReason(signal, "token exchange");
        logger.warn("token_exchange.failed", {
          audience,
          outcome: "network_error",
          latencyMs: now() - started,
          detail: err instanceof Error ? err.message : String(err),
        });
        throw new ExchangeError("NetworkFailure", "token endpoint unreachable", { cause: err });
      }

      if (!res.ok) {
        const oauthError = await readOAuthError(res);
        const kind = res.status >= 500 ? "NetworkFailure" : "IdentityProviderRejected";
        logger.warn("token_exchange.failed", {
          audience,
          outcome: kind === "NetworkFailure" ? "idp_unavailable" : "rejected",
          status: res.status,
          oauthError,
          latencyMs: now() - started,
        });
        throw new ExchangeError(
          kind,
          `token endpoint returned ${res.status}${oauthError ? ` (${oauthError})` : ""}`,
          { upstreamStatus: res.status }
        );
      }

      let json: unknown;
      try {
        json = await res.json();
      } catch (err) {
        logger.warn("token_exchange.failed", { audience, outcome: "malformed", status: res.status });
        throw new ExchangeError("MalformedResponse", "token endpoint returned invalid JSON", {
          upstreamStatus: res.status,
          cause: err,
        });
      }

      const parsed = TokenResponseSchema.safeParse(json);
      if (!parsed.success) {
        logger.warn("token_exchange.failed", { audience, outcome: "malformed", status: res.status });
        throw new ExchangeError("MalformedResponse", "token response is missing access_token", {
          upstreamStatus: res.status,
        });
      }

      const data = parsed.data;
      const expiresAt =
        data.expires_in !== undefined
          ? now() + data.expires_in * 1000
          : lifetimeFromJwt(data.access_token);

      if (expiresAt === undefined) {
        logger.warn("token_exchange.failed", { audience, outcome: "malformed", status: res.status });
        throw new ExchangeError("MalformedResponse", "token response carries no lifetime", {
          upstreamStatus: res.status,
        });
      }

      logger.info("token_exchange.succeeded", {
        audience,
        status: res.status,
        latencyMs: now() - started,
        expiresInSec: Math.round((expiresAt - now()) / 1000),
      });

      return {
        accessToken: data.access_token,
        tokenType: data.token_type ?? "Bearer",
        expiresAt,
        issuedTokenType: data.issued_token_type,
        scope: data.scope,
      };
    },
  };
}
