// packages/identity/src/express.d.ts

import type { InboundIdentity } from "@tapline/request-context";

declare module "express-serve-static-core" {
  interface Request {
    /**
     * Verified caller for this request. Set by the identity stage; the same
     * value lives on the GatewayContext.
     */
    identity?: InboundIdentity;
  }
}
