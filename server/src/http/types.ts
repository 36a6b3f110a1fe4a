/**
 * Hono environment shared by the collector's routes and middleware.
 */

import type { HttpBindings } from "@hono/node-server";
import type { ILogger } from "@wattlog/shared/logging";
import type { AuthAdmission } from "../auth/auth-gate.js";

export type AppEnv = {
  Bindings: HttpBindings;
  Variables: {
    /** Request-scoped logger carrying the correlation id */
    log: ILogger;
    requestId: string;
    /** Set by the device auth middleware on admitted requests */
    auth: AuthAdmission;
  };
};
