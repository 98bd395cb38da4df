import "fastify";
import type { AccessPolicy } from "../auth/access-policy.js";
import type { Identity } from "../auth/roles.js";
import type { TokenService } from "../auth/token-service.js";
import type { AppConfig } from "../config/env.js";
import type { AuthService } from "../services/auth-service.js";
import type { Stores } from "../stores/types.js";

declare module "fastify" {
  interface FastifyRequest {
    /** Set by the requireAuth hook on protected routes */
    identity: Identity | null;
  }

  interface FastifyInstance {
    config: AppConfig;
    stores: Stores;
    tokens: TokenService;
    accessPolicy: AccessPolicy;
    authService: AuthService;
    /** Whether the backing database answers */
    pingDb: () => Promise<boolean>;
  }
}
