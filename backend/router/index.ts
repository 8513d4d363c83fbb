import { Router } from "express";
import { handleHealthCheck } from "backend/handlers/health-check";
import { createIntelRouter, type IntelRouterDeps } from "backend/apps/threat-intel/router";

export interface ApiRouterDeps extends IntelRouterDeps {
  dialect: string;
}

export function createApiRouter(deps: ApiRouterDeps): Router {
  const router = Router();

  // HEALTH CHECKS (unprotected)
  router.get("/health", handleHealthCheck(deps.storage, deps.dialect));

  router.use("/intel", createIntelRouter(deps));

  return router;
}
