import { Hono } from "hono";
import type { BackendName } from "../duplicates/types.ts";

interface HealthRouteDeps {
  backend: BackendName;
  repoModeEnabled: boolean;
}

export function createHealthRoutes(deps: HealthRouteDeps): Hono {
  const { backend, repoModeEnabled } = deps;
  const app = new Hono();

  // Liveness probe: the process is up and serving
  app.get("/healthz", (c) => c.json({ status: "ok" }));

  // Readiness probe: reports which similarity backend was selected at startup
  app.get("/readiness", (c) =>
    c.json({ status: "ready", backend, repoMode: repoModeEnabled }),
  );

  return app;
}
