import express from "express";
import { getEnv } from "./config/env";
import { addSecurityHeaders } from "./middleware/security";
import { registerRoutes } from "./routes";
import { createDraftingServices } from "./services";
import { logError, logInfo } from "./utils/logger";

function main(): void {
  const env = getEnv();
  const app = express();

  app.use(addSecurityHeaders);
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      if (req.path.startsWith("/api")) {
        logInfo(`${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
      }
    });
    next();
  });

  const services = createDraftingServices(env);
  const server = registerRoutes(app, services, env.APP_PASSWORD);

  server.listen(env.PORT, () => {
    logInfo(`[Server] Serving on port ${env.PORT}`, { profile: services.profile.id });
  });
}

try {
  main();
} catch (error) {
  logError("[Server] Startup failed", { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
}
