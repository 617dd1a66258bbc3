import express from "express";
import { env } from "../core/config";
import { logger } from "../core/logger";
import { sessionsRoutes } from "./routes/sessions.routes";
import { accountsRoutes } from "./routes/accounts.routes";

const app = express();

app.use(express.json());

app.get("/health", (_req, res) => {
  res.json({ status: "ok", timestamp: Math.floor(Date.now() / 1000) });
});

app.use("/api/sessions", sessionsRoutes);
app.use("/api/accounts", accountsRoutes);

app.use(
  (
    err: Error,
    _req: express.Request,
    res: express.Response,
    _next: express.NextFunction
  ) => {
    logger.error({ err: err.message, stack: err.stack }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" });
  }
);

export function startServer() {
  if (!env.API_ENABLED) {
    logger.warn("API_ENABLED is false, not starting server");
    return;
  }

  app.listen(env.API_PORT, env.API_HOST, () => {
    logger.info(`API server listening on http://${env.API_HOST}:${env.API_PORT}`);
  });
}

export { app };
