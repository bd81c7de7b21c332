// src/server.ts
import express from "express";
import cors from "cors";
import { env } from "./env";
import { createCommentsRouter, CommentsRouterOptions } from "./routes/comments";

export function createApp(options: CommentsRouterOptions = {}) {
  const app = express();

  /* ------------------------------------------------------
   * Core app setup
   * ---------------------------------------------------- */

  app.use(
    cors({
      origin: env.CORS_ORIGIN.includes("*") ? true : env.CORS_ORIGIN,
      exposedHeaders: ["Content-Disposition"],
    }),
  );

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true });
  });

  app.use(
    "/comments",
    createCommentsRouter({
      maxUploadBytes: env.MAX_UPLOAD_BYTES,
      defaultLocale: env.DEFAULT_LOCALE,
      ...options,
    }),
  );

  return app;
}

if (require.main === module) {
  const app = createApp();
  app.listen(env.PORT, () => {
    console.log(`[server] Listening on http://localhost:${env.PORT}`);
  });
}
