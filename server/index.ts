import { buildApp } from "./app";
import { env } from "./config/env";

const start = async () => {
  const app = await buildApp({ env });

  try {
    await app.listen({ port: env.PORT, host: env.HOST });
    app.log.info(`[STARTUP] HTTP Server started on port ${env.PORT}`);
  } catch (err) {
    app.log.error(err, "[FATAL] Failed to start server");
    process.exit(1);
  }
};

start().catch((err: unknown) => {
  console.error("[FATAL] Failed to build server", err);
  process.exit(1);
});
