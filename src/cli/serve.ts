import { resolveChatCompletionApi } from "../adapter/api/index.js";
import { loadConfig } from "../config/env.js";
import { errorMessage } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import { ChatService } from "../runtime/chat-service.js";
import { InMemorySessionStore } from "../runtime/session-store.js";
import { buildApp } from "../server/app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config);
  const chat = new ChatService({
    store: new InMemorySessionStore(),
    client: resolveChatCompletionApi(config, logger),
    model: config.openaiModel,
    logger,
  });

  const app = await buildApp({ chat, logger, corsOrigins: config.corsOrigins });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "shutting down");
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, "shutdown failed");
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await app.listen({ host: config.host, port: config.port });
  logger.info({ client: chat.clientKind, model: config.openaiModel, env: config.appEnv }, "server ready");
}

main().catch((error) => {
  process.stderr.write(`fatal> ${errorMessage(error)}\n`);
  process.exit(1);
});
