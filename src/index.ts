import { ChatHandler } from "./chat-handler.js";
import { loadConfig } from "./config.js";
import { HTTPServer } from "./http-server.js";
import { ImageCompressor } from "./image-compressor.js";
import { logger, setLogLevel } from "./logger.js";
import { OpenAIClient } from "./openai-client.js";

async function main(): Promise<void> {
  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);

    logger.info("Starting vision relay", {
      port: config.httpPort,
      model: config.provider.model,
      baseUrl: config.provider.baseUrl,
      maxPixels: config.image.maxPixels,
    });

    const chatHandler = new ChatHandler({
      systemPrompt: config.systemPrompt,
      compressor: new ImageCompressor(config.image),
      provider: new OpenAIClient(config.provider),
    });

    const httpServer = new HTTPServer(chatHandler, {
      port: config.httpPort,
      host: config.host,
      bodyLimit: config.bodyLimit,
    });
    await httpServer.start();

    const shutdown = (signal: NodeJS.Signals): void => {
      logger.info(`${signal} received, shutting down gracefully`);
      httpServer
        .stop()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error("Shutdown failed", error instanceof Error ? error : new Error(String(error)));
          process.exit(1);
        });
    };

    process.on("SIGTERM", shutdown);
    process.on("SIGINT", shutdown);

    logger.info("Vision relay is ready");
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(
      "Failed to start server",
      error instanceof Error ? error : new Error(errorMessage)
    );
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error("Server start error", error instanceof Error ? error : new Error(String(error)));
  process.exit(1);
});
