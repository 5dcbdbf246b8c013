import { loadConfig } from "../config/loader.js";
import { ensureDir, getStateDir } from "../config/paths.js";
import type { DatawiseConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { StateDB } from "../store/db.js";
import { SqliteHistoryStore } from "../store/history-store.js";
import { createInferenceClient, type InferenceClient } from "../inference/client.js";
import { ChatService } from "../conversation/service.js";
import { DatasetPipeline } from "../cleaning/pipeline.js";
import { BotRouter } from "../bot/router.js";
import { TelegramAdapter } from "../channels/telegram/index.js";
import type { ChannelAdapter } from "../channels/adapter.js";

const BYTES_PER_MB = 1024 * 1024;

export interface AppContext {
  config: DatawiseConfig;
  logger: Logger;
  db: StateDB;
  inference: InferenceClient;
  chat: ChatService;
  pipeline: DatasetPipeline;
  router: BotRouter;
  channel: ChannelAdapter;
  abortController: AbortController;
}

export async function startApp(configPath?: string): Promise<AppContext> {
  // 1. Load config
  const config = loadConfig(configPath);

  // 2. Create logger
  const logger = createLogger(config.logging);
  logger.info("Starting Datawise...");

  const token = config.telegram.token;
  if (!token) {
    throw new Error("telegram.token is not configured");
  }

  // 3. Ensure state directory and open the database
  const stateDir = ensureDir(getStateDir());
  const db = new StateDB(stateDir);
  const store = new SqliteHistoryStore(db, logger);
  logger.info({ stateDir }, "State database opened");

  // 4. Inference, chat and cleaning services
  const inference = createInferenceClient(config.ollama, config.cleaning.model, logger);
  const chat = new ChatService({ store, generator: inference, config: config.chat, logger });
  const pipeline = new DatasetPipeline({
    config: config.cleaning,
    generator: inference,
    maxBytes: config.telegram.maxFileSizeMb * BYTES_PER_MB,
    logger,
  });

  logger.info(
    {
      maxFileSizeMb: config.telegram.maxFileSizeMb,
      allowedExtensions: config.telegram.allowedExtensions,
    },
    "Upload limits",
  );
  const available = await inference.isAvailable();
  logger.info({ available, transport: inference.getPreferredTransport() }, "Ollama status");
  if (available && !(await chat.checkModelAvailability())) {
    logger.warn({ model: config.chat.model }, "Chat model did not answer; chat replies may fail");
  }

  // 5. Channel and router
  const channel = new TelegramAdapter(token, logger);
  const router = new BotRouter({
    channel,
    chat,
    pipeline,
    status: inference,
    config: config.telegram,
    logger,
  });

  const abortController = new AbortController();
  await channel.start((msg) => router.handle(msg), abortController.signal);
  logger.info("Bot is polling for messages...");

  // 6. Graceful shutdown (use 'once' to avoid handler accumulation)
  let shutdownInProgress = false;
  const shutdown = async (): Promise<void> => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutdown signal received, closing bot...");
    try {
      await channel.stop();
    } catch (err) {
      logger.error({ err }, "Error stopping channel");
    }
    abortController.abort();
    db.close();
    logger.info("Datawise stopped");
  };

  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exitCode = 1;
    });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  return { config, logger, db, inference, chat, pipeline, router, channel, abortController };
}
