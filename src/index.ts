import 'express-async-errors';
import { Server } from 'http';
import { createApp } from './app';
import { env, resolveProjectPath } from './config/env';
import { loadGuardrails } from './config/guardrails';
import { initializeLangChain } from './config/langchain';
import { logger } from './config/logger';
import { Assistant, buildAssistant } from './services/assistant';
import { BankDataStore } from './services/bankData';
import { FlowStore } from './services/flowStore';

function createAssistantFromEnv(): Assistant {
  const dataDir = resolveProjectPath(env.DATA_DIR);

  return buildAssistant({
    model: initializeLangChain(),
    rules: loadGuardrails(resolveProjectPath(env.GUARDRAILS_CONFIG_PATH)),
    bankData: BankDataStore.fromDirectory(dataDir),
    flows: FlowStore.fromFile(resolveProjectPath(`${env.DATA_DIR}/flows.json`)),
    demoUserId: env.DEMO_USER_ID,
    offTopicBlocking: env.OFF_TOPIC_BLOCKING,
    guardianEnabled: env.GUARDIAN_ENABLED,
    riskGateEnabled: env.RISK_GATE_ENABLED,
    llmTimeoutMs: env.LLM_TIMEOUT_MS,
    session: {
      maxMessages: env.SESSION_MAX_MESSAGES,
      idleTimeoutMs: env.SESSION_IDLE_TIMEOUT_MS,
      cleanupIntervalMs: env.SESSION_CLEANUP_INTERVAL_MS
    },
    rateLimit: {
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      max: env.RATE_LIMIT_MAX
    }
  });
}

function gracefulShutdown(signal: string, server: Server, assistant: Assistant) {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  server.close(error => {
    assistant.shutdown();

    if (error) {
      logger.error('Error during graceful shutdown', { error: error.message });
      process.exit(1);
    }

    logger.info('Graceful shutdown completed');
    process.exit(0);
  });
}

function startServer(): Server {
  try {
    const assistant = createAssistantFromEnv();
    const app = createApp(assistant);

    const server = app.listen(env.PORT, env.HOST, () => {
      logger.info(`Server is running on port ${env.PORT} in ${env.NODE_ENV} mode`);
      logger.info(`Health check available at http://localhost:${env.PORT}/api/health`);
    });

    process.on('SIGTERM', () => gracefulShutdown('SIGTERM', server, assistant));
    process.on('SIGINT', () => gracefulShutdown('SIGINT', server, assistant));

    return server;
  } catch (error) {
    logger.error('Failed to start server', {
      error: error instanceof Error ? error.message : String(error)
    });
    process.exit(1);
  }
}

if (require.main === module) {
  startServer();
}

export { startServer, createAssistantFromEnv };
