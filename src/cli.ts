#!/usr/bin/env node
/**
 * Classroom agent service
 * Starts the chat server with configuration from environment variables
 */

import { loadConfig } from './config.js';
import { createLLMProviderAsync } from './agent/llm-provider.js';
import { ClassroomAgentServer } from './server.js';
import { StructuredLogger, serializeError } from './observability/logger.js';

async function main(): Promise<void> {
  const logger = new StructuredLogger({ name: 'classroom-agent' });

  try {
    const config = loadConfig();
    const model = await createLLMProviderAsync(config.llm);
    const server = new ClassroomAgentServer({
      config,
      model,
      logger: new StructuredLogger({ name: 'classroom-agent', minLevel: config.logLevel }),
    });

    await server.start();
  } catch (error) {
    logger.critical('Failed to start classroom agent', { error: serializeError(error) });
    process.exit(1);
  }
}

void main();
