#!/usr/bin/env node
/**
 * Terminal chat
 *
 * Talk to the classroom finder agent from a shell, against a real
 * classroom backend, without the HTTP server.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as readline from 'node:readline';
import { Agent } from './agent/agent.js';
import { createLLMProviderAsync, getAvailableProviders, getDefaultModelId } from './agent/llm-provider.js';
import { LLMProviderSchema, loadConfig } from './config.js';
import { ClassroomApiClient } from './tools/classroom-client.js';
import { createClassroomTools } from './tools/classroom-tools.js';
import { StructuredLogger } from './observability/logger.js';
import { parseReplInput } from './repl.js';

interface ChatOptions {
  provider?: string;
  model?: string;
  backendUrl?: string;
  token?: string;
  verbose?: boolean;
}

const program = new Command();

program
  .name('classroom-chat')
  .description('Chat with the classroom finder agent from the terminal')
  .version('1.0.0');

program
  .command('chat', { isDefault: true })
  .description('Start an interactive chat session')
  .option('-p, --provider <provider>', 'LLM provider (openrouter, anthropic or openai)')
  .option('-m, --model <model>', 'Model ID to use')
  .option('-b, --backend-url <url>', 'Classroom API base URL (default: CLASSROOM_API_URL)')
  .option('-t, --token <token>', 'Authorization header value forwarded to the classroom API')
  .option('-v, --verbose', 'Show tool calls and tool results')
  .action(async (options: ChatOptions) => {
    await runChat(options);
  });

program
  .command('info')
  .description('Show available providers and configuration')
  .action(() => {
    showInfo();
  });

async function runChat(options: ChatOptions): Promise<void> {
  const config = loadConfig();

  const providerResult = LLMProviderSchema.safeParse(options.provider ?? config.llm.provider);
  if (!providerResult.success) {
    console.error(chalk.red(`Unknown provider: ${options.provider}`));
    process.exit(1);
  }
  const provider = providerResult.data;
  const modelId = options.model || config.llm.model || getDefaultModelId(provider);
  const backendUrl = options.backendUrl || config.backendUrl;
  const verbose = options.verbose ?? false;

  const logger = new StructuredLogger({
    name: 'classroom-chat',
    minLevel: verbose ? 'debug' : 'warning',
  });

  let agent: Agent;
  try {
    const model = await createLLMProviderAsync({
      provider,
      model: modelId,
      apiKey: provider === config.llm.provider ? config.llm.apiKey : undefined,
    });
    const client = new ClassroomApiClient({ baseUrl: backendUrl, logger: logger.child('classroom-api') });
    const tools = createClassroomTools(client, {
      authorization: options.token,
      logger: logger.child('tools'),
    });
    agent = new Agent(tools, model, { maxSteps: config.maxSteps, logger: logger.child('agent') });
  } catch (error) {
    console.error(chalk.red(`Failed to start: ${error instanceof Error ? error.message : error}`));
    process.exit(1);
  }

  console.log(chalk.blue(`Provider: ${provider}  Model: ${modelId}`));
  console.log(chalk.blue(`Classroom API: ${backendUrl}`));
  console.log(chalk.yellow('\nType your messages, or:'));
  console.log(chalk.gray('  /clear        - Clear conversation history'));
  console.log(chalk.gray('  quit | exit   - End the session'));
  console.log();

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const prompt = (): void => {
    rl.question(chalk.cyan('User: '), (line) => {
      void handleLine(line);
    });
  };

  const handleLine = async (line: string): Promise<void> => {
    const input = parseReplInput(line);

    switch (input.kind) {
      case 'empty':
        prompt();
        return;
      case 'quit':
        console.log(chalk.yellow('Ending chat session.'));
        rl.close();
        return;
      case 'clear':
        agent.clearHistory();
        console.log(chalk.yellow('Conversation history cleared.'));
        prompt();
        return;
      case 'message':
        break;
    }

    try {
      const result = await agent.chat(input.text);

      if (verbose) {
        for (const step of result.steps) {
          if (step.type === 'tool_call') {
            console.log(chalk.magenta(`[Tool Call] ${step.toolName}`));
            console.log(chalk.gray(JSON.stringify(step.toolArgs, null, 2)));
          } else if (step.type === 'tool_result') {
            console.log(chalk.magenta(`[Tool Result] ${step.toolName}`));
            console.log(chalk.gray(step.content.substring(0, 300)));
          }
        }
      }

      console.log(chalk.green(`\nAgent: ${result.text}\n`));

      if (verbose && result.usage) {
        console.log(chalk.gray(`Tokens: ${result.usage.totalTokens} (prompt: ${result.usage.promptTokens}, completion: ${result.usage.completionTokens})`));
      }
    } catch (error) {
      console.error(chalk.red(`\nError: ${error instanceof Error ? error.message : error}\n`));
    }

    prompt();
  };

  prompt();
}

function showInfo(): void {
  const providers = getAvailableProviders();

  console.log(chalk.blue('\nClassroom Chat Information\n'));

  console.log(chalk.white('Providers:'));
  for (const provider of LLMProviderSchema.options) {
    const status = providers[provider] ? 'available' : 'no API key in environment';
    console.log(chalk.green(`  ${provider}: ${status} (default model ${getDefaultModelId(provider)})`));
  }

  console.log(chalk.white('\nEnvironment Variables:'));
  console.log(chalk.gray('  CLASSROOM_API_URL  - Classroom API base URL'));
  console.log(chalk.gray('  LLM_PROVIDER       - openrouter, anthropic or openai'));
  console.log(chalk.gray('  LLM_MODEL          - Model ID'));
  console.log(chalk.gray('  LLM_API_KEY        - Key for the selected provider'));

  console.log(chalk.white('\nExample:'));
  console.log(chalk.cyan('  classroom-chat chat --provider anthropic --backend-url http://localhost:3001 -v'));
  console.log();
}

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`Error: ${error instanceof Error ? error.message : error}`));
  process.exit(1);
});
