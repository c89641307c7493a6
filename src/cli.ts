#!/usr/bin/env node
/**
 * debate-arena command line
 *
 * `run` collects the configuration from flags, runs one debate and writes
 * the JSON and Markdown reports; `personas` lists the catalogue. Ctrl-C
 * requests cancellation, honored at the next turn boundary.
 */

import { Command, InvalidArgumentError } from 'commander';
import { v4 as uuidv4 } from 'uuid';
import { hasProviderCredentials, loadLLMConfig } from './config/llm.js';
import { loadPackageInfo } from './config/package-info.js';
import { listPersonas } from './config/personas.js';
import type { TurnFailurePolicy } from './types/debate.js';
import { ConfigurationError } from './types/errors.js';
import { runDebate } from './services/debate/index.js';
import { writeReport } from './services/export/index.js';
import { LLMClient } from './services/llm/index.js';
import { logShutdown, logStartup, loggers } from './services/logging/index.js';
import { LoggingSink } from './services/transcript/index.js';

const DEFAULT_PARTICIPANTS = 'scientist,philosopher';
const DEFAULT_ROUNDS = 3;
const DEFAULT_OUTPUT_DIR = 'debate_logs';

interface RunCommandOptions {
  topic: string;
  participants: string[];
  rounds: number;
  policy: TurnFailurePolicy;
  output: string;
  mock: boolean;
  write: boolean;
}

function parseParticipants(value: string): string[] {
  const ids = value
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
  if (ids.length === 0) {
    throw new InvalidArgumentError('Provide at least one participant id.');
  }
  return ids;
}

function parseRounds(value: string): number {
  const rounds = Number(value);
  if (!Number.isInteger(rounds) || rounds <= 0) {
    throw new InvalidArgumentError('Rounds must be a positive integer.');
  }
  return rounds;
}

function parsePolicy(value: string): TurnFailurePolicy {
  if (value !== 'skip' && value !== 'abort') {
    throw new InvalidArgumentError("Policy must be 'skip' or 'abort'.");
  }
  return value;
}

async function runCommand(options: RunCommandOptions): Promise<void> {
  logStartup('run');

  const controller = new AbortController();
  const onSigint = () => {
    logShutdown('SIGINT');
    console.error('\nCancelling after the current turn...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    let generator: LLMClient | undefined;
    if (!options.mock) {
      const llmConfig = loadLLMConfig();
      if (!hasProviderCredentials(llmConfig)) {
        throw new ConfigurationError(
          `No API key configured for provider '${llmConfig.provider}'. Set it in .env or use --mock.`,
          [`${llmConfig.provider === 'openai' ? 'OPENAI_API_KEY' : 'ANTHROPIC_API_KEY'}: missing`]
        );
      }
      generator = new LLMClient(llmConfig);
    }

    const debateId = uuidv4();
    const result = await runDebate({
      debateId,
      config: {
        topic: options.topic,
        participants: options.participants,
        maxRounds: options.rounds,
        turnFailurePolicy: options.policy,
      },
      generator,
      mock: options.mock,
      sinks: [new LoggingSink(debateId)],
      signal: controller.signal,
    });

    const { verdict, diagnostics } = result;
    console.log(`\nDebate ${result.debateId}: ${result.phase} (${verdict.outcome})`);
    console.log(`Winner: ${verdict.winnerAgentId ?? 'none'}`);
    for (const [id, score] of Object.entries(verdict.perAgentScores)) {
      console.log(`  ${id}: ${score}`);
    }
    console.log(
      `Accepted turns: ${diagnostics.acceptedTurns}, rejected attempts: ${diagnostics.rejectedAttempts}, ` +
        `failed turns: ${diagnostics.turnFailures}`
    );
    if (verdict.rationale) {
      console.log(`\n${verdict.rationale}`);
    }
    if (generator) {
      const usage = generator.getUsage();
      console.log(`Tokens: ${usage.totalTokens} (${usage.promptTokens} prompt, ${usage.completionTokens} completion)`);
    }

    if (options.write) {
      const written = await writeReport(result.snapshot, options.output);
      console.log(`\nReport: ${written.jsonPath}`);
      console.log(`Markdown: ${written.markdownPath}`);
    }
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

function personasCommand(): void {
  for (const persona of listPersonas()) {
    console.log(`${persona.id.padEnd(12)} ${persona.name} (${persona.persona})`);
    console.log(`${''.padEnd(12)} ${persona.description}`);
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('debate-arena')
    .description('Run multi-agent debates between expert personas with a judged verdict')
    .version(loadPackageInfo().version);

  program
    .command('run')
    .description('Run one debate and write its report')
    .requiredOption('-t, --topic <topic>', 'Debate topic')
    .option('-p, --participants <ids>', 'Comma-separated persona ids', parseParticipants, parseParticipants(DEFAULT_PARTICIPANTS))
    .option('-r, --rounds <number>', `Number of rounds (default ${DEFAULT_ROUNDS})`, parseRounds, DEFAULT_ROUNDS)
    .option('--policy <policy>', 'Turn failure policy: skip or abort', parsePolicy, 'skip')
    .option('-o, --output <dir>', 'Directory for report files', DEFAULT_OUTPUT_DIR)
    .option('--mock', 'Use offline agents and judge', false)
    .option('--no-write', 'Do not write report files')
    .action(async (options: RunCommandOptions) => {
      await runCommand(options);
    });

  program
    .command('personas')
    .description('List the available personas')
    .action(() => {
      personasCommand();
    });

  return program;
}

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
      process.exitCode = 2;
      return;
    }
    loggers.error('Command failed', error);
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
