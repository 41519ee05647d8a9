#!/usr/bin/env node

import { Command } from 'commander';
import { pino } from 'pino';
import { loadConfig, resetConfig } from './config/index.js';
import { resolveDefinitionPaths } from './config/paths.js';
import { loadReplayBatch } from './executors/replay-file.js';
import { ActivityTracker } from './observer/activity-tracker.js';
import { renderSessionReport } from './observer/session-report.js';
import { createOrchestrator } from './orchestrator.js';
import { PolicyEnforcer } from './policy/enforcer.js';
import { loadProfileStore } from './profiles/store.js';
import { loadToolRegistry } from './tools/registry.js';
import { describeOutcome } from './aggregate/aggregator.js';
import { createLogger } from './utils/logger.js';
import { errorMessage } from './utils/error-message.js';

const VERSION = '0.1.0';

const program = new Command();

program
  .name('agent-council')
  .description('Run capability-restricted subagents and combine their signals')
  .version(VERSION);

function loadDefinitions() {
  resetConfig();
  const config = loadConfig();
  const { toolsPath, profilesPath } = resolveDefinitionPaths(config.definitions);
  const registry = loadToolRegistry(toolsPath);
  const profiles = loadProfileStore(profilesPath, registry);
  return { config, registry, profiles };
}

// Profiles command - list loaded agent profiles
program
  .command('profiles')
  .description('Validate and list agent profiles')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }) => {
    try {
      const { registry, profiles } = loadDefinitions();
      const enforcer = new PolicyEnforcer(registry);

      const rows = profiles.list().map((profile) => ({
        name: profile.name,
        usableTools: enforcer.usableTools(profile).map((t) => t.name),
        deniedCapabilities: [...profile.deniedCapabilities],
        maxDurationMs: profile.maxDurationMs,
        maxContextTokens: profile.maxContextTokens,
        required: profile.outputSchema.required,
      }));

      if (options.json) {
        console.log(JSON.stringify(rows, null, 2));
        return;
      }

      console.log(`${registry.size} tools, ${rows.length} profiles\n`);
      for (const row of rows) {
        console.log(`${row.name}`);
        console.log(`  tools: ${row.usableTools.length} usable`);
        console.log(`  denied: ${row.deniedCapabilities.join(', ') || '(none)'}`);
        console.log(`  limits: ${row.maxDurationMs}ms, ${row.maxContextTokens} tokens`);
        console.log(`  result keys: ${row.required.join(', ')}`);
      }
    } catch (error) {
      console.error('Profile validation failed:', errorMessage(error));
      process.exit(1);
    }
  });

// Authorize command - check one tool call against a profile
program
  .command('authorize <agent> <tool>')
  .description('Check whether an agent may call a tool')
  .action((agent: string, tool: string) => {
    try {
      const { registry, profiles } = loadDefinitions();
      const decision = new PolicyEnforcer(registry).authorize(profiles.getProfile(agent), tool);
      if (decision.allowed) {
        console.log(`ALLOW ${decision.toolName} (${decision.capability})`);
      } else {
        console.log(`DENY ${decision.toolName}: ${decision.reason}`);
        process.exitCode = 2;
      }
    } catch (error) {
      console.error('Authorization check failed:', errorMessage(error));
      process.exit(1);
    }
  });

// Replay command - run a recorded batch through the engine
program
  .command('replay <file>')
  .description('Run a recorded batch and print the composite signal')
  .option('-c, --concurrency <n>', 'Concurrency limit', (v) => parseInt(v, 10))
  .option('-d, --deadline <ms>', 'Batch deadline in milliseconds', (v) => parseInt(v, 10))
  .option('-r, --report', 'Print a markdown session report')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (file: string, options: { concurrency?: number; deadline?: number; report?: boolean; verbose?: boolean }) => {
    try {
      resetConfig();
      const config = loadConfig();
      const logger = options.verbose ? createLogger({ level: 'debug' }) : pino({ level: 'silent' });

      const batch = loadReplayBatch(file);
      const orchestrator = createOrchestrator({
        config,
        logger,
        agentExecutor: batch.executor,
        toolProvider: batch.toolProvider,
      });

      const tracker = new ActivityTracker();
      const { signal, outcomes } = await orchestrator.submitBatch(batch.requests, {
        concurrencyLimit: options.concurrency ?? batch.concurrencyLimit,
        batchDeadlineMs: options.deadline ?? batch.batchDeadlineMs,
        observer: tracker,
      });

      if (options.report) {
        console.log(renderSessionReport(tracker, signal));
        return;
      }

      for (const outcome of outcomes) {
        console.log(`${outcome.agentName.padEnd(22)} ${outcome.status.padEnd(17)} ${describeOutcome(outcome)}`);
      }
      console.log('');
      console.log(`Final sentiment: ${signal.finalSentiment}`);
      console.log(`Confidence:      ${signal.aggregateConfidence.toFixed(3)}`);
    } catch (error) {
      console.error('Replay failed:', errorMessage(error));
      process.exit(1);
    }
  });

program.parse();
