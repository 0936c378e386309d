#!/usr/bin/env node
/**
 * Knowledge Router CLI
 * Command-line interface for classification, consolidation and review
 */

import { Command } from 'commander';

import { loadConfig } from '../core/config.js';
import { isKnowledgeRouterError } from '../core/errors.js';
import { createKnowledgeService, type KnowledgeService } from '../services/knowledge-service.js';
import { startServer, stopServer } from '../server/index.js';

interface GlobalOptions {
  config?: string;
}

const program = new Command();

program
  .name('knowledge-router')
  .description('Route tasks to knowledge domains and consolidate what agents learn')
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to a JSON configuration file');

function openService(): KnowledgeService {
  const { config } = program.opts<GlobalOptions>();
  return createKnowledgeService(loadConfig(config));
}

function fail(label: string, error: unknown): never {
  if (isKnowledgeRouterError(error)) {
    console.error(`${label} failed [${error.code}]: ${error.message}`);
  } else {
    console.error(`${label} failed:`, error);
  }
  process.exit(1);
}

/**
 * Run a command against a fresh service and always shut it down
 */
async function withService(label: string, fn: (service: KnowledgeService) => Promise<void>): Promise<void> {
  let service: KnowledgeService;
  try {
    service = openService();
  } catch (error) {
    fail(label, error);
  }

  try {
    await fn(service);
  } catch (error) {
    await service.shutdown();
    fail(label, error);
  }
  await service.shutdown();
}

/**
 * Serve command
 */
program
  .command('serve')
  .description('Start the HTTP API and the nightly consolidation scheduler')
  .option('-p, --port <number>', 'Port to listen on')
  .option('-H, --host <host>', 'Interface to bind')
  .option('--no-scheduler', 'Do not run consolidation on a timer')
  .action(async (options: { port?: string; host?: string; scheduler: boolean }) => {
    try {
      const { config: configPath } = program.opts<GlobalOptions>();
      const config = loadConfig(configPath);
      const service = createKnowledgeService(config);
      await service.initialize();

      startServer(service, {
        host: options.host ?? config.server.host,
        port: options.port ? parseInt(options.port, 10) : config.server.port
      });

      if (options.scheduler) {
        service.startScheduler((summary) => {
          console.log(`[Scheduler] run ${summary.runId}: ${summary.unitsCreated} created, ${summary.unitsUpdated} updated`);
        });
      }

      const shutdown = async (): Promise<void> => {
        await stopServer();
        await service.shutdown();
        process.exit(0);
      };
      process.once('SIGINT', () => void shutdown());
      process.once('SIGTERM', () => void shutdown());
    } catch (error) {
      fail('Serve', error);
    }
  });

/**
 * Classify command
 */
program
  .command('classify <text...>')
  .description('Score a task against every domain and show its disposition')
  .option('-t, --task-id <id>', 'Task identifier', 'cli-task')
  .option('--priority <level>', 'Task priority (low, medium, high, critical)')
  .option('--category <name>', 'Task category hint')
  .action(async (words: string[], options: { taskId: string; priority?: string; category?: string }) => {
    await withService('Classify', async (service) => {
      const context: Record<string, unknown> = {};
      if (options.priority) context.priority = options.priority;
      if (options.category) context.category = options.category;

      const outcome = service.classify({ id: options.taskId, text: words.join(' '), context });

      console.log('\n🧭 Classification\n');
      for (const score of outcome.scores) {
        const bar = '█'.repeat(Math.round(score.normalizedScore / 5));
        console.log(`  ${score.domainId.padEnd(16)} ${bar} ${score.normalizedScore.toFixed(1)}`);
      }
      console.log('');
      console.log(`Recommended: ${outcome.recommendedDomainId}`);
      console.log(`Confidence:  ${outcome.confidence.toFixed(2)}`);
      console.log(`Disposition: ${outcome.disposition.action} → ${outcome.disposition.domainId}`);
    });
  });

/**
 * Log command - append an activity entry
 */
program
  .command('log <domain> <taskId> <action> [result]')
  .description('Append an entry to the activity log')
  .action(async (domain: string, taskId: string, action: string, result: string | undefined) => {
    await withService('Log', async (service) => {
      const entry = await service.logActivity({
        domainId: domain,
        taskId,
        actionText: action,
        resultText: result ?? ''
      });
      console.log(`📝 Logged ${entry.id} (${entry.domainId}/${entry.taskId})`);
    });
  });

/**
 * Consolidate command
 */
program
  .command('consolidate')
  .description('Consolidate the activity log into knowledge units')
  .option('--since <iso>', 'Window start (inclusive)')
  .option('--until <iso>', 'Window end (exclusive)')
  .action(async (options: { since?: string; until?: string }) => {
    await withService('Consolidate', async (service) => {
      const summary = await service.consolidate({
        since: options.since ? new Date(options.since) : undefined,
        until: options.until ? new Date(options.until) : undefined
      });

      console.log('\n🌙 Consolidation Complete\n');
      console.log(`Window: ${summary.since.toISOString()} → ${summary.until.toISOString()}`);
      console.log(`Entries processed: ${summary.entriesProcessed}`);
      console.log(`Units created: ${summary.unitsCreated}`);
      console.log(`Units updated: ${summary.unitsUpdated}`);
      console.log(`Units unchanged: ${summary.unitsUnchanged}`);
      console.log(`Domains touched: ${summary.domainsTouched.join(', ') || '-'}`);

      if (summary.reinforcedSignals.length > 0) {
        console.log('\nReinforced signals:');
        for (const signal of summary.reinforcedSignals) {
          console.log(`  ${signal.domainId}/${signal.taskId} ×${signal.count}`);
        }
      }
    });
  });

/**
 * Approvals command
 */
program
  .command('approvals')
  .description('List knowledge units awaiting review')
  .option('-d, --domain <id>', 'Only units in this domain')
  .action(async (options: { domain?: string }) => {
    await withService('Approvals', async (service) => {
      const units = await service.listFlagged(options.domain);

      console.log('\n📋 Pending Approvals\n');
      console.log(`Found ${units.length} unit(s)\n`);

      for (const unit of units) {
        console.log(`🔖 ${unit.id}`);
        console.log(`   ${unit.domainId}/${unit.taskId} v${unit.version}`);
        console.log(`   Updated: ${unit.updatedAt.toISOString()}`);
        console.log(`   ${unit.content.slice(0, 150)}${unit.content.length > 150 ? '...' : ''}`);
        console.log('');
      }
    });
  });

/**
 * Decide command
 */
program
  .command('decide <unitId> <decision>')
  .description('Approve or reject a flagged unit')
  .option('-r, --reviewer <name>', 'Who made the decision')
  .action(async (unitId: string, decision: string, options: { reviewer?: string }) => {
    await withService('Decide', async (service) => {
      const record = await service.decide(unitId, decision, options.reviewer);
      console.log(`✅ ${record.unitId} v${record.unitVersion} ${record.decision}`);
    });
  });

/**
 * Digest command
 */
program
  .command('digest')
  .description('Daily digest of consolidation and review activity')
  .option('--date <yyyy-mm-dd>', 'UTC date, defaults to today')
  .action(async (options: { date?: string }) => {
    await withService('Digest', async (service) => {
      const digest = await service.digest(options.date);

      console.log(`\n📰 Digest for ${digest.date}\n`);
      console.log(`Domains touched: ${digest.domainsTouched.join(', ') || '-'}`);
      console.log(`Units created: ${digest.unitsCreated}`);
      console.log(`Pending review: ${digest.unitsFlaggedPending}`);
      console.log(`Approved: ${digest.approvedToday}`);
      console.log(`Rejected: ${digest.rejectedToday}`);
    });
  });

/**
 * Stats command
 */
program
  .command('stats')
  .description('View knowledge statistics')
  .action(async () => {
    await withService('Stats', async (service) => {
      const stats = await service.stats();

      console.log('\n📊 Knowledge Statistics\n');
      console.log(`Pending approvals: ${stats.pendingApprovals}`);
      console.log('\nUnits by domain:');
      for (const [domainId, count] of Object.entries(stats.unitsByDomain)) {
        const bar = '█'.repeat(Math.min(20, Math.ceil(count / 5)));
        console.log(`  ${domainId}: ${bar} ${count}`);
      }

      if (stats.lastRun) {
        console.log(`\nLast run: ${stats.lastRun.status} at ${stats.lastRun.startedAt.toISOString()}`);
      }
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => fail('Command', error));
