import { pino } from 'pino';
import { loadConfig } from './config.js';
import { createRedisClient } from './infrastructure/redis/connection.js';
import { createDbClient, ensureSchema, findEnabledRules, findSubjects } from './infrastructure/db/index.js';
import {
  startConsumer,
  startConfigSubscriber,
  startMonitorTicker,
  startRetentionSweeper,
} from './infrastructure/worker/index.js';
import { RuleEngine } from './application/rule-engine.js';
import { RuleStore, SubjectDirectory } from './application/rule-store.js';
import { StatsAccumulator } from './application/monitor-stats.js';

/**
 * Standalone worker process: consumes events from the Redis Stream,
 * persists them, evaluates rules and writes alerts.
 *
 * Runs independently of the Fastify HTTP server. Several workers can
 * share the consumer group, each with its own WORKER_ID.
 *
 * Rules and subjects are loaded from Postgres and kept current through
 * the "config_changed" channel.
 */
const config = loadConfig();
const log = pino({ level: config.logLevel });

const redis = createRedisClient(config.redisUrl);
const { sql, db } = createDbClient(config.databaseUrl);

// Abort controller for graceful shutdown
const ac = new AbortController();
let cleanupSubscriber: null | (() => Promise<void>) = null;

async function main(): Promise<void> {
  await redis.connect();
  log.info('Redis connected');

  await ensureSchema(sql);
  log.info('Database ready (events + subjects + rules + alerts tables)');

  const ruleStore = new RuleStore();
  const subjects = new SubjectDirectory();
  const stats = new StatsAccumulator();
  const engine = new RuleEngine({
    defaultZThreshold: config.anomalyThreshold,
    onDetection: (ruleId) => stats.recordDetection(ruleId),
    log,
  });

  const [rules, subjectRows] = await Promise.all([findEnabledRules(db), findSubjects(db)]);
  ruleStore.set(rules);
  subjects.set(subjectRows);
  log.info(
    { ruleCount: rules.length, ruleIds: rules.map((r) => r.rule_id), subjectCount: subjectRows.length },
    'Rules and subjects loaded from database',
  );

  cleanupSubscriber = await startConfigSubscriber(
    config.redisUrl,
    db,
    log,
    { ruleStore, subjects, onRulesReloaded: (reloaded) => engine.syncRules(reloaded) },
    ac.signal,
  );

  const deps = { redis, db, log, ruleStore, subjects, stats, engine };

  startMonitorTicker(
    { ...deps, workerId: config.workerId, intervalSeconds: config.monitoringIntervalSeconds },
    ac.signal,
  );
  startRetentionSweeper(db, log, config.retentionDays, ac.signal);

  await startConsumer({ ...deps, consumerName: config.workerId }, ac.signal);
}

async function closeConnections(): Promise<void> {
  if (cleanupSubscriber) await cleanupSubscriber();
  const results = await Promise.allSettled([redis.quit(), sql.end()]);
  for (const result of results) {
    if (result.status === 'rejected') log.warn({ err: result.reason }, 'Connection did not close cleanly');
  }
}

// Graceful shutdown on SIGINT / SIGTERM
function shutdown(): void {
  log.info('Shutting down worker...');
  ac.abort();

  // Give in-flight operations a moment, then force exit
  setTimeout(() => {
    void closeConnections().finally(() => process.exit(0));
  }, 3000);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
