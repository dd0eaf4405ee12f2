import { loadConfig } from './config.js';
import { buildServer } from './server.js';
import { loadNotificationConfig, createAlertDispatcher } from './infrastructure/notifications/index.js';
import { startAlertSubscriber } from './infrastructure/redis/alert-subscriber.js';

/**
 * API process entry point.
 *
 * Order:
 * 1) Config
 * 2) Fastify app (plugins + routes)
 * 3) Register shutdown hooks
 * 4) listen()
 * 5) Alert dispatch: notification config, dispatcher, Pub/Sub subscriber
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const fastify = await buildServer(config);

  let cleanupSubscriber: null | (() => Promise<void>) = null;

  /**
   * IMPORTANT:
   * onClose MUST be registered BEFORE listen()
   */
  fastify.addHook('onClose', async () => {
    if (cleanupSubscriber) {
      await cleanupSubscriber();
    }
  });

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down API server...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await fastify.listen({
    host: config.host,
    port: config.port,
  });

  // --------------------------------------------------
  // Alert dispatch (after listen)
  // --------------------------------------------------

  const notifConfig = loadNotificationConfig(
    config.notificationsConfigPath,
    (err) => fastify.log.warn({ err, path: config.notificationsConfigPath }, 'Notification config not loaded, using defaults'),
  );

  fastify.log.info(
    { routing: notifConfig.routing, slack: notifConfig.slack.enabled, webhook: notifConfig.webhook.enabled, email: notifConfig.email.enabled },
    'Notification config loaded',
  );

  const dispatcher = createAlertDispatcher(notifConfig, config.smtp, fastify.log);

  cleanupSubscriber = await startAlertSubscriber(
    config.redisUrl,
    fastify.log,
    (alert) => {
      dispatcher.dispatch(alert)
        .then((report) => {
          if (!report.duplicate) fastify.log.info(report, 'Alert dispatched');
        })
        .catch((err: unknown) => {
          fastify.log.error({ err, alert_id: alert.alert_id }, 'Alert dispatch failed');
        });
    },
  );
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
