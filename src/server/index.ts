import { join } from 'path';
import { serve, type ServerType } from '@hono/node-server';
import { BackupService } from '../services/backup.js';
import { runRefreshCycle } from '../services/refresh.js';
import { resolveStorePath, type AppConfig } from '../utils/config.js';
import type { Logger } from '../utils/logger.js';
import { createApp } from './app.js';

export function startServer(config: AppConfig, logger: Logger, port = config.SERVER_PORT): ServerType {
  const storePath = resolveStorePath(config.DATABASE_URL);
  const app = createApp({
    storePath,
    logger: logger.child('api'),
    backups: new BackupService(
      { storePath, backupDir: config.BACKUP_DIR, keep: config.BACKUP_KEEP },
      logger.child('backup', { file: join(config.LOGS_DIR, 'backup.log') })
    ),
    startRefresh: () => runRefreshCycle(config, logger.child('refresh', { file: join(config.LOGS_DIR, 'refresh.log') })),
  });

  return serve({ fetch: app.fetch, port }, (info) => {
    logger.success(`Read API listening on http://localhost:${info.port}/api`);
  });
}
