import { fetchCatalog } from './catalog/fetcher.js';
import type { Config } from './config.js';
import { DiscordNotifier } from './notifications/discord.js';
import type { DeliveryResult, Notifier } from './notifications/types.js';
import { runWatch } from './orchestrator.js';
import { FileSnapshotStore, type SnapshotStore } from './snapshot/store.js';
import type { Catalog } from './types/index.js';
import { logger } from './utils/logger.js';

export interface CliDeps {
  fetchCatalog: () => Promise<Catalog>;
  store: SnapshotStore;
  notifier: Notifier;
  sendTestMessage: () => Promise<DeliveryResult>;
}

export function createDeps(config: Config): CliDeps {
  const notifier = new DiscordNotifier({
    webhookUrl: config.DISCORD_WEBHOOK,
    timeoutMs: config.WEBHOOK_TIMEOUT_MS,
    sectionLimit: config.NOTIFY_SECTION_LIMIT,
  });

  return {
    fetchCatalog: () =>
      fetchCatalog({
        url: config.CATALOG_URL,
        apiKey: config.CATALOG_API_KEY,
        timeoutMs: config.HTTP_TIMEOUT_MS,
      }),
    store: new FileSnapshotStore(config.SNAPSHOT_FILE),
    notifier,
    sendTestMessage: () => notifier.sendTestMessage(),
  };
}

/**
 * Runs one invocation and returns the process exit code: 0 on success,
 * 1 when anything fatal (fetch, snapshot read or write) fails.
 */
export async function runCli(config: Config, deps: CliDeps = createDeps(config)): Promise<number> {
  logger.info({ url: config.CATALOG_URL }, 'Fetching models...');

  try {
    if (config.TEST_DISCORD) {
      const catalog = await deps.fetchCatalog();
      logger.info({ count: catalog.size }, 'Fetched catalog');
      const result = await deps.sendTestMessage();
      logger.info({ status: result.status }, 'Test message processed');
      return 0;
    }

    const summary = await runWatch(deps);
    logger.info(
      {
        items: summary.itemCount,
        free: summary.freeCount,
        firstRun: summary.firstRun,
        delivery: summary.delivery.status,
      },
      'Run complete',
    );
    return 0;
  } catch (err) {
    logger.fatal({ err }, 'Run failed');
    return 1;
  }
}
