import { diff, countChanges } from './pipeline/diff.js';
import type { DeliveryResult, Notifier } from './notifications/types.js';
import type { SnapshotStore } from './snapshot/store.js';
import { freeItems, type Catalog, type ChangeSet } from './types/index.js';
import { logger } from './utils/logger.js';

export interface WatchDeps {
  fetchCatalog: () => Promise<Catalog>;
  store: SnapshotStore;
  notifier: Notifier;
}

export interface RunSummary {
  itemCount: number;
  freeCount: number;
  firstRun: boolean;
  changes: ChangeSet;
  delivery: DeliveryResult;
}

/**
 * One watch cycle: fetch, load, diff, notify, save.
 *
 * A fetch failure propagates before anything is read or written. Notification
 * is best-effort, so the snapshot advances even when delivery fails and those
 * changes are not re-announced on the next run.
 */
export async function runWatch(deps: WatchDeps): Promise<RunSummary> {
  const { fetchCatalog, store, notifier } = deps;

  const current = await fetchCatalog();
  logger.info({ count: current.size }, 'Fetched catalog');

  const previous = await store.load();
  const firstRun = previous.size === 0;

  const changes = diff(previous, current);
  const changeCount = countChanges(changes);
  if (changeCount > 0) {
    logger.info(
      {
        newItems: changes.newItems.length,
        newlyFree: changes.newlyFree.length,
        priceDrops: changes.priceDrops.length,
      },
      `Found ${changeCount} changes`,
    );
  } else {
    logger.info('No changes detected');
  }

  const delivery = await notifier.notify(changes, current);
  if (delivery.status === 'failed') {
    logger.warn({ err: delivery.error }, 'Notification not delivered, advancing snapshot anyway');
  }

  await store.save(current);
  logger.info({ count: current.size }, 'Snapshot saved');

  return {
    itemCount: current.size,
    freeCount: freeItems(current).length,
    firstRun,
    changes,
    delivery,
  };
}
