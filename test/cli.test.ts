import { describe, it, expect, vi } from 'vitest';
import { runCli, createDeps, type CliDeps } from '../src/cli.js';
import { loadConfig } from '../src/config.js';
import { FetchError } from '../src/errors.js';
import type { Notifier } from '../src/notifications/types.js';
import { FileSnapshotStore } from '../src/snapshot/store.js';
import type { Catalog } from '../src/types/index.js';
import { makeCatalog, makeItem } from './helpers/catalog.js';

const alpha = makeItem({ id: 'acme/alpha', name: 'Alpha' });

function fakeDeps(fetchCatalog: () => Promise<Catalog>) {
  const load = vi.fn(async (): Promise<Catalog> => new Map());
  const save = vi.fn(async (_catalog: Catalog): Promise<void> => {});
  const notify = vi.fn<Notifier['notify']>().mockResolvedValue({ status: 'sent', httpStatus: 204 });
  const sendTestMessage = vi.fn<CliDeps['sendTestMessage']>().mockResolvedValue({
    status: 'sent',
    httpStatus: 204,
  });
  const deps: CliDeps = {
    fetchCatalog,
    store: { load, save },
    notifier: { notify },
    sendTestMessage,
  };
  return { deps, load, save, notify, sendTestMessage };
}

describe('runCli', () => {
  it('should exit 0 after a successful run', async () => {
    const { deps, save, notify } = fakeDeps(async () => makeCatalog(alpha));

    const code = await runCli(loadConfig({}), deps);

    expect(code).toBe(0);
    expect(notify).toHaveBeenCalledTimes(1);
    expect(save).toHaveBeenCalledWith(makeCatalog(alpha));
  });

  it('should exit 1 without saving or notifying when the fetch fails', async () => {
    const { deps, load, save, notify } = fakeDeps(async () => {
      throw new FetchError('Catalog request failed: socket hang up');
    });

    const code = await runCli(loadConfig({}), deps);

    expect(code).toBe(1);
    expect(load).not.toHaveBeenCalled();
    expect(notify).not.toHaveBeenCalled();
    expect(save).not.toHaveBeenCalled();
  });

  it('should exit 1 when the snapshot cannot be written', async () => {
    const { deps, save } = fakeDeps(async () => makeCatalog(alpha));
    save.mockRejectedValue(new Error('EACCES'));

    expect(await runCli(loadConfig({}), deps)).toBe(1);
  });

  it('should only send the test message when TEST_DISCORD is set', async () => {
    const fetchCatalog = vi.fn(async () => makeCatalog(alpha));
    const { deps, load, save, notify, sendTestMessage } = fakeDeps(fetchCatalog);

    const code = await runCli(loadConfig({ TEST_DISCORD: '1' }), deps);

    expect(code).toBe(0);
    expect(fetchCatalog).toHaveBeenCalledTimes(1);
    expect(sendTestMessage).toHaveBeenCalledTimes(1);
    expect(notify).not.toHaveBeenCalled();
    expect(load).not.toHaveBeenCalled();
    expect(save).not.toHaveBeenCalled();
  });

  it('should exit 1 in test-message mode when the fetch fails', async () => {
    const { deps, sendTestMessage } = fakeDeps(async () => {
      throw new FetchError('Catalog request returned HTTP 503: down', { status: 503 });
    });

    const code = await runCli(loadConfig({ TEST_DISCORD: 'true' }), deps);

    expect(code).toBe(1);
    expect(sendTestMessage).not.toHaveBeenCalled();
  });
});

describe('createDeps', () => {
  it('should store the snapshot at the configured path', () => {
    const deps = createDeps(loadConfig({ SNAPSHOT_FILE: '/tmp/state/models.json' }));

    expect(deps.store).toBeInstanceOf(FileSnapshotStore);
    expect(deps.store).toMatchObject({ filePath: '/tmp/state/models.json' });
  });
});
