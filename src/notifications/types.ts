import type { NotifyError } from '../errors.js';
import type { Catalog, ChangeSet } from '../types/index.js';

export type DeliveryResult =
  | { status: 'sent'; httpStatus: number }
  | { status: 'skipped'; reason: string }
  | { status: 'failed'; error: NotifyError };

export interface Notifier {
  /** Reports changes plus the current free models. Never throws on delivery failure. */
  notify(changes: ChangeSet, catalog: Catalog): Promise<DeliveryResult>;
}
