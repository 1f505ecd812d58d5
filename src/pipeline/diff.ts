import { isFree, isVariablePrice, type Catalog, type ChangeSet } from '../types/index.js';

function dropped(before: number, after: number): boolean {
  return !isVariablePrice(before) && !isVariablePrice(after) && after < before;
}

/**
 * Classifies what changed between the previous snapshot and the current catalog.
 * Removed models are not reported. An item that went free and also got cheaper
 * is listed under both `newlyFree` and `priceDrops`. Variable (negative) prices
 * never count as a drop in either direction.
 */
export function diff(previous: Catalog, current: Catalog): ChangeSet {
  const changes: ChangeSet = { newItems: [], newlyFree: [], priceDrops: [] };

  for (const item of current.values()) {
    const prev = previous.get(item.id);
    if (!prev) {
      changes.newItems.push(item);
      continue;
    }

    if (!isFree(prev) && isFree(item)) {
      changes.newlyFree.push(item);
    }

    if (dropped(prev.inputPrice, item.inputPrice) || dropped(prev.outputPrice, item.outputPrice)) {
      changes.priceDrops.push({
        item,
        oldInputPrice: prev.inputPrice,
        oldOutputPrice: prev.outputPrice,
      });
    }
  }

  return changes;
}

export function hasChanges(changes: ChangeSet): boolean {
  return changes.newItems.length > 0 || changes.newlyFree.length > 0 || changes.priceDrops.length > 0;
}

export function countChanges(changes: ChangeSet): number {
  return changes.newItems.length + changes.newlyFree.length + changes.priceDrops.length;
}
