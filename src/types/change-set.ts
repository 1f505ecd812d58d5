import type { Item } from './item.js';

export interface PriceDrop {
  item: Item;
  oldInputPrice: number;
  oldOutputPrice: number;
}

export interface ChangeSet {
  newItems: Item[];
  newlyFree: Item[];
  priceDrops: PriceDrop[];
}
