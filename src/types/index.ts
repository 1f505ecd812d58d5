export type { Item, Catalog } from './item.js';
export { isFree, isVariablePrice, providerOf, freeItems } from './item.js';
export type { ChangeSet, PriceDrop } from './change-set.js';
