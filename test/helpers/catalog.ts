import type { Catalog, Item } from '../../src/types/index.js';

export function makeItem({ id, ...rest }: Partial<Item> & Pick<Item, 'id'>): Item {
  return {
    id,
    name: id,
    provider: 'acme',
    inputPrice: 0.000001,
    outputPrice: 0.000002,
    contextLength: 8192,
    ...rest,
  };
}

export function makeCatalog(...items: Item[]): Catalog {
  return new Map(items.map((item) => [item.id, item]));
}
