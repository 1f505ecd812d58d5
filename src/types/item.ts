export interface Item {
  id: string;
  name: string;
  /** Leading segment of the id, e.g. `openai` for `openai/gpt-4o`. */
  provider: string;
  /** USD per input token; negative when the source prices per request (routers). */
  inputPrice: number;
  /** USD per output token; negative when the source prices per request (routers). */
  outputPrice: number;
  contextLength: number;
}

/** Items keyed by id, in the order the source listed them. */
export type Catalog = ReadonlyMap<string, Item>;

export function isFree(item: Pick<Item, 'inputPrice' | 'outputPrice'>): boolean {
  return item.inputPrice === 0 && item.outputPrice === 0;
}

export function isVariablePrice(price: number): boolean {
  return price < 0;
}

export function providerOf(id: string): string {
  const slash = id.indexOf('/');
  return slash > 0 ? id.slice(0, slash) : 'unknown';
}

export function freeItems(catalog: Catalog): Item[] {
  return [...catalog.values()].filter(isFree);
}
