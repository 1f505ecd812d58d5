import { hasChanges } from '../pipeline/diff.js';
import { freeItems, isFree, isVariablePrice, type Catalog, type ChangeSet, type Item, type PriceDrop } from '../types/index.js';

/** Discord rejects message content longer than this. */
export const DISCORD_CONTENT_LIMIT = 2000;

export interface FormatOptions {
  /** Max entries listed per section before collapsing into "…and N more". */
  sectionLimit: number;
}

const usd = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 4,
});

const tokens = new Intl.NumberFormat('en-US');

function escapeMarkdown(text: string): string {
  return text.replace(/([\\*_~`|>])/g, '\\$1');
}

/** Per-token USD price shown per million tokens, e.g. `$0.50/M`. */
export function formatPrice(perToken: number): string {
  if (isVariablePrice(perToken)) return 'variable';
  if (perToken === 0) return 'free';
  return `${usd.format(perToken * 1_000_000)}/M`;
}

export function formatContext(contextLength: number): string | null {
  return contextLength > 0 ? `${tokens.format(contextLength)} ctx` : null;
}

function label(item: Item): string {
  return `${escapeMarkdown(item.name)} (\`${item.id.replace(/`/g, '')}\`)`;
}

function withContext(text: string, item: Item): string {
  const ctx = formatContext(item.contextLength);
  return ctx ? `${text}, ${ctx}` : text;
}

export function formatNewItem(item: Item): string {
  const pricing = isFree(item)
    ? 'free'
    : `in ${formatPrice(item.inputPrice)}, out ${formatPrice(item.outputPrice)}`;
  return withContext(`- ${label(item)}: ${pricing}`, item);
}

export function formatNewlyFree(item: Item): string {
  const ctx = formatContext(item.contextLength);
  return ctx ? `- ${label(item)}: ${ctx}` : `- ${label(item)}`;
}

export function formatPriceDrop(drop: PriceDrop): string {
  const { item, oldInputPrice, oldOutputPrice } = drop;
  return (
    `- ${label(item)}: ` +
    `in ${formatPrice(oldInputPrice)} → ${formatPrice(item.inputPrice)}, ` +
    `out ${formatPrice(oldOutputPrice)} → ${formatPrice(item.outputPrice)}`
  );
}

export function formatFreeItem(item: Item): string {
  const ctx = formatContext(item.contextLength);
  return ctx ? `- ${escapeMarkdown(item.name)}: ${ctx}` : `- ${escapeMarkdown(item.name)}`;
}

function section(title: string, lines: string[], limit: number): string | null {
  if (lines.length === 0) return null;
  const shown = lines.slice(0, limit);
  if (lines.length > limit) shown.push(`…and ${lines.length - limit} more`);
  return [`${title} (${lines.length})`, ...shown].join('\n');
}

export function composeChangeSection(changes: ChangeSet, options: FormatOptions): string | null {
  if (!hasChanges(changes)) return null;

  const sections = [
    section('\u{1F195} **New models**', changes.newItems.map(formatNewItem), options.sectionLimit),
    section('\u{1F389} **Now free**', changes.newlyFree.map(formatNewlyFree), options.sectionLimit),
    section('\u{1F4B8} **Price drops**', changes.priceDrops.map(formatPriceDrop), options.sectionLimit),
  ].filter((s): s is string => s !== null);

  return ['\u{1F514} **Model pricing updates**', ...sections].join('\n');
}

export function composeFreeSection(catalog: Catalog, options: FormatOptions): string {
  const free = freeItems(catalog);
  return section('\u{1F4B0} **Free models**', free.map(formatFreeItem), options.sectionLimit)
    ?? '\u{1F4B0} **Free models:** none';
}

/** Cuts at a line boundary so the result fits in `limit` characters. */
export function truncateMessage(text: string, limit = DISCORD_CONTENT_LIMIT): string {
  if (text.length <= limit) return text;
  const cut = text.lastIndexOf('\n', limit - 2);
  if (cut > 0) return `${text.slice(0, cut)}\n…`;

  let end = limit - 1;
  const last = text.charCodeAt(end - 1);
  // Don't leave half of a surrogate pair.
  if (last >= 0xd800 && last <= 0xdbff) end -= 1;
  return `${text.slice(0, end)}…`;
}

/** Change sections (when anything changed) followed by the free-model listing. */
export function composeMessage(changes: ChangeSet, catalog: Catalog, options: FormatOptions): string {
  const parts = [composeChangeSection(changes, options), composeFreeSection(catalog, options)]
    .filter((p): p is string => p !== null);
  return truncateMessage(parts.join('\n\n'));
}
