import { z } from 'zod';

/**
 * Prices arrive as decimal strings ("0.000002") or plain numbers.
 * Negative values are kept as is: the source uses "-1" for routers with variable pricing.
 */
export const priceSchema = z.union([z.string(), z.number()]).transform((raw, ctx) => {
  const value = typeof raw === 'number' ? raw : raw.trim() === '' ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid price: ${String(raw)}` });
    return z.NEVER;
  }
  return value;
});

const tokenCountSchema = z.number().int().nonnegative();

export const modelRecordSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
    pricing: z.object({
      prompt: priceSchema,
      completion: priceSchema,
    }),
    context_length: tokenCountSchema.nullish(),
    max_tokens: tokenCountSchema.nullish(),
  })
  .refine((r) => r.context_length != null || r.max_tokens != null, {
    message: 'Missing context_length',
    path: ['context_length'],
  });

export const catalogResponseSchema = z.object({
  data: z.array(modelRecordSchema),
});

export type ModelRecord = z.infer<typeof modelRecordSchema>;

/** Turns zod issues into one line, e.g. `data.3.pricing.prompt: Required`. */
export function describeIssues(error: z.ZodError, limit = 3): string {
  const lines = error.issues
    .slice(0, limit)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  const more = error.issues.length - limit;
  return more > 0 ? `${lines.join('; ')} (+${more} more)` : lines.join('; ');
}
