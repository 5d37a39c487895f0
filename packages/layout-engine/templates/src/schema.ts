import { z } from 'zod';
import type { SlideTemplate, TemplateSlot } from '@slidegrid/contracts';

/** Height used as the upper bound when a slot declares none. */
export const DEFAULT_SLOT_MAX_HEIGHT_MM = 999;

const slotSchema = z
  .object({
    id: z.string().min(1),
    column: z.number().int().nonnegative().default(0),
    order: z.number().finite().optional(),
    minHeightMm: z.number().finite().nonnegative().default(0),
    maxHeightMm: z.number().finite().positive().default(DEFAULT_SLOT_MAX_HEIGHT_MM),
  })
  .refine((slot) => slot.minHeightMm <= slot.maxHeightMm, {
    message: 'minHeightMm must not exceed maxHeightMm',
    path: ['maxHeightMm'],
  });

const templateSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().default(''),
  slots: z.array(slotSchema),
});

export type TemplateParseResult = { success: true; template: SlideTemplate } | { success: false; error: string };

/**
 * Validates a template document and sorts its slots by `order`.
 *
 * Every slot must satisfy `minHeightMm <= maxHeightMm`.
 *
 * Slots without an `order` take their declaration index. The sort is stable,
 * so slots sharing an order keep declaration order.
 *
 * @param raw - Parsed JSON of the template file
 * @param fallbackId - Id used when the document does not declare one
 */
export function parseSlideTemplate(raw: unknown, fallbackId: string): TemplateParseResult {
  const parsed = templateSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      error: parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; '),
    };
  }

  const slots: TemplateSlot[] = parsed.data.slots
    .map((slot, index) => ({
      id: slot.id,
      column: slot.column,
      order: slot.order ?? index,
      minHeightMm: slot.minHeightMm,
      maxHeightMm: slot.maxHeightMm,
    }))
    .sort((a, b) => a.order - b.order);

  return {
    success: true,
    template: { id: parsed.data.id ?? fallbackId, name: parsed.data.name, slots },
  };
}
