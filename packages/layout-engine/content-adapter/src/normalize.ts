/**
 * Content normalization
 *
 * Turns whatever the text-to-structure generator returned into a typed
 * `ContentDescription`. The generator may drop fields, send numbers where
 * strings are expected, or return something that is not an object at all;
 * every such case resolves to a default here and nothing is thrown.
 */

import { z } from 'zod';
import type { BulletItem, ContentBlock, ContentDescription } from '@slidegrid/contracts';

export const DEFAULT_TITLE = 'Untitled';

const textValue = z.union([z.string(), z.number().transform((value) => String(value))]).catch('');

const idValue = z
  .union([z.string(), z.number().transform((value) => String(value))])
  .nullable()
  .catch(null);

// Fractional or non-numeric hints carry no usable column; the planner treats null as missing.
const columnValue = z.number().int().nullable().catch(null);

const bulletItem: z.ZodType<BulletItem, z.ZodTypeDef, unknown> = z
  .union([
    z.string().transform((text) => ({ text, indent: 0 })),
    z.number().transform((value) => ({ text: String(value), indent: 0 })),
    z.object({
      text: textValue,
      indent: z.number().int().nonnegative().catch(0),
    }),
  ])
  .catch({ text: '', indent: 0 });

const stepText = z
  .union([
    z.string(),
    z.number().transform((value) => String(value)),
    z.object({ text: textValue }).transform((step) => step.text),
  ])
  .catch('');

const listOf = <T>(item: z.ZodType<T, z.ZodTypeDef, unknown>) => z.array(item).catch([]);

const bulletsContent = z.object({ items: listOf(bulletItem) }).catch({ items: [] });

const tableContent = z
  .object({
    columns: listOf(textValue),
    rows: listOf(listOf(textValue)),
  })
  .catch({ columns: [], rows: [] });

const direction = z.enum(['h', 'v']).catch('h');

const flowchartContent = z
  .object({
    steps: listOf(stepText),
    direction,
  })
  .catch({ steps: [], direction: 'h' });

const kpiContent = z
  .object({ value: textValue, unit: textValue, label: textValue })
  .catch({ value: '', unit: '', label: '' });

const textContent = z
  .union([z.string().transform((text) => ({ text })), z.object({ text: textValue })])
  .catch({ text: '' });

const blockBase = z
  .object({
    id: idValue,
    column: columnValue,
    header: textValue,
    type: z.string().nullable().catch(null),
    content: z.unknown(),
  })
  .catch({ id: null, column: null, header: '', type: null, content: undefined });

const optionalId = z.string().min(1).optional().catch(undefined);

const descriptionSchema = z.object({
  templateId: optionalId,
  template_id: optionalId,
  recommended_template: optionalId,
  title: textValue,
  subtitle: textValue,
  footerNote: textValue.optional(),
  footer_note: textValue.optional(),
  sections: z.array(z.unknown()).catch([]),
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Normalizes a single raw section into a `ContentBlock`.
 *
 * Unknown or missing types become `text_block`, so the estimator and the
 * composer always see a member of the closed union.
 */
export function normalizeContentBlock(raw: unknown): ContentBlock {
  const base = blockBase.parse(raw);
  const common = { id: base.id, column: base.column, header: base.header };

  switch (base.type) {
    case 'bullets':
      return { ...common, type: 'bullets', content: bulletsContent.parse(base.content) };
    case 'table':
      return { ...common, type: 'table', content: tableContent.parse(base.content) };
    case 'flowchart':
      return { ...common, type: 'flowchart', content: flowchartContent.parse(base.content) };
    case 'kpi_box':
      return { ...common, type: 'kpi_box', content: kpiContent.parse(base.content) };
    default:
      return { ...common, type: 'text_block', content: textContent.parse(base.content) };
  }
}

/**
 * Normalizes the generator's output into a `ContentDescription`.
 *
 * @example
 * ```typescript
 * normalizeContentDescription(null);
 * // { templateId: null, title: 'Untitled', subtitle: '', footerNote: '', sections: [] }
 * ```
 */
export function normalizeContentDescription(raw: unknown): ContentDescription {
  const parsed = descriptionSchema.parse(isRecord(raw) ? raw : {});
  const title = parsed.title.trim().length > 0 ? parsed.title : DEFAULT_TITLE;

  return {
    templateId: parsed.templateId ?? parsed.template_id ?? parsed.recommended_template ?? null,
    title,
    subtitle: parsed.subtitle,
    footerNote: parsed.footerNote ?? parsed.footer_note ?? '',
    sections: parsed.sections.map(normalizeContentBlock),
  };
}
