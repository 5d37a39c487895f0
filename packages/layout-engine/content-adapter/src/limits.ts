import type { ContentBlock, ContentDescription, DiagnosticSink } from '@slidegrid/contracts';

/**
 * Caps applied to generated content before layout so that a verbose
 * generator does not push sections far past the page.
 */
export type ContentLimits = {
  maxBulletItems: number;
  maxBulletChars: number;
  maxFlowchartSteps: number;
  maxTextChars: number;
};

export const DEFAULT_CONTENT_LIMITS: ContentLimits = {
  maxBulletItems: 7,
  maxBulletChars: 50,
  maxFlowchartSteps: 6,
  maxTextChars: 200,
};

const ELLIPSIS = '...';

/**
 * Truncates `text` to `maxChars` code points, appending an ellipsis when
 * anything was cut.
 *
 * @example
 * ```typescript
 * truncateText('abcdef', 3); // 'abc...'
 * truncateText('abc', 3); // 'abc'
 * ```
 */
export const truncateText = (text: string, maxChars: number): string => {
  const chars = Array.from(text);
  if (chars.length <= maxChars) return text;
  return chars.slice(0, maxChars).join('') + ELLIPSIS;
};

type LimitResult = { block: ContentBlock; changed: boolean };

function limitBlock(block: ContentBlock, limits: ContentLimits): LimitResult {
  switch (block.type) {
    case 'bullets': {
      const kept = block.content.items.slice(0, limits.maxBulletItems);
      const items = kept.map((item) => ({ ...item, text: truncateText(item.text, limits.maxBulletChars) }));
      const changed =
        kept.length !== block.content.items.length || items.some((item, i) => item.text !== kept[i].text);
      return { block: { ...block, content: { items } }, changed };
    }
    case 'flowchart': {
      const steps = block.content.steps.slice(0, limits.maxFlowchartSteps);
      return {
        block: { ...block, content: { ...block.content, steps } },
        changed: steps.length !== block.content.steps.length,
      };
    }
    case 'text_block': {
      const text = truncateText(block.content.text, limits.maxTextChars);
      return { block: { ...block, content: { text } }, changed: text !== block.content.text };
    }
    default:
      return { block, changed: false };
  }
}

/**
 * Applies content limits to every section. Returns a new description; the
 * input is not modified. Emits one `content-truncated` diagnostic per block
 * that lost content.
 */
export function applyContentLimits(
  content: ContentDescription,
  limits: Partial<ContentLimits> = {},
  onDiagnostic?: DiagnosticSink,
): ContentDescription {
  const resolved: ContentLimits = { ...DEFAULT_CONTENT_LIMITS, ...limits };

  const sections = content.sections.map((block, index) => {
    const result = limitBlock(block, resolved);
    if (result.changed) {
      onDiagnostic?.({
        code: 'content-truncated',
        level: 'info',
        message: `Section ${block.id ?? index} (${block.type}) was truncated to fit content limits`,
        details: { index, sectionId: block.id, type: block.type },
      });
    }
    return result.block;
  });

  return { ...content, sections };
}
