import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  createConsoleDiagnosticSink,
  type DiagnosticSink,
  type SlideTemplate,
  type TemplateResolver,
} from '@slidegrid/contracts';
import { parseSlideTemplate } from './schema.js';

/** Closed set of template ids the resolver recognises. */
export const TEMPLATE_IDS = ['T1', 'T2', 'T3', 'T4'] as const;

export type TemplateId = (typeof TEMPLATE_IDS)[number];

/** File (without extension) each template id is stored in. */
export const TEMPLATE_FILES: Record<TemplateId, string> = {
  T1: 'T1_problem_solving',
  T2: 'T2_comparison',
  T3: 'T3_policy_proposal',
  T4: 'T4_workflow',
};

export const DEFAULT_TEMPLATE_DIRECTORY = fileURLToPath(new URL('../data/', import.meta.url));

export const isTemplateId = (value: string): value is TemplateId => TEMPLATE_IDS.some((id) => id === value);

export type FileTemplateResolverOptions = {
  /** Directory holding `<file>.json` template documents. Defaults to the bundled templates. */
  directory?: string;
  onDiagnostic?: DiagnosticSink;
};

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Resolves template ids against JSON files on disk.
 *
 * Reads are synchronous and uncached: every call sees the file as it is now.
 * Any miss (unknown id, missing file, unreadable or invalid document, empty
 * slot list) returns `undefined` and is reported to `onDiagnostic`.
 */
export function createFileTemplateResolver(options: FileTemplateResolverOptions = {}): TemplateResolver {
  const directory = options.directory ?? DEFAULT_TEMPLATE_DIRECTORY;
  const report = options.onDiagnostic ?? createConsoleDiagnosticSink('templates');

  const resolve = (templateId: string | null): SlideTemplate | undefined => {
    if (templateId == null) return undefined;

    if (!isTemplateId(templateId)) {
      report({
        code: 'template-unknown-id',
        level: 'warn',
        message: `Unknown template id "${templateId}"`,
        details: { templateId, known: TEMPLATE_IDS },
      });
      return undefined;
    }

    const filePath = path.join(directory, `${TEMPLATE_FILES[templateId]}.json`);

    let source: string;
    try {
      source = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        report({
          code: 'template-file-missing',
          level: 'warn',
          message: `Template file for "${templateId}" not found`,
          details: { templateId, filePath },
        });
      } else {
        report({
          code: 'template-invalid',
          level: 'warn',
          message: `Template file for "${templateId}" could not be read: ${describeError(error)}`,
          details: { templateId, filePath },
        });
      }
      return undefined;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(source);
    } catch (error) {
      report({
        code: 'template-invalid',
        level: 'warn',
        message: `Template file for "${templateId}" is not valid JSON: ${describeError(error)}`,
        details: { templateId, filePath },
      });
      return undefined;
    }

    const parsed = parseSlideTemplate(raw, templateId);
    if (!parsed.success) {
      report({
        code: 'template-invalid',
        level: 'warn',
        message: `Template "${templateId}" failed validation: ${parsed.error}`,
        details: { templateId, filePath },
      });
      return undefined;
    }

    return rejectEmpty(parsed.template, report);
  };

  return { resolve };
}

/**
 * Serves templates held in memory, keyed by their `id`. Useful when templates
 * come from somewhere other than the bundled files.
 *
 * Templates go through the same validation and slot ordering as template
 * files when the resolver is created; an invalid one is reported as
 * `template-invalid` each time it is requested.
 */
export function createMemoryTemplateResolver(
  templates: SlideTemplate[],
  options: { onDiagnostic?: DiagnosticSink } = {},
): TemplateResolver {
  const report = options.onDiagnostic ?? createConsoleDiagnosticSink('templates');
  const byId = new Map(templates.map((template) => [template.id, parseSlideTemplate(template, template.id)] as const));

  const resolve = (templateId: string | null): SlideTemplate | undefined => {
    if (templateId == null) return undefined;
    const parsed = byId.get(templateId);
    if (!parsed) {
      report({
        code: 'template-unknown-id',
        level: 'warn',
        message: `Unknown template id "${templateId}"`,
        details: { templateId, known: [...byId.keys()] },
      });
      return undefined;
    }
    if (!parsed.success) {
      report({
        code: 'template-invalid',
        level: 'warn',
        message: `Template "${templateId}" failed validation: ${parsed.error}`,
        details: { templateId },
      });
      return undefined;
    }
    return rejectEmpty(parsed.template, report);
  };

  return { resolve };
}

function rejectEmpty(template: SlideTemplate, report: DiagnosticSink): SlideTemplate | undefined {
  if (template.slots.length > 0) return template;
  report({
    code: 'template-empty',
    level: 'warn',
    message: `Template "${template.id}" declares no slots`,
    details: { templateId: template.id },
  });
  return undefined;
}
