export {
  createFileTemplateResolver,
  createMemoryTemplateResolver,
  isTemplateId,
  DEFAULT_TEMPLATE_DIRECTORY,
  TEMPLATE_FILES,
  TEMPLATE_IDS,
  type FileTemplateResolverOptions,
  type TemplateId,
} from './resolver.js';
export { parseSlideTemplate, DEFAULT_SLOT_MAX_HEIGHT_MM, type TemplateParseResult } from './schema.js';
