// ---------------------------------------------------------------------------
// @stockroom/templates — template discovery and registration
// ---------------------------------------------------------------------------

export {
  type LoadTemplatesOptions,
  loadTemplates,
  registerTemplates,
  TEMPLATE_CATEGORY_PREFIX,
  templateCategory,
  templateRoots,
} from "./register.js";
export { deriveTemplateKey, parseTemplateFile, scanTemplates, type TemplateKey } from "./scanner.js";
export type { ScanTemplatesOptions, TemplateRecord, TemplateScanResult } from "./types.js";

// Package metadata
export const PACKAGE_NAME = "@stockroom/templates";
