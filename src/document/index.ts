export { extractManualBody, manualBodyFromLines, resolveManualBody } from './manual-section.js';
export {
  renderGuidanceDocument,
  orderPatterns,
  CLOSING_PARAGRAPH,
  type RenderInput,
} from './guidance-renderer.js';
export { readDocument, writeDocumentIfChanged } from './document-writer.js';
