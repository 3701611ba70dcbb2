export type { DocumentRenderer, RenderFormat } from './types';
export { resumeToMarkdown, formatEducation, MarkdownResumeRenderer } from './markdown';
export { markdownToParagraphs, buildResumeDocument, DocxResumeRenderer } from './docx';

import type { DocumentRenderer, RenderFormat } from './types';
import { MarkdownResumeRenderer } from './markdown';
import { DocxResumeRenderer } from './docx';

export function createRenderer(format: RenderFormat): DocumentRenderer {
  return format === 'docx' ? new DocxResumeRenderer() : new MarkdownResumeRenderer();
}
