import type { RenderResult, ResumeContent } from '../types';

export type RenderFormat = 'markdown' | 'docx';

/**
 * Writes a resume record to a document file. Implementations report failure
 * through the result instead of rejecting.
 */
export interface DocumentRenderer {
  readonly format: RenderFormat;
  render(resume: ResumeContent, outputPath: string): Promise<RenderResult>;
}
