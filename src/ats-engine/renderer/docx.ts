/**
 * Word rendering of resume records
 *
 * Builds the Markdown layout first and maps each line onto a docx paragraph,
 * so both formats share one section order.
 */

import { Document, HeadingLevel, Packer, Paragraph, TextRun } from 'docx';
import type { RenderResult, ResumeContent } from '../types';
import type { DocumentRenderer } from './types';
import { renderFailure, resumeToMarkdown, writeDocument } from './markdown';
import { loggers } from '../../shared/logger';

/**
 * Map Markdown lines (headings, bullets, plain text) to docx paragraphs
 */
export function markdownToParagraphs(markdown: string): Paragraph[] {
  const children: Paragraph[] = [];

  for (const line of markdown.split('\n')) {
    if (line.startsWith('# ')) {
      children.push(new Paragraph({
        text: line.substring(2),
        heading: HeadingLevel.TITLE,
        spacing: { after: 200 }
      }));
    } else if (line.startsWith('## ')) {
      children.push(new Paragraph({
        text: line.substring(3),
        heading: HeadingLevel.HEADING_1,
        spacing: { before: 200, after: 100 }
      }));
    } else if (line.startsWith('### ')) {
      children.push(new Paragraph({
        text: line.substring(4),
        heading: HeadingLevel.HEADING_2,
        spacing: { after: 50 }
      }));
    } else if (line.startsWith('- ')) {
      children.push(new Paragraph({
        children: [new TextRun(line.substring(2))],
        bullet: { level: 0 },
        spacing: { after: 50 }
      }));
    } else if (line.trim() === '') {
      children.push(new Paragraph({ text: '', spacing: { after: 100 } }));
    } else {
      children.push(new Paragraph({
        children: [new TextRun(line)],
        spacing: { after: 50 }
      }));
    }
  }

  return children;
}

export function buildResumeDocument(resume: ResumeContent): Document {
  return new Document({
    sections: [{
      properties: {
        page: {
          // 0.5" top/bottom, 0.75" sides, in twentieths of a point
          margin: { top: 720, bottom: 720, left: 1080, right: 1080 }
        }
      },
      children: markdownToParagraphs(resumeToMarkdown(resume).trimEnd())
    }]
  });
}

export class DocxResumeRenderer implements DocumentRenderer {
  readonly format = 'docx' as const;

  async render(resume: ResumeContent, outputPath: string): Promise<RenderResult> {
    try {
      const buffer = await Packer.toBuffer(buildResumeDocument(resume));
      await writeDocument(outputPath, buffer);
      loggers.renderer.info({ format: this.format, outputPath, bytes: buffer.length }, 'Resume rendered');
      return { success: true, path: outputPath };
    } catch (error) {
      return renderFailure(this.format, outputPath, error);
    }
  }
}
