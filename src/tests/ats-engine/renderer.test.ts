/**
 * Unit tests for Markdown and Word rendering
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  resumeToMarkdown,
  formatEducation,
  markdownToParagraphs,
  createRenderer,
  MarkdownResumeRenderer,
  DocxResumeRenderer
} from '../../ats-engine/renderer';
import { extractResumeContent } from '../../ats-engine/parser/resumeParser';
import { ATSLogger, LogType } from '../../ats-engine/logging/logger';
import { SAMPLE_RESUME } from './fixtures';

const SAMPLE_MARKDOWN = [
  '# Jane Doe',
  'jane.doe@example.com | (555) 123-4567 | Austin, TX',
  'https://linkedin.com/in/janedoe | https://github.com/janedoe',
  '',
  '## Professional Summary',
  'Backend engineer focused on Python services',
  '',
  '## Technical Skills',
  '- Programming Languages: python, sql',
  '- Frameworks & Tools: django, flask, docker, git',
  '- Technical Skills: Python, SQL, Docker, Git',
  '',
  '## Professional Experience',
  '### Senior Developer - Acme Corp',
  'Jan 2020 - Present',
  'Built REST APIs with Python and Django Managed PostgreSQL databases',
  '',
  '### Developer - Beta Inc',
  '2017 - 2019',
  'Maintained internal tools',
  '',
  '## Education',
  '- Bachelor in Computer Science - State University (2016)',
  '',
  '## Projects',
  '### Inventory Tracker',
  'Stock management tool Built with Flask',
  '',
  '## Certifications',
  '- AWS Certified Developer',
  ''
].join('\n');

describe('Resume Renderers', () => {
  let dir: string;

  beforeEach(async () => {
    ATSLogger.setEnabled(true);
    ATSLogger.clearLogs();
    dir = await mkdtemp(join(tmpdir(), 'ats-render-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('resumeToMarkdown', () => {
    it('should lay out every section in order', () => {
      expect(resumeToMarkdown(extractResumeContent(SAMPLE_RESUME))).toBe(SAMPLE_MARKDOWN);
    });

    it('should omit empty sections', () => {
      const resume = extractResumeContent('');
      expect(resumeToMarkdown(resume)).toBe('');
      expect(resumeToMarkdown({ ...resume, name: 'Sam Lee', certifications: ['CKA'] })).toBe(
        '# Sam Lee\n\n## Certifications\n- CKA\n'
      );
    });
  });

  describe('formatEducation', () => {
    it('should join the parts that are present', () => {
      expect(formatEducation({ degree: 'BS', field: '', institution: '', year: '' })).toBe('BS');
      expect(formatEducation({ degree: '', field: '', institution: 'Example College', year: '2010' })).toBe(
        'Example College (2010)'
      );
    });
  });

  describe('markdownToParagraphs', () => {
    it('should produce one paragraph per line', () => {
      expect(markdownToParagraphs('# Name\n## Section\n### Entry\n- Bullet\n\nText')).toHaveLength(6);
    });
  });

  describe('MarkdownResumeRenderer', () => {
    it('should write the Markdown document', async () => {
      const outputPath = join(dir, 'nested', 'resume.md');
      const result = await new MarkdownResumeRenderer().render(extractResumeContent(SAMPLE_RESUME), outputPath);

      expect(result).toEqual({ success: true, path: outputPath });
      await expect(readFile(outputPath, 'utf-8')).resolves.toBe(SAMPLE_MARKDOWN);
    });

    it('should report a failure instead of rejecting', async () => {
      const blocker = join(dir, 'blocker');
      await writeFile(blocker, 'not a directory');
      const outputPath = join(blocker, 'resume.md');

      const result = await new MarkdownResumeRenderer().render(extractResumeContent(SAMPLE_RESUME), outputPath);

      expect(result.success).toBe(false);
      expect(result.error?.startsWith('Failed to render markdown document: ')).toBe(true);
      expect(ATSLogger.getLogsByType(LogType.ERROR)).toHaveLength(1);
    });
  });

  describe('DocxResumeRenderer', () => {
    it('should write a zip-packaged Word document', async () => {
      const outputPath = join(dir, 'resume.docx');
      const result = await new DocxResumeRenderer().render(extractResumeContent(SAMPLE_RESUME), outputPath);

      expect(result).toEqual({ success: true, path: outputPath });
      const bytes = await readFile(outputPath);
      expect(bytes.subarray(0, 2).toString('latin1')).toBe('PK');
    });
  });

  describe('createRenderer', () => {
    it('should pick the renderer by format', () => {
      expect(createRenderer('docx')).toBeInstanceOf(DocxResumeRenderer);
      expect(createRenderer('markdown').format).toBe('markdown');
    });
  });
});
