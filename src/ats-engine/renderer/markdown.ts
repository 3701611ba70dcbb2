/**
 * Markdown rendering of resume records
 *
 * Section order: name, contact line, URL line, Professional Summary,
 * Technical Skills, Professional Experience, Education, Projects,
 * Certifications. Empty sections are omitted.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Education, RenderResult, ResumeContent } from '../types';
import type { DocumentRenderer } from './types';
import { loggers } from '../../shared/logger';
import { toError } from '../../shared/errors';
import { ATSErrorFactory } from '../errors/types';
import { ATSLogger } from '../logging/logger';

export function formatEducation(entry: Education): string {
  let text = entry.field ? `${entry.degree} in ${entry.field}` : entry.degree;
  if (entry.institution) {
    text += text ? ` - ${entry.institution}` : entry.institution;
  }
  if (entry.year) {
    text += ` (${entry.year})`;
  }
  return text.trim();
}

export function resumeToMarkdown(resume: ResumeContent): string {
  const blocks: string[][] = [];

  const header: string[] = [];
  if (resume.name) {
    header.push(`# ${resume.name}`);
  }
  const contact = [resume.email, resume.phone, resume.location].filter(Boolean);
  if (contact.length > 0) {
    header.push(contact.join(' | '));
  }
  const urls = [resume.linkedinUrl, resume.githubUrl, resume.portfolioUrl].filter(Boolean);
  if (urls.length > 0) {
    header.push(urls.join(' | '));
  }
  if (header.length > 0) {
    blocks.push(header);
  }

  if (resume.summary) {
    blocks.push(['## Professional Summary', resume.summary]);
  }

  if (resume.programmingLanguages.length || resume.frameworksTools.length || resume.technicalSkills.length) {
    const skills = ['## Technical Skills'];
    if (resume.programmingLanguages.length) {
      skills.push(`- Programming Languages: ${resume.programmingLanguages.join(', ')}`);
    }
    if (resume.frameworksTools.length) {
      skills.push(`- Frameworks & Tools: ${resume.frameworksTools.join(', ')}`);
    }
    if (resume.technicalSkills.length) {
      skills.push(`- Technical Skills: ${resume.technicalSkills.join(', ')}`);
    }
    blocks.push(skills);
  }

  if (resume.workExperience.length) {
    const experience = ['## Professional Experience'];
    resume.workExperience.forEach((entry, index) => {
      if (index > 0) {
        experience.push('');
      }
      experience.push(`### ${[entry.title, entry.company].filter(Boolean).join(' - ')}`);
      if (entry.duration) {
        experience.push(entry.duration);
      }
      if (entry.description) {
        experience.push(entry.description);
      }
    });
    blocks.push(experience);
  }

  if (resume.education.length) {
    blocks.push(['## Education', ...resume.education.map(entry => `- ${formatEducation(entry)}`)]);
  }

  if (resume.projects.length) {
    const projects = ['## Projects'];
    for (const project of resume.projects) {
      if (project.name) {
        projects.push(`### ${project.name}`);
      }
      if (project.description) {
        projects.push(project.description);
      }
    }
    blocks.push(projects);
  }

  if (resume.certifications.length) {
    blocks.push(['## Certifications', ...resume.certifications.map(cert => `- ${cert}`)]);
  }

  return blocks.length > 0 ? `${blocks.map(block => block.join('\n')).join('\n\n')}\n` : '';
}

/**
 * Write content to a file, creating parent directories
 */
export async function writeDocument(outputPath: string, content: string | Buffer): Promise<void> {
  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, content);
}

export function renderFailure(format: string, outputPath: string, error: unknown): RenderResult {
  const failure = ATSErrorFactory.renderFailed(format, outputPath, toError(error).message);
  ATSLogger.logError(failure, { format, outputPath });
  return { success: false, error: failure.describe() };
}

export class MarkdownResumeRenderer implements DocumentRenderer {
  readonly format = 'markdown' as const;

  async render(resume: ResumeContent, outputPath: string): Promise<RenderResult> {
    try {
      await writeDocument(outputPath, resumeToMarkdown(resume));
      loggers.renderer.info({ format: this.format, outputPath }, 'Resume rendered');
      return { success: true, path: outputPath };
    } catch (error) {
      return renderFailure(this.format, outputPath, error);
    }
  }
}
