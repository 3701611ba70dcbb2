/**
 * Shared test data and in-process enhancer stubs
 */

import type { TextEnhancer } from '../../ats-engine/enhancement/textEnhancer';

export const SENIOR_PYTHON_POSTING =
  'Senior Python Developer. Required: Python, Django, PostgreSQL, AWS, Git. Preferred: React, Docker.';

export const SAMPLE_RESUME = `Jane Doe
jane.doe@example.com | (555) 123-4567
linkedin.com/in/janedoe | github.com/janedoe
Location: Austin, TX

Summary
Backend engineer focused on Python services

Experience
Senior Developer Jan 2020 - Present
Acme Corp
- Built REST APIs with Python and Django
- Managed PostgreSQL databases
Developer 2017 - 2019
Beta Inc
- Maintained internal tools

Education
Bachelor of Science in Computer Science, State University, 2016

Skills
Languages: Python, SQL
Tools: Docker, Git

Certifications
AWS Certified Developer

Projects
Inventory Tracker: Stock management tool
- Built with Flask`;

export const FIXED_NOW = new Date('2026-01-15T12:00:00.000Z');

/**
 * Replies chosen by the first matching prompt fragment; null when none match
 */
export class StubEnhancer implements TextEnhancer {
  readonly prompts: string[] = [];

  constructor(private readonly replies: ReadonlyArray<readonly [string, string]>) {}

  async generate(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    const match = this.replies.find(([fragment]) => prompt.includes(fragment));
    return match ? match[1] : null;
  }
}

export class FailingEnhancer implements TextEnhancer {
  calls = 0;

  async generate(): Promise<string | null> {
    this.calls++;
    throw new Error('service unavailable');
  }
}

/**
 * Never settles; exercises the per-call timeout
 */
export class HangingEnhancer implements TextEnhancer {
  generate(): Promise<string | null> {
    return new Promise<string | null>(() => undefined);
  }
}
