/**
 * Optimize Resume Example
 *
 * Extracts a job and a resume from plain text, optimizes the resume and
 * writes it as Markdown and Word. Uses the LLM enhancer when an API key is
 * configured in .env, the deterministic path otherwise.
 */

import { ATSEngine } from '../src/ats-engine';

const posting = `Backend Engineer
Location: Remote

Responsibilities: design REST APIs, review code, mentor junior engineers

Required: TypeScript, Node.js, PostgreSQL, Docker
Preferred: Kubernetes, GraphQL

3+ years of professional experience. Bachelor's degree in computer science.`;

const resume = `Alex Morgan
alex.morgan@example.com | 555-010-2030
linkedin.com/in/alexmorgan

Summary
Backend developer building services in TypeScript and Node.js

Experience
Software Engineer Jan 2021 - Present
Example Labs
- Built order services on Node.js and PostgreSQL
- Ran deployments with Docker

Skills
Languages: TypeScript, JavaScript, SQL

Education
B.S. in Computer Science, Example University, 2020`;

async function main() {
  const engine = new ATSEngine();
  const { optimization } = await engine.run({
    posting,
    resume,
    hints: { title: 'Backend Engineer' },
    output: { format: 'markdown', path: 'output/optimized-resume.md' }
  });

  console.log(`Score: ${optimization.beforeScore.overall.toFixed(1)} -> ${optimization.afterScore.overall.toFixed(1)}`);
  for (const improvement of optimization.improvementsMade) {
    console.log(`  - ${improvement}`);
  }

  const docx = await engine.render(optimization.optimizedResume, 'docx', 'output/optimized-resume.docx');
  console.log(docx.success ? `Word document: ${docx.path}` : `Word export failed: ${docx.error}`);
}

main().catch(console.error);
