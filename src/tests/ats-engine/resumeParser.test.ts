/**
 * Unit tests for resume content extraction and formatting analysis
 */

import { describe, it, expect } from 'vitest';
import {
  extractResumeContent,
  extractName,
  extractPhone,
  extractPortfolioUrl,
  extractSummary,
  extractWorkExperience,
  extractEducation,
  extractProjects,
  extractTechnicalSkills,
  extractCertifications,
  splitTitleAndDuration,
  analyzeFormatting,
  finalizeResume,
  toSections,
  SUMMARY_MAX_LENGTH
} from '../../ats-engine/parser/resumeParser';
import { SAMPLE_RESUME } from './fixtures';

describe('Resume Content Extractor', () => {
  describe('extractResumeContent', () => {
    const resume = extractResumeContent(SAMPLE_RESUME);

    it('should extract identity fields', () => {
      expect(resume.name).toBe('Jane Doe');
      expect(resume.email).toBe('jane.doe@example.com');
      expect(resume.phone).toBe('(555) 123-4567');
      expect(resume.location).toBe('Austin, TX');
      expect(resume.linkedinUrl).toBe('https://linkedin.com/in/janedoe');
      expect(resume.githubUrl).toBe('https://github.com/janedoe');
      expect(resume.portfolioUrl).toBe('');
    });

    it('should extract the summary', () => {
      expect(resume.summary).toBe('Backend engineer focused on Python services');
    });

    it('should split work experience into entries', () => {
      expect(resume.workExperience).toEqual([
        {
          title: 'Senior Developer',
          company: 'Acme Corp',
          duration: 'Jan 2020 - Present',
          description: 'Built REST APIs with Python and Django Managed PostgreSQL databases'
        },
        {
          title: 'Developer',
          company: 'Beta Inc',
          duration: '2017 - 2019',
          description: 'Maintained internal tools'
        }
      ]);
    });

    it('should extract education', () => {
      expect(resume.education).toEqual([
        { degree: 'Bachelor', field: 'Computer Science', institution: 'State University', year: '2016' }
      ]);
    });

    it('should extract skills by category', () => {
      expect(resume.technicalSkills).toEqual(['Python', 'SQL', 'Docker', 'Git']);
      expect(resume.programmingLanguages).toEqual(['python', 'sql']);
      expect(resume.frameworksTools).toEqual(['django', 'flask', 'docker', 'git']);
      expect(resume.softSkills).toEqual([]);
    });

    it('should extract certifications and projects', () => {
      expect(resume.certifications).toEqual(['AWS Certified Developer']);
      expect(resume.projects).toEqual([
        { name: 'Inventory Tracker', description: 'Stock management tool Built with Flask' }
      ]);
    });

    it('should compute word count and formatting diagnostics', () => {
      expect(resume.wordCount).toBe(55);
      expect(resume.atsScore).toBe(90);
      expect(resume.formattingIssues).toEqual(['Resume is too short (55 words, aim for 300-800)']);
      expect(resume.optimizationSuggestions).toEqual([]);
    });

    it('should honour configured word count bounds', () => {
      const bounded = extractResumeContent(SAMPLE_RESUME, { formatting: { minWordCount: 0, maxWordCount: 100 } });
      expect(bounded.atsScore).toBe(100);
      expect(bounded.formattingIssues).toEqual([]);
    });

    it('should return an empty record for empty text', () => {
      const empty = extractResumeContent('');
      expect(empty.name).toBe('');
      expect(empty.workExperience).toEqual([]);
      expect(empty.wordCount).toBe(0);
      expect(empty.atsScore).toBe(0);
      expect(empty.formattingIssues).toEqual([
        'Resume is too short (0 words, aim for 300-800)',
        'Missing candidate name',
        'Missing email address',
        'Missing work experience section',
        'Missing skills section'
      ]);
      expect(empty.optimizationSuggestions).toEqual([
        'Add an education section',
        'List technical skills such as languages, frameworks and tools',
        'Add a phone number',
        'Add a professional summary',
        'Add a LinkedIn profile URL'
      ]);
    });
  });

  describe('contact extractors', () => {
    it('should take the first 2-4 token alphabetic line as the name', () => {
      expect(extractName(['RESUME 2024', 'Ana María López', 'ana@example.com'])).toBe('Ana María López');
      expect(extractName(['a', 'b', 'c', 'd', 'e', 'Late Name'])).toBe('');
    });

    it('should require at least ten digits for a phone number', () => {
      expect(extractPhone('Call +1 555 010 2030 today')).toBe('+1 555 010 2030');
      expect(extractPhone('2019 - 2021')).toBe('');
    });

    it('should skip profile links when looking for a portfolio', () => {
      expect(extractPortfolioUrl('https://linkedin.com/in/x https://janedoe.dev/work.')).toBe('https://janedoe.dev/work');
    });
  });

  describe('section extractors', () => {
    it('should cap the summary length', () => {
      const summary = extractSummary(['x'.repeat(SUMMARY_MAX_LENGTH + 100)]);
      expect(summary).toHaveLength(SUMMARY_MAX_LENGTH);
    });

    it('should stop the summary at the first blank line', () => {
      expect(extractSummary(['', 'First line', 'second line', '', 'Other'])).toBe('First line second line');
    });

    it('should split title and duration at the first year', () => {
      expect(splitTitleAndDuration('Software Engineer, Acme, March 2019 - 2021')).toEqual({
        title: 'Software Engineer, Acme',
        duration: 'March 2019 - 2021'
      });
      expect(splitTitleAndDuration('Team Lead')).toEqual({ title: 'Team Lead', duration: '' });
    });

    it('should drop experience entries that are too short or untitled', () => {
      expect(extractWorkExperience(['Dev 2020', 'Short note'])).toEqual([]);
      expect(extractWorkExperience(['2019-2021 freelance consulting'])).toEqual([]);
    });

    it('should read the institution from the following line', () => {
      expect(extractEducation(['Master of Science in Data Analytics', 'Example Institute of Technology 2019'])).toEqual([
        { degree: 'Master', field: 'Data Analytics', institution: 'Example Institute of Technology', year: '2019' }
      ]);
    });

    it('should extend project descriptions with bullet lines', () => {
      expect(extractProjects(['Chat App - Realtime messaging', '- Used WebSockets', 'Blog', '* Static site'])).toEqual([
        { name: 'Chat App', description: 'Realtime messaging Used WebSockets' },
        { name: 'Blog', description: 'Static site' }
      ]);
    });

    it('should strip skill labels and keep mid-length entries', () => {
      expect(extractTechnicalSkills(['Cloud & DevOps: AWS, Terraform; K', 'python, Python'])).toEqual([
        'AWS',
        'Terraform',
        'python'
      ]);
    });

    it('should keep certifications longer than three characters', () => {
      expect(extractCertifications(['PMP, Certified ScrumMaster', 'CISSP • CCNA'])).toEqual([
        'Certified ScrumMaster',
        'CISSP',
        'CCNA'
      ]);
    });
  });

  describe('analyzeFormatting and finalizeResume', () => {
    it('should recompute derived fields from the sections', () => {
      const resume = extractResumeContent(SAMPLE_RESUME);
      const trimmed = finalizeResume({ ...toSections(resume), education: [], phone: '' });
      expect(trimmed.wordCount).toBe(49);
      expect(trimmed.atsScore).toBe(80);
      expect(trimmed.optimizationSuggestions).toEqual(['Add an education section', 'Add a phone number']);
    });

    it('should flag overly long resumes', () => {
      const resume = extractResumeContent(SAMPLE_RESUME);
      const analysis = analyzeFormatting({ ...resume, wordCount: 900 });
      expect(analysis.atsScore).toBe(90);
      expect(analysis.formattingIssues).toEqual(['Resume is too long (900 words, aim for 300-800)']);
    });
  });
});
