/**
 * Unit tests for match scoring
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  scoreMatch,
  composeResumeText,
  rankKeywordsByFrequency,
  calculateKeywordScore,
  calculateSkillScore,
  calculateExperienceScore,
  findMatchedKeywords,
  NEUTRAL_SCORE,
  NO_EXPERIENCE_SCORE
} from '../../ats-engine/scoring/matchScorer';
import { extractJobRequirements } from '../../ats-engine/parser/jobParser';
import { extractResumeContent } from '../../ats-engine/parser/resumeParser';
import { ATSErrorCode, isATSError } from '../../ats-engine/errors/types';
import { ATSLogger, LogType } from '../../ats-engine/logging/logger';
import type { JobRequirements, ResumeContent } from '../../ats-engine/types';
import { SAMPLE_RESUME, SENIOR_PYTHON_POSTING } from './fixtures';

describe('Match Scorer', () => {
  let job: JobRequirements;
  let resume: ResumeContent;

  beforeEach(() => {
    ATSLogger.setEnabled(true);
    ATSLogger.clearLogs();
    job = extractJobRequirements(SENIOR_PYTHON_POSTING);
    resume = extractResumeContent(SAMPLE_RESUME);
  });

  describe('scoreMatch', () => {
    it('should score the sample resume against the senior Python posting', () => {
      const score = scoreMatch(resume, job);

      expect(score.keywordScore).toBe(87.5);
      expect(score.skillScore).toBeCloseTo(400 / 7, 10);
      expect(score.experienceScore).toBe(72);
      expect(score.formattingScore).toBe(90);
      expect(score.overall).toBeCloseTo(35 + 0.3 * (400 / 7) + 14.4 + 9, 10);
      expect(score.matchedKeywords).toEqual({
        Python: 4,
        Django: 2,
        PostgreSQL: 1,
        AWS: 1,
        Git: 2,
        Docker: 2,
        senior: 1
      });
    });

    it('should apply custom weights', () => {
      const score = scoreMatch(resume, job, { keyword: 1, skill: 0, experience: 0, formatting: 0 });
      expect(score.overall).toBe(87.5);
    });

    it('should be deterministic', () => {
      expect(scoreMatch(resume, job)).toEqual(scoreMatch(resume, job));
    });

    it('should return neutral keyword and skill scores for an empty posting', () => {
      const score = scoreMatch(resume, extractJobRequirements(''));
      expect(score.keywordScore).toBe(NEUTRAL_SCORE);
      expect(score.skillScore).toBe(NEUTRAL_SCORE);
      expect(score.experienceScore).toBe(60);
      expect(score.matchedKeywords).toEqual({});
    });

    it('should log the score breakdown', () => {
      scoreMatch(resume, job);
      const logs = ATSLogger.getLogsByType(LogType.SCORING);
      expect(logs).toHaveLength(1);
      expect(logs[0].context?.keywordCount).toBe(8);
    });

    it('should reject a missing resume record', () => {
      const missing: ResumeContent = JSON.parse('null');
      expect.assertions(1);
      try {
        scoreMatch(missing, job);
      } catch (error) {
        expect(isATSError(error, ATSErrorCode.INVALID_INPUT)).toBe(true);
      }
    });
  });

  describe('dimension scores', () => {
    it('should give the no-experience score to resumes without entries', () => {
      expect(calculateExperienceScore({ ...resume, workExperience: [] }, job)).toBe(NO_EXPERIENCE_SCORE);
    });

    it('should add up to 40 points for top keywords found in descriptions', () => {
      const description = job.atsKeywords.join(' ');
      const entry = { title: 'Engineer', company: '', duration: '', description };
      expect(calculateExperienceScore({ ...resume, workExperience: [entry] }, job)).toBe(60 + 40 * 8 / 10);
    });

    it('should match keywords on word boundaries', () => {
      expect(calculateKeywordScore('Uses GitHub and Pythonic idioms', job)).toBe(0);
      expect(calculateKeywordScore('python, GIT', job)).toBe(25);
    });

    it('should compare skills case-insensitively', () => {
      const lowered = {
        ...resume,
        technicalSkills: ['PYTHON', 'django', 'Postgresql', 'aws', 'GIT', 'react', 'docker'],
        programmingLanguages: [],
        frameworksTools: []
      };
      expect(calculateSkillScore(lowered, job)).toBe(100);
    });

    it('should count literal occurrences case-insensitively', () => {
      expect(findMatchedKeywords('AWS aws Aws', job)).toEqual({ AWS: 3 });
    });
  });

  describe('composeResumeText', () => {
    it('should join name, sections and entries one per line', () => {
      const text = composeResumeText(resume);
      expect(text.split('\n')).toEqual([
        'Jane Doe',
        'Backend engineer focused on Python services',
        'Python, SQL, Docker, Git',
        'python, sql',
        'django, flask, docker, git',
        'Senior Developer Acme Corp Built REST APIs with Python and Django Managed PostgreSQL databases',
        'Developer Beta Inc Maintained internal tools',
        'Bachelor Computer Science State University 2016',
        'AWS Certified Developer',
        'Inventory Tracker Stock management tool Built with Flask'
      ]);
    });
  });

  describe('rankKeywordsByFrequency', () => {
    it('should order by frequency and keep ties in keyword order', () => {
      expect(rankKeywordsByFrequency(job)).toEqual([
        'Python', 'Django', 'PostgreSQL', 'AWS', 'Git', 'React', 'Docker', 'senior'
      ]);
    });

    it('should treat keywords missing from the frequency map as zero', () => {
      const ranked = rankKeywordsByFrequency({ ...job, atsKeywords: ['Extra', ...job.atsKeywords] });
      expect(ranked[0]).toBe('Python');
      expect(ranked[ranked.length - 1]).toBe('Extra');
    });
  });
});
