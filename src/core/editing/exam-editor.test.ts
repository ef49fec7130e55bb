/**
 * Exam Editing Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { buildAttempt, buildModule, buildProgram, day } from '../../../tests/helpers';
import { DomainValidationError } from '../models';
import {
  findModulesByCode,
  findOrCreateAttempt,
  parseAttemptInput,
  parseDateInput,
  parseGradeInput,
  setExamDate,
  setGrade,
} from './exam-editor';

describe('setGrade', () => {
  it('sets and clears a grade', () => {
    const attempt = buildAttempt();
    setGrade(attempt, 1.7);
    expect(attempt.grade).toBe(1.7);
    setGrade(attempt, null);
    expect(attempt.grade).toBeNull();
  });

  it('leaves the attempt untouched on an invalid grade', () => {
    const attempt = buildAttempt({ grade: 3.0 });
    expect(() => setGrade(attempt, 0.5)).toThrow(DomainValidationError);
    expect(() => setGrade(attempt, Number.POSITIVE_INFINITY)).toThrow(DomainValidationError);
    expect(attempt.grade).toBe(3.0);
  });
});

describe('setExamDate', () => {
  it('sets and clears a date', () => {
    const attempt = buildAttempt();
    setExamDate(attempt, day('2024-07-01'));
    expect(attempt.date).toEqual(day('2024-07-01'));
    setExamDate(attempt, null);
    expect(attempt.date).toBeNull();
  });

  it('rejects an invalid Date', () => {
    const attempt = buildAttempt({ date: '2024-07-01' });
    expect(() => setExamDate(attempt, new Date(Number.NaN))).toThrow(DomainValidationError);
    expect(attempt.date).toEqual(day('2024-07-01'));
  });
});

describe('findOrCreateAttempt', () => {
  it('returns an existing attempt', () => {
    const module = buildModule({ attempts: [{}, {}] });
    const result = findOrCreateAttempt(module, 2);
    expect(result.outcome).toBe('existing');
    expect(module.attempts).toHaveLength(2);
  });

  it('creates a missing attempt with the exam type of the first one', () => {
    const module = buildModule({
      code: 'CS202',
      attempts: [{ examType: 'oral-exam', grade: 5.0 }],
    });

    const result = findOrCreateAttempt(module, 2);

    expect(result.outcome).toBe('created');
    if (result.outcome !== 'created') return;
    expect(result.attempt.id).toBe('CS202-A2');
    expect(result.attempt.examType).toBe('oral-exam');
    expect(result.attempt.date).toBeNull();
    expect(result.attempt.grade).toBeNull();
    expect(module.attempts.map((a) => a.attemptNumber)).toEqual([1, 2]);
  });

  it('keeps attempts sorted when a gap is filled', () => {
    const module = buildModule({ attempts: [{ attemptNumber: 1 }, { attemptNumber: 3 }] });
    findOrCreateAttempt(module, 2);
    expect(module.attempts.map((a) => a.attemptNumber)).toEqual([1, 2, 3]);
  });

  it('signals the limit when three attempts exist and none matches', () => {
    const module = buildModule({
      attempts: [{ attemptNumber: 1 }, { attemptNumber: 2 }, { attemptNumber: 2 }],
    });
    expect(findOrCreateAttempt(module, 3)).toEqual({ outcome: 'limit-reached', maxAttempts: 3 });
    expect(module.attempts).toHaveLength(3);
  });

  it('rejects attempt numbers outside 1..3', () => {
    expect(() => findOrCreateAttempt(buildModule(), 4)).toThrow(DomainValidationError);
  });
});

describe('findModulesByCode', () => {
  const program = buildProgram({
    semesters: [
      { modules: [{ code: 'CS101' }, { code: ' CS503 ', title: 'Elective A' }] },
      { modules: [{ code: 'CS503', title: 'Elective B' }] },
    ],
  });

  it('returns every module with the code, in program order', () => {
    expect(findModulesByCode(program, 'CS503').map((m) => m.title)).toEqual(['Elective A', 'Elective B']);
  });

  it('trims the needle', () => {
    expect(findModulesByCode(program, '  CS101 ')).toHaveLength(1);
  });

  it('finds nothing for unknown or blank codes', () => {
    expect(findModulesByCode(program, 'XX999')).toEqual([]);
    expect(findModulesByCode(program, '   ')).toEqual([]);
  });
});

describe('parseGradeInput', () => {
  it('accepts comma and dot as decimal separator', () => {
    expect(parseGradeInput('2,3')).toBe(2.3);
    expect(parseGradeInput(' 1.7 ')).toBe(1.7);
    expect(parseGradeInput('4')).toBe(4);
  });

  it('treats blank input as "clear"', () => {
    expect(parseGradeInput('')).toBeNull();
    expect(parseGradeInput('   ')).toBeNull();
  });

  it('rejects text and out-of-range numbers', () => {
    expect(() => parseGradeInput('good')).toThrow('"good" is not a number.');
    expect(() => parseGradeInput('-1')).toThrow(DomainValidationError);
    expect(() => parseGradeInput('5,5')).toThrow('Grade must be between 1.0 and 5.0, got 5.5.');
  });
});

describe('parseDateInput', () => {
  it('accepts DD.MM.YYYY and YYYY-MM-DD', () => {
    expect(parseDateInput('15.03.2024')).toEqual(day('2024-03-15'));
    expect(parseDateInput('5.3.2024')).toEqual(day('2024-03-05'));
    expect(parseDateInput('2024-03-15')).toEqual(day('2024-03-15'));
  });

  it('treats blank input as "clear"', () => {
    expect(parseDateInput(' ')).toBeNull();
  });

  it('rejects other formats and impossible dates', () => {
    expect(() => parseDateInput('03/15/2024')).toThrow(
      '"03/15/2024" is not a valid date (use DD.MM.YYYY or YYYY-MM-DD).'
    );
    expect(() => parseDateInput('31.02.2024')).toThrow(DomainValidationError);
  });
});

describe('parseAttemptInput', () => {
  it('accepts 1, 2 and 3', () => {
    expect(parseAttemptInput(' 2 ')).toBe(2);
  });

  it('rejects anything else', () => {
    expect(() => parseAttemptInput('two')).toThrow('"two" is not an attempt number.');
    expect(() => parseAttemptInput('4')).toThrow('Attempt number must be between 1 and 3, got 4.');
  });
});
