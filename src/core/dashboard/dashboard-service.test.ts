/**
 * Dashboard Service Unit Tests
 *
 * Builds one small program with passed, failed, overdue, upcoming and
 * unscheduled exams and checks the snapshot the service assembles from it.
 */

import { describe, it, expect } from 'vitest';
import { buildProgram, day } from '../../../tests/helpers';
import { CRITICAL_ENTRIES_LIMIT, DashboardService, compareCriticalEntries } from './dashboard-service';
import type { CriticalEntry } from './types';

const asOf = day('2024-03-01');

function sampleProgram() {
  return buildProgram({
    name: 'B.Sc. Test',
    studyModel: 'part-time-I',
    durationMonths: 36,
    startDate: '2024-01-01',
    semesters: [
      {
        plannedCredits: 10,
        modules: [
          { code: 'ALG', attempts: [{ grade: 2.0 }] },
          { code: 'DB', attempts: [{ grade: 5.0 }, { date: '2024-02-20' }] },
        ],
      },
      {
        plannedCredits: 12.5,
        modules: [
          { code: 'NET', title: 'Networks', credits: 10, attempts: [{ date: '2024-03-02' }] },
          { code: 'OS', attempts: [{ date: '2024-03-01' }] },
          { code: 'SE', attempts: [{}] },
          { code: 'AI', attempts: [{ date: '2024-06-01' }] },
          { code: 'ML', attempts: [{ date: '2024-01-15' }] },
        ],
      },
      { plannedCredits: 2.5, modules: [{ code: 'X', attempts: [{ grade: 1.0 }] }] },
      { plannedCredits: 5, modules: [{ code: 'Y', attempts: [{ grade: 3.0 }] }] },
    ],
  });
}

describe('DashboardService', () => {
  describe('buildState', () => {
    const state = new DashboardService().buildState(sampleProgram(), asOf);

    it('carries the identifying data', () => {
      expect(state.programName).toBe('B.Sc. Test');
      expect(state.studyModelText).toBe('Part-time I, 36 months');
      expect(state.startDate).toEqual(day('2024-01-01'));
      expect(state.currentSemester).toBe(4);
      expect(state.totalSemesters).toBe(4);
      expect(state.targetCredits).toBe(180);
      expect(state.gradeTarget).toBe(2.5);
    });

    it('computes the progress KPIs', () => {
      expect(state.earnedCredits).toBe(15);
      expect(state.progressPercent).toBeCloseTo(8.33, 2);
      // Undated semesters, 9 months each, 2 months elapsed: nothing due yet.
      expect(state.targetCreditsToDate).toBe(0);
      expect(state.deviation).toBe(15);
    });

    it('computes the grade KPIs', () => {
      expect(state.averageGrade).toBe(2.0);
      expect(state.modulesAboveGradeTarget).toBe(1);
    });

    it('counts open and overdue exams', () => {
      expect(state.examCounts).toEqual({ open: 6, overdue: 2 });
    });

    it('ranks critical entries: overdue, then by date', () => {
      expect(state.criticalEntries.map((e) => [e.moduleCode, e.statusText])).toEqual([
        ['ML', 'Exam overdue (scheduled: 15.01.2024)'],
        ['DB', 'Exam overdue (scheduled: 20.02.2024)'],
        ['OS', 'Exam TODAY: 01.03.2024'],
        ['NET', 'Exam TOMORROW: 02.03.2024'],
        ['AI', 'Exam in 92 days: 01.06.2024'],
      ]);
      expect(state.criticalEntries[0].isOverdue).toBe(true);
      expect(state.criticalEntries[3]).toMatchObject({ title: 'Networks', examDate: day('2024-03-02') });
    });

    it('counts critical modules within the horizon', () => {
      expect(state.criticalHorizonDays).toBe(60);
      expect(state.criticalModuleCount).toBe(4);
    });

    it('builds one row per semester', () => {
      expect(state.semesterRows).toEqual([
        { number: 1, plannedCredits: 10, earnedCredits: 5, status: 'under-plan', statusText: 'under plan (-5 credits)' },
        { number: 2, plannedCredits: 12.5, earnedCredits: 0, status: 'under-plan', statusText: 'under plan (-12.5 credits)' },
        { number: 3, plannedCredits: 2.5, earnedCredits: 5, status: 'over-plan', statusText: 'over plan' },
        { number: 4, plannedCredits: 5, earnedCredits: 5, status: 'on-plan', statusText: 'on plan' },
      ]);
    });

    it('is frozen and detached from the program', () => {
      const program = sampleProgram();
      const snapshot = new DashboardService().buildState(program, asOf);

      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(Object.isFrozen(snapshot.criticalEntries)).toBe(true);
      expect(Object.isFrozen(snapshot.criticalEntries[0])).toBe(true);
      expect(Object.isFrozen(snapshot.semesterRows[0])).toBe(true);
      expect(snapshot.startDate).not.toBe(program.startDate);
    });

    it('does not change when built twice', () => {
      const program = sampleProgram();
      const service = new DashboardService();
      expect(service.buildState(program, asOf)).toEqual(service.buildState(program, asOf));
    });
  });

  describe('options', () => {
    it('uses a custom grade target', () => {
      const state = new DashboardService({ gradeTarget: 1.5 }).buildState(sampleProgram(), asOf);
      expect(state.gradeTarget).toBe(1.5);
      expect(state.modulesAboveGradeTarget).toBe(2);
    });

    it('uses a custom critical horizon', () => {
      const state = new DashboardService({ criticalHorizonDays: 100 }).buildState(sampleProgram(), asOf);
      expect(state.criticalHorizonDays).toBe(100);
      expect(state.criticalModuleCount).toBe(5);
    });
  });

  describe('criticalEntries', () => {
    it('keeps program order for equal dates', () => {
      const program = buildProgram({
        semesters: [
          {
            modules: [
              { code: 'LATE', attempts: [{ date: '2024-03-09' }] },
              { code: 'B1', attempts: [{ date: '2024-03-05' }] },
              { code: 'B2', attempts: [{ date: '2024-03-05' }] },
            ],
          },
        ],
      });
      const codes = new DashboardService().criticalEntries(program, asOf).map((e) => e.moduleCode);
      expect(codes).toEqual(['B1', 'B2', 'LATE']);
    });

    it('skips completed modules and modules without a dated open exam', () => {
      const program = buildProgram({
        semesters: [
          {
            modules: [
              { code: 'DONE', attempts: [{ grade: 1.3 }, { date: '2024-03-05' }] },
              { code: 'FAILED', attempts: [{ grade: 5.0 }] },
              { code: 'UNDATED', attempts: [{}] },
            ],
          },
        ],
      });
      expect(new DashboardService().criticalEntries(program, asOf)).toEqual([]);
    });

    it(`caps the snapshot at ${CRITICAL_ENTRIES_LIMIT} entries`, () => {
      const modules = Array.from({ length: 12 }, (_, i) => ({
        code: `M${String(i + 1).padStart(2, '0')}`,
        attempts: [{ date: `2024-03-${String(10 + i).padStart(2, '0')}` }],
      }));
      const program = buildProgram({ semesters: [{ modules }] });
      const service = new DashboardService();

      expect(service.criticalEntries(program, asOf)).toHaveLength(12);
      const state = service.buildState(program, asOf);
      expect(state.criticalEntries).toHaveLength(CRITICAL_ENTRIES_LIMIT);
      expect(state.criticalEntries[9].moduleCode).toBe('M10');
      expect(state.criticalModuleCount).toBe(12);
    });
  });

  describe('compareCriticalEntries', () => {
    const entry = (moduleCode: string, examDate: Date | null, isOverdue: boolean): CriticalEntry => ({
      moduleCode,
      title: moduleCode,
      statusText: '',
      examDate,
      isOverdue,
    });

    it('puts overdue first, then upcoming, then undated', () => {
      const undated = entry('UNDATED', null, false);
      const upcoming = entry('UPCOMING', day('2024-03-01'), false);
      const overdue = entry('OVERDUE', day('2024-01-01'), true);

      const sorted = [undated, upcoming, overdue].sort(compareCriticalEntries);
      expect(sorted.map((e) => e.moduleCode)).toEqual(['OVERDUE', 'UPCOMING', 'UNDATED']);
    });

    it('ranks an early upcoming exam after a later overdue one', () => {
      const upcoming = entry('UPCOMING', day('2023-12-01'), false);
      const overdue = entry('OVERDUE', day('2024-02-01'), true);
      expect(compareCriticalEntries(upcoming, overdue)).toBeGreaterThan(0);
    });

    it('treats two undated entries as equal', () => {
      expect(compareCriticalEntries(entry('A', null, false), entry('B', null, false))).toBe(0);
    });
  });
});
