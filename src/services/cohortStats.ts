// src/services/cohortStats.ts
// Rankings and averages over a (term, class) cohort.
//
// Ranks are positional: after a stable descending sort each entry's rank is
// its index + 1, so equal scores get consecutive ranks in record order
// (totals [90, 90, 75] rank 1, 2, 3).

export interface CohortEntry {
  studentId: string;
  subjectId: string;
  total: number;
}

export interface SubjectStanding {
  score: number;
  rank: number;
  average: number;
  high: number;
  low: number;
  count: number;
}

export interface OverallStanding {
  totalScore: number;
  average: number;
  rank: number;
  subjectCount: number;
  cohortSize: number;
  cohortAverage: number;
}

export interface CohortStats {
  subjects: Record<string, SubjectStanding>;
  overall: OverallStanding;
}

interface SubjectTable {
  ranked: CohortEntry[];
  average: number;
  high: number;
  low: number;
}

interface StudentAggregate {
  studentId: string;
  totalScore: number;
  subjectCount: number;
  average: number;
}

export interface CohortTable {
  subjects: Map<string, SubjectTable>;
  students: StudentAggregate[]; // ranked
  cohortAverage: number;
}

export const round1 = (n: number) => Math.round(n * 10) / 10;

const rankDescending = <T>(items: T[], score: (item: T) => number) =>
  [...items].sort((a, b) => score(b) - score(a));

export function buildCohortTable(entries: CohortEntry[]): CohortTable {
  const bySubject = new Map<string, CohortEntry[]>();
  const byStudent = new Map<string, StudentAggregate>();

  for (const entry of entries) {
    const list = bySubject.get(entry.subjectId) ?? [];
    list.push(entry);
    bySubject.set(entry.subjectId, list);

    const agg = byStudent.get(entry.studentId) ?? {
      studentId: entry.studentId,
      totalScore: 0,
      subjectCount: 0,
      average: 0,
    };
    agg.totalScore += entry.total;
    agg.subjectCount += 1;
    byStudent.set(entry.studentId, agg);
  }

  const subjects = new Map<string, SubjectTable>();
  for (const [subjectId, list] of bySubject) {
    const scores = list.map((e) => e.total);
    subjects.set(subjectId, {
      ranked: rankDescending(list, (e) => e.total),
      average: Math.round(scores.reduce((a, b) => a + b, 0) / scores.length),
      high: Math.max(...scores),
      low: Math.min(...scores),
    });
  }

  const aggregates = [...byStudent.values()].map((agg) => ({
    ...agg,
    average: agg.totalScore / agg.subjectCount,
  }));
  const cohortAverage =
    aggregates.length > 0 ? aggregates.reduce((sum, a) => sum + a.average, 0) / aggregates.length : 0;

  return {
    subjects,
    students: rankDescending(aggregates, (a) => a.totalScore),
    cohortAverage: round1(cohortAverage),
  };
}

export function standingFor(table: CohortTable, studentId: string): CohortStats | null {
  const position = table.students.findIndex((s) => s.studentId === studentId);
  if (position === -1) return null;
  const aggregate = table.students[position];

  const subjects: Record<string, SubjectStanding> = {};
  for (const [subjectId, subject] of table.subjects) {
    const index = subject.ranked.findIndex((e) => e.studentId === studentId);
    if (index === -1) continue;
    subjects[subjectId] = {
      score: subject.ranked[index].total,
      rank: index + 1,
      average: subject.average,
      high: subject.high,
      low: subject.low,
      count: subject.ranked.length,
    };
  }

  return {
    subjects,
    overall: {
      totalScore: aggregate.totalScore,
      average: round1(aggregate.average),
      rank: position + 1,
      subjectCount: aggregate.subjectCount,
      cohortSize: table.students.length,
      cohortAverage: table.cohortAverage,
    },
  };
}

export const computeCohortStats = (entries: CohortEntry[], studentId: string) =>
  standingFor(buildCohortTable(entries), studentId);

/**
 * Memoizes cohort tables per (term, class). Writers must call `invalidate`
 * after changing any result in the cohort.
 */
export class CohortCache {
  private tables = new Map<string, CohortTable>();

  private static key(termId: string, classId: string) {
    return `${termId}:${classId}`;
  }

  async get(termId: string, classId: string, load: () => Promise<CohortEntry[]>): Promise<CohortTable> {
    const key = CohortCache.key(termId, classId);
    const cached = this.tables.get(key);
    if (cached) return cached;

    const table = buildCohortTable(await load());
    this.tables.set(key, table);
    return table;
  }

  invalidate(termId: string, classId: string) {
    this.tables.delete(CohortCache.key(termId, classId));
  }

  clear() {
    this.tables.clear();
  }
}
