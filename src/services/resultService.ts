// src/services/resultService.ts
import type { GradeBand, Repositories, ResultRecord, Role, SubjectRecord, TermRecord, UserRecord } from "../repositories/types";
import { NotFoundError, ValidationError } from "../lib/errors";
import { parseMarks, scoreMarks, type MarkField } from "../utils/gradingCore";
import { isGradingPreset, presetScale } from "../utils/gradingScales";
import { CohortCache, round1, standingFor, type CohortEntry, type OverallStanding } from "./cohortStats";
import { assertAccess, checkAccess, type AccessDecision } from "./accessGate";

export interface ResultServiceDeps {
  repos: Repositories;
  cohortCache: CohortCache;
  defaultScale: string;
}

export type RawMarks = Record<MarkField, unknown>;

export interface RecordMarksInput {
  studentId: string;
  subjectId: string;
  termId: string;
  marks: RawMarks;
  recordedBy: string | null;
}

export interface SubjectResultView {
  subject: Pick<SubjectRecord, "id" | "name" | "code">;
  ca1: number;
  ca2: number;
  ca3: number;
  ca4: number;
  exam: number;
  total: number;
  grade: string;
  remark: string;
  rank: number | null;
  average: number | null;
  high: number | null;
  low: number | null;
}

export interface ResultSheet {
  term: Pick<TermRecord, "id" | "name" | "sessionId">;
  student: Pick<UserRecord, "id" | "name" | "admissionNumber" | "classId">;
  results: SubjectResultView[];
  overall: OverallStanding | null;
}

export interface BroadsheetRow {
  student: Pick<UserRecord, "id" | "name" | "admissionNumber">;
  scores: Record<string, number>; // subjectId -> total
  totalScore: number;
  average: number;
  rank: number;
}

/** Grading scale in force: a custom scale saved in settings, else a preset. */
export async function activeGradingScale(deps: Pick<ResultServiceDeps, "repos" | "defaultScale">): Promise<GradeBand[]> {
  const settings = await deps.repos.settings.get();
  if (settings.gradingScale && settings.gradingScale.length > 0) return settings.gradingScale;
  if (settings.gradingPreset && isGradingPreset(settings.gradingPreset)) return presetScale(settings.gradingPreset);
  return presetScale(deps.defaultScale);
}

async function requireStudent(repos: Repositories, studentId: string) {
  const student = await repos.users.findById(studentId);
  if (!student || student.role !== "student") throw new NotFoundError(`Student not found: ${studentId}`);
  return student;
}

async function requireTerm(repos: Repositories, termId: string) {
  const term = await repos.terms.findById(termId);
  if (!term) throw new NotFoundError(`Term not found: ${termId}`);
  return term;
}

/**
 * Clamps, totals and grades one student's marks for a subject and term, then
 * overwrites the stored row for that key. Every derived field is recomputed
 * on each save.
 *
 * A student's results for a term always sit in one cohort: when the student
 * has changed class, their earlier rows for the term follow them into the
 * current class and both cohorts are recomputed.
 */
export async function recordMarks(deps: ResultServiceDeps, input: RecordMarksInput): Promise<ResultRecord> {
  const { repos } = deps;
  const marks = parseMarks(input.marks);

  const student = await requireStudent(repos, input.studentId);
  const classId = student.classId;
  if (!classId) {
    throw new ValidationError(`Student ${student.name} is not assigned to a class`);
  }
  const subject = await repos.subjects.findById(input.subjectId);
  if (!subject) throw new NotFoundError(`Subject not found: ${input.subjectId}`);
  await requireTerm(repos, input.termId);

  const previousClasses = new Set(
    (await repos.results.findForStudent(student.id, input.termId)).map((r) => r.classId).filter((id) => id !== classId)
  );
  if (previousClasses.size > 0) await repos.results.moveToClass(student.id, input.termId, classId);

  const scored = scoreMarks(marks, await activeGradingScale(deps));
  const saved = await repos.results.upsert(
    { studentId: student.id, subjectId: subject.id, termId: input.termId },
    { ...scored, classId, recordedBy: input.recordedBy }
  );

  for (const previous of previousClasses) deps.cohortCache.invalidate(input.termId, previous);
  deps.cohortCache.invalidate(input.termId, classId);
  return saved;
}

const toEntries = (rows: ResultRecord[]): CohortEntry[] =>
  rows.map((r) => ({ studentId: r.studentId, subjectId: r.subjectId, total: r.total }));

function loadCohort(deps: ResultServiceDeps, termId: string, classId: string) {
  return deps.cohortCache.get(termId, classId, async () => toEntries(await deps.repos.results.findCohort(termId, classId)));
}

async function subjectIndex(repos: Repositories) {
  return new Map((await repos.subjects.list()).map((s) => [s.id, s]));
}

/** Builds the result sheet without any access check. */
export async function buildResultSheet(deps: ResultServiceDeps, studentId: string, termId: string): Promise<ResultSheet> {
  const { repos } = deps;
  const student = await requireStudent(repos, studentId);
  const term = await requireTerm(repos, termId);

  const rows = await repos.results.findForStudent(student.id, term.id);
  const subjects = await subjectIndex(repos);

  // The cohort is the class the marks were recorded under; recordMarks keeps it
  // the same for every row of the term.
  const classId = rows[0]?.classId ?? student.classId;
  const standing = classId ? standingFor(await loadCohort(deps, term.id, classId), student.id) : null;

  const results = rows.map((row): SubjectResultView => {
    const subject = subjects.get(row.subjectId);
    const stats = standing?.subjects[row.subjectId];
    return {
      subject: { id: row.subjectId, name: subject?.name ?? "Unknown subject", code: subject?.code ?? "" },
      ca1: row.ca1,
      ca2: row.ca2,
      ca3: row.ca3,
      ca4: row.ca4,
      exam: row.exam,
      total: row.total,
      grade: row.grade,
      remark: row.remark,
      rank: stats?.rank ?? null,
      average: stats?.average ?? null,
      high: stats?.high ?? null,
      low: stats?.low ?? null,
    };
  });
  results.sort((a, b) => a.subject.name.localeCompare(b.subject.name));

  return {
    term: { id: term.id, name: term.name, sessionId: term.sessionId },
    student: { id: student.id, name: student.name, admissionNumber: student.admissionNumber, classId: student.classId },
    results,
    overall: standing?.overall ?? null,
  };
}

/**
 * Result view behind the PIN gate. Throws AccessDeniedError on denial, in
 * which case nothing about the student's results is read.
 */
export async function viewResults(
  deps: ResultServiceDeps,
  viewer: { id: string; role: Role },
  studentId: string,
  termId: string,
  suppliedCode?: string | null
): Promise<{ sheet: ResultSheet; access: Extract<AccessDecision, { granted: true }>["via"] }> {
  await requireTerm(deps.repos, termId);

  const decision = await checkAccess(deps.repos, viewer, termId, suppliedCode);
  assertAccess(decision);

  return { sheet: await buildResultSheet(deps, studentId, termId), access: decision.via };
}

export async function buildBroadsheet(deps: ResultServiceDeps, termId: string, classId: string) {
  const { repos } = deps;
  const term = await requireTerm(repos, termId);
  const schoolClass = await repos.classes.findById(classId);
  if (!schoolClass) throw new NotFoundError(`Class not found: ${classId}`);

  const rows = await repos.results.findCohort(term.id, schoolClass.id);
  const table = await loadCohort(deps, term.id, schoolClass.id);
  const subjects = await subjectIndex(repos);

  const scores = new Map<string, Record<string, number>>();
  for (const row of rows) {
    const perStudent = scores.get(row.studentId) ?? {};
    perStudent[row.subjectId] = row.total;
    scores.set(row.studentId, perStudent);
  }

  const students: BroadsheetRow[] = [];
  for (const [index, aggregate] of table.students.entries()) {
    const user = await repos.users.findById(aggregate.studentId);
    students.push({
      student: {
        id: aggregate.studentId,
        name: user?.name ?? "Unknown student",
        admissionNumber: user?.admissionNumber ?? null,
      },
      scores: scores.get(aggregate.studentId) ?? {},
      totalScore: aggregate.totalScore,
      average: round1(aggregate.average),
      rank: index + 1,
    });
  }

  const subjectSummary = [...table.subjects.entries()].map(([subjectId, s]) => ({
    subject: { id: subjectId, name: subjects.get(subjectId)?.name ?? "Unknown subject", code: subjects.get(subjectId)?.code ?? "" },
    average: s.average,
    high: s.high,
    low: s.low,
    count: s.ranked.length,
  }));

  return {
    term: { id: term.id, name: term.name },
    class: schoolClass,
    cohortSize: table.students.length,
    cohortAverage: table.cohortAverage,
    subjects: subjectSummary,
    students,
  };
}
