// src/services/attendanceService.ts
import type { AttendanceStatus, NewAttendance, Repositories } from "../repositories/types";
import { NotFoundError, ValidationError } from "../lib/errors";

export interface RegisterInput {
  classId: string;
  date: string;
  termId?: string;
  entries: Array<{ studentId: string; status: AttendanceStatus }>;
  recordedBy: string;
}

export interface RegisterResult {
  recorded: number;
  skipped: string[];
}

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export async function recordRegister(repos: Repositories, input: RegisterInput): Promise<RegisterResult> {
  if (!DATE_RE.test(input.date) || Number.isNaN(Date.parse(input.date))) {
    throw new ValidationError(`date must be YYYY-MM-DD (got "${input.date}")`);
  }
  const schoolClass = await repos.classes.findById(input.classId);
  if (!schoolClass) throw new NotFoundError(`Class not found: ${input.classId}`);

  const term = input.termId ? await repos.terms.findById(input.termId) : await repos.terms.findCurrent();
  if (!term) throw new NotFoundError(input.termId ? `Term not found: ${input.termId}` : "No current term is set");

  const enrolled = new Set((await repos.users.list({ role: "student", classId: schoolClass.id })).map((u) => u.id));

  const records: NewAttendance[] = [];
  const skipped: string[] = [];
  for (const entry of input.entries) {
    if (!enrolled.has(entry.studentId)) {
      skipped.push(`${entry.studentId}: not a student of ${schoolClass.name}`);
      continue;
    }
    records.push({
      studentId: entry.studentId,
      classId: schoolClass.id,
      termId: term.id,
      date: input.date,
      status: entry.status,
      recordedBy: input.recordedBy,
    });
  }

  if (skipped.length) console.warn(`Attendance ${schoolClass.name} ${input.date}: skipped ${skipped.length} entries`);

  const recorded = records.length ? await repos.attendance.upsertMany(records) : 0;
  return { recorded, skipped };
}

export async function attendanceSummary(repos: Repositories, studentId: string, termId: string) {
  const rows = await repos.attendance.findForStudent(studentId, termId);
  const summary = { present: 0, absent: 0, late: 0, total: rows.length };
  for (const row of rows) summary[row.status] += 1;
  return summary;
}
