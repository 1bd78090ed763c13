// src/services/marksImporter.ts
import papa from "papaparse";
import type { UserRecord, SubjectRecord } from "../repositories/types";
import { NotFoundError, ValidationError } from "../lib/errors";
import { MARK_FIELDS } from "../utils/gradingCore";
import { recordMarks, type ResultServiceDeps } from "./resultService";

export const MARKS_UPLOAD_HEADERS = ["admission_number", "subject_code", ...MARK_FIELDS] as const;

type ImportRow = Record<string, string>;

export interface ImportResult {
  total: number;
  success: number;
  skipped: string[];
}

export interface ParsedMarksCsv {
  rows: ImportRow[];
  /** Row errors from the parser keyed by data row index, header excluded. */
  rowErrors: Map<number, string>;
}

// Data rows are numbered as the spreadsheet shows them; the header is line 1.
const lineOf = (index: number) => index + 2;

export function parseMarksCsv(buffer: Buffer): ParsedMarksCsv {
  const parsed = papa.parse<ImportRow>(buffer.toString("utf-8"), {
    header: true,
    skipEmptyLines: true,
    transformHeader: (h) => h.trim().toLowerCase(),
    transform: (v) => v.trim(),
  });

  const rowErrors = new Map<number, string>();
  for (const err of parsed.errors) {
    if (err.row === undefined) throw new ValidationError(`CSV parse error: ${err.message}`);
    if (!rowErrors.has(err.row)) rowErrors.set(err.row, err.message);
  }

  const rows = parsed.data;
  if (rows.length === 0) throw new ValidationError("File is empty");

  const headers = parsed.meta.fields ?? [];
  const missing = MARKS_UPLOAD_HEADERS.filter((h) => !headers.includes(h));
  if (missing.length) throw new ValidationError(`Missing columns: ${missing.join(", ")}`);

  return { rows, rowErrors };
}

/**
 * Feeds each CSV row through recordMarks. A row that cannot be matched or
 * validated is skipped and reported; the rest of the file still goes in.
 */
export async function importMarksFromBuffer(
  deps: ResultServiceDeps,
  buffer: Buffer,
  { termId, recordedBy }: { termId: string; recordedBy: string }
): Promise<ImportResult> {
  const { repos } = deps;
  const term = await repos.terms.findById(termId);
  if (!term) throw new NotFoundError(`Term not found: ${termId}`);

  const { rows, rowErrors } = parseMarksCsv(buffer);
  const result: ImportResult = { total: 0, success: 0, skipped: [] };

  const students = new Map<string, UserRecord | null>();
  const subjects = new Map<string, SubjectRecord | null>();

  for (const [index, row] of rows.entries()) {
    result.total++;
    const rowNum = lineOf(index);

    try {
      const malformed = rowErrors.get(index);
      if (malformed) throw new Error(malformed);

      const admissionNumber = (row.admission_number ?? "").toUpperCase();
      const subjectCode = (row.subject_code ?? "").toUpperCase();

      if (!students.has(admissionNumber)) {
        students.set(admissionNumber, admissionNumber ? await repos.users.findByAdmissionNumber(admissionNumber) : null);
      }
      if (!subjects.has(subjectCode)) {
        subjects.set(subjectCode, subjectCode ? await repos.subjects.findByCode(subjectCode) : null);
      }

      const student = students.get(admissionNumber);
      const subject = subjects.get(subjectCode);
      if (!student) throw new Error(`Student not found: ${admissionNumber || "(blank)"}`);
      if (!subject) throw new Error(`Subject not found: ${subjectCode || "(blank)"}`);

      await recordMarks(deps, {
        studentId: student.id,
        subjectId: subject.id,
        termId: term.id,
        marks: { ca1: row.ca1, ca2: row.ca2, ca3: row.ca3, ca4: row.ca4, exam: row.exam },
        recordedBy,
      });
      result.success++;
    } catch (rowErr: unknown) {
      const message = rowErr instanceof Error ? rowErr.message : String(rowErr);
      console.warn(`Marks upload: skipping row ${rowNum}: ${message}`);
      result.skipped.push(`Row ${rowNum}: ${message}`);
    }
  }

  return result;
}
