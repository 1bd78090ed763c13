// src/repositories/types.ts
// Plain records exchanged between services and storage. IDs are strings at
// this boundary; the mongoose layer converts them to ObjectIds.

export const ROLES = ["student", "teacher", "staff", "admin"] as const;
export type Role = (typeof ROLES)[number];

export type UserStatus = "active" | "suspended";

export interface UserRecord {
  id: string;
  username: string;
  name: string;
  email: string | null;
  passwordHash: string;
  role: Role;
  status: UserStatus;
  tokenVersion: number;
  admissionNumber: string | null; // students only
  classId: string | null; // students only: the cohort key
}

export type NewUser = Omit<UserRecord, "id" | "tokenVersion" | "status"> & {
  status?: UserStatus;
};

export type UserPatch = Partial<
  Pick<UserRecord, "role" | "status" | "passwordHash" | "tokenVersion" | "admissionNumber" | "classId" | "name" | "email">
>;

export interface SessionRecord {
  id: string;
  name: string; // e.g. "2024/2025"
  startDate: Date | null;
  endDate: Date | null;
  isCurrent: boolean;
}

export interface TermRecord {
  id: string;
  name: string; // e.g. "First Term"
  sessionId: string;
  isCurrent: boolean;
}

export interface ClassRecord {
  id: string;
  name: string;
  level: string | null;
}

export interface SubjectRecord {
  id: string;
  name: string;
  code: string;
  isElective: boolean;
}

export interface ResultKey {
  studentId: string;
  subjectId: string;
  termId: string;
}

export interface ResultValues {
  classId: string;
  ca1: number;
  ca2: number;
  ca3: number;
  ca4: number;
  exam: number;
  total: number;
  grade: string;
  remark: string;
  recordedBy: string | null;
}

export interface ResultRecord extends ResultKey, ResultValues {
  id: string;
  updatedAt: Date;
}

export type PinStatus = "active" | "used";

export interface PinRecord {
  id: string;
  code: string; // canonical XXXX-XXXX-XXXX
  studentId: string | null;
  termId: string;
  sessionId: string;
  status: PinStatus;
  usageCount: number;
  paymentId: string | null;
  createdAt: Date;
}

export type NewPin = Pick<PinRecord, "code" | "studentId" | "termId" | "sessionId" | "paymentId">;

export interface PinFilter {
  termId?: string;
  studentId?: string;
  status?: PinStatus;
  bound?: boolean;
}

export type PaymentStatus = "pending" | "approved" | "declined";
export type PaymentMethod = "gateway" | "manual";
export type PaymentPurpose = "result-pin" | "school-fees";

export interface PaymentRecord {
  id: string;
  studentId: string;
  termId: string;
  sessionId: string;
  amount: number;
  method: PaymentMethod;
  purpose: PaymentPurpose;
  status: PaymentStatus;
  reference: string;
  pinId: string | null;
  processedBy: string | null;
  processedAt: Date | null;
  note: string | null;
  createdAt: Date;
}

export type NewPayment = Pick<
  PaymentRecord,
  "studentId" | "termId" | "sessionId" | "amount" | "method" | "purpose" | "reference" | "note"
>;

export type PaymentPatch = Partial<Pick<PaymentRecord, "processedBy" | "processedAt" | "note" | "pinId">>;

export type AttendanceStatus = "present" | "absent" | "late";

export interface AttendanceRecord {
  id: string;
  studentId: string;
  classId: string;
  termId: string;
  date: string; // YYYY-MM-DD
  status: AttendanceStatus;
  recordedBy: string;
}

export type NewAttendance = Omit<AttendanceRecord, "id">;

export interface GradeBand {
  min: number;
  grade: string;
  remark: string;
}

export interface SchoolSettingsRecord {
  gradingPreset: string | null;
  gradingScale: GradeBand[] | null;
}

export interface AuditEntry {
  action: string;
  actor?: string;
  targetUser?: string;
  details: Record<string, unknown>;
  ip?: string;
  userAgent?: string;
}

export interface AuditLogRecord extends AuditEntry {
  id: string;
  createdAt: Date;
}

export interface AuditLogFilter {
  action?: string;
  actor?: string;
  from?: Date;
  to?: Date;
  skip: number;
  limit: number;
}

export interface UserRepository {
  findById(id: string): Promise<UserRecord | null>;
  findByLogin(login: string): Promise<UserRecord | null>;
  findByAdmissionNumber(admissionNumber: string): Promise<UserRecord | null>;
  list(filter: { role?: Role; classId?: string }): Promise<UserRecord[]>;
  count(filter: { role?: Role; status?: UserStatus }): Promise<number>;
  create(user: NewUser): Promise<UserRecord>;
  update(id: string, patch: UserPatch): Promise<UserRecord | null>;
}

export interface SessionRepository {
  create(session: Omit<SessionRecord, "id" | "isCurrent">): Promise<SessionRecord>;
  findById(id: string): Promise<SessionRecord | null>;
  findByName(name: string): Promise<SessionRecord | null>;
  list(): Promise<SessionRecord[]>;
}

export interface TermRepository {
  create(term: Omit<TermRecord, "id" | "isCurrent">): Promise<TermRecord>;
  findById(id: string): Promise<TermRecord | null>;
  findByName(sessionId: string, name: string): Promise<TermRecord | null>;
  findCurrent(): Promise<TermRecord | null>;
  list(sessionId?: string): Promise<TermRecord[]>;
  /**
   * Makes `termId` the only current term and its session the only current
   * session, atomically.
   */
  activate(termId: string): Promise<TermRecord | null>;
  activateSession(sessionId: string): Promise<SessionRecord | null>;
}

export interface ClassRepository {
  create(schoolClass: Omit<ClassRecord, "id">): Promise<ClassRecord>;
  findById(id: string): Promise<ClassRecord | null>;
  findByName(name: string): Promise<ClassRecord | null>;
  list(): Promise<ClassRecord[]>;
}

export interface SubjectRepository {
  create(subject: Omit<SubjectRecord, "id">): Promise<SubjectRecord>;
  findById(id: string): Promise<SubjectRecord | null>;
  findByCode(code: string): Promise<SubjectRecord | null>;
  list(): Promise<SubjectRecord[]>;
}

export interface ResultRepository {
  /** Insert or overwrite the row for the unique (student, subject, term) key. */
  upsert(key: ResultKey, values: ResultValues): Promise<ResultRecord>;
  findForStudent(studentId: string, termId: string): Promise<ResultRecord[]>;
  /** All rows of a cohort, in stable storage order. */
  findCohort(termId: string, classId: string): Promise<ResultRecord[]>;
  /** Re-files every row of the student's term under `classId`. Returns the number of rows moved. */
  moveToClass(studentId: string, termId: string, classId: string): Promise<number>;
}

export interface PinRepository {
  create(pin: NewPin): Promise<PinRecord>;
  createMany(pins: NewPin[]): Promise<PinRecord[]>;
  findById(id: string): Promise<PinRecord | null>;
  findByCode(code: string): Promise<PinRecord | null>;
  findExistingCodes(codes: string[]): Promise<string[]>;
  findOwned(studentId: string, termId: string): Promise<PinRecord | null>;
  list(filter: PinFilter): Promise<PinRecord[]>;
  /**
   * Binds the code to the student only while it is still unbound. Returns
   * null when another writer bound it first.
   */
  bindIfUnbound(pinId: string, studentId: string): Promise<PinRecord | null>;
  remove(pinId: string): Promise<void>;
}

export interface PaymentRepository {
  create(payment: NewPayment): Promise<PaymentRecord>;
  findById(id: string): Promise<PaymentRecord | null>;
  findByReference(reference: string): Promise<PaymentRecord | null>;
  list(filter: { status?: PaymentStatus; studentId?: string }): Promise<PaymentRecord[]>;
  /** Conditional status change; null when the payment is not in `from`. */
  transition(
    id: string,
    from: PaymentStatus,
    to: PaymentStatus,
    patch: PaymentPatch
  ): Promise<PaymentRecord | null>;
}

export interface AttendanceRepository {
  upsertMany(records: NewAttendance[]): Promise<number>;
  findForClassOnDate(classId: string, date: string): Promise<AttendanceRecord[]>;
  findForStudent(studentId: string, termId: string): Promise<AttendanceRecord[]>;
}

export interface SettingsRepository {
  get(): Promise<SchoolSettingsRecord>;
  save(settings: SchoolSettingsRecord): Promise<SchoolSettingsRecord>;
}

export interface AuditLogRepository {
  create(entry: AuditEntry): Promise<void>;
  list(filter: AuditLogFilter): Promise<{ data: AuditLogRecord[]; total: number }>;
}

export interface Repositories {
  users: UserRepository;
  sessions: SessionRepository;
  terms: TermRepository;
  classes: ClassRepository;
  subjects: SubjectRepository;
  results: ResultRepository;
  pins: PinRepository;
  payments: PaymentRepository;
  attendance: AttendanceRepository;
  settings: SettingsRepository;
  auditLogs: AuditLogRepository;
}
