// src/repositories/mongoRepositories.ts
import mongoose, { Types, type FilterQuery } from "mongoose";
import User, { type IUser } from "../models/User";
import AcademicSession, { type IAcademicSession } from "../models/AcademicSession";
import Term, { type ITerm } from "../models/Term";
import SchoolClass, { type ISchoolClass } from "../models/SchoolClass";
import Subject, { type ISubject } from "../models/Subject";
import Result, { type IResult } from "../models/Result";
import Pin, { type IPin } from "../models/Pin";
import Payment, { type IPayment } from "../models/Payment";
import Attendance, { type IAttendance } from "../models/Attendance";
import SchoolSettings, { type ISchoolSettings } from "../models/SchoolSettings";
import AuditLog, { type IAuditLog } from "../models/AuditLog";
import { ConflictError, ValidationError } from "../lib/errors";
import type {
  AttendanceRecord,
  AuditLogRecord,
  ClassRecord,
  PaymentPatch,
  PaymentRecord,
  PinRecord,
  Repositories,
  ResultRecord,
  SchoolSettingsRecord,
  SessionRecord,
  SubjectRecord,
  TermRecord,
  UserPatch,
  UserRecord,
} from "./types";

type WithId<T> = T & { _id: Types.ObjectId };

// Malformed ids simply match nothing.
const oid = (id: string): Types.ObjectId | null =>
  /^[a-f0-9]{24}$/i.test(id) ? new Types.ObjectId(id) : null;

const optionalOid = (id: string | null | undefined) => (id ? oid(id) : null);

const str = (id: Types.ObjectId | null | undefined) => (id ? id.toString() : null);

const isDuplicateKey = (err: unknown) =>
  typeof err === "object" && err !== null && "code" in err && err.code === 11000;

async function guardDuplicate<T>(work: () => PromiseLike<T>, message: string): Promise<T> {
  try {
    return await work();
  } catch (err) {
    if (isDuplicateKey(err)) throw new ConflictError(message);
    throw err;
  }
}

const toUser = (doc: WithId<IUser>): UserRecord => ({
  id: doc._id.toString(),
  username: doc.username,
  name: doc.name,
  email: doc.email ?? null,
  passwordHash: doc.password,
  role: doc.role,
  status: doc.status,
  tokenVersion: doc.tokenVersion ?? 0,
  admissionNumber: doc.admissionNumber ?? null,
  classId: str(doc.schoolClass),
});

const toSession = (doc: WithId<IAcademicSession>): SessionRecord => ({
  id: doc._id.toString(),
  name: doc.name,
  startDate: doc.startDate ?? null,
  endDate: doc.endDate ?? null,
  isCurrent: doc.isCurrent,
});

const toTerm = (doc: WithId<ITerm>): TermRecord => ({
  id: doc._id.toString(),
  name: doc.name,
  sessionId: doc.academicSession.toString(),
  isCurrent: doc.isCurrent,
});

const toClass = (doc: WithId<ISchoolClass>): ClassRecord => ({
  id: doc._id.toString(),
  name: doc.name,
  level: doc.level ?? null,
});

const toSubject = (doc: WithId<ISubject>): SubjectRecord => ({
  id: doc._id.toString(),
  name: doc.name,
  code: doc.code,
  isElective: doc.isElective,
});

const toResult = (doc: WithId<IResult>): ResultRecord => ({
  id: doc._id.toString(),
  studentId: doc.student.toString(),
  subjectId: doc.subject.toString(),
  termId: doc.term.toString(),
  classId: doc.schoolClass.toString(),
  ca1: doc.ca1,
  ca2: doc.ca2,
  ca3: doc.ca3,
  ca4: doc.ca4,
  exam: doc.exam,
  total: doc.total,
  grade: doc.grade,
  remark: doc.remark,
  recordedBy: str(doc.recordedBy),
  updatedAt: doc.updatedAt,
});

const toPin = (doc: WithId<IPin>): PinRecord => ({
  id: doc._id.toString(),
  code: doc.code,
  studentId: str(doc.student),
  termId: doc.term.toString(),
  sessionId: doc.academicSession.toString(),
  status: doc.status,
  usageCount: doc.usageCount,
  paymentId: str(doc.payment),
  createdAt: doc.createdAt,
});

const toPayment = (doc: WithId<IPayment>): PaymentRecord => ({
  id: doc._id.toString(),
  studentId: doc.student.toString(),
  termId: doc.term.toString(),
  sessionId: doc.academicSession.toString(),
  amount: doc.amount,
  method: doc.method,
  purpose: doc.purpose,
  status: doc.status,
  reference: doc.reference,
  pinId: str(doc.pin),
  processedBy: str(doc.processedBy),
  processedAt: doc.processedAt ?? null,
  note: doc.note ?? null,
  createdAt: doc.createdAt,
});

const toAttendance = (doc: WithId<IAttendance>): AttendanceRecord => ({
  id: doc._id.toString(),
  studentId: doc.student.toString(),
  classId: doc.schoolClass.toString(),
  termId: doc.term.toString(),
  date: doc.date,
  status: doc.status,
  recordedBy: doc.recordedBy.toString(),
});

const toAuditLog = (doc: WithId<IAuditLog>): AuditLogRecord => ({
  id: doc._id.toString(),
  action: doc.action,
  actor: str(doc.actor) ?? undefined,
  targetUser: str(doc.targetUser) ?? undefined,
  details: doc.details ?? {},
  ip: doc.ip,
  userAgent: doc.userAgent,
  createdAt: doc.createdAt,
});

function userPatch(patch: UserPatch): Partial<IUser> {
  const { passwordHash, classId, ...rest } = patch;
  const update: Partial<IUser> = { ...rest };
  if (passwordHash !== undefined) update.password = passwordHash;
  if (classId !== undefined) update.schoolClass = optionalOid(classId);
  return update;
}

function paymentPatch(patch: PaymentPatch): Partial<IPayment> {
  const update: Partial<IPayment> = {};
  if (patch.processedBy !== undefined) update.processedBy = optionalOid(patch.processedBy);
  if (patch.processedAt !== undefined) update.processedAt = patch.processedAt;
  if (patch.note !== undefined) update.note = patch.note;
  if (patch.pinId !== undefined) update.pin = optionalOid(patch.pinId);
  return update;
}

const toSettings = (doc: Pick<ISchoolSettings, "gradingPreset" | "gradingScale"> | null): SchoolSettingsRecord => ({
  gradingPreset: doc?.gradingPreset ?? null,
  gradingScale:
    doc && doc.gradingScale.length > 0
      ? doc.gradingScale.map((b) => ({ min: b.min, grade: b.grade, remark: b.remark }))
      : null,
});

async function inTransaction(work: (session: mongoose.ClientSession) => Promise<void>) {
  const session = await mongoose.startSession();
  try {
    await session.withTransaction(() => work(session));
  } finally {
    await session.endSession();
  }
}

export function createMongoRepositories(): Repositories {
  return {
    users: {
      async findById(id) {
        const _id = oid(id);
        const doc = _id ? await User.findById(_id) : null;
        return doc ? toUser(doc) : null;
      },
      async findByLogin(login) {
        const value = login.toLowerCase().trim();
        const doc = await User.findOne({ $or: [{ username: value }, { email: value }] });
        return doc ? toUser(doc) : null;
      },
      async findByAdmissionNumber(admissionNumber) {
        const doc = await User.findOne({ admissionNumber: admissionNumber.toUpperCase().trim(), role: "student" });
        return doc ? toUser(doc) : null;
      },
      async list({ role, classId }) {
        const filter: FilterQuery<IUser> = {};
        if (role) filter.role = role;
        if (classId) filter.schoolClass = oid(classId);
        return (await User.find(filter).sort({ name: 1 })).map(toUser);
      },
      async count(filter) {
        return User.countDocuments(filter);
      },
      async create(user) {
        const doc = await guardDuplicate(
          () =>
            User.create({
              username: user.username,
              name: user.name,
              email: user.email,
              password: user.passwordHash,
              role: user.role,
              status: user.status ?? "active",
              admissionNumber: user.admissionNumber,
              schoolClass: optionalOid(user.classId),
            }),
          `Username or admission number already in use`
        );
        return toUser(doc);
      },
      async update(id, patch) {
        const _id = oid(id);
        if (!_id) return null;
        const doc = await guardDuplicate(
          () => User.findByIdAndUpdate(_id, { $set: userPatch(patch) }, { new: true, runValidators: true }),
          "Admission number already in use"
        );
        return doc ? toUser(doc) : null;
      },
    },

    sessions: {
      async create(session) {
        const doc = await guardDuplicate(
          () => AcademicSession.create({ ...session, isCurrent: false }),
          `Academic session ${session.name} already exists`
        );
        return toSession(doc);
      },
      async findById(id) {
        const _id = oid(id);
        const doc = _id ? await AcademicSession.findById(_id) : null;
        return doc ? toSession(doc) : null;
      },
      async findByName(name) {
        const doc = await AcademicSession.findOne({ name });
        return doc ? toSession(doc) : null;
      },
      async list() {
        return (await AcademicSession.find().sort({ name: -1 })).map(toSession);
      },
    },

    terms: {
      async create({ name, sessionId }) {
        const doc = await guardDuplicate(
          () => Term.create({ name, academicSession: oid(sessionId), isCurrent: false }),
          `${name} already exists in this session`
        );
        return toTerm(doc);
      },
      async findById(id) {
        const _id = oid(id);
        const doc = _id ? await Term.findById(_id) : null;
        return doc ? toTerm(doc) : null;
      },
      async findByName(sessionId, name) {
        const session = oid(sessionId);
        const doc = session ? await Term.findOne({ academicSession: session, name }) : null;
        return doc ? toTerm(doc) : null;
      },
      async findCurrent() {
        const doc = await Term.findOne({ isCurrent: true });
        return doc ? toTerm(doc) : null;
      },
      async list(sessionId) {
        const filter: FilterQuery<ITerm> = {};
        if (sessionId) filter.academicSession = oid(sessionId);
        return (await Term.find(filter).sort({ createdAt: 1 })).map(toTerm);
      },
      async activate(termId) {
        const _id = oid(termId);
        if (!_id) return null;
        const term = await Term.findById(_id);
        if (!term) return null;

        await inTransaction(async (session) => {
          await Term.updateMany({ _id: { $ne: term._id }, isCurrent: true }, { $set: { isCurrent: false } }, { session });
          await Term.updateOne({ _id: term._id }, { $set: { isCurrent: true } }, { session });
          await AcademicSession.updateMany(
            { _id: { $ne: term.academicSession }, isCurrent: true },
            { $set: { isCurrent: false } },
            { session }
          );
          await AcademicSession.updateOne({ _id: term.academicSession }, { $set: { isCurrent: true } }, { session });
        });

        return { ...toTerm(term), isCurrent: true };
      },
      async activateSession(sessionId) {
        const _id = oid(sessionId);
        if (!_id) return null;
        const academicSession = await AcademicSession.findById(_id);
        if (!academicSession) return null;

        await inTransaction(async (session) => {
          await AcademicSession.updateMany({ _id: { $ne: _id }, isCurrent: true }, { $set: { isCurrent: false } }, { session });
          await AcademicSession.updateOne({ _id }, { $set: { isCurrent: true } }, { session });
          // A current term outside the new session no longer makes sense.
          await Term.updateMany({ academicSession: { $ne: _id }, isCurrent: true }, { $set: { isCurrent: false } }, { session });
        });

        return { ...toSession(academicSession), isCurrent: true };
      },
    },

    classes: {
      async create(schoolClass) {
        const doc = await guardDuplicate(() => SchoolClass.create(schoolClass), `Class ${schoolClass.name} already exists`);
        return toClass(doc);
      },
      async findById(id) {
        const _id = oid(id);
        const doc = _id ? await SchoolClass.findById(_id) : null;
        return doc ? toClass(doc) : null;
      },
      async findByName(name) {
        const doc = await SchoolClass.findOne({ name });
        return doc ? toClass(doc) : null;
      },
      async list() {
        return (await SchoolClass.find().sort({ name: 1 })).map(toClass);
      },
    },

    subjects: {
      async create(subject) {
        const doc = await guardDuplicate(() => Subject.create(subject), `Subject code ${subject.code} already exists`);
        return toSubject(doc);
      },
      async findById(id) {
        const _id = oid(id);
        const doc = _id ? await Subject.findById(_id) : null;
        return doc ? toSubject(doc) : null;
      },
      async findByCode(code) {
        const doc = await Subject.findOne({ code: code.toUpperCase().trim() });
        return doc ? toSubject(doc) : null;
      },
      async list() {
        return (await Subject.find().sort({ name: 1 })).map(toSubject);
      },
    },

    results: {
      async upsert(key, values) {
        const student = oid(key.studentId);
        const subject = oid(key.subjectId);
        const term = oid(key.termId);
        if (!student || !subject || !term) throw new ValidationError("Malformed student, subject or term id");
        const doc = await Result.findOneAndUpdate(
          { student, subject, term },
          {
            $set: {
              schoolClass: oid(values.classId),
              ca1: values.ca1,
              ca2: values.ca2,
              ca3: values.ca3,
              ca4: values.ca4,
              exam: values.exam,
              total: values.total,
              grade: values.grade,
              remark: values.remark,
              recordedBy: optionalOid(values.recordedBy),
            },
          },
          { upsert: true, new: true, runValidators: true, setDefaultsOnInsert: true }
        );
        if (!doc) throw new Error("Result upsert returned no document");
        return toResult(doc);
      },
      async findForStudent(studentId, termId) {
        const student = oid(studentId);
        const term = oid(termId);
        if (!student || !term) return [];
        return (await Result.find({ student, term })).map(toResult);
      },
      async findCohort(termId, classId) {
        const term = oid(termId);
        const schoolClass = oid(classId);
        if (!term || !schoolClass) return [];
        return (await Result.find({ term, schoolClass }).sort({ _id: 1 })).map(toResult);
      },
      async moveToClass(studentId, termId, classId) {
        const student = oid(studentId);
        const term = oid(termId);
        const schoolClass = oid(classId);
        if (!student || !term || !schoolClass) return 0;
        const { modifiedCount } = await Result.updateMany(
          { student, term, schoolClass: { $ne: schoolClass } },
          { $set: { schoolClass } }
        );
        return modifiedCount;
      },
    },

    pins: {
      async create(pin) {
        const doc = await guardDuplicate(
          () =>
            Pin.create({
              code: pin.code,
              student: optionalOid(pin.studentId),
              term: oid(pin.termId),
              academicSession: oid(pin.sessionId),
              payment: optionalOid(pin.paymentId),
            }),
          `PIN ${pin.code} already exists`
        );
        return toPin(doc);
      },
      async createMany(pins) {
        const docs = await guardDuplicate(
          () =>
            Pin.insertMany(
              pins.map((pin) => ({
                code: pin.code,
                student: optionalOid(pin.studentId),
                term: oid(pin.termId),
                academicSession: oid(pin.sessionId),
                payment: optionalOid(pin.paymentId),
              }))
            ),
          "One or more PIN codes already exist"
        );
        return docs.map(toPin);
      },
      async findById(id) {
        const _id = oid(id);
        const doc = _id ? await Pin.findById(_id) : null;
        return doc ? toPin(doc) : null;
      },
      async findByCode(code) {
        const doc = await Pin.findOne({ code });
        return doc ? toPin(doc) : null;
      },
      async findExistingCodes(codes) {
        const docs = await Pin.find({ code: { $in: codes } }).select("code");
        return docs.map((d) => d.code);
      },
      async findOwned(studentId, termId) {
        const student = oid(studentId);
        const term = oid(termId);
        if (!student || !term) return null;
        const doc = await Pin.findOne({ student, term, status: "active" });
        return doc ? toPin(doc) : null;
      },
      async list({ termId, studentId, status, bound }) {
        const filter: FilterQuery<IPin> = {};
        if (termId) filter.term = oid(termId);
        if (studentId) filter.student = oid(studentId);
        if (status) filter.status = status;
        if (bound !== undefined) filter.student = bound ? { $ne: null } : null;
        return (await Pin.find(filter).sort({ createdAt: -1 })).map(toPin);
      },
      async bindIfUnbound(pinId, studentId) {
        const _id = oid(pinId);
        const student = oid(studentId);
        if (!_id || !student) return null;
        const doc = await Pin.findOneAndUpdate(
          { _id, student: null, status: "active" },
          { $set: { student }, $inc: { usageCount: 1 } },
          { new: true }
        );
        return doc ? toPin(doc) : null;
      },
      async remove(pinId) {
        const _id = oid(pinId);
        if (_id) await Pin.deleteOne({ _id });
      },
    },

    payments: {
      async create(payment) {
        const doc = await guardDuplicate(
          () =>
            Payment.create({
              student: oid(payment.studentId),
              term: oid(payment.termId),
              academicSession: oid(payment.sessionId),
              amount: payment.amount,
              method: payment.method,
              purpose: payment.purpose,
              reference: payment.reference,
              note: payment.note,
            }),
          `Payment reference ${payment.reference} has already been submitted`
        );
        return toPayment(doc);
      },
      async findById(id) {
        const _id = oid(id);
        const doc = _id ? await Payment.findById(_id) : null;
        return doc ? toPayment(doc) : null;
      },
      async findByReference(reference) {
        const doc = await Payment.findOne({ reference });
        return doc ? toPayment(doc) : null;
      },
      async list({ status, studentId }) {
        const filter: FilterQuery<IPayment> = {};
        if (status) filter.status = status;
        if (studentId) filter.student = oid(studentId);
        return (await Payment.find(filter).sort({ createdAt: -1 })).map(toPayment);
      },
      async transition(id, from, to, patch) {
        const _id = oid(id);
        if (!_id) return null;
        const doc = await Payment.findOneAndUpdate(
          { _id, status: from },
          { $set: { status: to, ...paymentPatch(patch) } },
          { new: true }
        );
        return doc ? toPayment(doc) : null;
      },
    },

    attendance: {
      async upsertMany(records) {
        const result = await Attendance.bulkWrite(
          records.map((r) => ({
            updateOne: {
              filter: { student: oid(r.studentId), date: r.date },
              update: {
                $set: {
                  schoolClass: oid(r.classId),
                  term: oid(r.termId),
                  status: r.status,
                  recordedBy: oid(r.recordedBy),
                },
              },
              upsert: true,
            },
          }))
        );
        return result.upsertedCount + result.matchedCount;
      },
      async findForClassOnDate(classId, date) {
        const schoolClass = oid(classId);
        if (!schoolClass) return [];
        return (await Attendance.find({ schoolClass, date })).map(toAttendance);
      },
      async findForStudent(studentId, termId) {
        const student = oid(studentId);
        const term = oid(termId);
        if (!student || !term) return [];
        return (await Attendance.find({ student, term }).sort({ date: 1 })).map(toAttendance);
      },
    },

    settings: {
      async get() {
        return toSettings(await SchoolSettings.findOne({ key: "default" }));
      },
      async save(settings) {
        const doc = await SchoolSettings.findOneAndUpdate(
          { key: "default" },
          { $set: { gradingPreset: settings.gradingPreset, gradingScale: settings.gradingScale ?? [] } },
          { upsert: true, new: true, runValidators: true, setDefaultsOnInsert: true }
        );
        return toSettings(doc);
      },
    },

    auditLogs: {
      async create(entry) {
        await AuditLog.create({
          action: entry.action,
          actor: optionalOid(entry.actor) ?? undefined,
          targetUser: optionalOid(entry.targetUser) ?? undefined,
          details: entry.details,
          ip: entry.ip,
          userAgent: entry.userAgent,
        });
      },
      async list({ action, actor, from, to, skip, limit }) {
        const filter: FilterQuery<IAuditLog> = {};
        if (action) filter.action = action;
        if (actor) filter.actor = oid(actor);
        if (from || to) {
          const range: { $gte?: Date; $lte?: Date } = {};
          if (from) range.$gte = from;
          if (to) range.$lte = to;
          filter.createdAt = range;
        }
        const [docs, total] = await Promise.all([
          AuditLog.find(filter).sort({ createdAt: -1 }).skip(skip).limit(limit),
          AuditLog.countDocuments(filter),
        ]);
        return { data: docs.map(toAuditLog), total };
      },
    },
  };
}
