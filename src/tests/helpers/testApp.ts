// Shared fixtures: a seeded school on in-memory repositories plus a scripted gateway.
import bcrypt from "bcryptjs";
import type { Express } from "express";
import { buildApp } from "../../app";
import { createContext, type AppContext } from "../../context";
import { signToken } from "../../lib/jwt";
import type {
  ClassRecord,
  NewUser,
  SessionRecord,
  SubjectRecord,
  TermRecord,
  UserRecord,
} from "../../repositories/types";
import type { GatewayVerification, PaymentGateway } from "../../services/paymentGateway";
import { createMemoryRepositories, type MemoryRepositories } from "./memoryRepositories";

export const TEST_PASSWORD = "test-password";
export const PIN_PRICE = 1000;

/** Answers verify() from a queue; an Error in the queue is thrown instead. */
export class FakeGateway implements PaymentGateway {
  readonly calls: string[] = [];
  private queue: Array<GatewayVerification | Error> = [];

  respondWith(...answers: Array<GatewayVerification | Error>) {
    this.queue.push(...answers);
  }

  async verify(reference: string): Promise<GatewayVerification> {
    this.calls.push(reference);
    const next = this.queue.shift();
    if (!next) throw new Error(`No scripted gateway answer for ${reference}`);
    if (next instanceof Error) throw next;
    return next;
  }
}

export interface TestWorld {
  repos: MemoryRepositories;
  gateway: FakeGateway;
  ctx: AppContext;
  app: Express;
  admin: UserRecord;
  staff: UserRecord;
  teacher: UserRecord;
  alice: UserRecord;
  bob: UserRecord;
  carol: UserRecord;
  session: SessionRecord;
  firstTerm: TermRecord;
  secondTerm: TermRecord;
  jss1: ClassRecord;
  jss2: ClassRecord;
  maths: SubjectRecord;
  english: SubjectRecord;
}

const passwordHash = bcrypt.hashSync(TEST_PASSWORD, 4);

const person = (overrides: Partial<NewUser> & Pick<NewUser, "username" | "name" | "role">): NewUser => ({
  email: null,
  passwordHash,
  admissionNumber: null,
  classId: null,
  ...overrides,
});

export async function createWorld(): Promise<TestWorld> {
  const repos = createMemoryRepositories();
  const gateway = new FakeGateway();
  const ctx = createContext(repos, gateway, { defaultScale: "four-band", pinPrice: PIN_PRICE });

  const session = await repos.sessions.create({ name: "2024/2025", startDate: null, endDate: null });
  const firstTerm = await repos.terms.create({ name: "First Term", sessionId: session.id });
  const secondTerm = await repos.terms.create({ name: "Second Term", sessionId: session.id });
  await repos.terms.activate(firstTerm.id);

  const jss1 = await repos.classes.create({ name: "JSS 1", level: "junior" });
  const jss2 = await repos.classes.create({ name: "JSS 2", level: "junior" });
  const maths = await repos.subjects.create({ name: "Mathematics", code: "MTH", isElective: false });
  const english = await repos.subjects.create({ name: "English Language", code: "ENG", isElective: false });

  const admin = await repos.users.create(person({ username: "admin", name: "Ada Admin", role: "admin" }));
  const staff = await repos.users.create(person({ username: "bursar", name: "Sam Staff", role: "staff" }));
  const teacher = await repos.users.create(person({ username: "teacher", name: "Tola Teacher", role: "teacher" }));
  const alice = await repos.users.create(
    person({ username: "alice", name: "Alice Student", role: "student", admissionNumber: "ADM001", classId: jss1.id })
  );
  const bob = await repos.users.create(
    person({ username: "bob", name: "Bob Student", role: "student", admissionNumber: "ADM002", classId: jss1.id })
  );
  const carol = await repos.users.create(
    person({ username: "carol", name: "Carol Student", role: "student", admissionNumber: "ADM003", classId: jss2.id })
  );

  return {
    repos,
    gateway,
    ctx,
    app: buildApp(ctx),
    admin,
    staff,
    teacher,
    alice,
    bob,
    carol,
    session,
    firstTerm,
    secondTerm,
    jss1,
    jss2,
    maths,
    english,
  };
}

export const authCookie = (user: UserRecord) => `token=${signToken(user)}`;

export const marks = (ca1: number, ca2: number, ca3: number, ca4: number, exam: number) => ({ ca1, ca2, ca3, ca4, exam });
