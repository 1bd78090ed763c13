// src/services/academicService.ts
import type { ClassRecord, Repositories, SessionRecord, SubjectRecord, TermRecord } from "../repositories/types";
import { ConflictError, NotFoundError } from "../lib/errors";

export async function createSession(
  repos: Repositories,
  input: { name: string; startDate: Date | null; endDate: Date | null }
): Promise<SessionRecord> {
  const name = input.name.trim();
  if (await repos.sessions.findByName(name)) throw new ConflictError(`Academic session ${name} already exists`);
  return repos.sessions.create({ ...input, name });
}

export async function createTerm(repos: Repositories, input: { name: string; sessionId: string }): Promise<TermRecord> {
  const session = await repos.sessions.findById(input.sessionId);
  if (!session) throw new NotFoundError(`Academic session not found: ${input.sessionId}`);

  const name = input.name.trim();
  if (await repos.terms.findByName(session.id, name)) {
    throw new ConflictError(`${name} already exists in ${session.name}`);
  }
  return repos.terms.create({ name, sessionId: session.id });
}

/**
 * "Set active term": this term becomes the only current term and its session
 * the only current session.
 */
export async function activateTerm(repos: Repositories, termId: string): Promise<TermRecord> {
  const term = await repos.terms.activate(termId);
  if (!term) throw new NotFoundError(`Term not found: ${termId}`);
  return term;
}

export async function activateSession(repos: Repositories, sessionId: string): Promise<SessionRecord> {
  const session = await repos.terms.activateSession(sessionId);
  if (!session) throw new NotFoundError(`Academic session not found: ${sessionId}`);
  return session;
}

export async function createClass(repos: Repositories, input: { name: string; level: string | null }): Promise<ClassRecord> {
  const name = input.name.trim();
  if (await repos.classes.findByName(name)) throw new ConflictError(`Class ${name} already exists`);
  return repos.classes.create({ name, level: input.level });
}

export async function createSubject(
  repos: Repositories,
  input: { name: string; code: string; isElective: boolean }
): Promise<SubjectRecord> {
  const code = input.code.trim().toUpperCase();
  if (await repos.subjects.findByCode(code)) throw new ConflictError(`Subject code ${code} is already in use`);
  return repos.subjects.create({ name: input.name.trim(), code, isElective: input.isElective });
}
