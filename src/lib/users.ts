// src/lib/users.ts
import bcrypt from "bcryptjs";
import type { UserRecord } from "../repositories/types";

const SALT_ROUNDS = 12;

// Compared against when the login name is unknown, so both paths cost a bcrypt round
const DUMMY_HASH = "$2a$12$LRYuW9uB6S1EjSM0rE9Q9u3Z9Q9Z9Q9Z9Q9Z9Q9Z9Q9Z9Q9Z9Q9Z9";

export const hashPassword = (password: string) => bcrypt.hash(password, SALT_ROUNDS);

export const checkPassword = (password: string, user: UserRecord | null) =>
  bcrypt.compare(password, user?.passwordHash ?? DUMMY_HASH);

/** Response shape for a user; never includes the hash or token version. */
export const publicUser = (user: UserRecord) => ({
  id: user.id,
  username: user.username,
  name: user.name,
  email: user.email,
  role: user.role,
  status: user.status,
  admissionNumber: user.admissionNumber,
  classId: user.classId,
});
