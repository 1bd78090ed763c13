// src/types/express.ts
import type { UserRecord } from "../repositories/types";

// What handlers see of the signed-in user (never the password hash)
export type AuthUser = Pick<UserRecord, "id" | "username" | "name" | "email" | "role" | "classId" | "admissionNumber">;

declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

export {};
