// src/config/defaultData.ts
import type { UserRepository } from "../repositories/types";
import { hashPassword } from "../lib/users";

export interface DefaultAdmin {
  username: string;
  password: string;
  name: string;
}

/** Creates the first administrator on an empty install. Returns true when one was created. */
export const ensureDefaultAdmin = async (users: UserRepository, admin: DefaultAdmin, retries = 3): Promise<boolean> => {
  for (let i = 0; i < retries; i++) {
    try {
      const count = await users.count({ role: "admin" });
      if (count > 0) {
        console.log(`Admin accounts found → ${count}`);
        return false;
      }

      if (!admin.password) {
        console.warn("No admin found and ADMIN_PASSWORD is not set; skipping default admin");
        return false;
      }

      console.log("No admin found. Creating default...");
      const created = await users.create({
        username: admin.username.toLowerCase(),
        name: admin.name,
        email: null,
        passwordHash: await hashPassword(admin.password),
        role: "admin",
        admissionNumber: null,
        classId: null,
      });
      console.log("Default admin created →", created.username);
      return true;
    } catch (err: unknown) {
      console.error(`Attempt ${i + 1} failed:`, err instanceof Error ? err.message : err);
      if (i === retries - 1) throw err;
      await new Promise((resolve) => setTimeout(resolve, 2000));
    }
  }
  return false;
};
