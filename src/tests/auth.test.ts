// src/tests/auth.test.ts
import request from "supertest";
import { authCookie, createWorld, TEST_PASSWORD, type TestWorld } from "./helpers/testApp";

describe("🔒 Security Infrastructure Tests", () => {
  let world: TestWorld;

  beforeEach(async () => {
    world = await createWorld();
  });

  // 1. NOSQL INJECTION TEST
  it("should reject NoSQL Injection objects in login", async () => {
    const response = await request(world.app)
      .post("/auth/login")
      .send({
        username: { $gt: "" },
        password: "any-password",
      });

    expect(response.status).toBe(401);
    expect(response.body.message).toBe("Invalid credentials");
  });

  // 2. RATE LIMITING TEST
  it("should block multiple failed login attempts (Rate Limiting)", async () => {
    for (let i = 0; i < 6; i++) {
      const res = await request(world.app)
        .post("/auth/login")
        .send({ username: `brute-test-${i}`, password: "wrong-password" });

      if (i < 5) {
        expect(res.status).toBe(401);
      } else {
        expect(res.status).toBe(429);
        expect(res.body.message).toContain("Too many attempts");
      }
    }
  });

  // 3. REAL-TIME SESSION REVOCATION TEST
  it("should deny access if user status becomes suspended mid-session", async () => {
    const loginRes = await request(world.app).post("/auth/login").send({ username: "alice", password: TEST_PASSWORD });
    expect(loginRes.status).toBe(200);
    const cookie = loginRes.get("Set-Cookie") ?? [];

    await world.repos.users.update(world.alice.id, { status: "suspended" });

    const response = await request(world.app).get("/auth/me").set("Cookie", cookie);
    expect(response.status).toBe(403);
    expect(response.body.message).toMatch(/suspended/i);
  });

  it("logs in by username or email and never returns the hash", async () => {
    await world.repos.users.update(world.teacher.id, { email: "tola@school.test" });

    const res = await request(world.app)
      .post("/auth/login")
      .send({ email: "TOLA@school.test", password: TEST_PASSWORD });

    expect(res.status).toBe(200);
    expect(res.body.user).toEqual({
      id: world.teacher.id,
      username: "teacher",
      name: "Tola Teacher",
      email: "tola@school.test",
      role: "teacher",
      status: "active",
      admissionNumber: null,
      classId: null,
    });
    expect(world.repos.tables.auditLogs.map((l) => l.action)).toEqual(["login_success"]);
  });

  it("rejects missing credentials and wrong passwords", async () => {
    const missing = await request(world.app).post("/auth/login").send({ username: "alice" });
    expect(missing.status).toBe(400);
    expect(missing.body).toEqual({ success: false, message: "Missing credentials" });

    const wrong = await request(world.app).post("/auth/login").send({ username: "alice", password: "nope" });
    expect(wrong.status).toBe(401);
    expect(world.repos.tables.auditLogs.map((l) => l.action)).toEqual(["login_failed"]);
  });

  it("requires a valid token cookie", async () => {
    const none = await request(world.app).get("/auth/me");
    expect(none.status).toBe(401);
    expect(none.body.message).toBe("Not authenticated");

    const forged = await request(world.app).get("/auth/me").set("Cookie", "token=not-a-jwt");
    expect(forged.status).toBe(401);
    expect(forged.body.message).toBe("Invalid token");

    const me = await request(world.app).get("/auth/me").set("Cookie", authCookie(world.alice));
    expect(me.status).toBe(200);
    expect(me.body).toMatchObject({ id: world.alice.id, role: "student", admissionNumber: "ADM001" });
  });

  it("invalidates older sessions when the password changes", async () => {
    const oldCookie = authCookie(world.alice);

    const changed = await request(world.app)
      .post("/auth/change-password")
      .set("Cookie", oldCookie)
      .send({ currentPassword: TEST_PASSWORD, newPassword: "another-password" });
    expect(changed.status).toBe(200);

    const stale = await request(world.app).get("/auth/me").set("Cookie", oldCookie);
    expect(stale.status).toBe(401);
    expect(stale.body.message).toBe("Session expired due to security update.");

    const fresh = await request(world.app).get("/auth/me").set("Cookie", changed.get("Set-Cookie") ?? []);
    expect(fresh.status).toBe(200);

    const relogin = await request(world.app).post("/auth/login").send({ username: "alice", password: "another-password" });
    expect(relogin.status).toBe(200);
  });

  it("rejects a wrong current password", async () => {
    const res = await request(world.app)
      .post("/auth/change-password")
      .set("Cookie", authCookie(world.alice))
      .send({ currentPassword: "not-it", newPassword: "another-password" });

    expect(res.status).toBe(400);
    expect(res.body.message).toBe("Current password is incorrect");
  });

  it("clears the cookie on logout", async () => {
    const res = await request(world.app).post("/auth/logout").set("Cookie", authCookie(world.alice));

    expect(res.status).toBe(200);
    expect(res.get("Set-Cookie")?.[0]).toMatch(/^token=;/);
  });

  it("serves health and 404 responses", async () => {
    const health = await request(world.app).get("/health");
    expect(health.status).toBe(200);
    expect(health.body.status).toBe("OK");

    const missing = await request(world.app).get("/nope");
    expect(missing.status).toBe(404);
    expect(missing.body).toEqual({ message: "Route /nope not found", method: "GET" });
  });
});
