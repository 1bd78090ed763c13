// src/tests/admin.api.test.ts
import request from "supertest";
import { authCookie, createWorld, type TestWorld } from "./helpers/testApp";

describe("administration over HTTP", () => {
  let world: TestWorld;
  let admin: string;

  beforeEach(async () => {
    world = await createWorld();
    admin = authCookie(world.admin);
  });

  describe("users", () => {
    it("creates a student with a class and hides the password hash", async () => {
      const res = await request(world.app).post("/admin/users").set("Cookie", admin).send({
        username: "Dayo",
        password: "test-password",
        name: "Dayo Student",
        role: "student",
        admissionNumber: "adm010",
        classId: world.jss2.id,
      });

      expect(res.status).toBe(201);
      expect(res.body).toEqual({
        id: expect.any(String),
        username: "dayo",
        name: "Dayo Student",
        email: null,
        role: "student",
        status: "active",
        admissionNumber: "ADM010",
        classId: world.jss2.id,
      });
      expect(world.repos.tables.auditLogs.map((l) => l.action)).toEqual(["user_created"]);
    });

    it("rejects duplicate usernames and unknown classes", async () => {
      const base = { password: "test-password", name: "Someone", role: "teacher" };

      const duplicate = await request(world.app).post("/admin/users").set("Cookie", admin).send({ ...base, username: "alice" });
      expect(duplicate.status).toBe(409);

      const noClass = await request(world.app)
        .post("/admin/users")
        .set("Cookie", admin)
        .send({ ...base, username: "newkid", role: "student", classId: "missing" });
      expect(noClass.status).toBe(404);
    });

    it("is admin only", async () => {
      const res = await request(world.app).get("/admin/users").set("Cookie", authCookie(world.teacher));
      expect(res.status).toBe(403);
    });

    it("filters users by role", async () => {
      const res = await request(world.app).get("/admin/users").query({ role: "student" }).set("Cookie", admin);
      expect(res.body.map((u: { username: string }) => u.username)).toEqual(["alice", "bob", "carol"]);
    });

    it("changes roles but never the caller's own", async () => {
      const own = await request(world.app).put(`/admin/users/${world.admin.id}/role`).set("Cookie", admin).send({ role: "staff" });
      expect(own.status).toBe(403);
      expect(own.body.message).toBe("You cannot change your own role");

      const promoted = await request(world.app)
        .put(`/admin/users/${world.teacher.id}/role`)
        .set("Cookie", admin)
        .send({ role: "staff" });
      expect(promoted.status).toBe(200);
      expect(promoted.body.user.role).toBe("staff");
      expect(world.repos.tables.auditLogs[0].details).toEqual({ from: "teacher", to: "staff" });
    });

    it("suspends users, who are then locked out", async () => {
      const res = await request(world.app)
        .put(`/admin/users/${world.bob.id}/status`)
        .set("Cookie", admin)
        .send({ status: "suspended" });
      expect(res.status).toBe(200);

      const me = await request(world.app).get("/auth/me").set("Cookie", authCookie(world.bob));
      expect(me.status).toBe(403);

      const self = await request(world.app)
        .put(`/admin/users/${world.admin.id}/status`)
        .set("Cookie", admin)
        .send({ status: "suspended" });
      expect(self.status).toBe(403);
    });

    it("updates a student's class and admission number", async () => {
      const moved = await request(world.app)
        .put(`/admin/users/${world.alice.id}/profile`)
        .set("Cookie", admin)
        .send({ classId: world.jss2.id });
      expect(moved.status).toBe(200);
      expect(moved.body).toMatchObject({ classId: world.jss2.id, admissionNumber: "ADM001" });

      const clash = await request(world.app)
        .put(`/admin/users/${world.alice.id}/profile`)
        .set("Cookie", admin)
        .send({ admissionNumber: "adm002" });
      expect(clash.status).toBe(409);

      const teacher = await request(world.app)
        .put(`/admin/users/${world.teacher.id}/profile`)
        .set("Cookie", admin)
        .send({ classId: world.jss1.id });
      expect(teacher.status).toBe(400);
    });
  });

  describe("academics", () => {
    it("lets staff create and activate terms", async () => {
      const staff = authCookie(world.staff);
      const created = await request(world.app)
        .post("/academics/terms")
        .set("Cookie", staff)
        .send({ name: "Third Term", sessionId: world.session.id });
      expect(created.status).toBe(201);

      const activated = await request(world.app).post(`/academics/terms/${created.body.id}/activate`).set("Cookie", staff);
      expect(activated.status).toBe(200);

      const current = await request(world.app).get("/academics/terms/current").set("Cookie", authCookie(world.alice));
      expect(current.body).toMatchObject({ id: created.body.id, name: "Third Term", isCurrent: true });
    });

    it("keeps students from changing the structure", async () => {
      const res = await request(world.app)
        .post("/academics/classes")
        .set("Cookie", authCookie(world.alice))
        .send({ name: "SS 1" });
      expect(res.status).toBe(403);
    });

    it("rejects duplicate subject codes", async () => {
      const res = await request(world.app)
        .post("/academics/subjects")
        .set("Cookie", admin)
        .send({ name: "Further Maths", code: "mth" });
      expect(res.status).toBe(409);
      expect(res.body.message).toBe("Subject code MTH is already in use");
    });
  });

  describe("grading settings", () => {
    it("reports the configured preset by default", async () => {
      const res = await request(world.app).get("/settings/grading").set("Cookie", authCookie(world.teacher));
      expect(res.status).toBe(200);
      expect(res.body.source).toBe("preset");
      expect(res.body.preset).toBe("four-band");
      expect(res.body.bands.map((b: { grade: string }) => b.grade)).toEqual(["A", "C", "P", "F"]);
    });

    it("switches presets and saves custom scales", async () => {
      const preset = await request(world.app).put("/settings/grading").set("Cookie", admin).send({ preset: "six-band" });
      expect(preset.body).toMatchObject({ source: "preset", preset: "six-band" });
      expect(preset.body.bands).toHaveLength(6);

      const custom = await request(world.app)
        .put("/settings/grading")
        .set("Cookie", admin)
        .send({ bands: [{ min: 0, grade: "f", remark: "Fail" }, { min: 50, grade: "p", remark: "Pass" }] });
      expect(custom.body).toEqual({
        source: "custom",
        preset: "six-band",
        bands: [
          { min: 50, grade: "P", remark: "Pass" },
          { min: 0, grade: "F", remark: "Fail" },
        ],
      });

      const invalid = await request(world.app)
        .put("/settings/grading")
        .set("Cookie", admin)
        .send({ bands: [{ min: 40, grade: "P" }] });
      expect(invalid.status).toBe(400);
      expect(invalid.body.message).toBe("Grading scale must include a band starting at 0");

      const unknown = await request(world.app).put("/settings/grading").set("Cookie", admin).send({ preset: "nine-band" });
      expect(unknown.status).toBe(400);
    });

    it("is changed by admins only", async () => {
      const res = await request(world.app)
        .put("/settings/grading")
        .set("Cookie", authCookie(world.staff))
        .send({ preset: "six-band" });
      expect(res.status).toBe(403);
    });
  });

  describe("attendance", () => {
    it("records a register and summarizes it per student", async () => {
      const res = await request(world.app)
        .post("/attendance")
        .set("Cookie", authCookie(world.teacher))
        .send({
          classId: world.jss1.id,
          date: "2025-01-06",
          entries: [
            { studentId: world.alice.id, status: "present" },
            { studentId: world.carol.id, status: "present" },
          ],
        });
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ recorded: 1, skipped: [`${world.carol.id}: not a student of JSS 1`] });

      const own = await request(world.app)
        .get(`/attendance/summary/${world.alice.id}`)
        .set("Cookie", authCookie(world.alice));
      expect(own.body).toEqual({
        studentId: world.alice.id,
        termId: world.firstTerm.id,
        present: 1,
        absent: 0,
        late: 0,
        total: 1,
      });

      const other = await request(world.app)
        .get(`/attendance/summary/${world.alice.id}`)
        .set("Cookie", authCookie(world.bob));
      expect(other.status).toBe(403);
    });
  });

  describe("audit logs", () => {
    it("lists entries newest first with paging", async () => {
      for (const username of ["one", "two", "three"]) {
        await request(world.app)
          .post("/admin/users")
          .set("Cookie", admin)
          .send({ username: `user-${username}`, password: "test-password", name: username, role: "teacher" });
      }

      const res = await request(world.app)
        .get("/audit-logs")
        .query({ action: "user_created", limit: 2 })
        .set("Cookie", admin);

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ total: 3, page: 1, pages: 2 });
      expect(res.body.data.map((l: { details: { username: string } }) => l.details.username)).toEqual([
        "user-three",
        "user-two",
      ]);
      expect(res.body.data[0].actor).toBe(world.admin.id);
    });
  });
});
