import { beforeEach, describe, expect, it } from "vitest";
import { makeMember, makeProject, makeTask, makeTodo } from "../helpers/fakes.js";
import { createTestServer, type TestAgent } from "../utils/testServer.js";

type TestServer = ReturnType<typeof createTestServer>;

describe("derived views", () => {
  let server: TestServer;
  let agent: TestAgent;

  beforeEach(async () => {
    server = createTestServer({ now: "2025-03-05T12:00:00.000Z" });
    agent = server.agent;
    server.fetcher
      .enqueue("projects", {
        ok: true,
        records: [
          makeProject({ pageId: "p-1", healthColor: "red", assignees: ["Dana Lee"] }),
          makeProject({ pageId: "p-2", healthColor: "green", assignees: ["Sam Park", "Dana Lee"] })
        ],
        pages: 1
      })
      .enqueue("tasks", {
        ok: true,
        records: [
          makeTask({ pageId: "t-1", status: "Done", priority: "High", createdTime: "2025-03-05T08:00:00.000Z", lastEditedTime: "2025-03-05T09:00:00.000Z" }),
          makeTask({ pageId: "t-2", status: "In progress", priority: "Low" })
        ],
        pages: 1
      })
      .enqueue("todos", {
        ok: true,
        records: [
          makeTodo({ id: "d-1", status: "To-do", deadline: "2025-03-04", assignees: ["Dana Lee"] }),
          makeTodo({ id: "d-2", status: "In-progress", deadline: "2025-03-06", assignees: ["Dana Lee", "Sam Park"] })
        ],
        pages: 1
      })
      .enqueue("members", { ok: true, records: [], pages: 1 });
    await agent.post("/api/cache/refresh").expect(200);
  });

  it("selects projects by health color", async () => {
    const response = await agent.get("/api/projects/health/RED").expect(200);

    expect(response.body.totalCount).toBe(1);
    expect(response.body.projects[0].pageId).toBe("p-1");
    expect(response.body.freshness).toMatchObject({ resourceType: "projects", version: 1, isStale: false });
  });

  it("rejects an unknown health color", async () => {
    const response = await agent.get("/api/projects/health/purple").expect(400);

    expect(response.body.reason).toBe("invalid_query");
  });

  it("summarizes projects and employees", async () => {
    const statistics = await agent.get("/api/projects/statistics").expect(200);
    const employees = await agent.get("/api/employees").expect(200);

    expect(statistics.body).toMatchObject({
      totalProjects: 2,
      statusSummary: { red: 1, yellow: 0, green: 1, notSet: 0 },
      projectsByAssignee: { "Dana Lee": 2, "Sam Park": 1 }
    });
    expect(employees.body.totalEmployees).toBe(2);
    expect(employees.body.employees[0]).toMatchObject({ employeeName: "Dana Lee", totalProjects: 2 });
  });

  it("filters tasks and finds the ones created or completed today", async () => {
    const filtered = await agent.get("/api/tasks/filter").query({ priority: "Low" }).expect(200);
    const created = await agent.get("/api/tasks/created-today").expect(200);
    const completed = await agent.get("/api/tasks/completed-today").expect(200);

    expect(filtered.body.tasks.map((task: { pageId: string }) => task.pageId)).toEqual(["t-2"]);
    expect(created.body.tasks.map((task: { pageId: string }) => task.pageId)).toEqual(["t-1"]);
    expect(completed.body.totalCount).toBe(1);
  });

  it("groups todos by member with overdue flags", async () => {
    const response = await agent.get("/api/todos").expect(200);

    expect(response.body.totalMembers).toBe(2);
    expect(response.body.membersWithTasks).toBe(2);
    expect(response.body.members[0]).toMatchObject({
      memberName: "Dana Lee",
      totalTasks: 2,
      overdueCount: 1,
      tasksByStatus: { "To-do": 1, "In-progress": 1 }
    });
  });

  it("answers the active listing under /api/todos/active", async () => {
    const response = await agent.get("/api/todos/active").expect(200);

    expect(response.body.totalMembers).toBe(2);
    expect(response.body.members.map((member: { memberName: string }) => member.memberName)).toEqual(["Dana Lee", "Sam Park"]);
  });

  it("answers for a single member and rejects unknown ones", async () => {
    const member = await agent.get("/api/todos/member/sam%20park").expect(200);
    const missing = await agent.get("/api/todos/member/Nobody").expect(404);

    expect(member.body).toMatchObject({ memberName: "Sam Park", totalTasks: 1, overdueCount: 0 });
    expect(missing.body).toMatchObject({ reason: "member_not_found", details: { memberName: "Nobody" } });
  });

  it("lists overdue todos and statistics", async () => {
    const overdue = await agent.get("/api/todos/overdue").expect(200);
    const statistics = await agent.get("/api/todos/statistics").expect(200);

    expect(overdue.body.totalOverdue).toBe(1);
    expect(overdue.body.overdueTodos[0]).toMatchObject({
      members: [{ memberName: "Dana Lee", memberPosition: null }],
      todo: { id: "d-1", isOverdue: true }
    });
    expect(statistics.body).toMatchObject({
      totalMembers: 2,
      membersWithTasks: 2,
      totalTodos: 2,
      totalOverdue: 1,
      overdueByMember: { "Dana Lee": 1 },
      unassignedTodos: 0
    });
  });

  describe("with the team directory", () => {
    beforeEach(async () => {
      server.fetcher.enqueue("members", {
        ok: true,
        records: [
          makeMember({ pageId: "m-1", name: "Dana Lee", position: "Designer" }),
          makeMember({ pageId: "m-2", name: "Kim Ode", position: "Engineer" })
        ],
        pages: 1
      });
      await agent.post("/api/cache/members/refresh").expect(200);
    });

    it("lists directory members without todos next to the assignees", async () => {
      const response = await agent.get("/api/todos").expect(200);

      expect(response.body.totalMembers).toBe(3);
      expect(response.body.membersWithTasks).toBe(2);
      expect(response.body.members.map((member: { memberName: string }) => member.memberName)).toEqual([
        "Dana Lee",
        "Kim Ode",
        "Sam Park"
      ]);
      expect(response.body.members[1].member).toMatchObject({ name: "Kim Ode", position: "Engineer" });
      expect(response.body.directoryFreshness).toMatchObject({ resourceType: "members", recordCount: 2 });
    });

    it("finds a directory member with no todos and carries positions onto overdue todos", async () => {
      const member = await agent.get("/api/todos/member/kim%20ode").expect(200);
      const overdue = await agent.get("/api/todos/overdue").expect(200);

      expect(member.body).toMatchObject({ memberName: "Kim Ode", totalTasks: 0, todos: [] });
      expect(overdue.body.overdueTodos[0].members).toEqual([{ memberName: "Dana Lee", memberPosition: "Designer" }]);
    });
  });
});
