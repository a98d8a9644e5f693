import { describe, expect, it } from "vitest";
import {
  notionPageSchema,
  parseMemberPage,
  parseProjectPage,
  parseTaskPage,
  parseTodoPage
} from "../../src/infra/notion/properties.js";
import { memberPage, people, projectPage, taskPage, title, todoPage } from "../helpers/notionPages.js";

const parsePage = (raw: unknown) => notionPageSchema.parse(raw);

describe("upstream page parsers", () => {
  it("maps project properties", () => {
    expect(parseProjectPage(parsePage(projectPage("p-1", "Website relaunch")))).toEqual({
      pageId: "p-1",
      projectName: "Website relaunch",
      healthStatus: "On track",
      healthColor: "green",
      status: "In progress",
      priority: "High",
      priorityColor: "red",
      assignees: ["Dana Lee"],
      taskCount: 3,
      url: "https://notion.example.test/p-1",
      createdTime: "2025-03-01T09:00:00.000Z",
      lastEditedTime: "2025-03-02T09:00:00.000Z"
    });
  });

  it("fills in an untitled, unassigned project without health", () => {
    const page = projectPage("p-2", "", {
      Health: { type: "select", select: null },
      Assignee: people([]),
      "Task Count": { type: "rollup", rollup: { type: "number", number: null } }
    });

    const project = parseProjectPage(parsePage(page));

    expect(project.projectName).toBe("Untitled");
    expect(project.assignees).toEqual(["Unassigned"]);
    expect(project.healthColor).toBeNull();
    expect(project.healthStatus).toBeNull();
    expect(project.taskCount).toBe(0);
  });

  it("falls back to the person id when a name is missing", () => {
    const page = projectPage("p-3", "Ops", {
      Assignee: { type: "people", people: [{ id: "user-42" }, { id: "user-7", name: "Kim" }] }
    });

    expect(parseProjectPage(parsePage(page)).assignees).toEqual(["user-42", "Kim"]);
  });

  it("maps task properties", () => {
    expect(parseTaskPage(parsePage(taskPage("t-1", "Fix login")))).toEqual({
      pageId: "t-1",
      taskName: "Fix login",
      status: "Done",
      priority: "Low",
      effortLevel: null,
      description: "First draft",
      dueDate: "2025-03-07",
      taskType: ["Bug", "Backend"],
      assignees: ["Sam Park"],
      createdTime: "2025-03-05T08:00:00.000Z",
      lastEditedTime: "2025-03-05T16:30:00.000Z"
    });
  });

  it("merges todo assignees from both people properties without duplicates", () => {
    expect(parseTodoPage(parsePage(todoPage("d-1", "Write summary")))).toEqual({
      id: "d-1",
      url: "https://notion.example.test/d-1",
      name: "Write summary",
      status: "To-do",
      deadline: "2025-03-03",
      dateDone: null,
      projectIds: ["project-1"],
      assignees: ["Dana Lee", "Sam Park"]
    });
  });

  it("leaves missing member details empty and names a nameless member Unknown", () => {
    const page = memberPage("m-2", "", {
      Position: { type: "rich_text", rich_text: [] },
      Status: { type: "status", status: null },
      tg_id: { type: "number", number: 42 },
      "Start Date": { type: "date", date: null }
    });

    expect(parseMemberPage(parsePage(page))).toMatchObject({
      pageId: "m-2",
      name: "Unknown",
      position: "",
      status: null,
      tgId: null,
      startDate: null
    });
  });

  it("treats properties of an unexpected type as absent", () => {
    const page = todoPage("d-2", "Odd", {
      Name: title("Odd"),
      Status: { type: "select", select: { name: "To-do" } },
      Deadline: { type: "rich_text", rich_text: [] }
    });

    const todo = parseTodoPage(parsePage(page));

    expect(todo.status).toBeNull();
    expect(todo.deadline).toBeNull();
  });
});
