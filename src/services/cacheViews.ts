import type { MemberRecord, ProjectRecord, TaskRecord, TodoRecord } from "../domain/records.js";
import { CacheServiceError } from "../models/errorCodes.js";

// Pure projections over committed records. None of these mutate their input.

const CLOSED_TODO_STATUSES = new Set(["Done", "Cancelled"]);
const NO_STATUS = "No Status";

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

// Keys come from upstream names; fromEntries defines them as own properties.
function toCounts(counts: Map<string, number>): Record<string, number> {
  return Object.fromEntries(counts);
}

export function utcDay(value: Date): string {
  return value.toISOString().slice(0, 10);
}

function dayOf(timestamp: string | null): string | null {
  return timestamp && timestamp.length >= 10 ? timestamp.slice(0, 10) : null;
}

export function isTodoOverdue(todo: TodoRecord, today: Date): boolean {
  const deadline = dayOf(todo.deadline);
  if (!deadline) {
    return false;
  }
  if (todo.status !== null && CLOSED_TODO_STATUSES.has(todo.status)) {
    return false;
  }
  return deadline < utcDay(today);
}

// Projects

export function projectsByHealth(projects: readonly ProjectRecord[], color: string): ProjectRecord[] {
  const wanted = color.toLowerCase();
  return projects.filter((project) => project.healthColor?.toLowerCase() === wanted);
}

export interface ProjectStatistics {
  totalProjects: number;
  statusSummary: { red: number; yellow: number; green: number; notSet: number };
  projectsByAssignee: Record<string, number>;
}

export function projectStatistics(projects: readonly ProjectRecord[]): ProjectStatistics {
  const statusSummary = { red: 0, yellow: 0, green: 0, notSet: 0 };
  const projectsByAssignee = new Map<string, number>();

  for (const project of projects) {
    switch (project.healthColor) {
      case "red":
        statusSummary.red += 1;
        break;
      case "yellow":
        statusSummary.yellow += 1;
        break;
      case "green":
        statusSummary.green += 1;
        break;
      default:
        statusSummary.notSet += 1;
    }
    for (const assignee of project.assignees) {
      increment(projectsByAssignee, assignee);
    }
  }

  return { totalProjects: projects.length, statusSummary, projectsByAssignee: toCounts(projectsByAssignee) };
}

export interface EmployeeProject {
  pageId: string;
  projectName: string;
  status: string | null;
  healthStatus: string | null;
  healthColor: string | null;
  priority: string | null;
  url: string;
}

export interface EmployeeWithProjects {
  employeeName: string;
  totalProjects: number;
  projects: EmployeeProject[];
}

export function employeesWithProjects(projects: readonly ProjectRecord[]): EmployeeWithProjects[] {
  const byEmployee = new Map<string, EmployeeProject[]>();
  for (const project of projects) {
    for (const assignee of project.assignees) {
      const entry: EmployeeProject = {
        pageId: project.pageId,
        projectName: project.projectName,
        status: project.status,
        healthStatus: project.healthStatus,
        healthColor: project.healthColor,
        priority: project.priority,
        url: project.url
      };
      const existing = byEmployee.get(assignee);
      if (existing) {
        existing.push(entry);
      } else {
        byEmployee.set(assignee, [entry]);
      }
    }
  }

  return [...byEmployee.entries()]
    .map(([employeeName, assigned]) => ({ employeeName, totalProjects: assigned.length, projects: assigned }))
    .sort((a, b) => a.employeeName.localeCompare(b.employeeName));
}

// Tasks

export interface TaskQuery {
  status?: string;
  priority?: string;
}

export function filterTasks(tasks: readonly TaskRecord[], query: TaskQuery): TaskRecord[] {
  return tasks.filter(
    (task) =>
      (query.status === undefined || task.status === query.status) &&
      (query.priority === undefined || task.priority === query.priority)
  );
}

export function tasksCreatedOn(tasks: readonly TaskRecord[], day: Date): TaskRecord[] {
  const wanted = utcDay(day);
  return tasks.filter((task) => dayOf(task.createdTime) === wanted);
}

/** Done tasks last edited on the given day; the edit is taken as the completion. */
export function tasksCompletedOn(tasks: readonly TaskRecord[], day: Date): TaskRecord[] {
  const wanted = utcDay(day);
  return tasks.filter((task) => task.status === "Done" && dayOf(task.lastEditedTime) === wanted);
}

// Todos

export interface MemberProfile {
  name: string;
  position: string | null;
  status: string | null;
  tgId: string | null;
  startDate: string | null;
}

export interface TodoView extends TodoRecord {
  isOverdue: boolean;
}

export interface MemberTodos {
  memberName: string;
  /** Null for an assignee the team directory does not list. */
  member: MemberProfile | null;
  totalTasks: number;
  tasksByStatus: Record<string, number>;
  overdueCount: number;
  todos: TodoView[];
}

export interface TodoViewOptions {
  statusFilter?: string;
  directory?: readonly MemberRecord[];
}

interface MemberTally {
  memberName: string;
  member: MemberProfile | null;
  statusCounts: Map<string, number>;
  overdueCount: number;
  todos: TodoView[];
}

function memberKey(name: string): string {
  return name.trim().toLowerCase();
}

function toProfile(record: MemberRecord): MemberProfile {
  return {
    name: record.name,
    position: record.position,
    status: record.status,
    tgId: record.tgId,
    startDate: record.startDate
  };
}

function directoryIndex(directory: readonly MemberRecord[]): Map<string, MemberProfile> {
  const index = new Map<string, MemberProfile>();
  for (const record of directory) {
    const key = memberKey(record.name);
    if (!index.has(key)) {
      index.set(key, toProfile(record));
    }
  }
  return index;
}

/**
 * Every directory member gets an entry, with or without todos. Assignees are matched
 * to the directory by case-insensitive name; unknown assignees get an entry of their own.
 */
export function groupTodosByMember(
  todos: readonly TodoRecord[],
  today: Date,
  options: TodoViewOptions = {}
): MemberTodos[] {
  const tallies = new Map<string, MemberTally>();
  for (const [key, member] of directoryIndex(options.directory ?? [])) {
    tallies.set(key, { memberName: member.name, member, statusCounts: new Map(), overdueCount: 0, todos: [] });
  }

  for (const todo of todos) {
    if (options.statusFilter !== undefined && todo.status !== options.statusFilter) {
      continue;
    }
    const view: TodoView = { ...todo, isOverdue: isTodoOverdue(todo, today) };
    for (const memberName of todo.assignees) {
      const key = memberKey(memberName);
      let tally = tallies.get(key);
      if (!tally) {
        tally = { memberName, member: null, statusCounts: new Map(), overdueCount: 0, todos: [] };
        tallies.set(key, tally);
      }
      tally.todos.push(view);
      increment(tally.statusCounts, todo.status ?? NO_STATUS);
      if (view.isOverdue) {
        tally.overdueCount += 1;
      }
    }
  }

  return [...tallies.values()]
    .map((tally) => ({
      memberName: tally.memberName,
      member: tally.member,
      totalTasks: tally.todos.length,
      tasksByStatus: toCounts(tally.statusCounts),
      overdueCount: tally.overdueCount,
      todos: tally.todos
    }))
    .sort((a, b) => a.memberName.localeCompare(b.memberName));
}

export function memberTodos(
  todos: readonly TodoRecord[],
  memberName: string,
  today: Date,
  options: TodoViewOptions = {}
): MemberTodos {
  const wanted = memberKey(memberName);
  const match = groupTodosByMember(todos, today, options).find((member) => memberKey(member.memberName) === wanted);
  if (!match) {
    throw new CacheServiceError("MEMBER_NOT_FOUND", { memberName }, `Member '${memberName}' not found in cache`);
  }
  return match;
}

export interface OverdueAssignee {
  memberName: string;
  memberPosition: string | null;
}

export interface OverdueTodo {
  members: OverdueAssignee[];
  todo: TodoView;
}

export function overdueTodos(
  todos: readonly TodoRecord[],
  today: Date,
  directory: readonly MemberRecord[] = []
): OverdueTodo[] {
  const index = directoryIndex(directory);
  return todos
    .filter((todo) => isTodoOverdue(todo, today))
    .map((todo) => ({
      members: todo.assignees.map((memberName) => ({
        memberName,
        memberPosition: index.get(memberKey(memberName))?.position ?? null
      })),
      todo: { ...todo, isOverdue: true }
    }));
}

export interface TodoStatistics {
  totalMembers: number;
  membersWithTasks: number;
  totalTodos: number;
  todosByStatus: Record<string, number>;
  totalOverdue: number;
  overdueByMember: Record<string, number>;
  unassignedTodos: number;
}

export function todoStatistics(
  todos: readonly TodoRecord[],
  today: Date,
  directory: readonly MemberRecord[] = []
): TodoStatistics {
  const todosByStatus = new Map<string, number>();
  let totalOverdue = 0;
  let unassignedTodos = 0;

  for (const todo of todos) {
    increment(todosByStatus, todo.status ?? NO_STATUS);
    if (isTodoOverdue(todo, today)) {
      totalOverdue += 1;
    }
    if (todo.assignees.length === 0) {
      unassignedTodos += 1;
    }
  }

  const members = groupTodosByMember(todos, today, { directory });
  const overdueByMember = members
    .filter((member) => member.overdueCount > 0)
    .map((member): [string, number] => [member.memberName, member.overdueCount]);

  return {
    totalMembers: members.length,
    membersWithTasks: members.filter((member) => member.totalTasks > 0).length,
    totalTodos: todos.length,
    todosByStatus: toCounts(todosByStatus),
    totalOverdue,
    overdueByMember: Object.fromEntries(overdueByMember),
    unassignedTodos
  };
}
