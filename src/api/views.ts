import { Router } from "express";
import { restSchemas } from "../contracts/restSchemas.js";
import type { AppLogger } from "../logging/logger.js";
import {
  employeesWithProjects,
  filterTasks,
  groupTodosByMember,
  memberTodos,
  overdueTodos,
  projectStatistics,
  projectsByHealth,
  tasksCompletedOn,
  tasksCreatedOn,
  todoStatistics
} from "../services/cacheViews.js";
import type { MemberRecord } from "../domain/records.js";
import type { FreshnessView, ReadService } from "../services/readService.js";
import { parseRequestPart } from "./validation.js";

export interface ViewsRouterDeps {
  reader: ReadService;
  logger: AppLogger;
}

interface Directory {
  records: readonly MemberRecord[];
  freshness: FreshnessView | null;
}

// Every view answers from the committed snapshot and echoes its freshness.
export function createViewsRouter(deps: ViewsRouterDeps): Router {
  const router = Router();
  const { reader, logger } = deps;

  // Todo views still answer before the first directory refresh, from assignees alone.
  const loadDirectory = async (): Promise<Directory> => {
    const result = await reader.read("members");
    return result ? { records: result.records, freshness: result.freshness } : { records: [], freshness: null };
  };

  router.get("/api/projects/health/:color", async (req, res, next) => {
    try {
      const { color } = parseRequestPart(restSchemas.healthColorParams, req.params);
      const { records, freshness } = await reader.require("projects");
      const projects = projectsByHealth(records, color);
      res.status(200).json({ freshness, totalCount: projects.length, projects });
    } catch (error) {
      next(error);
    }
  });

  router.get("/api/projects/statistics", async (_req, res, next) => {
    try {
      const { records, freshness } = await reader.require("projects");
      res.status(200).json({ freshness, ...projectStatistics(records) });
    } catch (error) {
      next(error);
    }
  });

  router.get("/api/employees", async (_req, res, next) => {
    try {
      const { records, freshness } = await reader.require("projects");
      const employees = employeesWithProjects(records);
      res.status(200).json({ freshness, totalEmployees: employees.length, employees });
    } catch (error) {
      next(error);
    }
  });

  router.get("/api/tasks/filter", async (req, res, next) => {
    try {
      const query = parseRequestPart(restSchemas.taskFilterQuery, req.query);
      const { records, freshness } = await reader.require("tasks");
      const tasks = filterTasks(records, query);
      res.status(200).json({ freshness, totalCount: tasks.length, tasks });
    } catch (error) {
      next(error);
    }
  });

  router.get("/api/tasks/created-today", async (_req, res, next) => {
    try {
      const { records, freshness } = await reader.require("tasks");
      const tasks = tasksCreatedOn(records, reader.today());
      res.status(200).json({ freshness, totalCount: tasks.length, tasks });
    } catch (error) {
      next(error);
    }
  });

  router.get("/api/tasks/completed-today", async (_req, res, next) => {
    try {
      const { records, freshness } = await reader.require("tasks");
      const tasks = tasksCompletedOn(records, reader.today());
      res.status(200).json({ freshness, totalCount: tasks.length, tasks });
    } catch (error) {
      next(error);
    }
  });

  // The todos snapshot holds active todos only, so /active answers the same listing.
  router.get(["/api/todos", "/api/todos/active"], async (req, res, next) => {
    try {
      const { status } = parseRequestPart(restSchemas.todoQuery, req.query);
      const { records, freshness } = await reader.require("todos");
      const directory = await loadDirectory();
      const members = groupTodosByMember(records, reader.today(), {
        statusFilter: status,
        directory: directory.records
      });
      res.status(200).json({
        freshness,
        directoryFreshness: directory.freshness,
        totalMembers: members.length,
        membersWithTasks: members.filter((member) => member.totalTasks > 0).length,
        members
      });
    } catch (error) {
      next(error);
    }
  });

  router.get("/api/todos/overdue", async (_req, res, next) => {
    try {
      const { records, freshness } = await reader.require("todos");
      const directory = await loadDirectory();
      const overdue = overdueTodos(records, reader.today(), directory.records);
      res.status(200).json({
        freshness,
        directoryFreshness: directory.freshness,
        totalOverdue: overdue.length,
        overdueTodos: overdue
      });
    } catch (error) {
      next(error);
    }
  });

  router.get("/api/todos/statistics", async (_req, res, next) => {
    try {
      const { records, freshness } = await reader.require("todos");
      const directory = await loadDirectory();
      res.status(200).json({
        freshness,
        directoryFreshness: directory.freshness,
        ...todoStatistics(records, reader.today(), directory.records)
      });
    } catch (error) {
      next(error);
    }
  });

  router.get("/api/todos/member/:name", async (req, res, next) => {
    try {
      const { name } = parseRequestPart(restSchemas.memberParams, req.params);
      const { status } = parseRequestPart(restSchemas.todoQuery, req.query);
      const { records, freshness } = await reader.require("todos");
      const directory = await loadDirectory();
      const member = memberTodos(records, name, reader.today(), { statusFilter: status, directory: directory.records });
      logger.debug?.({ member: member.memberName, total: member.totalTasks }, "views.member_todos");
      res.status(200).json({ freshness, directoryFreshness: directory.freshness, ...member });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
