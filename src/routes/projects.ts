import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import { parseProject } from "../modules/validation/projectSchema";
import {
  createProject,
  findProjectById,
  listProjects,
  updateProject,
} from "../modules/storage/projectRepository";
import { createProjectLog, listProjectLogs } from "../modules/storage/projectLogRepository";
import { generateCostSheet } from "../services/generation/generationService";
import { sendFailure, sendOutputFile } from "./respond";

const router = Router();

router.get("/", async (_req: Request, res: Response, next: NextFunction) => {
  try {
    const projects = await listProjects();
    res.status(200).json(projects);
  } catch (error) {
    next(error);
  }
});

router.post("/", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const project = parseProject(req.body);
    const stored = await createProject(project);
    await createProjectLog({
      projectId: stored.id,
      operation: "create",
      message: `Project saved: ${project.meta.projectNumber} ${project.meta.projectName}.`,
    });
    res.status(201).json(stored);
  } catch (error) {
    next(error);
  }
});

router.get("/:projectId", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const stored = await findProjectById(req.params.projectId);
    if (!stored) {
      return res.status(404).json({ error: { code: "NOT_FOUND", message: "Project not found", details: {} } });
    }
    res.status(200).json(stored);
  } catch (error) {
    next(error);
  }
});

router.put("/:projectId", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const project = parseProject(req.body);
    const updated = await updateProject(req.params.projectId, project);
    if (!updated) {
      return res.status(404).json({ error: { code: "NOT_FOUND", message: "Project not found", details: {} } });
    }
    await createProjectLog({ projectId: updated.id, operation: "update", message: "Project tree updated." });
    res.status(200).json(updated);
  } catch (error) {
    next(error);
  }
});

router.get("/:projectId/logs", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const limit = Number(req.query.limit ?? 50);
    const logs = await listProjectLogs({
      projectId: req.params.projectId,
      limit: Number.isFinite(limit) && limit > 0 ? limit : 50,
    });
    res.status(200).json(logs);
  } catch (error) {
    next(error);
  }
});

router.post("/:projectId/cost-sheet", async (req: Request, res: Response, next: NextFunction) => {
  try {
    const projectId = req.params.projectId;
    const stored = await findProjectById(projectId);
    if (!stored) {
      return res.status(404).json({ error: { code: "NOT_FOUND", message: "Project not found", details: {} } });
    }
    const result = await generateCostSheet(stored.project);
    if (!result.ok) {
      await createProjectLog({ projectId, operation: "cost-sheet", level: "error", message: result.error.message });
      return sendFailure(res, result.error);
    }
    await createProjectLog({
      projectId,
      operation: "cost-sheet",
      level: result.warnings.length ? "warning" : "info",
      message: result.warnings.length
        ? `Cost sheet generated with ${result.warnings.length} warning(s): ${result.warnings.join("; ")}`
        : `Cost sheet generated: ${result.value.fileName}.`,
    });
    sendOutputFile(res, result.value, result.warnings);
  } catch (error) {
    next(error);
  }
});

export default router;
