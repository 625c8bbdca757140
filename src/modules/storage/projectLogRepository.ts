import { Types } from "mongoose";
import { ProjectLogDocument, ProjectLogLevel, ProjectLogModel } from "./projectLogModel";

export interface ProjectLogEntry {
  operation: string;
  level: ProjectLogLevel;
  message: string;
  createdAt: Date;
}

export async function createProjectLog(params: {
  projectId: string;
  operation: string;
  level?: ProjectLogLevel;
  message: string;
}): Promise<void> {
  if (!Types.ObjectId.isValid(params.projectId)) {
    throw new Error("Invalid project id");
  }
  const log = new ProjectLogModel({
    projectId: params.projectId,
    operation: params.operation,
    level: params.level ?? "info",
    message: params.message,
  });
  await log.save();
}

export async function listProjectLogs(params: { projectId: string; limit?: number }): Promise<ProjectLogEntry[]> {
  if (!Types.ObjectId.isValid(params.projectId)) return [];
  const limit = Math.min(params.limit ?? 50, 200);
  const docs: ProjectLogDocument[] = await ProjectLogModel.find({ projectId: params.projectId })
    .sort({ createdAt: -1 })
    .limit(limit)
    .exec();
  return docs.map((doc) => ({
    operation: doc.operation,
    level: doc.level,
    message: doc.message,
    createdAt: doc.createdAt,
  }));
}
