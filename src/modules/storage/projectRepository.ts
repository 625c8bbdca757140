import { Types } from "mongoose";
import { parseProject } from "../validation/projectSchema";
import type { Project } from "../../types/project";
import { ProjectDocument, ProjectModel } from "./projectModel";

export interface StoredProject {
  id: string;
  project: Project;
  createdAt: Date;
  updatedAt: Date;
}

export interface StoredProjectSummary {
  id: string;
  projectNumber: string;
  projectName: string;
  revision: string;
  updatedAt: Date;
}

function toStored(doc: ProjectDocument): StoredProject {
  return {
    id: String(doc._id),
    project: parseProject(doc.data),
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  };
}

function indexedFields(project: Project) {
  return {
    projectNumber: project.meta.projectNumber,
    projectName: project.meta.projectName,
    revision: project.meta.revision,
    data: project,
  };
}

export async function listProjects(): Promise<StoredProjectSummary[]> {
  const docs: ProjectDocument[] = await ProjectModel.find().sort({ updatedAt: -1 }).exec();
  return docs.map((doc) => ({
    id: String(doc._id),
    projectNumber: doc.projectNumber,
    projectName: doc.projectName,
    revision: doc.revision,
    updatedAt: doc.updatedAt,
  }));
}

export async function findProjectById(projectId: string): Promise<StoredProject | null> {
  if (!Types.ObjectId.isValid(projectId)) return null;
  const doc: ProjectDocument | null = await ProjectModel.findById(projectId).exec();
  return doc ? toStored(doc) : null;
}

export async function createProject(project: Project): Promise<StoredProject> {
  const doc: ProjectDocument = await new ProjectModel(indexedFields(project)).save();
  return toStored(doc);
}

export async function updateProject(projectId: string, project: Project): Promise<StoredProject | null> {
  if (!Types.ObjectId.isValid(projectId)) return null;
  const doc: ProjectDocument | null = await ProjectModel.findByIdAndUpdate(projectId, indexedFields(project), {
    new: true,
  }).exec();
  return doc ? toStored(doc) : null;
}
