import mongoose, { Schema } from "mongoose";

export type ProjectLogLevel = "info" | "warning" | "error";

export interface ProjectLogDocument extends mongoose.Document {
  projectId: mongoose.Types.ObjectId;
  operation: string;
  level: ProjectLogLevel;
  message: string;
  createdAt: Date;
  updatedAt: Date;
}

const ProjectLogSchema = new Schema<ProjectLogDocument>(
  {
    projectId: { type: Schema.Types.ObjectId, required: true, index: true, ref: "Project" },
    operation: { type: String, required: true },
    level: { type: String, required: true },
    message: { type: String, required: true },
  },
  { timestamps: true }
);

ProjectLogSchema.index({ projectId: 1, createdAt: -1 });

export const ProjectLogModel =
  mongoose.models.ProjectLog ?? mongoose.model<ProjectLogDocument>("ProjectLog", ProjectLogSchema);
