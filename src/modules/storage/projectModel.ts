import mongoose, { Schema } from "mongoose";

export interface ProjectDocument extends mongoose.Document {
  projectNumber: string;
  projectName: string;
  revision: string;
  /** The validated project tree, stored as-is. */
  data: unknown;
  createdAt: Date;
  updatedAt: Date;
}

const ProjectSchema = new Schema<ProjectDocument>(
  {
    projectNumber: { type: String, required: true, index: true },
    projectName: { type: String, required: true },
    revision: { type: String, default: "" },
    data: { type: Schema.Types.Mixed, required: true },
  },
  { timestamps: true, minimize: false }
);

ProjectSchema.index({ updatedAt: -1 });

export const ProjectModel =
  mongoose.models.Project ?? mongoose.model<ProjectDocument>("Project", ProjectSchema);
