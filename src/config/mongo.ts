import mongoose from "mongoose";
import { config } from "./index";

export async function initMongo(): Promise<void> {
  mongoose.set("strictQuery", false);

  // Query params in MONGO_URI carry write-concern settings that clash with the ones below
  const baseUri = config.mongoUri.split("?")[0];

  await mongoose.connect(baseUri, {
    w: "majority",
    wtimeoutMS: 2500,
  });

  console.log("[Mongo] connected", { db: mongoose.connection.name });
}

export async function closeMongo(): Promise<void> {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.disconnect();
  }
}
