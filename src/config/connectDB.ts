import mongoose from "mongoose";
import { createLogger } from "../utils/logger";

const log = createLogger("DB");

export const connectDB = async (mongoUri: string): Promise<void> => {
  if (mongoose.connection.readyState === 1) return;

  mongoose.set("strictQuery", true);
  await mongoose.connect(mongoUri, {
    serverSelectionTimeoutMS: 15000,
  });
  log.info("Connected to MongoDB");
};

export const disconnectDB = async (): Promise<void> => {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
};
