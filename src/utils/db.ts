import mongoose from "mongoose";
import { config } from "./config";
import { logger } from "./logger";

/**
 * Connect to MongoDB when `MONGODB_URI` is set. Resolves false when the service
 * should run on the in-process interaction store instead.
 */
export const connectDB = async (uri: string = config.mongodbUri): Promise<boolean> => {
  if (!uri) {
    logger.warn("MONGODB_URI not set, interactions will be kept in memory");
    return false;
  }

  try {
    await mongoose.connect(uri, {
      serverSelectionTimeoutMS: 5000, // Keep trying to send operations for 5 seconds
      socketTimeoutMS: 45000, // Close sockets after 45 seconds of inactivity
    });
    logger.info("Connected to MongoDB");
    return true;
  } catch (error) {
    logger.error("MongoDB connection error:", error);
    logger.warn("Continuing without database connection, interactions will be kept in memory");
    return false;
  }
};

export const disconnectDB = async (): Promise<void> => {
  if (mongoose.connection.readyState !== 0) {
    await mongoose.disconnect();
    logger.info("Disconnected from MongoDB");
  }
};
