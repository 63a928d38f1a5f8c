import mongoose from "mongoose";

import { env } from "../config/env";

let connection: Promise<typeof mongoose> | null = null;

export async function connectMongo(uri: string | undefined = env.MONGO_URI) {
  if (!uri) {
    throw new Error("MONGO_URI is not configured");
  }
  if (!connection) {
    connection = mongoose.connect(uri).catch((error: unknown) => {
      connection = null;
      throw error;
    });
  }
  await connection;
  console.log("[MONGO] connected");
  return mongoose.connection;
}

export async function disconnectMongo(): Promise<void> {
  if (!connection) return;
  connection = null;
  await mongoose.disconnect();
}
