import { MongoClient } from "mongodb";

export interface MongoDBSettings {
  uri: string;
  dbName: string;
}

let client: MongoClient | null = null;

export async function connectToMongoDB(settings: MongoDBSettings): Promise<MongoClient> {
  if (client) {
    return client;
  }

  try {
    const candidate = new MongoClient(settings.uri);
    await candidate.connect();
    client = candidate;
    console.log(`Connected to MongoDB: ${settings.dbName}`);
    return client;
  } catch (error) {
    console.error("Failed to connect to MongoDB:", error);
    throw error;
  }
}

export async function closeMongoDBConnection(): Promise<void> {
  if (client) {
    await client.close();
    client = null;
    console.log("MongoDB connection closed");
  }
}
