import { MongoClient } from "mongodb";

// Ledger writes give up quickly when the server is unreachable.
const serverSelectionTimeoutMS = 5000;

export const createMongoClient = async (mongoUri: string): Promise<MongoClient> => {
  const client = new MongoClient(mongoUri, { appName: "github-harvester", serverSelectionTimeoutMS });
  await client.connect();
  return client;
};
