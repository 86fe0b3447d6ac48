import type { Collection, MongoClient } from "mongodb";
import type { HarvestRunRecord, HarvestRunRepository } from "../../ports/HarvestRunRepository";
import { createMongoClient } from "./MongoClientFactory";
import { mongoIndexes } from "./mongo.indexes";

export type HarvestRunDoc = HarvestRunRecord & { recordedAt: Date };

/**
 * Keeps one document per harvest job, upserted by `runId`, so recording the
 * same run twice leaves a single entry.
 */
export class MongoHarvestRunRepository implements HarvestRunRepository {
  private client?: MongoClient;
  // Shared by concurrent first callers so only one client is ever opened.
  private collection?: Promise<Collection<HarvestRunDoc>>;

  constructor(
    private readonly mongoUri: string,
    private readonly dbName = "github_harvester",
    private readonly collectionName = "harvest_runs",
    private readonly connect: (uri: string) => Promise<MongoClient> = createMongoClient
  ) {}

  private getCollection(): Promise<Collection<HarvestRunDoc>> {
    if (this.collection) return this.collection;

    const pending = this.openCollection();
    this.collection = pending;
    // A failed open is retried by the next caller; this one still sees the rejection.
    void pending.catch(() => {
      if (this.collection === pending) this.collection = undefined;
    });
    return pending;
  }

  private async openCollection(): Promise<Collection<HarvestRunDoc>> {
    const client = await this.connect(this.mongoUri);
    this.client = client;
    const col = client.db(this.dbName).collection<HarvestRunDoc>(this.collectionName);

    try {
      for (const idx of mongoIndexes.harvestRunCollection) {
        await col.createIndex(idx.keys, idx.options);
      }
    } catch (err) {
      if (this.client === client) this.client = undefined;
      await client.close();
      throw err;
    }

    return col;
  }

  async record(run: HarvestRunRecord): Promise<void> {
    const col = await this.getCollection();
    await col.updateOne(
      { runId: run.runId },
      { $set: { ...run, recordedAt: new Date() } },
      { upsert: true }
    );
  }

  async close(): Promise<void> {
    const pending = this.collection;
    this.collection = undefined;
    // A connect still in flight must settle before its client can be closed.
    if (pending) await Promise.allSettled([pending]);

    const client = this.client;
    this.client = undefined;
    await client?.close();
  }
}
