import type { FastifyInstance } from "fastify";
import type { Queryable } from "./db";
import { getDb } from "./db";

export async function registerHealthRoutes(app: FastifyInstance, db: Queryable | null = getDb()): Promise<void> {
  app.get("/health", async () => ({ status: "ok" }));

  app.get("/ready", async () => {
    if (db) {
      await db.query("SELECT 1");
    }
    return { status: "ready" };
  });
}
