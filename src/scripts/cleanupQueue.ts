/**
 * Cleanup Script
 * Empties the BullMQ downloads queue (QUEUE_DRIVER=redis).
 *
 * Run it while the server is stopped: queued ids whose tasks were failed by
 * restart recovery would otherwise be picked up and skipped one by one.
 */

import "dotenv/config";
import { Queue } from "bullmq";
import { DOWNLOAD_QUEUE_NAME } from "../jobs/dispatchers/bullmqDispatcher.js";
import { getRedisUrl } from "../config/env.js";
import { createRedisConnection } from "../config/redis.js";

async function cleanupQueue() {
  console.log(`[cleanup] Flushing queue '${DOWNLOAD_QUEUE_NAME}'...`);

  const connection = createRedisConnection(getRedisUrl());
  const queue = new Queue(DOWNLOAD_QUEUE_NAME, { connection });

  try {
    const counts = await queue.getJobCounts("waiting", "active", "completed", "failed", "delayed");
    const total = Object.values(counts).reduce((sum, count) => sum + count, 0);

    console.log("[cleanup] Current queue state:");
    for (const [state, count] of Object.entries(counts)) {
      console.log(`  - ${state}: ${count}`);
    }
    console.log(`  - total: ${total}`);

    // Obliterate removes ALL jobs (waiting, active, completed, failed, delayed)
    await queue.obliterate({ force: true });
    console.log("[cleanup] ✓ Queue cleared");
  } finally {
    await queue.close();
    await connection.quit();
  }
}

cleanupQueue()
  .then(() => process.exit(0))
  .catch((error) => {
    console.error("[cleanup] ✗ Error:", error);
    process.exit(1);
  });
