/**
 * Supabase Task Store
 * Postgres-backed store. The tasks table comes from supabase/migrations;
 * run them separately via:
 *   npx supabase db push
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import type { Task } from "../types/task.js";
import { decodeTaskRecords, toTaskRecord, type TaskStore } from "./taskStore.js";

const LOG_PREFIX = "[store:supabase]";
const TASKS_TABLE = "tasks";

export class SupabaseTaskStore implements TaskStore {
  constructor(private readonly client: SupabaseClient) {}

  /**
   * Verifies the migrated table is reachable. Throws so startup fails fast on a bad setup.
   */
  async init(): Promise<void> {
    const { error } = await this.client.from(TASKS_TABLE).select("id").limit(1);

    if (error) {
      throw new Error(`Tasks table is not reachable (did the migrations run?): ${error.message}`);
    }

    console.log(`${LOG_PREFIX} ✓ Table '${TASKS_TABLE}' reachable`);
  }

  async loadAll(): Promise<Task[]> {
    const { data, error } = await this.client
      .from(TASKS_TABLE)
      .select()
      .order("created_at", { ascending: true });

    if (error) {
      throw new Error(`Failed to load tasks: ${error.message}`);
    }

    const rows: unknown[] = data ?? [];
    return decodeTaskRecords(rows, LOG_PREFIX);
  }

  async upsert(task: Task): Promise<void> {
    const { error } = await this.client
      .from(TASKS_TABLE)
      .upsert(toTaskRecord(task), { onConflict: "id" });

    if (error) {
      throw new Error(`Failed to upsert task ${task.id}: ${error.message}`);
    }
  }

  async close(): Promise<void> {
    // supabase-js holds no connection of its own
  }
}
