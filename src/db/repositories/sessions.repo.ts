import { eq, desc } from "drizzle-orm";
import type { WorkflowSession, NewWorkflowSession } from "../schema";
import { workflowSessions } from "../schema";
import { getDb, type AppDatabase } from "../client";
import { logger } from "../../core/logger";

export class SessionsRepository {
  constructor(private db: AppDatabase = getDb()) {}

  async create(data: NewWorkflowSession): Promise<WorkflowSession> {
    const result = await this.db.insert(workflowSessions).values(data).returning();
    if (!result || result.length === 0 || !result[0]) {
      throw new Error("Failed to create workflow session");
    }
    logger.debug({ sessionId: result[0].id, workflowType: result[0].workflowType }, "Workflow session created");
    return result[0];
  }

  async findById(id: number): Promise<WorkflowSession | null> {
    const [result] = await this.db.select().from(workflowSessions).where(eq(workflowSessions.id, id)).limit(1);
    return result ?? null;
  }

  async listRecent(limit: number = 20, accountId?: number): Promise<WorkflowSession[]> {
    return this.db
      .select()
      .from(workflowSessions)
      .where(accountId !== undefined ? eq(workflowSessions.accountId, accountId) : undefined)
      .orderBy(desc(workflowSessions.startedAt), desc(workflowSessions.id))
      .limit(limit);
  }

  async update(id: number, data: Partial<NewWorkflowSession>): Promise<WorkflowSession | null> {
    const [result] = await this.db.update(workflowSessions).set(data).where(eq(workflowSessions.id, id)).returning();
    return result ?? null;
  }
}

export const sessionsRepo = new SessionsRepository();
