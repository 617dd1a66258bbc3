import { and, countDistinct, desc, eq, gte, sql } from "drizzle-orm";
import type { Interaction } from "../schema";
import { interactions, workflowSessions } from "../schema";
import { getDb, type AppDatabase } from "../client";
import type { InteractionKind } from "../../domain/models";

export interface UpsertInteractionInput {
  accountId: number;
  targetIdentifier: string;
  kind: InteractionKind;
  success: boolean;
  sessionId: number | null;
  at: number;
}

export class InteractionsRepository {
  constructor(private db: AppDatabase = getDb()) {}

  /**
   * One row per (account, target, kind). A later failure never downgrades an
   * earlier success.
   */
  async upsert(input: UpsertInteractionInput): Promise<void> {
    await this.db
      .insert(interactions)
      .values({
        accountId: input.accountId,
        targetIdentifier: input.targetIdentifier,
        kind: input.kind,
        success: input.success,
        sessionId: input.sessionId,
        createdAt: input.at,
        updatedAt: input.at,
      })
      .onConflictDoUpdate({
        target: [interactions.accountId, interactions.targetIdentifier, interactions.kind],
        set: {
          success: sql`max(${interactions.success}, excluded.success)`,
          sessionId: sql`coalesce(excluded.session_id, ${interactions.sessionId})`,
          // The cooldown window runs from the last success; failed retries leave it alone.
          updatedAt: sql`case when excluded.success then excluded.updated_at else ${interactions.updatedAt} end`,
        },
      });
  }

  async existsSince(
    accountId: number,
    targetIdentifier: string,
    kind: InteractionKind | "any",
    since: number
  ): Promise<boolean> {
    const conditions = [
      eq(interactions.accountId, accountId),
      eq(interactions.targetIdentifier, targetIdentifier),
      eq(interactions.success, true),
      gte(interactions.updatedAt, since),
    ];
    if (kind !== "any") {
      conditions.push(eq(interactions.kind, kind));
    }

    const [row] = await this.db
      .select({ id: interactions.id })
      .from(interactions)
      .where(and(...conditions))
      .limit(1);
    return row !== undefined;
  }

  async countDistinctTargetsForScope(accountId: number, scope: string, since: number): Promise<number> {
    const [row] = await this.db
      .select({ total: countDistinct(interactions.targetIdentifier) })
      .from(interactions)
      .innerJoin(workflowSessions, eq(interactions.sessionId, workflowSessions.id))
      .where(
        and(
          eq(interactions.accountId, accountId),
          eq(workflowSessions.target, scope),
          gte(interactions.updatedAt, since)
        )
      );
    return row?.total ?? 0;
  }

  async findOne(accountId: number, targetIdentifier: string, kind: InteractionKind): Promise<Interaction | null> {
    const [result] = await this.db
      .select()
      .from(interactions)
      .where(
        and(
          eq(interactions.accountId, accountId),
          eq(interactions.targetIdentifier, targetIdentifier),
          eq(interactions.kind, kind)
        )
      )
      .limit(1);
    return result ?? null;
  }

  async listByAccount(accountId: number, limit: number = 50): Promise<Interaction[]> {
    return this.db
      .select()
      .from(interactions)
      .where(eq(interactions.accountId, accountId))
      .orderBy(desc(interactions.updatedAt), desc(interactions.id))
      .limit(limit);
  }

  async listBySession(sessionId: number): Promise<Interaction[]> {
    return this.db
      .select()
      .from(interactions)
      .where(eq(interactions.sessionId, sessionId))
      .orderBy(desc(interactions.updatedAt), desc(interactions.id));
  }
}

export const interactionsRepo = new InteractionsRepository();
