import { eq, asc } from "drizzle-orm";
import type { Account, NewAccount } from "../schema";
import { accounts } from "../schema";
import { getDb, type AppDatabase } from "../client";
import { logger } from "../../core/logger";

export class AccountsRepository {
  constructor(private db: AppDatabase = getDb()) {}

  async create(data: NewAccount): Promise<Account> {
    const result = await this.db.insert(accounts).values(data).returning();
    if (!result || result.length === 0 || !result[0]) {
      throw new Error("Failed to create account");
    }
    logger.info({ accountId: result[0].id, username: result[0].username }, "Account created");
    return result[0];
  }

  async findById(id: number): Promise<Account | null> {
    const [result] = await this.db.select().from(accounts).where(eq(accounts.id, id)).limit(1);
    return result ?? null;
  }

  async findByUsername(username: string): Promise<Account | null> {
    const [result] = await this.db.select().from(accounts).where(eq(accounts.username, username)).limit(1);
    return result ?? null;
  }

  async list(): Promise<Account[]> {
    return this.db.select().from(accounts).orderBy(asc(accounts.id));
  }
}

export const accountsRepo = new AccountsRepository();
