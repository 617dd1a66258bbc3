import { eq, asc } from "drizzle-orm";
import type { Profile } from "../schema";
import { profiles, scrapedProfiles } from "../schema";
import { getDb, type AppDatabase } from "../client";
import type { ScrapedProfile } from "../../domain/models";

export class ProfilesRepository {
  constructor(private db: AppDatabase = getDb()) {}

  /** Inserts or refreshes a profile; enriched counters are never overwritten by a bare listing. */
  async upsert(profile: ScrapedProfile, at: number): Promise<Profile> {
    const enrichedFields = profile.isEnriched
      ? {
          displayName: profile.displayName,
          followersCount: profile.followersCount,
          followingCount: profile.followingCount,
          likesCount: profile.likesCount,
          bio: profile.bio,
          isPrivate: profile.isPrivate,
          isVerified: profile.isVerified,
          isEnriched: true,
        }
      : {};

    const result = await this.db
      .insert(profiles)
      .values({
        username: profile.username,
        displayName: profile.displayName,
        followersCount: profile.followersCount,
        followingCount: profile.followingCount,
        likesCount: profile.likesCount,
        bio: profile.bio,
        isPrivate: profile.isPrivate,
        isVerified: profile.isVerified,
        isEnriched: profile.isEnriched,
        firstSeenAt: at,
        lastSeenAt: at,
      })
      .onConflictDoUpdate({
        target: profiles.username,
        set: { ...enrichedFields, lastSeenAt: at },
      })
      .returning();

    if (!result || result.length === 0 || !result[0]) {
      throw new Error("Failed to upsert profile");
    }
    return result[0];
  }

  async linkToSession(sessionId: number, profileId: number, at: number): Promise<void> {
    await this.db
      .insert(scrapedProfiles)
      .values({ sessionId, profileId, createdAt: at })
      .onConflictDoNothing({ target: [scrapedProfiles.sessionId, scrapedProfiles.profileId] });
  }

  async findByUsername(username: string): Promise<Profile | null> {
    const [result] = await this.db.select().from(profiles).where(eq(profiles.username, username)).limit(1);
    return result ?? null;
  }

  async listBySession(sessionId: number): Promise<Profile[]> {
    const rows = await this.db
      .select({ profile: profiles })
      .from(scrapedProfiles)
      .innerJoin(profiles, eq(scrapedProfiles.profileId, profiles.id))
      .where(eq(scrapedProfiles.sessionId, sessionId))
      .orderBy(asc(scrapedProfiles.id));
    return rows.map((row) => row.profile);
  }
}

export const profilesRepo = new ProfilesRepository();
