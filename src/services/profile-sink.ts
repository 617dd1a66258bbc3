import { systemClock, unixSeconds, type Clock } from "../core/clock";
import type { ScrapedProfile } from "../domain/models";
import type { ProfileSink } from "../domain/ports";
import { ProfilesRepository, profilesRepo } from "../db/repositories/profiles.repo";

export class SqliteProfileSink implements ProfileSink {
  constructor(
    private repo: ProfilesRepository = profilesRepo,
    private clock: Pick<Clock, "now"> = systemClock
  ) {}

  async saveProfile(profile: ScrapedProfile, sessionId: number | null): Promise<void> {
    const at = unixSeconds(this.clock);
    const row = await this.repo.upsert(profile, at);
    if (sessionId !== null) {
      await this.repo.linkToSession(sessionId, row.id, at);
    }
  }
}
