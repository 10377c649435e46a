import type { Repository } from './repository.js';
import type { UserRecord } from './types.js';

export type LeaderboardEntry = {
  user: UserRecord;
  score: number;
};

/**
 * Contribution scores, recomputed from the repository on every call.
 * Score = approved posts authored + comments authored (replies count the same).
 */
export class RatingEngine {
  constructor(private readonly repo: Repository) {}

  async score(userId: string): Promise<number> {
    const [posts, comments] = await Promise.all([
      this.repo.countPosts({ authorId: userId, approved: true }),
      this.repo.countComments({ authorId: userId }),
    ]);
    return posts + comments;
  }

  /** 1-based position in the full ranking, or undefined for an unknown user. */
  async rank(userId: string): Promise<number | undefined> {
    const ranking = await this.ranking();
    const idx = ranking.findIndex((e) => e.user.id === userId);
    return idx === -1 ? undefined : idx + 1;
  }

  async leaderboard(limit: number): Promise<LeaderboardEntry[]> {
    const ranking = await this.ranking();
    return limit > 0 ? ranking.slice(0, limit) : ranking;
  }

  /** Score descending; ties keep user insertion order (Array#sort is stable). */
  private async ranking(): Promise<LeaderboardEntry[]> {
    const users = await this.repo.listUsers();
    const entries: LeaderboardEntry[] = [];
    for (const user of users) {
      entries.push({ user, score: await this.score(user.id) });
    }
    return entries.sort((a, b) => b.score - a.score);
  }
}

/** Star bar for a score: one star per five contributions, capped. */
export function formatStars(score: number, maxStars = 5): string {
  const full = Math.min(Math.floor(Math.max(0, score) / 5), maxStars);
  return '⭐️'.repeat(full) + '☆'.repeat(maxStars - full);
}
