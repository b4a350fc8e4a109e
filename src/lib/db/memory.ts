/**
 * In-process stores
 * Same contracts as the SQL stores, for demos and tests
 */

import type { CandidateArticle, InteractionEvent, InteractionSignal, InterestProfile, StoredDigest } from "../model";
import { cloneProfile, createDefaultProfile } from "../profile";
import type { ProfileStore } from "./profiles";
import type { CandidateFeed, CandidateQuery } from "./articles";
import type { InteractionLog, StoredInteraction } from "./interactions";
import type { DigestHistory } from "./digests";

export class InMemoryProfileStore implements ProfileStore {
  private readonly profiles = new Map<string, InterestProfile>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async getProfile(userId: string): Promise<InterestProfile> {
    let profile = this.profiles.get(userId);
    if (!profile) {
      profile = createDefaultProfile(userId, this.clock());
      this.profiles.set(userId, profile);
    }
    return cloneProfile(profile);
  }

  async saveProfile(profile: InterestProfile): Promise<void> {
    this.profiles.set(profile.userId, cloneProfile(profile));
  }

  async listUserIds(): Promise<string[]> {
    return [...this.profiles.keys()].sort();
  }
}

export class InMemoryArticleStore implements CandidateFeed {
  private readonly articles = new Map<string, CandidateArticle>();

  constructor(initial: readonly CandidateArticle[] = []) {
    for (const article of initial) {
      this.articles.set(article.id, article);
    }
  }

  add(article: CandidateArticle): void {
    this.articles.set(article.id, article);
  }

  async loadCandidates({ now, windowHours, limit }: CandidateQuery): Promise<CandidateArticle[]> {
    const since = now.getTime() - windowHours * 60 * 60 * 1000;
    return [...this.articles.values()]
      .filter((a) => a.publishedAt.getTime() >= since && a.publishedAt.getTime() <= now.getTime())
      .sort((a, b) => b.publishedAt.getTime() - a.publishedAt.getTime() || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .slice(0, limit);
  }

  async getArticle(articleId: string): Promise<CandidateArticle | null> {
    return this.articles.get(articleId) ?? null;
  }
}

export class InMemoryInteractionLog implements InteractionLog {
  private readonly rows = new Map<string, StoredInteraction>();

  async record(event: InteractionEvent, signal: InteractionSignal): Promise<void> {
    this.rows.set(`${event.userId}\u0000${event.articleId}`, { ...event, signal });
  }

  async listForUser(userId: string, since?: Date): Promise<StoredInteraction[]> {
    return [...this.rows.values()]
      .filter((row) => row.userId === userId && (!since || row.occurredAt.getTime() >= since.getTime()))
      .sort((a, b) => b.occurredAt.getTime() - a.occurredAt.getTime());
  }
}

export class InMemoryDigestHistory implements DigestHistory {
  private readonly digests: StoredDigest[] = [];

  async save(digest: StoredDigest): Promise<void> {
    this.digests.push(digest);
  }

  async listForUser(userId: string, limit: number): Promise<StoredDigest[]> {
    return this.digests
      .filter((d) => d.userId === userId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || (a.id < b.id ? -1 : 1))
      .slice(0, limit);
  }

  async countForUser(userId: string): Promise<number> {
    return this.digests.filter((d) => d.userId === userId).length;
  }
}
