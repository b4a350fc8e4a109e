#!/usr/bin/env tsx
/**
 * Seed demo articles and walk one reader through onboarding, a digest
 * and some feedback, printing how the profile moves.
 *
 * Usage:
 *   npx tsx scripts/seed-demo.ts [userId]
 */

import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });

import { initializeDatabase } from '../src/lib/db/index';
import { resetDbClient } from '../src/lib/db/driver';
import { SqlArticleStore } from '../src/lib/db/articles';
import { getPersonalizationService } from '../src/lib/personalization/context';
import { logger } from '../src/lib/logger';
import type { CandidateArticle } from '../src/lib/model';

const DemoArticleSchema = z.array(
  z.object({
    id: z.string(),
    title: z.string(),
    category: z.string(),
    source: z.string(),
    quality: z.number().nullable(),
    hoursAgo: z.number(),
  })
);

function loadDemoArticles(now: Date): CandidateArticle[] {
  const file = path.resolve(process.cwd(), 'scripts/data/demo-articles.json');
  const raw = DemoArticleSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));
  return raw.map((a) => ({
    id: a.id,
    title: a.title,
    url: `https://example.com/articles/${a.id}`,
    category: a.category,
    source: a.source,
    quality: a.quality ?? undefined,
    publishedAt: new Date(now.getTime() - a.hoursAgo * 60 * 60 * 1000),
  }));
}

async function main() {
  const userId = process.argv[2] ?? 'demo-reader';
  const now = new Date();

  const db = await initializeDatabase();
  try {
    await new SqlArticleStore(db).upsertArticles(loadDemoArticles(now));

    const service = await getPersonalizationService();
    await service.completeOnboarding(userId, {
      topics: ['AI', 'Science'],
      sources: ['Nature News'],
      dailyLimit: 5,
    });
    await service.updatePreferences(userId, { excludeTopics: ['Politics'] });

    const digest = await service.generateDigest(userId);
    console.log(`\nDigest for ${userId} (personalization ${digest.personalizationScore.toFixed(3)}, diversity ${digest.diversityScore.toFixed(2)})`);
    for (const article of digest.articles) {
      console.log(`  ${article.score.toFixed(3)}  [${article.category}] ${article.title ?? article.id} (${article.source})`);
    }

    const first = digest.articles[0];
    if (first) {
      const liked = await service.submitFeedback(userId, first.id, 'like');
      console.log(`\nLiked ${first.id}:`, liked.changes);
    }
    const disliked = await service.submitFeedback(userId, 'demo-04', 'dislike');
    console.log(`Disliked demo-04:`, disliked.changes);

    const profile = await service.getProfile(userId);
    console.log('\nTopic weights now:', profile.topicWeights);
    console.log('Source weights now:', profile.sourceWeights);
  } finally {
    await resetDbClient();
  }
}

main().catch((error: unknown) => {
  logger.error('Demo failed', error);
  process.exit(1);
});
