#!/usr/bin/env tsx

import { readFile } from 'node:fs/promises';
import { config } from 'dotenv';
import { z } from 'zod';
import { loadConfig } from '../src/config.js';
import { ReviewerSchema } from '../src/schemas/reviews.js';
import { MAX_RATING, MIN_RATING } from '../src/lib/constants.js';
import { createPostgresStore, createSqlClient } from '../src/services/postgres-store.js';
import { createBook } from '../src/services/catalog-service.js';
import { createReview } from '../src/services/review-service.js';
import type { ServiceContext } from '../src/services/context.js';
import { Logger } from '../lib/logger.js';

// Load environment variables
config();

const FIXTURE_URL = new URL('./fixtures/sample-books.json', import.meta.url);
const REVIEWS_PER_BOOK = { min: 0, max: 5 };

// Books are validated by the catalog service itself
const FixtureSchema = z.object({
  books: z.array(z.unknown()).min(1),
  reviewers: z.array(ReviewerSchema).min(1),
  comments: z.array(z.string().min(1)).min(1),
});

const randomInt = (min: number, max: number) => min + Math.floor(Math.random() * (max - min + 1));

function pick<T>(items: readonly T[]): T {
  const item = items[randomInt(0, items.length - 1)];
  if (item === undefined) throw new Error('Cannot pick from an empty list');
  return item;
}

// Some moment earlier this year
function randomReviewDate(): string {
  const now = Date.now();
  const startOfYear = new Date(new Date().getFullYear(), 0, 1).getTime();
  return new Date(randomInt(startOfYear, now)).toISOString();
}

async function seed(): Promise<void> {
  const appConfig = loadConfig();
  const logger = Logger.forScript(appConfig, 'seed');
  const sql = createSqlClient(appConfig);
  const ctx: ServiceContext = {
    store: createPostgresStore(sql),
    logger,
    defaultPageSize: appConfig.DEFAULT_PAGE_SIZE,
  };

  try {
    const fixture = FixtureSchema.parse(JSON.parse(await readFile(FIXTURE_URL, 'utf8')));
    let reviewCount = 0;

    for (const input of fixture.books) {
      const book = await createBook(ctx, input);

      const reviews = randomInt(REVIEWS_PER_BOOK.min, REVIEWS_PER_BOOK.max);
      for (let i = 0; i < reviews; i++) {
        await createReview(ctx, book.id, {
          rating: randomInt(MIN_RATING, MAX_RATING),
          comment: pick(fixture.comments),
          reviewer: pick(fixture.reviewers),
          review_date: randomReviewDate(),
        });
        reviewCount++;
      }
    }

    logger.info('Database seeded', { books: fixture.books.length, reviews: reviewCount });
  } finally {
    await ctx.store.close();
  }
}

seed().catch((error: unknown) => {
  console.error('❌ Seeding failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
