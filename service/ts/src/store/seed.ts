import { z } from 'zod';

import { GAMES, type UserId } from '../engine/types.js';
import type { ProfileStore } from './types.js';

const SeedProfileSchema = z.object({
  game: z.enum(GAMES),
  version: z.number().int().min(1),
  data: z.record(z.unknown()),
});

const SeedUserSchema = z.object({
  cards: z.array(z.string().trim().min(1)).default([]),
  profiles: z.array(SeedProfileSchema).default([]),
});

export const SeedFileSchema = z.object({
  users: z.array(SeedUserSchema),
});

export type SeedFile = z.infer<typeof SeedFileSchema>;

export interface SeedReport {
  users: UserId[];
  cards: number;
  profiles: number;
}

/** Creates one local user per seed entry, with its cards and profiles. */
export const seedStore = async (store: ProfileStore, seed: SeedFile): Promise<SeedReport> => {
  const report: SeedReport = { users: [], cards: 0, profiles: 0 };

  for (const user of seed.users) {
    const userId = await store.createUser();
    report.users.push(userId);

    for (const card of user.cards) {
      await store.addCard(userId, card);
      report.cards += 1;
    }

    for (const profile of user.profiles) {
      await store.putProfile({ userId, game: profile.game, version: profile.version, data: profile.data });
      report.profiles += 1;
    }
  }

  return report;
};
