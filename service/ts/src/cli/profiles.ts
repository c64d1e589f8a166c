import { readFileSync } from 'node:fs';
import yargs from 'yargs';
import { z } from 'zod';

import { loadConfig } from '../config.js';
import type { ProfileReconciler } from '../engine/reconciler.js';
import { isVirtual } from '../engine/identity.js';
import { GAMES } from '../engine/types.js';
import { toProfileEntryResponse, toProfileResponse } from '../routes/helpers/responders.js';
import { createReconciler } from '../services/federation.js';
import { getStore, type ProfileStore } from '../store/index.js';
import { SeedFileSchema, seedStore } from '../store/seed.js';

const GameOption = z.enum(GAMES);

export interface ProfilesCliDeps {
  store: () => ProfileStore;
  reconciler: () => ProfileReconciler;
  log: (line: string) => void;
}

const defaultDeps = (): ProfilesCliDeps => ({
  store: getStore,
  reconciler: () => createReconciler(getStore(), loadConfig()),
  log: (line) => console.log(line),
});

export const createProfilesCli = (args: string[], deps: ProfilesCliDeps = defaultDeps()) => {
  const print = (value: unknown) => deps.log(JSON.stringify(value, null, 2));

  return (
    yargs(args)
      .scriptName('profiles')
      // `--version` names a game version here, not the tool's.
      .version(false)
      .command(
        'card <card>',
        'Resolve a card to a local or virtual identity',
        (cmd) => cmd.positional('card', { type: 'string', demandOption: true }),
        async (argv) => {
          const userId = await deps.reconciler().fromCard(argv.card);
          print({ user_id: userId, virtual: isVirtual(userId) });
        }
      )
      .command(
        'profile',
        'Look up one profile through the federation',
        (cmd) =>
          cmd
            .option('game', { type: 'string', choices: GAMES, demandOption: true })
            .option('version', { type: 'number', demandOption: true })
            .option('user', { type: 'string', demandOption: true, desc: 'Local or virtual user id' })
            .option('strict', { type: 'boolean', default: false, desc: 'Require an exact version match' }),
        async (argv) => {
          const reconciler = deps.reconciler();
          const game = GameOption.parse(argv.game);
          const profile = argv.strict
            ? await reconciler.getProfile(game, argv.version, argv.user)
            : await reconciler.getAnyProfile(game, argv.version, argv.user);
          if (!profile) {
            deps.log(`No profile for ${argv.user}`);
            return;
          }
          print(toProfileResponse(profile));
        }
      )
      .command(
        'all',
        'List every local and remote-only profile for a game version',
        (cmd) =>
          cmd
            .option('game', { type: 'string', choices: GAMES, demandOption: true })
            .option('version', { type: 'number', demandOption: true }),
        async (argv) => {
          const entries = await deps.reconciler().getAllProfiles(GameOption.parse(argv.game), argv.version);
          print(entries.map(toProfileEntryResponse));
        }
      )
      .command(
        'seed',
        'Load users, cards and profiles from a JSON file into the configured store',
        (cmd) => cmd.option('file', { type: 'string', demandOption: true }),
        async (argv) => {
          const seed = SeedFileSchema.parse(JSON.parse(readFileSync(argv.file, 'utf8')));
          const report = await seedStore(deps.store(), seed);
          deps.log(`Seeded ${report.users.length} users, ${report.cards} cards, ${report.profiles} profiles`);
        }
      )
      .demandCommand(1)
      .strict()
      .help()
  );
};
