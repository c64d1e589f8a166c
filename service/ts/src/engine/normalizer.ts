import { z } from 'zod';

import type {
  CanonicalProfile,
  Game,
  GameSpecificFields,
  QproSelection,
  RawProfileRecord,
} from './types.js';

// Stored and remote payloads use -1 for "not set"; anything that is not an
// integer is treated the same way.
const OptionalInt = z
  .number()
  .int()
  .optional()
  .catch(undefined)
  .transform((value) => (value === -1 ? undefined : value));

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const QPRO_PARTS = ['head', 'hair', 'face', 'body', 'hand'] as const;

const QproSchema = z.object({
  head: OptionalInt,
  hair: OptionalInt,
  face: OptionalInt,
  body: OptionalInt,
  hand: OptionalInt,
});

const ProfileFieldsSchema = z.object({
  name: z.string().catch(''),
  area: OptionalInt,
  character: OptionalInt,
  icon: OptionalInt,
  qpro: z.preprocess((value) => (isRecord(value) ? value : {}), QproSchema),
});

export type ProfileFields = z.infer<typeof ProfileFieldsSchema>;

export interface GameFormat {
  /** Game specific canonical fields taken from a parsed payload. */
  extract(fields: ProfileFields): GameSpecificFields;
  /** The same fields written back in payload form. */
  toWire(profile: CanonicalProfile): RawProfileRecord;
}

const pickQpro = (source: QproSelection): QproSelection => {
  const qpro: QproSelection = {};
  for (const part of QPRO_PARTS) {
    const value = source[part];
    if (value !== undefined) {
      qpro[part] = value;
    }
  }
  return qpro;
};

const GAME_FORMATS: Partial<Record<Game, GameFormat>> = {
  ddr: {
    extract: (fields) => (fields.area === undefined ? {} : { area: fields.area }),
    toWire: (profile) => (profile.area === undefined ? {} : { area: profile.area }),
  },
  iidx: {
    extract: (fields) => ({
      ...(fields.area === undefined ? {} : { pid: fields.area }),
      qpro: pickQpro(fields.qpro),
    }),
    toWire: (profile) => ({
      ...(profile.pid === undefined ? {} : { area: profile.pid }),
      qpro: pickQpro(profile.qpro ?? {}),
    }),
  },
  pnm: {
    extract: (fields) => (fields.character === undefined ? {} : { chara: fields.character }),
    toWire: (profile) => (profile.chara === undefined ? {} : { character: profile.chara }),
  },
  reflec: {
    extract: (fields) => (fields.icon === undefined ? {} : { config: { iconId: fields.icon } }),
    toWire: (profile) => (profile.config === undefined ? {} : { icon: profile.config.iconId }),
  },
};

export const getGameFormat = (game: Game): GameFormat | undefined => GAME_FORMATS[game];

export const parseProfileFields = (raw: RawProfileRecord): ProfileFields => ProfileFieldsSchema.parse(raw);

/**
 * Builds a canonical profile from a stored or remote payload. Every call
 * returns a new object; malformed fields are dropped rather than rejected.
 */
export const normalizeProfile = (
  raw: RawProfileRecord,
  game: Game,
  version: number,
  refId: string,
  extId: number
): CanonicalProfile => {
  const fields = parseProfileFields(raw);
  const extra = getGameFormat(game)?.extract(fields) ?? {};

  return {
    name: fields.name,
    game,
    version,
    refId,
    extId,
    ...extra,
  };
};

/** Payload form of a canonical profile, as served to other servers. */
export const toWireRecord = (profile: CanonicalProfile): RawProfileRecord => ({
  name: profile.name,
  ...(getGameFormat(profile.game)?.toWire(profile) ?? {}),
});
