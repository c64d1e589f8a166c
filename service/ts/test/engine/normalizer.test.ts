import { test } from 'node:test';
import assert from 'node:assert/strict';

import { normalizeProfile, toWireRecord } from '../../src/engine/normalizer.js';

const REF_ID = '0123456789ABCDEF';
const EXT_ID = 12345678;

test('always emits the fixed fields and defaults the name', () => {
  const profile = normalizeProfile({}, 'jubeat', 12, REF_ID, EXT_ID);

  assert.deepEqual(profile, {
    name: '',
    game: 'jubeat',
    version: 12,
    refId: REF_ID,
    extId: EXT_ID,
  });
});

test('games without extra fields ignore game specific keys', () => {
  const profile = normalizeProfile(
    { name: 'ECHO', area: 5, character: 9, icon: 3, qpro: { head: 1 } },
    'sdvx',
    6,
    REF_ID,
    EXT_ID
  );

  assert.deepEqual(profile, { name: 'ECHO', game: 'sdvx', version: 6, refId: REF_ID, extId: EXT_ID });
});

test('ddr copies area unless it is the unset sentinel', () => {
  assert.equal(normalizeProfile({ area: 13 }, 'ddr', 17, REF_ID, EXT_ID).area, 13);
  assert.equal('area' in normalizeProfile({ area: -1 }, 'ddr', 17, REF_ID, EXT_ID), false);
});

test('iidx maps area to pid and keeps only the qpro parts that are set', () => {
  const profile = normalizeProfile(
    { name: 'ALPHA', area: 7, qpro: { head: -1, hair: 3 } },
    'iidx',
    25,
    REF_ID,
    EXT_ID
  );

  assert.deepEqual(profile, {
    name: 'ALPHA',
    game: 'iidx',
    version: 25,
    refId: REF_ID,
    extId: EXT_ID,
    pid: 7,
    qpro: { hair: 3 },
  });
});

test('iidx copies all five qpro parts when present', () => {
  const profile = normalizeProfile(
    { qpro: { head: 1, hair: 2, face: 3, body: 4, hand: 5 } },
    'iidx',
    25,
    REF_ID,
    EXT_ID
  );

  assert.deepEqual(profile.qpro, { head: 1, hair: 2, face: 3, body: 4, hand: 5 });
  assert.equal('pid' in profile, false);
});

test('pnm maps character to chara and reflec maps icon to config.iconId', () => {
  assert.equal(normalizeProfile({ character: 1044 }, 'pnm', 24, REF_ID, EXT_ID).chara, 1044);
  assert.equal('chara' in normalizeProfile({ character: -1 }, 'pnm', 24, REF_ID, EXT_ID), false);
  assert.deepEqual(normalizeProfile({ icon: 77 }, 'reflec', 5, REF_ID, EXT_ID).config, { iconId: 77 });
  assert.equal('config' in normalizeProfile({}, 'reflec', 5, REF_ID, EXT_ID), false);
});

test('malformed fields are treated as absent', () => {
  const profile = normalizeProfile(
    { name: 42, area: '5', qpro: 'junk' },
    'iidx',
    25,
    REF_ID,
    EXT_ID
  );

  assert.deepEqual(profile, {
    name: '',
    game: 'iidx',
    version: 25,
    refId: REF_ID,
    extId: EXT_ID,
    qpro: {},
  });
  assert.equal('area' in normalizeProfile({ area: 2.5 }, 'ddr', 17, REF_ID, EXT_ID), false);
});

test('normalizing twice yields equal but independent profiles', () => {
  const raw = { name: 'ALPHA', area: 7, qpro: { hair: 3 } };
  const first = normalizeProfile(raw, 'iidx', 25, REF_ID, EXT_ID);
  const second = normalizeProfile(raw, 'iidx', 25, REF_ID, EXT_ID);

  assert.deepEqual(first, second);
  assert.notEqual(first, second);
  assert.notEqual(first.qpro, second.qpro);

  if (first.qpro) first.qpro.hair = 9;
  assert.deepEqual(second.qpro, { hair: 3 });
  assert.deepEqual(raw.qpro, { hair: 3 });
});

test('toWireRecord writes game specific fields back in payload form', () => {
  const iidx = normalizeProfile({ name: 'ALPHA', area: 7, qpro: { hair: 3 } }, 'iidx', 25, REF_ID, EXT_ID);
  assert.deepEqual(toWireRecord(iidx), { name: 'ALPHA', area: 7, qpro: { hair: 3 } });

  const reflec = normalizeProfile({ name: 'BRAVO', icon: 77 }, 'reflec', 5, REF_ID, EXT_ID);
  assert.deepEqual(toWireRecord(reflec), { name: 'BRAVO', icon: 77 });

  const pnm = normalizeProfile({ name: 'CHARLIE', character: 12 }, 'pnm', 24, REF_ID, EXT_ID);
  assert.deepEqual(toWireRecord(pnm), { name: 'CHARLIE', character: 12 });

  const jubeat = normalizeProfile({ name: 'DELTA', area: 3 }, 'jubeat', 12, REF_ID, EXT_ID);
  assert.deepEqual(toWireRecord(jubeat), { name: 'DELTA' });
});
