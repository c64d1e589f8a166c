import { beforeEach, mock, test } from 'node:test';
import assert from 'node:assert/strict';
import request from 'supertest';

process.env.NODE_ENV = 'test';
delete process.env.DATABASE_URL;

const { createTestApp } = await import('../helpers/app.js');
const { FakePeer } = await import('../helpers/peers.js');

const LOCAL_CARD = 'E0040000000000FF';
const REMOTE_CARD = 'E004000000000001';
const REMOTE_ID = `remote:${REMOTE_CARD}`;

let peer: InstanceType<typeof FakePeer>;
let context: ReturnType<typeof createTestApp>;
let agent: ReturnType<typeof request>;

beforeEach(() => {
  peer = new FakePeer('east');
  context = createTestApp([peer]);
  agent = request(context.app);
});

const createLocalUser = async () => {
  const { store } = context;
  const userId = await store.createUser();
  await store.addCard(userId, LOCAL_CARD);
  await store.putProfile({
    userId,
    game: 'iidx',
    version: 25,
    data: { name: 'LOCAL', area: 7, qpro: { head: 1, hair: -1 } },
  });
  return userId;
};

test('health reports the configured peer count', async () => {
  const res = await agent.get('/health');
  assert.equal(res.status, 200);
  assert.deepEqual(res.body, { ok: true, peers: 1 });
});

test('resolves known cards to local users and unknown cards to virtual identities', async () => {
  const userId = await createLocalUser();

  const local = await agent.get('/v1/identities/cards/e0040000000000ff');
  assert.equal(local.status, 200, local.text);
  assert.deepEqual(local.body, { user_id: userId, virtual: false });

  const remote = await agent.get(`/v1/identities/cards/${REMOTE_CARD.toLowerCase()}`);
  assert.equal(remote.status, 200, remote.text);
  assert.deepEqual(remote.body, { user_id: REMOTE_ID, virtual: true });
  assert.equal(peer.calls.length, 0);
});

test('serves a local profile and resolves its identifiers back to the user', async () => {
  const userId = await createLocalUser();

  const res = await agent.get(`/v1/games/iidx/25/profiles/${userId}`);
  assert.equal(res.status, 200, res.text);
  assert.equal(res.body.name, 'LOCAL');
  assert.equal(res.body.version, 25);
  assert.equal(res.body.pid, 7);
  assert.deepEqual(res.body.qpro, { head: 1 });

  const byRefId = await agent.get(`/v1/games/iidx/25/identities/refid/${res.body.refid}`);
  assert.equal(byRefId.status, 200, byRefId.text);
  assert.deepEqual(byRefId.body, { user_id: userId, virtual: false });

  const byExtId = await agent.get(`/v1/games/iidx/25/identities/extid/${res.body.extid}`);
  assert.equal(byExtId.status, 200, byExtId.text);
  assert.equal(byExtId.body.user_id, userId);

  const unknown = await agent.get('/v1/games/iidx/24/identities/refid/0000000000000000');
  assert.equal(unknown.status, 404);
  assert.equal(unknown.body.error, 'identity_not_found');
});

test('strict lookups ignore partial remote matches', async () => {
  peer.respondWith([{ name: 'REMOTE', character: 12, cards: [REMOTE_CARD], match: 'partial' }]);

  const strict = await agent.get(`/v1/games/pnm/24/profiles/${REMOTE_ID}`).query({ strict: 'true' });
  assert.equal(strict.status, 404);
  assert.deepEqual(strict.body, { error: 'profile_not_found', message: `No profile for ${REMOTE_ID}` });

  const any = await agent.get(`/v1/games/pnm/24/profiles/${REMOTE_ID}`);
  assert.equal(any.status, 200, any.text);
  assert.equal(any.body.name, 'REMOTE');
  assert.equal(any.body.version, 0);
  assert.equal(any.body.chara, 12);
  assert.deepEqual(peer.calls.map((call) => call.ids), [[REMOTE_CARD], [REMOTE_CARD]]);
});

test('batch lookup answers every requested identity', async () => {
  const userId = await createLocalUser();

  const res = await agent
    .post('/v1/games/iidx/25/profiles/lookup')
    .send({ user_ids: [userId, REMOTE_ID] });

  assert.equal(res.status, 200, res.text);
  assert.equal(res.body.profiles.length, 2);
  assert.equal(res.body.profiles[0].user_id, userId);
  assert.equal(res.body.profiles[0].profile.name, 'LOCAL');
  assert.deepEqual(res.body.profiles[1], { user_id: REMOTE_ID, virtual: true, profile: null });
});

test('listing merges local profiles with exact remote ones', async () => {
  const userId = await createLocalUser();
  peer.respondWith([
    { name: 'REMOTE', area: 4, cards: [REMOTE_CARD], match: 'exact' },
    { name: 'MIRROR', cards: [LOCAL_CARD], match: 'exact' },
  ]);

  const res = await agent.get('/v1/games/iidx/25/profiles');

  assert.equal(res.status, 200, res.text);
  assert.deepEqual(
    res.body.profiles.map((entry: { user_id: string; profile: { name: string } }) => [
      entry.user_id,
      entry.profile.name,
    ]),
    [
      [userId, 'LOCAL'],
      [REMOTE_ID, 'REMOTE'],
    ]
  );
  assert.equal(peer.calls[0]?.idType, 'server');
});

test('rejects unknown games and malformed versions', async () => {
  const game = await agent.get('/v1/games/pinball/1/profiles');
  assert.equal(game.status, 400);
  assert.equal(game.body.error, 'validation_error');

  const version = await agent.get('/v1/games/ddr/latest/profiles');
  assert.equal(version.status, 400);
  assert.equal(version.body.error, 'validation_error');

  const body = await agent.post('/v1/games/ddr/17/profiles/lookup').send({ user_ids: 'nope' });
  assert.equal(body.status, 400);
  assert.equal(body.body.error, 'validation_error');

  const bare = await agent.get('/v1/games/ddr/17/profiles/remote:');
  assert.equal(bare.status, 400);
  assert.equal(bare.body.error, 'validation_error');

  const bareLookup = await agent.post('/v1/games/ddr/17/profiles/lookup').send({ user_ids: ['remote:'] });
  assert.equal(bareLookup.status, 400);
  assert.equal(peer.calls.length, 0);
});

test('rejects malformed JSON bodies', async () => {
  const res = await agent
    .post('/v1/games/ddr/17/profiles/lookup')
    .set('Content-Type', 'application/json')
    .send('{"user_ids": [');

  assert.equal(res.status, 400);
  assert.equal(res.body.error, 'invalid_json');
});

test('a failing lone peer surfaces as 502', async (t) => {
  const warn = mock.method(console, 'warn', () => {});
  t.after(() => warn.mock.restore());
  peer.failWith(new Error('connection refused'));

  const res = await agent.get(`/v1/games/ddr/17/profiles/${REMOTE_ID}`);

  assert.equal(res.status, 502);
  assert.deepEqual(res.body, {
    error: 'peer_unavailable',
    message: 'Peer request failed: east',
    peers: ['east'],
  });
  assert.equal(warn.mock.callCount(), 1);
});
