import { mock, test } from 'node:test';
import assert from 'node:assert/strict';

import { PeerUnavailableError } from '../../src/engine/errors.js';
import { RemoteProfileFetcher } from '../../src/engine/fanout.js';
import { FakePeer } from '../helpers/peers.js';

test('returns nothing and calls nobody without peers', async () => {
  const fetcher = new RemoteProfileFetcher([]);
  assert.deepEqual(await fetcher.fetchByCards('iidx', 25, ['E004000000000001']), []);
  assert.deepEqual(await fetcher.fetchAll('iidx', 25), []);
});

test('flattens responses in peer configuration order, not completion order', async () => {
  const slow = new FakePeer('slow', { delayMs: 20, records: [{ name: 'S1' }, { name: 'S2' }] });
  const fast = new FakePeer('fast', { records: [{ name: 'F1' }] });
  const fetcher = new RemoteProfileFetcher([slow, fast]);

  const records = await fetcher.fetchByCards('iidx', 25, ['E004000000000001', 'E004000000000002']);

  assert.deepEqual(records.map((record) => record.name), ['S1', 'S2', 'F1']);
});

test('every peer receives the full card list', async () => {
  const peers = [new FakePeer('a'), new FakePeer('b')];
  const fetcher = new RemoteProfileFetcher(peers);

  await fetcher.fetchByCards('ddr', 17, ['E004000000000001', 'E004000000000002']);
  await fetcher.fetchAll('ddr', 17);

  for (const peer of peers) {
    assert.deepEqual(
      peer.calls.map(({ game, version, idType, ids }) => ({ game, version, idType, ids })),
      [
        { game: 'ddr', version: 17, idType: 'card', ids: ['E004000000000001', 'E004000000000002'] },
        { game: 'ddr', version: 17, idType: 'server', ids: [] },
      ]
    );
  }
});

test('degrade policy drops a failing peer and logs it', async (t) => {
  const warn = mock.method(console, 'warn', () => undefined);
  t.after(() => warn.mock.restore());

  const healthy = new FakePeer('healthy', { records: [{ name: 'OK' }] });
  const broken = new FakePeer('broken', { error: new Error('connection refused') });
  const fetcher = new RemoteProfileFetcher([broken, healthy], { failurePolicy: 'degrade' });

  const records = await fetcher.fetchByCards('pnm', 24, ['E004000000000001']);

  assert.deepEqual(records, [{ name: 'OK' }]);
  assert.equal(warn.mock.callCount(), 1);
  assert.deepEqual(warn.mock.calls[0]?.arguments, [
    'peer_fetch_failed',
    { peer: 'broken', game: 'pnm', version: 24, idType: 'card', message: 'connection refused' },
  ]);
});

test('degrade policy passes the failure through when the peer is the only one', async () => {
  const fetcher = new RemoteProfileFetcher([new FakePeer('lonely', { error: new Error('timeout') })]);

  await assert.rejects(fetcher.fetchAll('pnm', 24), (err: unknown) => {
    assert.ok(err instanceof PeerUnavailableError);
    assert.deepEqual(err.peers, ['lonely']);
    assert.equal(err.message, 'Peer request failed: lonely');
    return true;
  });
});

test('propagate policy rejects after every call settles and aborts the siblings', async () => {
  const sibling = new FakePeer('sibling', { delayMs: 20, records: [{ name: 'LATE' }] });
  const broken = new FakePeer('broken', { error: new Error('bad gateway') });
  const fetcher = new RemoteProfileFetcher([sibling, broken], { failurePolicy: 'propagate' });

  await assert.rejects(fetcher.fetchByCards('iidx', 25, ['E004000000000001']), (err: unknown) => {
    assert.ok(err instanceof PeerUnavailableError);
    assert.deepEqual(err.peers, ['broken']);
    return true;
  });
  assert.equal(sibling.calls.length, 1);
  assert.equal(sibling.calls[0]?.signal?.aborted, true);
});

test('forwards caller cancellation to every peer and rejects', async () => {
  const peers = [new FakePeer('a'), new FakePeer('b')];
  const fetcher = new RemoteProfileFetcher(peers);
  const controller = new AbortController();
  controller.abort();

  await assert.rejects(fetcher.fetchAll('sdvx', 6, controller.signal), { name: 'AbortError' });

  for (const peer of peers) {
    assert.equal(peer.calls[0]?.signal?.aborted, true);
  }
});

test('a caller abort in flight rejects instead of degrading to an empty answer', async (t) => {
  const warn = mock.method(console, 'warn', () => undefined);
  t.after(() => warn.mock.restore());

  const peers = [
    new FakePeer('a', { delayMs: 200, records: [{ name: 'A' }] }),
    new FakePeer('b', { delayMs: 200, records: [{ name: 'B' }] }),
  ];
  const fetcher = new RemoteProfileFetcher(peers, { failurePolicy: 'degrade' });
  const controller = new AbortController();
  setTimeout(() => controller.abort(new Error('client_disconnected')), 5);

  await assert.rejects(fetcher.fetchByCards('iidx', 25, ['E004ABCD00000001'], controller.signal), {
    message: 'client_disconnected',
  });
  assert.equal(warn.mock.callCount(), 0);
});

test('propagate policy names only the peer that failed, not the siblings it cancelled', async () => {
  const first = new FakePeer('first', { delayMs: 200 });
  const broken = new FakePeer('broken', { error: new Error('bad gateway') });
  const last = new FakePeer('last', { delayMs: 200 });
  const fetcher = new RemoteProfileFetcher([first, broken, last], { failurePolicy: 'propagate' });

  await assert.rejects(fetcher.fetchAll('ddr', 17), (err: unknown) => {
    assert.ok(err instanceof PeerUnavailableError);
    assert.deepEqual(err.peers, ['broken']);
    assert.equal(err.failures.length, 1);
    return true;
  });
  assert.equal(first.calls[0]?.signal?.aborted, true);
  assert.equal(last.calls[0]?.signal?.aborted, true);
});
