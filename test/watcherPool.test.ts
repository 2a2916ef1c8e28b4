import { expect } from 'chai';
import sinon from 'sinon';

import { AuthError, ConnectionError, GoneError, WatchUnsupportedError } from '../src/errors';
import { ResourceStore } from '../src/services/store/resourceStore';
import { WatcherPool } from '../src/services/watcherPool';
import type { SubscriptionInfo } from '../src/types';
import { FakeCluster } from './support/fakeCluster';
import { rawPod, waitFor } from './support/fixtures';

const NO_WAIT = { baseMs: 0, capMs: 0, jitter: 0 };

describe('WatcherPool', () => {
  let api: FakeCluster;
  let store: ResourceStore;
  let pool: WatcherPool;

  const names = () => store.snapshot('dev', 'pods').map(obj => obj.name);

  beforeEach(() => {
    api = new FakeCluster();
    store = new ResourceStore();
    pool = new WatcherPool(api, store, { backoff: NO_WAIT, pollIntervalMs: 1 });
  });

  afterEach(async () => {
    await pool.dispose();
    store.dispose();
    sinon.restore();
  });

  it('lists, then applies watch events from the list revision', async () => {
    api.onList('dev', 'pods', { items: [rawPod('p1', '5')], revision: '5' });
    api.onWatch('dev', 'pods', {
      events: [
        { type: 'ADDED', object: rawPod('p2', '6') },
        { type: 'MODIFIED', object: rawPod('p1', '7', 'default', 'Failed') }
      ]
    });

    pool.start('dev', 'pods');
    await waitFor(() => pool.get('dev', 'pods')?.revision === '7', 'the second event');

    expect(names()).to.deep.equal(['p1', 'p2']);
    expect(store.get('dev', 'pods', 'default/p1')?.status).to.deep.equal({ text: 'Failed', tone: 'error' });
    expect(api.watchCalls.map(call => call.revision)).to.deep.equal(['5']);
  });

  it('relists after a broken watch and ends up with every object', async () => {
    api.onList(
      'dev',
      'pods',
      { items: [], revision: '1' },
      { items: [rawPod('p1', '2'), rawPod('p2', '3'), rawPod('p3', '4')], revision: '4' }
    );
    api.onWatch(
      'dev',
      'pods',
      {
        events: [
          { type: 'ADDED', object: rawPod('p1', '2') },
          { type: 'ADDED', object: rawPod('p2', '3') }
        ],
        end: new ConnectionError('connection reset by peer')
      },
      { events: [] }
    );

    pool.start('dev', 'pods');
    await waitFor(() => api.watchCalls.length === 2, 'the second watch');

    expect(names()).to.deep.equal(['p1', 'p2', 'p3']);
    expect(api.listCount('dev', 'pods')).to.equal(2);
    expect(api.watchCalls.map(call => call.revision)).to.deep.equal(['1', '4']);
    const info = pool.get('dev', 'pods');
    expect(info?.state).to.equal('active');
    expect(info?.attempts).to.equal(0);
    expect(info?.listCount).to.equal(2);
  });

  it('keeps an object deleted when its addition arrives after the deletion', async () => {
    api.onList('dev', 'pods', { items: [rawPod('p1', '5'), rawPod('p3', '6')], revision: '6' });
    api.onWatch('dev', 'pods', {
      events: [
        { type: 'DELETED', object: rawPod('p2', '8') },
        { type: 'ADDED', object: rawPod('p2', '7') }
      ]
    });

    pool.start('dev', 'pods');
    await waitFor(() => pool.get('dev', 'pods')?.revision === '7', 'both events');

    expect(names()).to.deep.equal(['p1', 'p3']);
  });

  it('relists immediately when the watch revision has expired', async () => {
    api.onList(
      'dev',
      'pods',
      { items: [rawPod('p1', '5')], revision: '5' },
      { items: [rawPod('p1', '5'), rawPod('p2', '25')], revision: '25' }
    );
    api.onWatch('dev', 'pods', { events: [], end: new GoneError('HTTP 410: too old resource version') }, { events: [] });

    pool.start('dev', 'pods');
    await waitFor(() => api.watchCalls.length === 2, 'the second watch');

    expect(names()).to.deep.equal(['p1', 'p2']);
    expect(api.watchCalls.map(call => call.revision)).to.deep.equal(['5', '25']);
  });

  it('re-opens a watch the server closed', async () => {
    api.onWatch('dev', 'pods', { events: [], end: 'close' }, { events: [] });

    pool.start('dev', 'pods');
    await waitFor(() => api.watchCalls.length === 2, 'the second watch');

    expect(api.listCount('dev', 'pods')).to.equal(2);
  });

  it('stops on rejected credentials and reports them', async () => {
    const onAuthFailure = sinon.stub();
    pool = new WatcherPool(api, store, { backoff: NO_WAIT, onAuthFailure });
    api.onList('dev', 'pods', new AuthError('HTTP 401: Unauthorized', 401));

    pool.start('dev', 'pods');
    await waitFor(() => pool.get('dev', 'pods')?.state === 'stopped', 'the subscription to stop');

    expect(onAuthFailure.calledOnceWith('dev', sinon.match.instanceOf(AuthError))).to.equal(true);
    expect(pool.get('dev', 'pods')?.lastError).to.equal('HTTP 401: Unauthorized');
    expect(api.listCount('dev', 'pods')).to.equal(1);
    expect(pool.activeKeys()).to.deep.equal([]);
  });

  it('polls kinds the server will not watch', async () => {
    api.onList('dev', 'nodes', { items: [], revision: '3' });
    api.onWatch('dev', 'nodes', { events: [], end: new WatchUnsupportedError('HTTP 405: method not allowed') });

    pool.start('dev', 'nodes');
    await waitFor(() => api.listCount('dev', 'nodes') >= 3, 'three lists');

    expect(pool.get('dev', 'nodes')?.mode).to.equal('poll');
    expect(api.watchCalls).to.have.length(1);
  });

  it('skips malformed objects in lists and events', async () => {
    api.onList('dev', 'pods', {
      items: [rawPod('p1', '2'), { metadata: { name: 'no-namespace' } }, 'garbage'],
      revision: '2'
    });
    api.onWatch('dev', 'pods', {
      events: [
        { type: 'ADDED', object: { metadata: {} } },
        { type: 'ADDED', object: rawPod('p2', '3') }
      ]
    });

    pool.start('dev', 'pods');
    await waitFor(() => pool.get('dev', 'pods')?.revision === '3', 'the valid event');

    expect(names()).to.deep.equal(['p1', 'p2']);
    expect(pool.get('dev', 'pods')?.state).to.equal('active');
  });

  it('returns the live subscription when started twice', async () => {
    const first = pool.start('dev', 'pods');
    const second = pool.start('dev', 'pods');
    await waitFor(() => api.watchCalls.length === 1, 'the watch');

    expect(second).to.deep.equal(first);
    expect(api.listCount('dev', 'pods')).to.equal(1);
  });

  it('passes the namespace restriction to the API', async () => {
    pool = new WatcherPool(api, store, { backoff: NO_WAIT, namespace: 'team-a' });

    pool.start('dev', 'pods');
    await waitFor(() => api.listCalls.length === 1, 'the list');

    expect(api.listCalls[0]).to.deep.equal({ context: 'dev', kind: 'pods', namespace: 'team-a' });
  });

  it('cancels the watch and acknowledges a stop', async () => {
    const changes: SubscriptionInfo[] = [];
    pool.onDidChangeSubscription(info => changes.push(info));
    pool.start('dev', 'pods');
    await waitFor(() => api.streams.length === 1, 'the watch');

    await pool.stop('dev', 'pods');

    expect(api.streams[0].cancelled).to.equal(true);
    expect(pool.get('dev', 'pods')).to.equal(undefined);
    expect(changes[changes.length - 1].state).to.equal('stopped');
  });

  it('stops every subscription of one context', async () => {
    pool.start('dev', 'pods');
    pool.start('dev', 'services');
    pool.start('prod', 'pods');
    await waitFor(() => api.streams.length === 3, 'three watches');

    await pool.stopContext('dev');

    expect(pool.activeKeys()).to.deep.equal([{ context: 'prod', kind: 'pods' }]);
  });
});
