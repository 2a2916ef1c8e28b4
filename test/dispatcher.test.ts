import { expect } from 'chai';
import sinon from 'sinon';

import { ConnectionError } from '../src/errors';
import { ContextRegistry } from '../src/services/contextRegistry';
import { Dispatcher } from '../src/services/dispatcher';
import type { FocusChange } from '../src/services/dispatcher';
import { ResourceStore } from '../src/services/store/resourceStore';
import { WatcherPool } from '../src/services/watcherPool';
import { FakeCluster, StaticContextSource, clusterContext } from './support/fakeCluster';
import { rawPod, waitFor } from './support/fixtures';

describe('Dispatcher', () => {
  let api: FakeCluster;
  let store: ResourceStore;
  let pool: WatcherPool;
  let registry: ContextRegistry;
  let dispatcher: Dispatcher;

  function createDispatcher(options: ConstructorParameters<typeof Dispatcher>[3]): Dispatcher {
    dispatcher.dispose();
    dispatcher = new Dispatcher(pool, store, registry, options);
    return dispatcher;
  }

  beforeEach(() => {
    api = new FakeCluster();
    store = new ResourceStore();
    pool = new WatcherPool(api, store, { backoff: { baseMs: 0, capMs: 0, jitter: 0 } });
    registry = new ContextRegistry(new StaticContextSource([clusterContext('dev'), clusterContext('prod')], 'dev'), api);
    dispatcher = new Dispatcher(pool, store, registry, { graceMs: 30_000, prefetch: 1 });
  });

  afterEach(async () => {
    dispatcher.dispose();
    await pool.dispose();
    registry.dispose();
    store.dispose();
    sinon.restore();
  });

  describe('desiredKinds', () => {
    it('includes the neighbouring tabs', () => {
      expect(dispatcher.desiredKinds('dev', 'pods')).to.deep.equal(['pods', 'services']);
      expect(dispatcher.desiredKinds('dev', 'nodes')).to.deep.equal(['services', 'nodes', 'configmaps']);
    });

    it('follows the kinds discovered for the context', async () => {
      api.onDiscover('dev', ['pods', 'deployments']);
      await registry.activate('dev');

      expect(dispatcher.desiredKinds('dev', 'deployments')).to.deep.equal(['pods', 'deployments']);
    });
  });

  it('reuses a subscription when focus returns within the grace period', async () => {
    createDispatcher({ graceMs: 30_000, prefetch: 0 });

    expect(dispatcher.onFocusChange('dev', 'pods').start).to.deep.equal([{ context: 'dev', kind: 'pods' }]);
    await waitFor(() => api.watchCalls.length === 1, 'the pods watch');

    const away = dispatcher.onFocusChange('dev', 'services');
    expect(away.linger).to.deep.equal([{ context: 'dev', kind: 'pods' }]);
    expect(away.start).to.deep.equal([{ context: 'dev', kind: 'services' }]);

    const back = dispatcher.onFocusChange('dev', 'pods');
    expect(back.start).to.deep.equal([]);
    expect(back.linger).to.deep.equal([{ context: 'dev', kind: 'services' }]);
    await waitFor(() => api.watchCalls.length === 2, 'the services watch');

    expect(api.listCount('dev', 'pods')).to.equal(1);
    expect(pool.get('dev', 'pods')?.state).to.equal('active');
  });

  it('stops a lingering subscription once the grace period expires', () => {
    const clock = sinon.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    try {
      createDispatcher({ graceMs: 1000, prefetch: 0 });
      dispatcher.onFocusChange('dev', 'pods');
      dispatcher.onFocusChange('dev', 'services');

      clock.tick(999);
      expect(pool.get('dev', 'pods')).to.not.equal(undefined);

      clock.tick(1);
      expect(pool.get('dev', 'pods')).to.equal(undefined);
      expect(pool.get('dev', 'services')?.state).to.equal('active');
    } finally {
      clock.restore();
    }
  });

  it('stops right away without a grace period', () => {
    createDispatcher({ graceMs: 0, prefetch: 0 });
    dispatcher.onFocusChange('dev', 'pods');

    const change = dispatcher.onFocusChange('dev', 'services');

    expect(change.stop).to.deep.equal([{ context: 'dev', kind: 'pods' }]);
    expect(pool.get('dev', 'pods')).to.equal(undefined);
  });

  it('stops the previous context when focus moves to another one', () => {
    createDispatcher({ graceMs: 30_000, prefetch: 0 });
    dispatcher.onFocusChange('dev', 'pods');

    const change = dispatcher.onFocusChange('prod', 'pods');

    expect(change.stop).to.deep.equal([{ context: 'dev', kind: 'pods' }]);
    expect(pool.activeKeys()).to.deep.equal([{ context: 'prod', kind: 'pods' }]);
  });

  describe('switchContext', () => {
    it('tears down the previous context before switching', async () => {
      const releaseContext = sinon.stub();
      createDispatcher({ graceMs: 30_000, prefetch: 1, releaseContext });
      api.onList('dev', 'pods', { items: [rawPod('p1', '1'), rawPod('p2', '2')], revision: '2' });

      expect((await dispatcher.switchContext('dev')).status).to.equal('success');
      dispatcher.onFocusChange('dev', 'pods');
      await waitFor(() => store.count('dev') === 2, 'the dev pods');

      const result = await dispatcher.switchContext('prod');

      expect(result.status).to.equal('success');
      expect(store.count('dev')).to.equal(0);
      expect(pool.list().filter(info => info.context === 'dev')).to.deep.equal([]);
      expect(releaseContext.calledOnceWithExactly('dev')).to.equal(true);
      expect(registry.getActive()?.id).to.equal('prod');
      expect(registry.listContexts().find(ctx => ctx.id === 'dev')?.status).to.equal('idle');
    });

    it('ignores focus on a context while it is being torn down', async () => {
      createDispatcher({ graceMs: 30_000, prefetch: 0 });
      await dispatcher.switchContext('dev');
      dispatcher.onFocusChange('dev', 'pods');
      await waitFor(() => api.watchCalls.length === 1, 'the pods watch');
      const stopContext = pool.stopContext.bind(pool);
      let lateFocus: FocusChange | undefined;
      sinon.stub(pool, 'stopContext').callsFake(async context => {
        const stopped = stopContext(context);
        lateFocus = dispatcher.onFocusChange('dev', 'pods');
        await stopped;
      });

      const result = await dispatcher.switchContext('prod');

      expect(result.status).to.equal('success');
      expect(lateFocus).to.deep.equal({ start: [], stop: [], linger: [] });
      expect(pool.list().filter(info => info.context === 'dev')).to.deep.equal([]);
      expect(api.listCount('dev', 'pods')).to.equal(1);
    });

    it('leaves the current context alone when the target cannot be reached', async () => {
      api.onList('dev', 'pods', { items: [rawPod('p1', '1')], revision: '1' });
      api.onDiscover('prod', new ConnectionError('connect ECONNREFUSED'));
      await dispatcher.switchContext('dev');
      dispatcher.onFocusChange('dev', 'pods');
      await waitFor(() => store.count('dev') === 1, 'the dev pods');

      const result = await dispatcher.switchContext('prod');

      expect(result.status).to.equal('connectionError');
      expect(registry.getActive()?.id).to.equal('dev');
      expect(pool.get('dev', 'pods')?.state).to.equal('active');
      expect(store.count('dev')).to.equal(1);
    });
  });
});
