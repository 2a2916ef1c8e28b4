import { expect } from 'chai';
import sinon from 'sinon';

import { ConnectionError } from '../src/errors';
import { ActionExecutor } from '../src/services/actionExecutor';
import { ContextRegistry } from '../src/services/contextRegistry';
import { Dispatcher } from '../src/services/dispatcher';
import { ResourceStore } from '../src/services/store/resourceStore';
import { WatcherPool } from '../src/services/watcherPool';
import { rowText } from '../src/ui/frame';
import { RenderLoop } from '../src/ui/renderLoop';
import type { RenderLoopOptions } from '../src/ui/renderLoop';
import { initialAppState } from '../src/ui/viewState';
import { FakeCluster, StaticContextSource, clusterContext } from './support/fakeCluster';
import { FakeScreen } from './support/fakeScreen';
import { added, pod, rawPod, waitFor } from './support/fixtures';

describe('RenderLoop', () => {
  let api: FakeCluster;
  let store: ResourceStore;
  let pool: WatcherPool;
  let registry: ContextRegistry;
  let dispatcher: Dispatcher;
  let executor: ActionExecutor;
  let screen: FakeScreen;
  let loop: RenderLoop;

  function createLoop(options: Partial<RenderLoopOptions> = {}): RenderLoop {
    loop = new RenderLoop(
      { store, pool, dispatcher, executor, registry, sink: screen, input: screen },
      {
        ...initialAppState(screen.size()),
        context: 'dev',
        kinds: ['pods', 'services'],
        contexts: registry.listContexts()
      },
      options
    );
    return loop;
  }

  function lastRow(index: number): string {
    const frame = screen.lastFrame;
    return frame ? rowText(frame.rows[index]) : '';
  }

  beforeEach(() => {
    api = new FakeCluster();
    store = new ResourceStore();
    pool = new WatcherPool(api, store, { backoff: { baseMs: 60_000, capMs: 60_000, jitter: 0 } });
    registry = new ContextRegistry(new StaticContextSource([clusterContext('dev'), clusterContext('prod')], 'dev'), api);
    dispatcher = new Dispatcher(pool, store, registry, { graceMs: 0, prefetch: 0 });
    executor = new ActionExecutor(api);
    screen = new FakeScreen();
    createLoop();
  });

  afterEach(async () => {
    loop.dispose();
    dispatcher.dispose();
    await pool.dispose();
    registry.dispose();
    store.dispose();
    screen.dispose();
    sinon.restore();
  });

  it('keeps a tick within the frame budget while 10,000 objects stream in', () => {
    for (let i = 0; i < 10_000; i++) {
      store.apply(added('dev', pod(`pod-${String(i).padStart(5, '0')}`, String(i + 1))));
    }

    const started = Date.now();
    const frame = loop.tick();
    const elapsed = Date.now() - started;

    expect(elapsed).to.be.below(250);
    expect(frame.rows).to.have.length(20);
    expect(rowText(frame.rows[3]).startsWith(`${'default'.padEnd(16)} pod-00000 `)).to.equal(true);
    expect(rowText(frame.rows[19]).endsWith(' 10000/10000')).to.equal(true);
  });

  it('coalesces bursts of changes into frames at the minimum interval', () => {
    const clock = sinon.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    try {
      createLoop({ minFrameIntervalMs: 50, maxFrameIntervalMs: 250 });
      loop.start();
      clock.tick(0);
      expect(loop.frameCount).to.equal(1);

      for (let i = 0; i < 100; i++) {
        store.apply(added('dev', pod(`p${i}`, String(i + 1))));
      }
      clock.tick(49);
      expect(loop.frameCount).to.equal(1);
      clock.tick(1);
      expect(loop.frameCount).to.equal(2);

      clock.tick(250);
      expect(loop.frameCount).to.equal(3);
    } finally {
      loop.stop();
      clock.restore();
    }
  });

  it('applies key presses and forwards focus changes', () => {
    const onFocusChange = sinon.spy(dispatcher, 'onFocusChange');
    screen.press('2');

    loop.tick();

    expect(loop.state.view.tab).to.equal(1);
    expect(onFocusChange.calledOnceWithExactly('dev', 'services')).to.equal(true);
    expect(lastRow(1)).to.equal(' 1:Pods  2:Services ');
  });

  it('confirms and executes an action, then reports the outcome', async () => {
    store.replaceKind('dev', 'pods', [pod('web-1', '3')], '3');
    screen.press('CTRL_D');
    loop.tick();

    expect(loop.state.view.mode).to.equal('confirm');
    expect(lastRow(18)).to.equal('Delete pods/default/web-1? [y/N]');

    screen.press('y');
    loop.tick();
    expect(loop.state.status?.text).to.equal('Working…');

    await executor.idle();
    loop.tick();

    expect(api.mutations.map(m => m.action)).to.deep.equal(['delete']);
    expect(loop.state.status).to.include({ text: 'Deleted pods/default/web-1', tone: 'ok' });
    expect(store.get('dev', 'pods', 'default/web-1')?.revision).to.equal('3');
  });

  it('shows the YAML of the selected object', () => {
    store.replaceKind('dev', 'pods', [pod('web-1', '3')], '3');
    screen.press('y');

    loop.tick();

    expect(lastRow(2)).to.equal('YAML pods/default/web-1');
    expect(lastRow(3)).to.equal('apiVersion: v1');
    expect(lastRow(4)).to.equal('kind: Pod');
  });

  it('shows a banner while a subscription is retrying', async () => {
    api.onList('dev', 'pods', new ConnectionError('HTTP 503: unavailable', 503));
    pool.start('dev', 'pods');
    await waitFor(() => pool.get('dev', 'pods')?.state === 'retrying', 'the retry');

    loop.tick();

    expect(lastRow(18)).to.equal('Connection trouble (HTTP 503: unavailable); retrying');
  });

  it('shows a banner for an unreachable context', () => {
    registry.markUnreachable('dev');

    loop.tick();

    expect(lastRow(18)).to.equal('Context dev is unreachable: check credentials and switch contexts to retry');
  });

  it('switches contexts from the context list', async () => {
    api.onList('prod', 'pods', { items: [rawPod('api-1', '9')], revision: '9' });
    await dispatcher.switchContext('dev');
    loop.showContext('dev');

    screen.press('c', 'DOWN', 'ENTER');
    loop.tick();
    expect(loop.state.status?.text).to.equal('Switching to prod…');
    await waitFor(() => loop.state.context === 'prod', 'the switch');
    await waitFor(() => store.count('prod') === 1, 'the prod pods');
    loop.tick();

    expect(loop.state.status?.text).to.equal('Switched to prod');
    expect(lastRow(0).startsWith(' kubeglance  prod https://prod.example.test:6443')).to.equal(true);
    expect(lastRow(3).startsWith(`${'default'.padEnd(16)} api-1 `)).to.equal(true);
    expect(pool.activeKeys()).to.deep.equal([{ context: 'prod', kind: 'pods' }]);
  });

  it('holds focus changes while a context switch is in flight', async () => {
    await dispatcher.switchContext('dev');
    loop.showContext('dev');
    const onFocusChange = sinon.spy(dispatcher, 'onFocusChange');

    screen.press('c', 'DOWN', 'ENTER');
    loop.tick();
    screen.press('TAB');
    loop.tick();
    await waitFor(() => loop.state.context === 'prod', 'the switch');

    expect(onFocusChange.calledWith('dev', 'services')).to.equal(false);
    expect(onFocusChange.calledOnceWithExactly('prod', 'pods')).to.equal(true);
    expect(pool.activeKeys()).to.deep.equal([{ context: 'prod', kind: 'pods' }]);
  });

  it('stops and announces quitting', () => {
    const onQuit = sinon.spy();
    loop.onDidQuit(onQuit);
    loop.start();
    screen.press('q');

    loop.tick();

    expect(onQuit.calledOnce).to.equal(true);
    expect(loop.state.quitting).to.equal(true);
  });
});
