import { expect } from 'chai';
import sinon from 'sinon';
import { Response } from 'undici';

import type { FetchLike } from '../src/clients/kubernetesClient';
import { loadConfig } from '../src/config';
import { activate, deactivate } from '../src/dashboard';
import type { Dashboard } from '../src/dashboard';
import { ConfigError } from '../src/errors';
import { rowText } from '../src/ui/frame';
import { StaticContextSource, clusterContext } from './support/fakeCluster';
import { FakeScreen } from './support/fakeScreen';
import { rawPod, rejectionOf, waitFor } from './support/fixtures';

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

/** A cluster that serves pods only and cannot watch them */
const fakeApiServer: FetchLike = async url => {
  const { pathname, searchParams } = new URL(url);
  if (pathname === '/api/v1') {
    return json({ resources: [{ name: 'pods', verbs: ['get', 'list', 'watch'] }] });
  }
  if (pathname === '/api/v1/pods' && searchParams.has('watch')) {
    return json({ kind: 'Status', message: 'watch disabled' }, 405);
  }
  if (pathname === '/api/v1/pods') {
    return json({ items: [rawPod('web-1', '5')], metadata: { resourceVersion: '5' } });
  }
  return json({ kind: 'Status', message: 'not found' }, 404);
};

describe('dashboard', () => {
  let dashboard: Dashboard | undefined;
  let screen: FakeScreen;
  const source = new StaticContextSource([clusterContext('dev'), clusterContext('prod')], 'dev');

  beforeEach(() => {
    screen = new FakeScreen();
  });

  afterEach(async () => {
    if (dashboard) {
      await deactivate(dashboard);
      dashboard = undefined;
    }
    sinon.restore();
  });

  it('shows the current context and quits on q', async () => {
    const fetchImpl = sinon.spy(fakeApiServer);
    dashboard = await activate(loadConfig([], {}), { source, fetchImpl, screen });
    const started = dashboard;

    await waitFor(() => started.loop.state.context === 'dev', 'dev to be shown');
    await waitFor(() => started.store.snapshot('dev', 'pods').length === 1, 'pods to be listed');

    expect(screen.opened).to.equal(true);
    expect(started.registry.getKinds('dev')).to.deep.equal(['pods']);
    const frame = started.loop.tick();
    expect(frame.rows.some(row => rowText(row).startsWith(`${'default'.padEnd(16)} web-1 `))).to.equal(true);
    expect(fetchImpl.args.every(([url]) => url.startsWith('https://dev.example.test:6443/'))).to.equal(true);

    screen.press('q');
    await started.done;
  });

  it('starts on the context named in the configuration', async () => {
    dashboard = await activate(loadConfig(['-c', 'prod'], {}), { source, fetchImpl: fakeApiServer, screen });
    const started = dashboard;

    await waitFor(() => started.loop.state.context === 'prod', 'prod to be shown');
  });

  it('refuses contexts the configuration does not have', async () => {
    const err = await rejectionOf(activate(loadConfig(['-c', 'staging'], {}), { source, fetchImpl: fakeApiServer, screen }));

    expect(err).to.be.instanceOf(ConfigError);
    expect(err).to.have.property('message', "Context 'staging' not found; available: dev, prod");
    expect(screen.opened).to.equal(false);
  });
});
