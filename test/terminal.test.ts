import { expect } from 'chai';
import sinon from 'sinon';
import { terminal } from 'terminal-kit';

import { TerminalScreen } from '../src/ui/terminal';

describe('TerminalScreen', () => {
  let on: sinon.SinonStub;
  let removeListener: sinon.SinonStub;

  beforeEach(() => {
    sinon.stub(terminal, 'fullscreen');
    sinon.stub(terminal, 'hideCursor');
    sinon.stub(terminal, 'grabInput');
    sinon.stub(terminal, 'styleReset');
    on = sinon.stub(terminal, 'on');
    removeListener = sinon.stub(terminal, 'removeListener');
  });

  afterEach(() => {
    sinon.restore();
  });

  it('removes its key and resize listeners when the terminal is restored', () => {
    const screen = new TerminalScreen();

    screen.open();
    screen.restore();
    screen.open();
    screen.dispose();

    const added = on.args.map(args => [args[0], args[1]]);
    const removed = removeListener.args.map(args => [args[0], args[1]]);
    expect(added.map(([event]) => event)).to.deep.equal(['key', 'resize', 'key', 'resize']);
    expect(removed).to.deep.equal(added);
  });

  it('queues key presses while open', () => {
    const screen = new TerminalScreen();
    screen.open();
    const onKey: unknown = on.args.find(args => args[0] === 'key')?.[1];
    if (typeof onKey !== 'function') {
      expect.fail('no key listener registered');
    }

    onKey('TAB');
    screen.restore();
    onKey('q');

    expect(screen.drain()).to.deep.equal([{ type: 'key', key: 'TAB' }]);
    screen.dispose();
  });
});
