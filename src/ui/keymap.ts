// src/ui/keymap.ts
import { RESOURCE_KINDS } from '../resources/resourceKinds';
import type { ActionKind, ResourceKindName, ResourceObject } from '../types';
import { getNumber } from '../utils/attributes';
import type { AppState, ViewState } from './viewState';
import { activeKind, bodyHeight, clampSelection } from './viewState';

/**
 * Keys use terminal-kit's names: 'UP', 'PAGE_DOWN', 'SHIFT_TAB', 'CTRL_D',
 * 'ESCAPE', 'ENTER', 'BACKSPACE', ...; printable keys are the character itself.
 */
export type InputEvent =
  | { type: 'key'; key: string }
  | { type: 'resize'; width: number; height: number };

export type Effect =
  | { type: 'focus'; context: string; kind: ResourceKindName }
  | { type: 'switchContext'; context: string }
  | { type: 'requestAction'; action: ActionKind; target: ResourceObject; replicas?: number }
  | { type: 'respond'; requestId: number; confirmed: boolean }
  | { type: 'quit' };

export interface KeyResult {
  app: AppState;
  effects: Effect[];
}

const MAX_SCALE_DIGITS = 4;

function isPrintable(key: string): boolean {
  return key.length === 1 && key >= ' ';
}

function setView(app: AppState, changes: Partial<ViewState>): AppState {
  return { ...app, view: { ...app.view, ...changes } };
}

function focusEffects(app: AppState): Effect[] {
  const kind = activeKind(app);
  return app.context && kind ? [{ type: 'focus', context: app.context, kind }] : [];
}

function switchTab(app: AppState, tab: number): KeyResult {
  const count = app.kinds.length;
  if (count === 0) {
    return { app, effects: [] };
  }
  const next = ((tab % count) + count) % count;
  if (next === app.view.tab) {
    return { app, effects: [] };
  }
  const moved = setView(app, { tab: next, selected: 0, scroll: 0 });
  return { app: moved, effects: focusEffects(moved) };
}

function moveSelection(app: AppState, delta: number, rowCount: number): AppState {
  const view = { ...app.view, selected: app.view.selected + delta };
  return { ...app, view: clampSelection(view, rowCount, bodyHeight(app.size)) };
}

function requestFor(app: AppState, action: ActionKind, row: ResourceObject | undefined): KeyResult {
  if (!row) {
    return { app, effects: [] };
  }
  if (action === 'scale') {
    const current = getNumber(row.raw, 'spec', 'replicas');
    return { app: setView(app, { mode: 'scale', scaleInput: current !== undefined ? String(current) : '' }), effects: [] };
  }
  return { app, effects: [{ type: 'requestAction', action, target: row }] };
}

function browse(app: AppState, key: string, rows: readonly ResourceObject[]): KeyResult {
  const page = bodyHeight(app.size);
  const selectedRow = rows[app.view.selected];
  const kind = activeKind(app);
  const supports = (action: ActionKind) => kind !== undefined && RESOURCE_KINDS[kind].actions.includes(action);

  switch (key) {
    case 'q':
      return { app: { ...app, quitting: true }, effects: [{ type: 'quit' }] };
    case 'LEFT':
    case 'h':
    case 'SHIFT_TAB':
      return switchTab(app, app.view.tab - 1);
    case 'RIGHT':
    case 'l':
    case 'TAB':
      return switchTab(app, app.view.tab + 1);
    case 'UP':
    case 'k':
      return { app: moveSelection(app, -1, rows.length), effects: [] };
    case 'DOWN':
    case 'j':
      return { app: moveSelection(app, 1, rows.length), effects: [] };
    case 'PAGE_UP':
      return { app: moveSelection(app, -page, rows.length), effects: [] };
    case 'PAGE_DOWN':
      return { app: moveSelection(app, page, rows.length), effects: [] };
    case 'g':
    case 'HOME':
      return { app: moveSelection(app, -app.view.selected, rows.length), effects: [] };
    case 'G':
    case 'END':
      return { app: moveSelection(app, rows.length, rows.length), effects: [] };
    case '/':
      return { app: setView(app, { mode: 'filter' }), effects: [] };
    case 'ESCAPE':
      return { app: setView(app, { filter: '', selected: 0, scroll: 0 }), effects: [] };
    case 'c': {
      const cursor = Math.max(0, app.contexts.findIndex(ctx => ctx.id === app.context));
      return { app: setView(app, { mode: 'contexts', contextCursor: cursor }), effects: [] };
    }
    case '?':
      return { app: setView(app, { mode: 'help' }), effects: [] };
    case 'y':
    case 'ENTER':
      return selectedRow
        ? { app: setView(app, { mode: 'detail', detailKey: selectedRow.key, detailScroll: 0 }), effects: [] }
        : { app, effects: [] };
    case 'CTRL_D':
      return requestFor(app, 'delete', selectedRow);
    case 's':
      return supports('scale') ? requestFor(app, 'scale', selectedRow) : { app, effects: [] };
    case 'r':
      return supports('restart') ? requestFor(app, 'restart', selectedRow) : { app, effects: [] };
    default:
      if (/^[1-9]$/.test(key)) {
        const index = Number(key) - 1;
        return index < app.kinds.length ? switchTab(app, index) : { app, effects: [] };
      }
      return { app, effects: [] };
  }
}

function filter(app: AppState, key: string): KeyResult {
  switch (key) {
    case 'ENTER':
      return { app: setView(app, { mode: 'browse' }), effects: [] };
    case 'ESCAPE':
      return { app: setView(app, { mode: 'browse', filter: '', selected: 0, scroll: 0 }), effects: [] };
    case 'BACKSPACE':
      return { app: setView(app, { filter: app.view.filter.slice(0, -1), selected: 0, scroll: 0 }), effects: [] };
    default:
      return isPrintable(key)
        ? { app: setView(app, { filter: app.view.filter + key, selected: 0, scroll: 0 }), effects: [] }
        : { app, effects: [] };
  }
}

function confirm(app: AppState, key: string): KeyResult {
  const request = app.view.confirm;
  const answer = (confirmed: boolean): KeyResult => ({
    app: setView(app, { mode: 'browse', confirm: undefined }),
    effects: request ? [{ type: 'respond', requestId: request.id, confirmed }] : []
  });
  switch (key) {
    case 'y':
    case 'Y':
      return answer(true);
    case 'n':
    case 'N':
    case 'q':
    case 'ESCAPE':
    case 'ENTER':
      return answer(false);
    default:
      return { app, effects: [] };
  }
}

function scale(app: AppState, key: string, rows: readonly ResourceObject[]): KeyResult {
  switch (key) {
    case 'ESCAPE':
      return { app: setView(app, { mode: 'browse', scaleInput: '' }), effects: [] };
    case 'BACKSPACE':
      return { app: setView(app, { scaleInput: app.view.scaleInput.slice(0, -1) }), effects: [] };
    case 'ENTER': {
      const row = rows[app.view.selected];
      const closed = setView(app, { mode: 'browse', scaleInput: '' });
      if (!row || app.view.scaleInput === '') {
        return { app: closed, effects: [] };
      }
      return {
        app: closed,
        effects: [{ type: 'requestAction', action: 'scale', target: row, replicas: Number(app.view.scaleInput) }]
      };
    }
    default:
      if (/^[0-9]$/.test(key) && app.view.scaleInput.length < MAX_SCALE_DIGITS) {
        return { app: setView(app, { scaleInput: app.view.scaleInput + key }), effects: [] };
      }
      return { app, effects: [] };
  }
}

function contexts(app: AppState, key: string): KeyResult {
  const count = app.contexts.length;
  switch (key) {
    case 'UP':
    case 'k':
      return { app: setView(app, { contextCursor: Math.max(0, app.view.contextCursor - 1) }), effects: [] };
    case 'DOWN':
    case 'j':
      return { app: setView(app, { contextCursor: Math.min(Math.max(0, count - 1), app.view.contextCursor + 1) }), effects: [] };
    case 'ENTER': {
      const target = app.contexts[app.view.contextCursor];
      const closed = setView(app, { mode: 'browse' });
      if (!target || target.id === app.context) {
        return { app: closed, effects: [] };
      }
      return { app: closed, effects: [{ type: 'switchContext', context: target.id }] };
    }
    case 'ESCAPE':
    case 'c':
    case 'q':
      return { app: setView(app, { mode: 'browse' }), effects: [] };
    default:
      return { app, effects: [] };
  }
}

function detail(app: AppState, key: string): KeyResult {
  const page = bodyHeight(app.size);
  const scrollBy = (delta: number) => setView(app, { detailScroll: Math.max(0, app.view.detailScroll + delta) });
  switch (key) {
    case 'UP':
    case 'k':
      return { app: scrollBy(-1), effects: [] };
    case 'DOWN':
    case 'j':
      return { app: scrollBy(1), effects: [] };
    case 'PAGE_UP':
      return { app: scrollBy(-page), effects: [] };
    case 'PAGE_DOWN':
      return { app: scrollBy(page), effects: [] };
    case 'ESCAPE':
    case 'q':
    case 'y':
      return { app: setView(app, { mode: 'browse', detailKey: undefined, detailScroll: 0 }), effects: [] };
    default:
      return { app, effects: [] };
  }
}

/**
 * Apply one input event. `rows` is the filtered table the operator sees,
 * needed to resolve the selected object.
 */
export function handleInput(app: AppState, event: InputEvent, rows: readonly ResourceObject[]): KeyResult {
  if (event.type === 'resize') {
    const resized = { ...app, size: { width: event.width, height: event.height } };
    return { app: { ...resized, view: clampSelection(resized.view, rows.length, bodyHeight(resized.size)) }, effects: [] };
  }
  const { key } = event;
  if (key === 'CTRL_C') {
    return { app: { ...app, quitting: true }, effects: [{ type: 'quit' }] };
  }
  switch (app.view.mode) {
    case 'browse':
      return browse(app, key, rows);
    case 'filter':
      return filter(app, key);
    case 'confirm':
      return confirm(app, key);
    case 'scale':
      return scale(app, key, rows);
    case 'contexts':
      return contexts(app, key);
    case 'help':
      return key === 'ESCAPE' || key === '?' || key === 'q' ? { app: setView(app, { mode: 'browse' }), effects: [] } : { app, effects: [] };
    case 'detail':
      return detail(app, key);
  }
}
