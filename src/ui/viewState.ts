// src/ui/viewState.ts
import type { ActionRequest } from '../services/actionExecutor';
import type { ClusterContext, ResourceKindName, ResourceObject, StatusTone } from '../types';

export type InputMode = 'browse' | 'filter' | 'confirm' | 'scale' | 'contexts' | 'help' | 'detail';

export interface ViewState {
  /** Index into AppState.kinds */
  tab: number;
  selected: number;
  scroll: number;
  filter: string;
  mode: InputMode;
  /** Request shown in the confirmation prompt */
  confirm?: ActionRequest;
  scaleInput: string;
  contextCursor: number;
  /** Key of the object shown in the YAML view */
  detailKey?: string;
  detailScroll: number;
}

export interface StatusMessage {
  text: string;
  tone: StatusTone;
  expiresAt: number;
}

export interface ScreenSize {
  width: number;
  height: number;
}

/**
 * Everything the render loop knows about the session. Replaced, never
 * mutated in place, so a frame always sees one consistent value.
 */
export interface AppState {
  context: string | undefined;
  view: ViewState;
  status?: StatusMessage;
  /** Persistent trouble indicator, e.g. a subscription that keeps failing */
  banner?: string;
  size: ScreenSize;
  kinds: readonly ResourceKindName[];
  contexts: readonly ClusterContext[];
  quitting: boolean;
}

/** Header, tab bar and column headers above the table; prompt and status line below */
export const CHROME_ROWS = 5;

export function initialViewState(): ViewState {
  return {
    tab: 0,
    selected: 0,
    scroll: 0,
    filter: '',
    mode: 'browse',
    scaleInput: '',
    contextCursor: 0,
    detailScroll: 0
  };
}

export function initialAppState(size: ScreenSize): AppState {
  return {
    context: undefined,
    view: initialViewState(),
    size,
    kinds: [],
    contexts: [],
    quitting: false
  };
}

export function bodyHeight(size: ScreenSize): number {
  return Math.max(1, size.height - CHROME_ROWS);
}

export function activeKind(app: AppState): ResourceKindName | undefined {
  return app.kinds[app.view.tab];
}

/**
 * Case-insensitive match of the filter text against name, namespace and status.
 */
export function filterRows(rows: readonly ResourceObject[], filter: string): readonly ResourceObject[] {
  const needle = filter.trim().toLowerCase();
  if (!needle) {
    return rows;
  }
  return rows.filter(
    row =>
      row.name.toLowerCase().includes(needle) ||
      (row.namespace ?? '').toLowerCase().includes(needle) ||
      row.status.text.toLowerCase().includes(needle)
  );
}

/**
 * Keep the selection inside the table and the scroll window around it.
 */
export function clampSelection(view: ViewState, rowCount: number, height: number): ViewState {
  const selected = rowCount === 0 ? 0 : Math.min(Math.max(0, view.selected), rowCount - 1);
  let scroll = Math.min(view.scroll, Math.max(0, rowCount - height));
  if (selected < scroll) {
    scroll = selected;
  } else if (selected >= scroll + height) {
    scroll = selected - height + 1;
  }
  scroll = Math.max(0, scroll);
  if (selected === view.selected && scroll === view.scroll) {
    return view;
  }
  return { ...view, selected, scroll };
}

export function withStatus(app: AppState, text: string, tone: StatusTone, now: number, ttlMs: number): AppState {
  return { ...app, status: { text, tone, expiresAt: now + ttlMs } };
}
