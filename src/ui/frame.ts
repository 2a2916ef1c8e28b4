// src/ui/frame.ts
import { AGE_COLUMN, RESOURCE_KINDS, formatAge } from '../resources/resourceKinds';
import type { Column } from '../resources/resourceKinds';
import type { ContextStatus, ResourceObject, StatusTone, SubscriptionInfo, SubscriptionState } from '../types';
import { helpSections } from './helpDocs';
import type { AppState } from './viewState';
import { activeKind, bodyHeight } from './viewState';

export type Color = 'red' | 'green' | 'yellow' | 'cyan' | 'gray' | 'white';

export interface CellStyle {
  fg?: Color;
  bold?: boolean;
  inverse?: boolean;
  dim?: boolean;
}

/** A run of text sharing one style */
export interface FrameCell {
  text: string;
  style: CellStyle;
}

export type FrameRow = FrameCell[];

export interface Frame {
  width: number;
  height: number;
  rows: FrameRow[];
}

export interface DetailView {
  title: string;
  lines: string[];
}

export interface RenderInput {
  app: AppState;
  /** Filtered rows of the active tab */
  rows: readonly ResourceObject[];
  /** Unfiltered row count */
  total: number;
  subscription?: SubscriptionInfo;
  detail?: DetailView;
  now: number;
}

const TONE_COLOR: Record<StatusTone, Color | undefined> = {
  ok: undefined,
  warn: 'yellow',
  error: 'red',
  neutral: undefined
};

const SUBSCRIPTION_COLOR: Record<SubscriptionState, Color> = {
  active: 'green',
  retrying: 'yellow',
  stopped: 'red'
};

const CONTEXT_COLOR: Record<ContextStatus, Color> = {
  connected: 'green',
  connecting: 'yellow',
  unreachable: 'red',
  idle: 'gray'
};

const HINT = '? help  / filter  c contexts  q quit';

function cell(text: string, style: CellStyle = {}): FrameCell {
  return { text, style };
}

/**
 * Pad or truncate to exactly `width` characters.
 */
export function fit(text: string, width: number): string {
  if (width <= 0) {
    return '';
  }
  if (text.length > width) {
    return width === 1 ? '…' : `${text.slice(0, width - 1)}…`;
  }
  return text.padEnd(width);
}

export function rowText(row: FrameRow): string {
  return row.map(c => c.text).join('');
}

function clipRow(row: FrameRow, width: number): FrameRow {
  const clipped: FrameRow = [];
  let used = 0;
  for (const c of row) {
    if (used >= width) {
      break;
    }
    const text = c.text.length > width - used ? c.text.slice(0, width - used) : c.text;
    clipped.push({ text, style: c.style });
    used += text.length;
  }
  return clipped;
}

export function tableColumns(app: AppState): Column[] {
  const kind = activeKind(app);
  return kind ? [...RESOURCE_KINDS[kind].columns, AGE_COLUMN] : [];
}

export function formatRow(obj: ResourceObject, columns: readonly Column[], now: number): string {
  const age = obj.createdAt !== undefined ? formatAge(now - obj.createdAt) : '';
  const cells = [...obj.cells, age];
  return columns.map((column, i) => fit(cells[i] ?? '', column.width)).join(' ');
}

function headerRow(input: RenderInput): FrameRow {
  const { app, subscription } = input;
  const row: FrameRow = [cell(' kubeglance ', { bold: true, inverse: true }), cell(' ')];
  const ctx = app.contexts.find(c => c.id === app.context);
  if (!ctx) {
    row.push(cell('no active context', { dim: true }));
    return row;
  }
  row.push(cell(ctx.id, { bold: true }));
  if (ctx.namespace) {
    row.push(cell(`/${ctx.namespace}`));
  }
  row.push(cell(` ${ctx.server}`, { dim: true }));
  if (subscription) {
    const mode = subscription.mode === 'poll' ? ' (poll)' : '';
    row.push(cell('  '), cell(`${subscription.kind}: ${subscription.state}${mode}`, { fg: SUBSCRIPTION_COLOR[subscription.state] }));
  }
  return row;
}

function tabsRow(app: AppState): FrameRow {
  return app.kinds.map((kind, i) => {
    const label = ` ${i < 9 ? `${i + 1}:` : ''}${RESOURCE_KINDS[kind].title} `;
    return cell(label, i === app.view.tab ? { bold: true, inverse: true } : {});
  });
}

function tableSection(input: RenderInput, height: number): FrameRow[] {
  const { app, rows, subscription, now } = input;
  const kind = activeKind(app);
  const columns = tableColumns(app);
  const width = app.size.width;
  const out: FrameRow[] = [[cell(columns.map(c => fit(c.header, c.width)).join(' '), { bold: true })]];

  if (!kind) {
    return out;
  }
  if (rows.length === 0) {
    const title = RESOURCE_KINDS[kind].title;
    let message: string;
    if (subscription && subscription.listCount === 0 && subscription.state !== 'stopped') {
      message = `Loading ${title}…`;
    } else if (app.view.filter) {
      message = `No ${title} match "${app.view.filter}"`;
    } else {
      message = `No ${title} found`;
    }
    out.push([cell(message, { dim: true })]);
    return out;
  }

  const visible = rows.slice(app.view.scroll, app.view.scroll + height);
  visible.forEach((obj, i) => {
    const text = formatRow(obj, columns, now);
    const selected = app.view.scroll + i === app.view.selected;
    const fg = TONE_COLOR[obj.status.tone];
    out.push([cell(selected ? fit(text, width) : text, { fg, inverse: selected || undefined })]);
  });
  return out;
}

function helpSection(height: number): FrameRow[] {
  const out: FrameRow[] = [[cell('Keybindings', { bold: true })]];
  for (const [section, entries] of helpSections()) {
    out.push([cell(section, { bold: true, fg: 'yellow' })]);
    for (const entry of entries) {
      out.push([cell(`  ${fit(entry.keys, 26)}`, { fg: 'cyan' }), cell(entry.description)]);
    }
  }
  return out.slice(0, height + 1);
}

function detailSection(input: RenderInput, height: number): FrameRow[] {
  const { detail, app } = input;
  if (!detail) {
    return [[cell('YAML', { bold: true })], [cell('Object no longer exists', { dim: true })]];
  }
  const lines = detail.lines.slice(app.view.detailScroll, app.view.detailScroll + height);
  return [[cell(`YAML ${detail.title}`, { bold: true })], ...lines.map(line => [cell(line)])];
}

function contextsSection(app: AppState, height: number): FrameRow[] {
  const out: FrameRow[] = [
    [cell(`  ${fit('CONTEXT', 24)} ${fit('CLUSTER', 20)} ${fit('SERVER', 36)} STATUS`, { bold: true })]
  ];
  const start = Math.max(0, app.view.contextCursor - height + 1);
  app.contexts.slice(start, start + height).forEach((ctx, i) => {
    const marker = ctx.id === app.context ? '*' : ' ';
    const text = `${marker} ${fit(ctx.id, 24)} ${fit(ctx.cluster, 20)} ${fit(ctx.server, 36)} `;
    const selected = start + i === app.view.contextCursor;
    out.push([cell(text, { inverse: selected || undefined }), cell(ctx.status, { fg: CONTEXT_COLOR[ctx.status] })]);
  });
  return out;
}

function promptRow(input: RenderInput): FrameRow {
  const { app, rows } = input;
  const view = app.view;
  switch (view.mode) {
    case 'filter':
      return [cell('/', { bold: true }), cell(view.filter), cell('_', { dim: true })];
    case 'confirm':
      return view.confirm ? [cell(`${view.confirm.prompt} [y/N]`, { bold: true, fg: 'yellow' })] : [];
    case 'scale': {
      const row = rows[view.selected];
      const target = row ? `${row.kind}/${row.key}` : '';
      return [cell(`Replicas for ${target}: `, { bold: true }), cell(view.scaleInput), cell('_', { dim: true })];
    }
    default:
      if (app.banner) {
        return [cell(app.banner, { bold: true, fg: 'red' })];
      }
      return view.filter ? [cell(`filter: ${view.filter}`, { dim: true })] : [];
  }
}

function statusRow(input: RenderInput): FrameRow {
  const { app, rows, total, now } = input;
  const width = app.size.width;
  const right = app.view.mode === 'browse' || app.view.mode === 'filter' ? `${rows.length}/${total}` : '';
  const leftWidth = Math.max(0, width - right.length - 1);
  const status = app.status && app.status.expiresAt > now ? app.status : undefined;
  const left = status
    ? cell(fit(status.text, leftWidth), { fg: TONE_COLOR[status.tone], bold: status.tone === 'error' || undefined })
    : cell(fit(HINT, leftWidth), { dim: true });
  return right ? [left, cell(' '), cell(right, { dim: true })] : [left];
}

/**
 * Lay out one frame. Pure: everything it shows comes from `input`.
 */
export function renderFrame(input: RenderInput): Frame {
  const { app } = input;
  const { width, height } = app.size;
  const body = bodyHeight(app.size);

  let main: FrameRow[];
  switch (app.view.mode) {
    case 'help':
      main = helpSection(body);
      break;
    case 'detail':
      main = detailSection(input, body);
      break;
    case 'contexts':
      main = contextsSection(app, body);
      break;
    default:
      main = tableSection(input, body);
  }
  while (main.length < body + 1) {
    main.push([]);
  }

  const rows = [headerRow(input), tabsRow(app), ...main.slice(0, body + 1), promptRow(input), statusRow(input)]
    .slice(0, height)
    .map(row => clipRow(row, width));
  return { width, height, rows };
}
