// src/ui/helpDocs.ts

export interface HelpEntry {
  description: string;
  keys: string;
  section: string;
}

export const HELP_DOCS: readonly HelpEntry[] = [
  { description: 'Next resource tab', keys: '<Right> | l | <Tab>', section: 'General' },
  { description: 'Previous resource tab', keys: '<Left> | h | <Shift+Tab>', section: 'General' },
  { description: 'Jump to resource tab', keys: '1 .. 9', section: 'General' },
  { description: 'Move selection up', keys: '<Up> | k', section: 'General' },
  { description: 'Move selection down', keys: '<Down> | j', section: 'General' },
  { description: 'Page up / down', keys: '<PgUp> | <PgDn>', section: 'General' },
  { description: 'Top / bottom of list', keys: 'g | G', section: 'General' },
  { description: 'Switch context', keys: 'c', section: 'General' },
  { description: 'Show this help', keys: '?', section: 'General' },
  { description: 'Quit', keys: 'q | <Ctrl+c>', section: 'General' },
  { description: 'Filter rows', keys: '/', section: 'Table' },
  { description: 'Clear filter', keys: '<Esc>', section: 'Table' },
  { description: 'View YAML of selected resource', keys: 'y | <Enter>', section: 'Table' },
  { description: 'Delete selected resource', keys: '<Ctrl+d>', section: 'Table' },
  { description: 'Scale selected workload', keys: 's', section: 'Table' },
  { description: 'Restart selected workload', keys: 'r', section: 'Table' },
  { description: 'Apply filter', keys: '<Enter>', section: 'Filter input' },
  { description: 'Discard filter', keys: '<Esc>', section: 'Filter input' },
  { description: 'Confirm', keys: 'y', section: 'Confirmation' },
  { description: 'Cancel', keys: 'n | <Esc> | <Enter>', section: 'Confirmation' },
  { description: 'Scroll', keys: '<Up> | <Down> | j | k', section: 'YAML view' },
  { description: 'Back to table', keys: '<Esc> | y | q', section: 'YAML view' }
];

/** Entries grouped by section, in first-appearance order */
export function helpSections(): Array<[string, HelpEntry[]]> {
  const sections = new Map<string, HelpEntry[]>();
  for (const entry of HELP_DOCS) {
    const list = sections.get(entry.section) ?? [];
    list.push(entry);
    sections.set(entry.section, list);
  }
  return Array.from(sections);
}
