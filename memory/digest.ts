import type { CategoryView } from './memory-manager';
import type { MemoryCategory, ScoredMemory } from './types';

export const MAX_DIGEST_LINES = 120;

export interface DigestOptions {
  project?: string | null;
  /** Active memories across all projects; shown in the footer. */
  totalActive: number;
}

interface DigestSection {
  title: string;
  entries: ScoredMemory[];
}

const CATEGORY_SECTIONS: ReadonlyArray<{ title: string; category: MemoryCategory }> = [
  { title: 'Preferences', category: 'preferences' },
  { title: 'Corrections (Do Not Repeat)', category: 'corrections' },
  { title: 'Key Facts', category: 'facts' }
];

const TRAILING_SECTIONS: ReadonlyArray<{ title: string; category: MemoryCategory }> = [
  { title: 'Past Decisions', category: 'decisions' },
  { title: 'Known Procedures', category: 'procedures' },
  { title: 'Relationships', category: 'relationships' }
];

/**
 * Renders a category view as the Markdown block injected at session start.
 * Empty sections are omitted; an empty view renders as an empty string.
 */
export function renderMemoryDigest(view: CategoryView, options: DigestOptions): string {
  const project = options.project?.trim() || view.projectName;
  const sections: DigestSection[] = [
    ...CATEGORY_SECTIONS.map(({ title, category }) => ({ title, entries: view.categories[category] })),
    {
      title: project ? `Current Project: ${project}` : 'Current Project',
      entries: project ? view.project : view.categories['project-knowledge']
    },
    ...TRAILING_SECTIONS.map(({ title, category }) => ({ title, entries: view.categories[category] }))
  ].filter((section) => section.entries.length > 0);

  if (!sections.length) {
    return '';
  }

  const lines: string[] = ['# Memory Digest', ''];
  for (const section of sections) {
    lines.push(`## ${section.title}`);
    for (const entry of section.entries) {
      lines.push(formatEntry(entry));
    }
    lines.push('');
  }

  const footer = `_${options.totalActive} active memories. Use recall for more._`;
  const body = lines.slice(0, MAX_DIGEST_LINES - 1);
  return [...body, footer].join('\n');
}

function formatEntry(entry: ScoredMemory): string {
  const { record } = entry;
  const context = record.context ? ` (${record.context})` : '';
  return `- [#${record.id}] ${record.content.replace(/\s+/gu, ' ')}${context}`;
}
