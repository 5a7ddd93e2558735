/**
 * Section splitter for bracket-delimited drafts:
 *
 *   [HOOK]
 *   Breaking news tonight...
 *   [MAIN STORY 1]
 *   ...
 */

import { ScriptDraft } from '../types';
import { stripThinkBlocks } from './sanitize';

const SECTION_HEADER = /^\[([^\[\]]+)\]$/;

export function normalizeSectionKey(label: string): string {
  return label.trim().toLowerCase().replace(/\s+/g, '_');
}

/**
 * Text before the first header is dropped, as are headers with no text under them.
 * A repeated header replaces the earlier section. Keys are not checked against
 * any expected set.
 */
export function splitSections(rawText: string): ScriptDraft {
  const sections: ScriptDraft = {};
  let currentKey: string | null = null;
  let buffer: string[] = [];

  const flush = () => {
    if (currentKey && buffer.length > 0) {
      sections[currentKey] = buffer.join(' ');
    }
  };

  for (const rawLine of stripThinkBlocks(rawText).split(/\r?\n/)) {
    const line = rawLine.trim();
    const header = SECTION_HEADER.exec(line);

    if (header) {
      flush();
      currentKey = normalizeSectionKey(header[1]);
      buffer = [];
    } else if (currentKey && line) {
      buffer.push(line);
    }
  }
  flush();

  return sections;
}
