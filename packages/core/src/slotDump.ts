/**
 * Readable views of a slot table, for debugging and the inspector
 */

import { identityLabel } from './callSite.js';
import { RESULT_TYPE_TAG } from './slotTable.js';
import type { GroupStatus, SlotEntry, ValueCell } from './types.js';

export interface SlotValueSnapshot {
  key: string;
  typeTag: string;
  path: string;
  hasValue: boolean;
  preview: string;
  /** Ids of the groups whose last evaluation read this cell */
  readers: number[];
}

export interface SlotGroupSnapshot {
  id: number;
  key: string;
  label: string;
  path: string;
  status: GroupStatus;
  evaluatedAt: number;
  len: number;
  result: string;
  values: SlotValueSnapshot[];
  children: SlotGroupSnapshot[];
}

const MAX_PREVIEW = 40;

/**
 * Short one-line rendering of a stored value
 */
export function previewValue(value: unknown, max = MAX_PREVIEW): string {
  let text: string;
  if (value === undefined) {
    text = 'undefined';
  } else if (typeof value === 'function') {
    text = '[Function]';
  } else if (typeof value === 'bigint') {
    text = `${value}n`;
  } else if (value instanceof Map) {
    text = `Map(${value.size})`;
  } else if (value instanceof Set) {
    text = `Set(${value.size})`;
  } else {
    try {
      text = JSON.stringify(value) ?? String(value);
    } catch {
      // circular structures
      text = Object.prototype.toString.call(value);
    }
  }
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

function cellPreview(cell: ValueCell): string {
  return cell.hasValue ? previewValue(cell.value) : '(empty)';
}

/**
 * One line per entry, indented by nesting depth:
 *
 * ```
 * 0: group g:root#0 len=4 cached
 * 1:   tag root
 * 2:   value result <result> = 1
 * 3: end
 * ```
 */
export function formatSlotTable(entries: readonly SlotEntry[]): string {
  const lines: string[] = [];
  let depth = 0;

  entries.forEach((entry, index) => {
    let body: string;
    let indent = depth;
    switch (entry.kind) {
      case 'groupStart':
        body = `group ${entry.key} len=${entry.len} ${entry.record.status}`;
        depth++;
        break;
      case 'tag':
        body = `tag ${identityLabel(entry.identity)}`;
        break;
      case 'value':
        body = `value ${entry.key} <${entry.typeTag}> = ${cellPreview(entry.cell)}`;
        break;
      case 'groupEnd':
        depth--;
        indent = depth;
        body = 'end';
        break;
    }
    lines.push(`${index}: ${'  '.repeat(indent)}${body}`);
  });

  return lines.join('\n');
}

/**
 * Nested snapshot of the table starting at its first group (the root)
 */
export function buildSlotTree(entries: readonly SlotEntry[]): SlotGroupSnapshot {
  const stack: SlotGroupSnapshot[] = [];
  let root: SlotGroupSnapshot | undefined;

  for (const entry of entries) {
    const current = stack[stack.length - 1];
    switch (entry.kind) {
      case 'groupStart': {
        const { record } = entry;
        const node: SlotGroupSnapshot = {
          id: record.id,
          key: entry.key,
          label: record.label,
          path: record.path,
          status: record.status,
          evaluatedAt: record.evaluatedAt,
          len: entry.len,
          result: '(empty)',
          values: [],
          children: [],
        };
        if (current) {
          current.children.push(node);
        } else {
          root = node;
        }
        stack.push(node);
        break;
      }
      case 'value': {
        if (!current) break;
        if (entry.typeTag === RESULT_TYPE_TAG && entry.key === RESULT_TYPE_TAG) {
          current.result = cellPreview(entry.cell);
          break;
        }
        current.values.push({
          key: entry.key,
          typeTag: entry.typeTag,
          path: entry.cell.path,
          hasValue: entry.cell.hasValue,
          preview: cellPreview(entry.cell),
          readers: [...entry.cell.readers].map((reader) => reader.id).sort((a, b) => a - b),
        });
        break;
      }
      case 'groupEnd':
        stack.pop();
        break;
      case 'tag':
        break;
    }
  }

  if (!root) {
    throw new Error('Slot table has no root group');
  }
  return root;
}
