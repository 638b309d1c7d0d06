/**
 * @narrowpack/cli Layout Command
 *
 * Describes the group layout of one width or of every supported width.
 */

import { BIT_WIDTHS, getGroupLayout, type GroupLayout } from '@narrowpack/core';

import type { LayoutOptions, LayoutResult } from '../types.js';

export type { LayoutOptions, LayoutResult };

const COLUMNS: ReadonlyArray<[header: string, cell: (layout: GroupLayout) => number]> = [
  ['width', (layout) => layout.width],
  ['values/group', (layout) => layout.valuesPerGroup],
  ['bytes/group', (layout) => layout.bytesPerGroup],
  ['max value', (layout) => layout.maxValue],
];

/**
 * Layout command: look up group layouts
 */
export async function layoutCommand(options: LayoutOptions = {}): Promise<LayoutResult> {
  try {
    const layouts =
      options.width === undefined
        ? BIT_WIDTHS.map((width) => getGroupLayout(width))
        : [getGroupLayout(options.width)];
    return { success: true, layouts };
  } catch (error) {
    return {
      success: false,
      layouts: [],
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Render layouts as a right-aligned table, one line per entry, header first.
 */
export function formatLayoutTable(layouts: readonly GroupLayout[]): string[] {
  const header = COLUMNS.map(([title]) => title).join('  ');
  const rows = layouts.map((layout) =>
    COLUMNS.map(([title, cell]) => String(cell(layout)).padStart(title.length)).join('  ')
  );
  return [header, ...rows];
}
