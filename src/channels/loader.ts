/**
 * Channel List Loader
 *
 * Parses the priority-ordered list of creators from a CSV file with a
 * header row and rows of `name,channel_id,priority`.
 *
 * Any malformed row fails the whole load; there is no partial recovery.
 *
 * @module channels/loader
 */

import * as fs from 'node:fs/promises';
import { ConfigurationError } from '../config/index.js';
import { ChannelEntrySchema, type ChannelEntry } from '../schemas/index.js';

// ============================================================================
// Errors
// ============================================================================

/**
 * Error thrown when the channel list cannot be read or parsed
 */
export class ChannelListError extends ConfigurationError {
  constructor(
    message: string,
    public readonly line?: number
  ) {
    super(line === undefined ? message : `Line ${line}: ${message}`);
    this.name = 'ChannelListError';
  }
}

// ============================================================================
// Constants
// ============================================================================

const EXPECTED_COLUMNS = 3;

const INTEGER_PATTERN = /^[+-]?\d+$/;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse channel list text into entries sorted by priority, highest first.
 *
 * Ties keep file order. Blank lines are ignored and cells are trimmed.
 *
 * @param text - Full file contents, header row included
 * @throws ChannelListError naming the first bad line
 *
 * @example
 * ```typescript
 * parseChannelList('name,channel_id,priority\nA,id1,1\nB,id2,5');
 * // [{ name: 'B', channelId: 'id2', priority: 5 }, { name: 'A', channelId: 'id1', priority: 1 }]
 * ```
 */
export function parseChannelList(text: string): ChannelEntry[] {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);

  const entries: ChannelEntry[] = [];
  const seenIds = new Set<string>();
  let headerSeen = false;

  lines.forEach((rawLine, index) => {
    const lineNumber = index + 1;
    if (rawLine.trim() === '') {
      return;
    }
    if (!headerSeen) {
      headerSeen = true;
      return;
    }

    const entry = parseRow(rawLine, lineNumber);
    if (seenIds.has(entry.channelId)) {
      throw new ChannelListError(`Duplicate channel id '${entry.channelId}'`, lineNumber);
    }
    seenIds.add(entry.channelId);
    entries.push(entry);
  });

  return sortByPriority(entries);
}

/**
 * Parse one data row.
 */
function parseRow(line: string, lineNumber: number): ChannelEntry {
  const cells = line.split(',').map((cell) => cell.trim());

  if (cells.length !== EXPECTED_COLUMNS) {
    throw new ChannelListError(
      `Expected ${EXPECTED_COLUMNS} columns (name,channel_id,priority), got ${cells.length}`,
      lineNumber
    );
  }

  const [name, channelId, priorityText] = cells;
  if (!INTEGER_PATTERN.test(priorityText)) {
    throw new ChannelListError(`Priority must be an integer, got '${priorityText}'`, lineNumber);
  }

  const parsed = ChannelEntrySchema.safeParse({
    name,
    channelId,
    priority: Number.parseInt(priorityText, 10),
  });
  if (!parsed.success) {
    throw new ChannelListError(parsed.error.issues[0]?.message ?? 'Invalid row', lineNumber);
  }

  return parsed.data;
}

/**
 * Sort by priority descending. Array.prototype.sort is stable, so ties
 * keep their input order.
 */
export function sortByPriority(entries: ChannelEntry[]): ChannelEntry[] {
  return [...entries].sort((a, b) => b.priority - a.priority);
}

// ============================================================================
// File Loading
// ============================================================================

/**
 * Read and parse a channel list file.
 *
 * @param filePath - Path to the CSV file
 * @throws ChannelListError if the file is missing or malformed
 */
export async function loadChannels(filePath: string): Promise<ChannelEntry[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ChannelListError(`Channel list not found: ${filePath}`);
    }
    throw error;
  }

  return parseChannelList(content);
}
