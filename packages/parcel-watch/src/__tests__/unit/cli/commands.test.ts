/**
 * CLI Command Tests
 *
 * Commands run against a buffered output instead of the console.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'node:path';
import { DEFAULT_CONFIG, type ParcelWatchConfig } from '../../../config/config.js';
import type { NotificationMessage, Notifier, SendResult } from '../../../notify/notifier.js';
import { executeChange } from '../../../cli/commands/change.js';
import { executeChanges } from '../../../cli/commands/changes.js';
import { executeDetect } from '../../../cli/commands/detect.js';
import { executeParcel } from '../../../cli/commands/parcel.js';
import { executeSearch } from '../../../cli/commands/search.js';
import { executeWatched } from '../../../cli/commands/watched.js';
import { EXIT_CODES, exitCodeFor } from '../../../cli/lib/exit-codes.js';
import { formatTable, type CommandOutput } from '../../../cli/lib/output.js';
import { ConfigError, DatasetError, NotificationError } from '../../../core/errors.js';
import { createTempDir, parcel, removeTempDir, writeDataset, writeText } from '../../utils/fixtures.js';

class BufferOutput implements CommandOutput {
  readonly lines: string[] = [];
  readonly errors: string[] = [];

  log(line: string): void {
    this.lines.push(line);
  }

  error(line: string): void {
    this.errors.push(line);
  }
}

class RecordingNotifier implements Notifier {
  readonly channel = 'test';
  readonly messages: NotificationMessage[] = [];

  async send(message: NotificationMessage): Promise<SendResult> {
    this.messages.push(message);
    return { success: true, channel: this.channel };
  }
}

const fixedClock = (): Date => new Date('2026-01-15T03:00:00.000Z');

describe('commands', () => {
  let dir: string;
  let config: ParcelWatchConfig;
  let out: BufferOutput;

  beforeEach(async () => {
    dir = await createTempDir();
    config = {
      ...DEFAULT_CONFIG,
      paths: {
        current: join(dir, 'parcels.geojson'),
        baseline: join(dir, 'parcels_last.geojson'),
        summary: join(dir, 'changes_summary.json'),
        watchlist: join(dir, 'watched_parcels.txt'),
      },
      verbose: false,
      json: false,
      dryRun: false,
      configPath: null,
    };
    out = new BufferOutput();
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    await writeDataset(dir, 'parcels_last.geojson', [
      parcel('0101', { PROP_STREET: '12 Oak St', NAME_ONE: 'Old Owner' }),
      parcel('0102', { PROP_STREET: '14 Oak St' }),
    ]);
    await writeDataset(dir, 'parcels.geojson', [
      parcel('0101', { PROP_STREET: '12 Oak St', NAME_ONE: 'New Owner' }),
      parcel('0103', { PROP_STREET: '3 Elm St' }),
    ]);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(dir);
  });

  it('detect prints a run report and sends the message', async () => {
    const notifier = new RecordingNotifier();

    const code = await executeDetect(config, out, { notifier, now: fixedClock });

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(notifier.messages).toHaveLength(1);
    expect(out.lines).toEqual([
      '3 changes (added 1, removed 1, changed 1)',
      `Summary written to ${config.paths.summary}`,
      `Baseline updated: ${config.paths.baseline}`,
    ]);
  });

  it('detect --json prints the run result', async () => {
    const code = await executeDetect({ ...config, json: true }, out, { notifier: null, now: fixedClock });

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(out.lines).toHaveLength(1);
    const parsed: unknown = JSON.parse(out.lines[0] ?? '');
    expect(parsed).toMatchObject({
      summary: { added: ['0103'], removed: ['0102'] },
      notification: { send: true },
      promoted: true,
      summaryPath: config.paths.summary,
    });
  });

  it('detect --dry-run previews the message', async () => {
    const code = await executeDetect({ ...config, dryRun: true }, out, { notifier: null, now: fixedClock });

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(out.lines[0]?.split('\n')[0]).toBe('Parcel change summary');
    expect(out.lines.slice(1)).toEqual([
      '3 changes (added 1, removed 1, changed 1)',
      'Dry run: summary and baseline left untouched',
    ]);
  });

  it('changes reports a missing summary', async () => {
    const code = await executeChanges(config, out);

    expect(code).toBe(EXIT_CODES.NOT_FOUND);
    expect(out.errors).toEqual([`Error: No summary found at ${config.paths.summary}; run detect first`]);
  });

  it('changes and change read the latest summary', async () => {
    await executeDetect(config, new BufferOutput(), { notifier: null, now: fixedClock });

    expect(await executeChanges(config, out)).toBe(EXIT_CODES.SUCCESS);
    expect(out.lines).toContain('Changed ids: 0101');

    const detail = new BufferOutput();
    expect(await executeChange(config, detail, '0101')).toBe(EXIT_CODES.SUCCESS);
    expect(detail.lines).toEqual(['0101: changed', '  NAME_ONE: "Old Owner" -> "New Owner"']);

    expect(await executeChange(config, new BufferOutput(), '9999')).toBe(EXIT_CODES.NOT_FOUND);
  });

  it('parcel shows attributes and the recorded change', async () => {
    await executeDetect(config, new BufferOutput(), { notifier: null, now: fixedClock });

    const code = await executeParcel(config, out, '0103');

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(out.lines).toEqual([
      'Parcel 0103',
      '  PARCEL_ID: 0103',
      '  PROP_STREET: 3 Elm St',
      '',
      '0103: added',
    ]);
  });

  it('parcel reports an unknown identifier', async () => {
    const code = await executeParcel(config, out, '0102');

    expect(code).toBe(EXIT_CODES.NOT_FOUND);
    expect(out.errors).toEqual([`Error: Parcel 0102 not found in ${config.paths.current}`]);
  });

  it('search prints a table of matches', async () => {
    const code = await executeSearch(config, out, 'oak');

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(out.lines).toEqual([
      '1 parcels match "oak"',
      ['PARCEL | PROP_STREET', '-------+------------', '0101   | 12 Oak St'].join('\n'),
    ]);
  });

  it('watched previews the watchlist', async () => {
    await writeText(dir, 'watched_parcels.txt', '# ours\n0101\n0103\n');

    expect(await executeWatched(config, out)).toBe(EXIT_CODES.SUCCESS);
    expect(out.lines).toEqual(['Watching 2 parcels:', '- 0101', '- 0103']);
  });

  it('watched without a file says all parcels are reported', async () => {
    expect(await executeWatched(config, out)).toBe(EXIT_CODES.SUCCESS);
    expect(out.lines).toEqual(['Watchlist not configured; all parcels are reported']);
  });
});

describe('exitCodeFor', () => {
  it('maps error classes to exit codes', () => {
    expect(exitCodeFor(new ConfigError('bad'))).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(exitCodeFor(new DatasetError('invalid', 'x.geojson', 'bad'))).toBe(
      EXIT_CODES.DATA_INTEGRITY_ERROR
    );
    expect(exitCodeFor(new NotificationError('console', 'closed'))).toBe(EXIT_CODES.ERRORS);
  });
});

describe('formatTable', () => {
  it('right-aligns columns on request', () => {
    const table = formatTable(
      [{ name: 'a', count: 5 }, { name: 'bb', count: 12 }],
      [
        { header: 'NAME', value: (row) => row.name },
        { header: 'N', value: (row) => String(row.count), align: 'right' },
      ]
    );

    expect(table).toBe(['NAME |  N', '-----+---', 'a    |  5', 'bb   | 12'].join('\n'));
  });

  it('reports an empty result', () => {
    expect(formatTable([], [])).toBe('No entries found.');
  });
});
