import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  CSV_HEADER,
  CsvLogWriter,
  PersistenceConsumer,
  flatten_snapshot,
  health_column,
  log_file_name,
  to_csv_line
} from '../persistence';
import { TelemetryStore } from '../../store/telemetry_store';
import { ErrorLog } from '../../store/error_log';
import type { SessionContext } from '../../session/session_types';
import type { Logger } from '../../log/logger';
import { FakeTelemetrySource } from '../../../../test/fixtures/fake_source';

function quiet_logger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const ROW_TIME = new Date(Date.UTC(2024, 0, 1, 10, 0, 0));

// ---------------------------------------------------------------------------
// Row format
// ---------------------------------------------------------------------------

describe('CSV format', () => {
  it('has a fixed header', () => {
    expect(CSV_HEADER.join(',')).toBe(
      'timestamp,lat,lon,alt,abs_alt,speed,roll,pitch,yaw,voltage,battery,gps_fix,satellites,flight_mode,armed,rc_signal,' +
        'health_accelerometer_calibration,health_armable,health_global_position,health_gyrometer_calibration,' +
        'health_home_position,health_local_position,health_magnetometer_calibration'
    );
  });

  it('derives health column names', () => {
    expect(health_column('Home position')).toBe('health_home_position');
  });

  it('writes 0 for every unavailable value', () => {
    const cells = flatten_snapshot(new TelemetryStore().snapshot(), ROW_TIME);

    expect(cells).toHaveLength(CSV_HEADER.length);
    expect(cells[0]).toBe('2024-01-01T10:00:00.000Z');
    expect(cells.slice(1).every((c) => c === '0')).toBe(true);
  });

  it('writes stored values in column order', () => {
    const store = new TelemetryStore();
    store.update({ lat: '47.397742', armed: 'Yes', gps_fix: 'FIX_3D' });
    store.update({
      health: {
        'Accelerometer calibration': 'OK',
        'Armable': 'FAIL',
        'Global position': 'OK',
        'Gyrometer calibration': 'OK',
        'Home position': 'OK',
        'Local position': 'OK',
        'Magnetometer calibration': 'OK'
      }
    });

    const cells = flatten_snapshot(store.snapshot(), ROW_TIME);

    expect(cells[CSV_HEADER.indexOf('lat')]).toBe('47.397742');
    expect(cells[CSV_HEADER.indexOf('speed')]).toBe('0');
    expect(cells[CSV_HEADER.indexOf('armed')]).toBe('Yes');
    expect(cells[CSV_HEADER.indexOf('gps_fix')]).toBe('FIX_3D');
    expect(cells[CSV_HEADER.indexOf('health_armable')]).toBe('FAIL');
    expect(cells[CSV_HEADER.indexOf('health_home_position')]).toBe('OK');
  });

  it('does not modify the store when flattening', () => {
    const store = new TelemetryStore();
    flatten_snapshot(store.snapshot(), ROW_TIME);

    expect(store.snapshot().lat).toBeNull();
  });

  it('quotes cells holding a comma, quote or newline', () => {
    expect(to_csv_line(['a,b', 'say "hi"', 'two\nlines', 'plain'])).toBe('"a,b","say ""hi""","two\nlines",plain\n');
  });

  it('names the file after the session start time', () => {
    expect(log_file_name(new Date(2024, 2, 5, 7, 8, 9))).toBe('telemetry_log_20240305_070809.csv');
  });
});

// ---------------------------------------------------------------------------
// File writes
// ---------------------------------------------------------------------------

describe('CsvLogWriter', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'telemetry-csv-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes the header once, then appends rows', async () => {
    const writer = new CsvLogWriter(join(dir, 'log.csv'));

    await writer.append(['1', '2']);
    await writer.append(['3', '4']);

    const lines = (await fs.readFile(writer.path, 'utf8')).split('\n');
    expect(lines).toEqual([CSV_HEADER.join(','), '1,2', '3,4', '']);
  });

  it('does not repeat the header in an existing file', async () => {
    const path = join(dir, 'existing.csv');
    await fs.writeFile(path, `${CSV_HEADER.join(',')}\n`);

    await new CsvLogWriter(path).append(['1', '2']);

    const lines = (await fs.readFile(path, 'utf8')).split('\n');
    expect(lines).toEqual([CSV_HEADER.join(','), '1,2', '']);
  });

  it('creates a missing directory', async () => {
    const writer = new CsvLogWriter(join(dir, 'flight_logs', 'nested', 'log.csv'));

    await writer.append(['1']);

    expect((await fs.readFile(writer.path, 'utf8')).startsWith('timestamp,')).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Consumer loop
// ---------------------------------------------------------------------------

describe('PersistenceConsumer', () => {
  let dir: string;
  let controller: AbortController;
  let ctx: SessionContext;

  beforeEach(async () => {
    dir = await fs.mkdtemp(join(tmpdir(), 'telemetry-csv-'));
    controller = new AbortController();
    ctx = {
      id: 1,
      started_at: new Date(2024, 2, 5, 7, 8, 9),
      source: new FakeTelemetrySource(),
      store: new TelemetryStore(),
      errors: new ErrorLog(5, () => new Date(2024, 2, 5, 7, 8, 9), quiet_logger()),
      signal: controller.signal
    };
  });

  afterEach(async () => {
    controller.abort();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('appends one row per tick to the session file', async () => {
    const consumer = new PersistenceConsumer({ log_dir: dir, tick_ms: 10, now: () => ROW_TIME });
    const path = join(dir, 'telemetry_log_20240305_070809.csv');
    ctx.store.update({ voltage: '12.15' });

    expect(consumer.file_for(ctx.started_at)).toBe(path);

    const done = consumer.run(ctx);
    await vi.waitFor(async () => {
      const lines = (await fs.readFile(path, 'utf8')).split('\n');
      expect(lines.length).toBeGreaterThanOrEqual(4);
    });
    controller.abort();
    await done;

    const lines = (await fs.readFile(path, 'utf8')).trimEnd().split('\n');
    expect(lines[0]).toBe(CSV_HEADER.join(','));
    expect(lines.slice(1).every((line) => line === lines[1])).toBe(true);
    expect(lines[1].split(',')[CSV_HEADER.indexOf('voltage')]).toBe('12.15');
    expect(ctx.errors.recent()).toHaveLength(0);
  });

  it('records write failures and keeps running', async () => {
    const blocker = join(dir, 'not_a_dir');
    await fs.writeFile(blocker, 'x');
    const consumer = new PersistenceConsumer({ log_dir: join(blocker, 'logs'), tick_ms: 10 });

    const done = consumer.run(ctx);
    await vi.waitFor(() => {
      expect(ctx.errors.recent().length).toBeGreaterThanOrEqual(2);
    });
    controller.abort();
    await done;

    const entry = ctx.errors.recent()[0];
    expect(entry.source).toBe('persistence');
    expect(entry.message.startsWith('CSV write error: ')).toBe(true);
  });
});
