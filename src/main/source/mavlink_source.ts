/**
 * MAVLink telemetry source.
 *
 * Reads raw bytes from a {@link TelemetryLink}, splits and decodes MAVLink
 * frames, and republishes the result as independent per-category streams
 * (see {@link TelemetrySource}). Only the first vehicle that sends a
 * heartbeat is tracked; traffic from other systems is ignored.
 *
 * Message → stream mapping:
 *   HEARTBEAT            → flight_mode, armed, connection_state
 *   SYS_STATUS           → battery, health
 *   GPS_RAW_INT          → gps_info (fix also feeds health)
 *   ATTITUDE             → attitude_euler
 *   GLOBAL_POSITION_INT  → position
 *   RC_CHANNELS          → rc_status
 *   HOME_POSITION, LOCAL_POSITION_NED → health flags only
 *
 * A link error fails every open category stream (the fetchers retry); a
 * link close ends every stream for good and resolves {@link until_closed}.
 *
 * @module source/mavlink_source
 */

import type { TelemetryLink } from '../transport/link_types';
import { create_link } from '../transport/open_link';
import { MavlinkFrameSplitter } from '../protocol/frame_splitter';
import { parse_message } from '../protocol/parser';
import { build_gcs_heartbeat } from '../protocol/frame_builder';
import { flight_mode_label, gps_fix_label } from '../protocol/px4_modes';
import type { Heartbeat, SysStatus, RcChannels, ParsedMessage } from '../protocol/types';
import {
  MAV_TYPE_GCS,
  MAV_AUTOPILOT_INVALID,
  MAV_MODE_FLAG_SAFETY_ARMED,
  SENSOR_3D_GYRO,
  SENSOR_3D_ACCEL,
  SENSOR_3D_MAG,
  SENSOR_PREARM_CHECK,
  GPS_FIX_TYPE_3D,
  RSSI_UNKNOWN,
  RSSI_MAX,
  GCS_HEARTBEAT_INTERVAL_MS,
  HEARTBEAT_TIMEOUT_MS
} from '../protocol/constants';
import { TelemetryChannel } from './telemetry_channel';
import type {
  TelemetrySource,
  ConnectionState,
  Position,
  EulerAngle,
  Battery,
  GpsInfo,
  FlightModeUpdate,
  ArmedUpdate,
  RcStatus,
  Health
} from './source_types';
import { create_logger, type Logger } from '../log/logger';
import { describe_error } from '../util/errors';

const RAD_TO_DEG = 180 / Math.PI;

export interface MavlinkSourceOptions {
  /** Interval between outgoing GCS heartbeats. Defaults to 1000 ms. */
  heartbeat_interval_ms?: number;
  /** Vehicle is reported disconnected after this long without a heartbeat. Defaults to 3000 ms. */
  heartbeat_timeout_ms?: number;
  /** Clock, injectable for tests. */
  now?: () => number;
  logger?: Logger;
}

export class MavlinkTelemetrySource implements TelemetrySource {
  private readonly splitter = new MavlinkFrameSplitter();
  private readonly log: Logger;
  private readonly heartbeat_interval_ms: number;
  private readonly heartbeat_timeout_ms: number;
  private readonly now: () => number;

  private readonly connection = new TelemetryChannel<ConnectionState>('connection_state');
  private readonly positions = new TelemetryChannel<Position>('position');
  private readonly attitudes = new TelemetryChannel<EulerAngle>('attitude');
  private readonly batteries = new TelemetryChannel<Battery>('battery');
  private readonly gps = new TelemetryChannel<GpsInfo>('gps_info');
  private readonly modes = new TelemetryChannel<FlightModeUpdate>('flight_mode');
  private readonly arming = new TelemetryChannel<ArmedUpdate>('armed');
  private readonly rc = new TelemetryChannel<RcStatus>('rc_status');
  private readonly health_checks = new TelemetryChannel<Health>('health');

  private vehicle_system_id: number | null = null;
  private connected = false;
  private last_heartbeat_ms = 0;
  private last_fix_type = 0;
  private home_position_seen = false;
  private local_position_seen = false;
  private rc_seen = false;
  private tx_seq = 0;

  private heartbeat_timer: ReturnType<typeof setInterval> | null = null;
  private watchdog_timer: ReturnType<typeof setInterval> | null = null;
  private closed_reason: Error | null = null;
  private close_waiters: Set<(reason: Error) => void> = new Set();

  constructor(
    private readonly link: TelemetryLink,
    options: MavlinkSourceOptions = {}
  ) {
    this.heartbeat_interval_ms = options.heartbeat_interval_ms ?? GCS_HEARTBEAT_INTERVAL_MS;
    this.heartbeat_timeout_ms = options.heartbeat_timeout_ms ?? HEARTBEAT_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? create_logger('mavlink');
  }

  /**
   * Create the link for `url`, open it and start the source.
   *
   * @param signal - Aborting abandons a link that is still opening.
   * @throws If the URL is invalid, the link cannot be opened, or on abort.
   */
  static async open(
    url: string,
    options: MavlinkSourceOptions = {},
    signal?: AbortSignal
  ): Promise<MavlinkTelemetrySource> {
    const source = new MavlinkTelemetrySource(create_link(url), options);
    await source.start(signal);
    return source;
  }

  /**
   * Attach to the link, open it, and start the heartbeat and watchdog timers.
   *
   * @throws If the link fails to open, or `signal` aborts first.
   */
  async start(signal?: AbortSignal): Promise<void> {
    this.link.on('data', (bytes: Uint8Array) => this.on_link_data(bytes));
    this.link.on('error', (err: Error) => this.on_link_error(err));
    this.link.on('close', () => this.on_link_close(new Error(`link closed: ${this.link.describe()}`)));

    try {
      await this.link.connect(signal);
    } catch (err) {
      this.link.removeAllListeners();
      throw err;
    }
    this.log.info(`opened ${this.link.describe()}`);

    this.heartbeat_timer = setInterval(() => this.send_heartbeat(), this.heartbeat_interval_ms);
    this.watchdog_timer = setInterval(() => this.check_heartbeat_timeout(), Math.max(100, this.heartbeat_timeout_ms / 4));
  }

  // -----------------------------------------------------------------------
  // TelemetrySource
  // -----------------------------------------------------------------------

  /** Current state first, then every change. */
  connection_state(signal?: AbortSignal): AsyncIterable<ConnectionState> {
    return this.connection.subscribe(signal, [{ is_connected: this.connected }]);
  }

  position(signal?: AbortSignal): AsyncIterable<Position> {
    return this.positions.subscribe(signal);
  }

  attitude_euler(signal?: AbortSignal): AsyncIterable<EulerAngle> {
    return this.attitudes.subscribe(signal);
  }

  battery(signal?: AbortSignal): AsyncIterable<Battery> {
    return this.batteries.subscribe(signal);
  }

  gps_info(signal?: AbortSignal): AsyncIterable<GpsInfo> {
    return this.gps.subscribe(signal);
  }

  flight_mode(signal?: AbortSignal): AsyncIterable<FlightModeUpdate> {
    return this.modes.subscribe(signal);
  }

  armed(signal?: AbortSignal): AsyncIterable<ArmedUpdate> {
    return this.arming.subscribe(signal);
  }

  rc_status(signal?: AbortSignal): AsyncIterable<RcStatus> {
    return this.rc.subscribe(signal);
  }

  health(signal?: AbortSignal): AsyncIterable<Health> {
    return this.health_checks.subscribe(signal);
  }

  until_closed(signal: AbortSignal): Promise<Error> {
    if (this.closed_reason) {
      return Promise.resolve(this.closed_reason);
    }
    return new Promise<Error>((resolve, reject) => {
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }
      const on_abort = (): void => {
        this.close_waiters.delete(waiter);
        reject(signal.reason);
      };
      const waiter = (reason: Error): void => {
        signal.removeEventListener('abort', on_abort);
        resolve(reason);
      };
      this.close_waiters.add(waiter);
      signal.addEventListener('abort', on_abort, { once: true });
    });
  }

  async close(): Promise<void> {
    if (this.closed_reason) {
      return;
    }
    this.shutdown(new Error('telemetry source closed'));
    this.link.disconnect();
    this.link.removeAllListeners();
  }

  // -----------------------------------------------------------------------
  // Link events
  // -----------------------------------------------------------------------

  private on_link_data(bytes: Uint8Array): void {
    for (const frame of this.splitter.push(bytes)) {
      const result = parse_message(frame);
      if (!result.ok) {
        this.log.debug(`dropped frame: ${result.error}`);
        continue;
      }
      this.dispatch(frame.system_id, result.message);
    }
  }

  private on_link_error(err: Error): void {
    this.log.warn(`link error: ${err.message}`);
    const reason = new Error(`link error: ${err.message}`);
    for (const channel of this.category_channels()) {
      channel.fail(reason);
    }
  }

  private on_link_close(reason: Error): void {
    this.log.warn(reason.message);
    this.shutdown(reason);
  }

  private shutdown(reason: Error): void {
    if (this.closed_reason) {
      return;
    }
    this.closed_reason = reason;
    this.stop_timers();
    const stats = this.splitter.get_stats();
    this.log.info(
      `link stats: ${stats.frames} frames, ${stats.crc_errors} checksum errors, ` +
        `${stats.unknown} unknown, ${stats.discarded_bytes} bytes discarded`
    );
    this.splitter.reset();
    this.set_connected(false);
    this.connection.close(reason);
    for (const channel of this.category_channels()) {
      channel.close(reason);
    }
    for (const waiter of this.close_waiters) {
      waiter(reason);
    }
    this.close_waiters.clear();
  }

  private stop_timers(): void {
    if (this.heartbeat_timer) {
      clearInterval(this.heartbeat_timer);
      this.heartbeat_timer = null;
    }
    if (this.watchdog_timer) {
      clearInterval(this.watchdog_timer);
      this.watchdog_timer = null;
    }
  }

  private category_channels(): Array<Pick<TelemetryChannel<unknown>, 'fail' | 'close'>> {
    return [
      this.positions,
      this.attitudes,
      this.batteries,
      this.gps,
      this.modes,
      this.arming,
      this.rc,
      this.health_checks
    ];
  }

  // -----------------------------------------------------------------------
  // Message handling
  // -----------------------------------------------------------------------

  private dispatch(system_id: number, msg: ParsedMessage): void {
    if (msg.type === 'heartbeat') {
      this.handle_heartbeat(system_id, msg.data);
      return;
    }
    if (system_id !== this.vehicle_system_id) {
      return;
    }

    switch (msg.type) {
      case 'sys_status':
        this.batteries.publish({
          voltage_v: msg.data.voltage_v,
          remaining_percent: msg.data.battery_remaining_percent
        });
        this.health_checks.publish(this.health_from(msg.data));
        break;
      case 'gps_raw_int':
        this.last_fix_type = msg.data.fix_type;
        this.gps.publish({
          num_satellites: msg.data.satellites_visible,
          fix_type: gps_fix_label(msg.data.fix_type)
        });
        break;
      case 'attitude':
        this.attitudes.publish({
          roll_deg: msg.data.roll_rad * RAD_TO_DEG,
          pitch_deg: msg.data.pitch_rad * RAD_TO_DEG,
          yaw_deg: msg.data.yaw_rad * RAD_TO_DEG
        });
        break;
      case 'global_position_int':
        this.positions.publish({
          latitude_deg: msg.data.lat_deg,
          longitude_deg: msg.data.lon_deg,
          relative_altitude_m: msg.data.relative_alt_m,
          absolute_altitude_m: msg.data.alt_m
        });
        break;
      case 'rc_channels':
        this.rc.publish(this.rc_status_from(msg.data));
        break;
      case 'home_position':
        this.home_position_seen = true;
        break;
      case 'local_position_ned':
        this.local_position_seen = true;
        break;
    }
  }

  private handle_heartbeat(system_id: number, hb: Heartbeat): void {
    // Ground stations and non-autopilot components also send heartbeats.
    if (hb.type === MAV_TYPE_GCS || hb.autopilot === MAV_AUTOPILOT_INVALID) {
      return;
    }
    if (this.vehicle_system_id === null) {
      this.vehicle_system_id = system_id;
      this.log.info(`vehicle discovered: system ${system_id}`);
    } else if (system_id !== this.vehicle_system_id) {
      return;
    }

    this.last_heartbeat_ms = this.now();
    this.set_connected(true);
    this.modes.publish({ flight_mode: flight_mode_label(hb) });
    this.arming.publish({ is_armed: (hb.base_mode & MAV_MODE_FLAG_SAFETY_ARMED) !== 0 });
  }

  private health_from(status: SysStatus): Health {
    const healthy = (bit: number): boolean => (status.sensors_health & bit) !== 0;
    return {
      is_accelerometer_calibration_ok: healthy(SENSOR_3D_ACCEL),
      is_armable: healthy(SENSOR_PREARM_CHECK),
      is_global_position_ok: this.last_fix_type >= GPS_FIX_TYPE_3D,
      is_gyrometer_calibration_ok: healthy(SENSOR_3D_GYRO),
      is_home_position_ok: this.home_position_seen,
      is_local_position_ok: this.local_position_seen,
      is_magnetometer_calibration_ok: healthy(SENSOR_3D_MAG)
    };
  }

  private rc_status_from(rc: RcChannels): RcStatus {
    const is_available = rc.channel_count > 0;
    this.rc_seen = this.rc_seen || is_available;
    return {
      was_available_once: this.rc_seen,
      is_available,
      signal_strength_percent: rc.rssi === RSSI_UNKNOWN ? null : (rc.rssi / RSSI_MAX) * 100
    };
  }

  // -----------------------------------------------------------------------
  // Connection state
  // -----------------------------------------------------------------------

  private set_connected(connected: boolean): void {
    if (this.connected === connected) {
      return;
    }
    this.connected = connected;
    this.log.info(connected ? 'vehicle connected' : 'vehicle heartbeat lost');
    this.connection.publish({ is_connected: connected });
  }

  private check_heartbeat_timeout(): void {
    if (this.connected && this.now() - this.last_heartbeat_ms > this.heartbeat_timeout_ms) {
      this.set_connected(false);
    }
  }

  private send_heartbeat(): void {
    try {
      this.link.send(build_gcs_heartbeat(this.tx_seq));
      this.tx_seq = (this.tx_seq + 1) & 0xFF;
    } catch (err) {
      this.log.debug(`heartbeat not sent: ${describe_error(err)}`);
    }
  }
}
