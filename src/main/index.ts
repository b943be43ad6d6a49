#!/usr/bin/env node
import 'dotenv/config';

import { load_config } from './config';
import { create_logger, set_log_level } from './log/logger';
import { ErrorLog } from './store/error_log';
import { MavlinkTelemetrySource } from './source/mavlink_source';
import { create_fetchers } from './fetchers/categories';
import { DisplayConsumer } from './consumers/display';
import { PersistenceConsumer } from './consumers/persistence';
import { ConnectionSupervisor } from './supervisor/connection_supervisor';
import { scan_ports, format_port_list } from './transport/port_scanner';
import { DEFAULT_SERIAL_BAUD } from './transport/link_types';
import type { SessionTask } from './session/session_types';
import { describe_error } from './util/errors';

const log = create_logger('main');

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/**
 * Run the aggregator until SIGINT/SIGTERM.
 *
 * @returns The process exit code.
 */
export async function main(argv: readonly string[], env: NodeJS.ProcessEnv): Promise<number> {
  const errors = new ErrorLog();

  try {
    const config = load_config(env, argv);
    set_log_level(config.log_level);

    if (config.list_ports) {
      const ports = await scan_ports();
      for (const line of format_port_list(ports, DEFAULT_SERIAL_BAUD)) {
        console.log(line);
      }
      return 0;
    }

    const persistence = new PersistenceConsumer({ log_dir: config.log_dir, tick_ms: config.tick_ms });
    const create_tasks = (): SessionTask[] => {
      const tasks = create_fetchers({ retry_delay_ms: config.fetch_retry_ms });
      if (config.display_enabled) {
        tasks.push(new DisplayConsumer(process.stdout, { tick_ms: config.tick_ms }));
      }
      tasks.push(persistence);
      return tasks;
    };

    const supervisor = new ConnectionSupervisor({
      connect: (signal) => MavlinkTelemetrySource.open(config.connection_url, {}, signal),
      create_tasks,
      errors,
      restart_delay_ms: config.restart_delay_ms,
      on_session_start: (ctx) => log.info(`logging to ${persistence.file_for(ctx.started_at)}`)
    });

    const on_signal = (): void => supervisor.stop();
    process.once('SIGINT', on_signal);
    process.once('SIGTERM', on_signal);

    log.info(`connecting to ${config.connection_url}`);
    try {
      await supervisor.run();
    } finally {
      process.off('SIGINT', on_signal);
      process.off('SIGTERM', on_signal);
    }

    console.log('Exiting...');
    return 0;
  } catch (err) {
    errors.record('main', `Fatal error in main: ${describe_error(err)}`);
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2), process.env).then(
    (code) => process.exit(code),
    (err: unknown) => {
      console.error(`[main] ${describe_error(err)}`);
      process.exit(1);
    }
  );
}
