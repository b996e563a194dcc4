#!/usr/bin/env node
import { parseArgs } from 'util';
import { getConfig, type EnvConfig } from './config.js';
import { closeDb, ensureSchema, getDb, type DbHandle } from './db/client.js';
import { runDaemon } from './server.js';
import { createController, intervalFor, parseMode, rendererFor } from './services/bootstrap.js';
import { ControlClient } from './services/control-client.js';
import { formatAdvance, formatStatus, type StatusView } from './services/report.js';
import { getCurrentMode, setCurrentMode } from './services/settings.js';
import type { AdvanceResult } from './services/rotation-controller.js';
import type { CatalogKind } from './rotation/types.js';
import { ConfigError, errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

const USAGE = `Usage: wallrotor <command> [--mode video|picture]

Commands:
  daemon    Rotate wallpapers on a timer and serve the control API
  next      Switch to the next wallpaper of the current mode
  video     Switch to video wallpapers and show the next one
  picture   Switch to static wallpapers and show the next one
  reset     Rescan the wallpaper directory and update the catalog
  status    Show catalog statistics and the wallpaper list`;

const COMMANDS = ['daemon', 'next', 'video', 'picture', 'reset', 'status'] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some(c => c === value);
}

function readMode(handle: DbHandle): CatalogKind {
  try {
    ensureSchema(handle.sqlite);
    return getCurrentMode(handle.db);
  } catch (err) {
    logger.warn({ err: errorMessage(err) }, 'Current mode unreadable, using video');
    return 'video';
  }
}

function writeMode(handle: DbHandle, kind: CatalogKind): void {
  try {
    ensureSchema(handle.sqlite);
    setCurrentMode(handle.db, kind);
  } catch (err) {
    logger.warn({ err: errorMessage(err), mode: kind }, 'Could not record current mode');
  }
}

/** Forward to a daemon that owns `kind`, if one is listening. */
async function daemonFor(config: EnvConfig, kind: CatalogKind): Promise<ControlClient | null> {
  const client = new ControlClient(config.CONTROL_PORT);
  return (await client.probe()) === kind ? client : null;
}

async function advance(config: EnvConfig, handle: DbHandle, kind: CatalogKind): Promise<AdvanceResult> {
  const remote = await daemonFor(config, kind);
  if (remote) return remote.next();

  const controller = createController(config, handle, kind);
  await controller.open();
  return controller.advance();
}

function report(result: AdvanceResult): number {
  const line = formatAdvance(result);
  if (result.status === 'render-failed') {
    console.error(line);
    return 1;
  }
  console.log(line);
  return 0;
}

async function run(command: Command, modeFlag: string | undefined): Promise<number> {
  const config = getConfig();

  if (command === 'daemon') {
    await runDaemon(config, parseMode(modeFlag ?? 'video'));
    return 0;
  }

  const handle = getDb();
  try {
    switch (command) {
      case 'next':
        return report(await advance(config, handle, readMode(handle)));

      case 'video':
        writeMode(handle, 'video');
        return report(await advance(config, handle, 'video'));

      case 'picture': {
        await rendererFor(config, 'video').stop().catch((err: unknown) => {
          logger.warn({ err: errorMessage(err) }, 'Could not stop the video renderer');
        });
        writeMode(handle, 'image');
        return report(await advance(config, handle, 'image'));
      }

      case 'reset': {
        const kind = parseMode(modeFlag ?? 'video');
        const remote = await daemonFor(config, kind);
        const count = remote ? await remote.reset() : await createController(config, handle, kind).open();
        console.log(`Rescan complete: ${count} wallpapers`);
        return 0;
      }

      case 'status': {
        const kind = parseMode(modeFlag ?? 'video');
        const remote = await daemonFor(config, kind);
        let view: StatusView;
        if (remote) {
          view = await remote.status();
        } else {
          const controller = createController(config, handle, kind);
          await controller.open();
          view = controller.status();
        }
        console.log(formatStatus(view, intervalFor(config, kind)));
        return 0;
      }
    }
  } finally {
    closeDb();
  }
}

async function main(): Promise<number> {
  let parsed;
  try {
    parsed = parseArgs({
      args: process.argv.slice(2),
      allowPositionals: true,
      options: {
        mode: { type: 'string', short: 'm' },
        help: { type: 'boolean', short: 'h' },
      },
    });
  } catch (err) {
    console.error(errorMessage(err));
    console.error(USAGE);
    return 2;
  }

  const command = parsed.positionals[0];
  if (parsed.values.help || !isCommand(command)) {
    console.error(USAGE);
    return parsed.values.help ? 0 : 2;
  }

  try {
    return await run(command, parsed.values.mode);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      return 2;
    }
    console.error(`wallrotor ${command} failed: ${errorMessage(err)}`);
    return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('Fatal:', err);
    process.exitCode = 1;
  },
);
