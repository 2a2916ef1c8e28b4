#!/usr/bin/env node
// src/cli.ts
import * as fs from 'fs';
import * as path from 'path';
import { loadConfig, USAGE } from './config';
import type { DashboardConfig } from './config';
import { activate, deactivate } from './dashboard';
import { ConfigError, describeError } from './errors';
import { log, LogLevel } from './logging';
import { TerminalScreen } from './ui/terminal';

function packageVersion(): string {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (err) {
    log(`Cannot read package version: ${err}`, LogLevel.DEBUG);
  }
  return 'unknown';
}

async function main(argv: string[]): Promise<number> {
  let config: DashboardConfig;
  try {
    config = loadConfig(argv, process.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`kubeglance: ${err.message}\n\n${USAGE}`);
      return 1;
    }
    throw err;
  }
  if (config.help) {
    process.stdout.write(USAGE);
    return 0;
  }
  if (config.version) {
    process.stdout.write(`kubeglance ${packageVersion()}\n`);
    return 0;
  }
  if (!TerminalScreen.isSupported()) {
    process.stderr.write('kubeglance: an interactive terminal is required\n');
    return 1;
  }

  const screen = new TerminalScreen();
  const fail = (err: unknown) => {
    screen.restore();
    log(`Fatal: ${err instanceof Error ? err.stack ?? err.message : err}`, LogLevel.ERROR, true);
    process.stderr.write(`kubeglance: ${describeError(err)}\n`);
    process.exit(1);
  };
  process.on('uncaughtException', fail);
  process.on('unhandledRejection', fail);

  try {
    const dashboard = await activate(config, { screen });
    await dashboard.done;
    await deactivate(dashboard);
  } finally {
    screen.restore();
  }
  return 0;
}

main(process.argv.slice(2))
  .then(code => process.exit(code))
  .catch(err => {
    process.stderr.write(`kubeglance: ${describeError(err)}\n`);
    process.exit(1);
  });
