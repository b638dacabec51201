#!/usr/bin/env node
/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as fs from 'fs';
import * as tty from 'tty';
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import pc from 'picocolors';
import type { Logger } from './common/logger';
import { StreamLogger, type LineSink } from './common/stream-logger';
import { errorMessage } from './common/validation';
import { defaultCatalog, readCatalogFile, type CatalogFunction } from './completion/catalog';
import { formatNode, type OutputFormat } from './data/output';
import { loadData } from './data/loader';
import { navigate } from './data/navigate';
import { DATA_FORMATS, type DataFormat } from './data/types';
import { loadSettingsFile, mergeSettings, type Settings } from './settings';
import { strings } from './strings';
import { renderSnapshot, runExplorer } from './tui/run';
import { parseStartupKeys } from './tui/startup-keys';
import { Terminal } from './tui/terminal';
import { parseDuration, readDisplaySchemaFile, type DisplaySchema } from './views/display-schema';
import { KEY_MODES } from './views/keybindings';
import { createTheme } from './views/theme';

const VERSION = '0.1.0';

export interface CliOptions {
  path?: string;
  schema?: string;
  config?: string;
  keyMode?: string;
  color: boolean;
  functions?: string;
  output?: OutputFormat;
  format?: DataFormat;
  timeout?: string;
  logFile?: string;
  debug?: boolean;
  press?: string[];
  snapshot?: boolean;
  width?: number;
  height?: number;
}

export interface CliIO {
  stdout: LineSink;
  stderr: LineSink;
  stdin: NodeJS.ReadStream;
  /** Color support of the output, before settings apply. */
  colorSupported: boolean;
}

const defaultIO: CliIO = {
  stdout: process.stdout,
  stderr: process.stderr,
  stdin: process.stdin,
  colorSupported: pc.isColorSupported,
};

function parsePositive(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('expected a positive integer');
  return n;
}

async function readAll(stream: NodeJS.ReadStream): Promise<string> {
  const chunks: Buffer[] = [];
  const source: AsyncIterable<unknown> = stream;
  for await (const chunk of source) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

/** Keyboard for the session; piped data leaves stdin busy, so read the tty. */
function openKeyboard(io: CliIO): NodeJS.ReadStream | undefined {
  if (io.stdin.isTTY) return io.stdin;
  try {
    return new tty.ReadStream(fs.openSync('/dev/tty', 'r'));
  } catch {
    return undefined;
  }
}

function fail(lines: string[]): never {
  throw new Error(lines.join('\n'));
}

function createLogger(settings: Settings, debug: boolean, interactive: boolean, io: CliIO): { logger: Logger; close(): void } {
  const threshold = debug ? 'debug' : settings.logLevel;
  if (settings.logFile) {
    const stream = fs.createWriteStream(settings.logFile, { flags: 'a' });
    return { logger: new StreamLogger(stream, { threshold }), close: () => stream.end() };
  }
  // stdout and stderr share the screen with the explorer
  return { logger: new StreamLogger(io.stderr, { threshold: interactive ? 'off' : threshold }), close: () => undefined };
}

function loadSchema(file: string | undefined, timeout: string | undefined): DisplaySchema | undefined {
  let schema: DisplaySchema | undefined;
  if (file) {
    const result = readDisplaySchemaFile(file);
    if (result.errors.length > 0) fail(result.errors);
    schema = result.schema;
  }
  if (timeout !== undefined) {
    if (parseDuration(timeout) === undefined) fail([strings.errorInvalidOption('timeout', timeout)]);
    if (schema?.status) schema = { ...schema, status: { ...schema.status, timeout } };
  }
  return schema;
}

function loadFunctions(file: string | undefined): CatalogFunction[] {
  if (!file) return defaultCatalog();
  const result = readCatalogFile(file);
  if (result.errors.length > 0) fail(result.errors.map((e) => `${file}: ${e}`));
  return result.functions;
}

export async function run(file: string | undefined, options: CliOptions, colorFromCli: boolean, io: CliIO): Promise<number> {
  const loaded = loadSettingsFile(options.config);
  if (loaded.errors.length > 0) fail(loaded.errors);
  const merged = mergeSettings(loaded.settings, {
    keyMode: options.keyMode,
    color: colorFromCli ? options.color : undefined,
    schema: options.schema,
    functions: options.functions,
    logFile: options.logFile,
  });
  for (const warning of merged.errors) io.stderr.write(warning + '\n');
  const settings = merged.settings;

  const interactive = !options.output && !options.snapshot;
  const { logger, close } = createLogger(settings, Boolean(options.debug), interactive, io);
  try {
    let text: string;
    if (file && file !== '-') text = fs.readFileSync(file, 'utf8');
    else if (!io.stdin.isTTY) text = await readAll(io.stdin);
    else fail([strings.errorNoInput]);

    const data = loadData(text, { format: options.format, fileName: file });
    if (data.errors.length > 0) {
      const where = file ?? 'stdin';
      fail(data.errors.map((e) => strings.errorLoad(`${where}:${e.line}:${e.column}`, e.message)));
    }
    logger.debug(`loaded ${data.format} input`);

    if (options.output) {
      const target = navigate(data.root, options.path ?? '_');
      if (!target.ok) fail([strings.errorLoad(target.at, target.error)]);
      io.stdout.write(formatNode(target.node, options.output) + '\n');
      return 0;
    }

    const explorerOptions = {
      root: data.root,
      catalog: loadFunctions(settings.functions),
      schema: loadSchema(settings.schema, options.timeout),
      keyMode: settings.keyMode,
      theme: createTheme(settings.color && io.colorSupported),
      path: options.path,
      logger,
    };
    const keys = parseStartupKeys(options.press ?? []);

    if (options.snapshot) {
      const frame = renderSnapshot({ ...explorerOptions, width: options.width, height: options.height }, keys);
      io.stdout.write(frame + '\n');
      return 0;
    }

    const keyboard = openKeyboard(io);
    if (!keyboard || !process.stdout.isTTY) fail([strings.errorNotTerminal]);
    await runExplorer({ ...explorerOptions, terminal: new Terminal(keyboard, process.stdout), startupKeys: keys });
    return 0;
  } finally {
    close();
  }
}

export function buildProgram(io: CliIO, onExit: (code: number) => void): Command {
  return new Command()
    .name(strings.appName)
    .description(strings.appDescription)
    .version(VERSION, '-V, --version', 'Print version')
    .argument('[file]', 'JSON, NDJSON or XML file; stdin when omitted or -')
    .option('-p, --path <path>', 'start at this path, e.g. _.items[0]')
    .option('-s, --schema <file>', 'display schema (JSON) selecting list, detail and status views')
    .option('-c, --config <file>', 'settings file (default ~/.config/treelens/config.json)')
    .addOption(new Option('-k, --key-mode <mode>', 'key bindings').choices([...KEY_MODES]))
    .option('--no-color', 'disable colors')
    .option('-f, --functions <file>', 'function catalog (JSON) for completion')
    .addOption(new Option('-o, --output <format>', 'print the node at --path and exit').choices(['json', 'xml']))
    .addOption(new Option('--format <format>', 'input format (default: from extension or content)').choices([...DATA_FORMATS]))
    .option('--timeout <duration>', 'status view deadline, e.g. 30s or 2m')
    .option('--log-file <file>', 'append diagnostics to this file')
    .option('--debug', 'log at debug level')
    .option('--press <keys...>', 'keys to apply at startup, e.g. "<F3>term" or "_.items<Tab><CR>"')
    .option('--snapshot', 'print a single frame and exit; honors --width and --height')
    .option('--width <columns>', 'snapshot width', parsePositive)
    .option('--height <rows>', 'snapshot height', parsePositive)
    .configureOutput({
      writeOut: (s) => io.stdout.write(s),
      writeErr: (s) => io.stderr.write(s),
    })
    .exitOverride()
    .action(async (file: string | undefined, options: CliOptions, command: Command) => {
      const colorFromCli = command.getOptionValueSource('color') === 'cli';
      onExit(await run(file, options, colorFromCli, io));
    });
}

export async function main(argv: string[], io: CliIO = defaultIO): Promise<number> {
  let code = 0;
  const program = buildProgram(io, (c) => {
    code = c;
  });
  try {
    await program.parseAsync(argv);
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode;
    io.stderr.write(`${strings.appName}: ${errorMessage(e)}\n`);
    return 1;
  }
  return code;
}

if (require.main === module) {
  main(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      process.stderr.write(`${strings.appName}: ${errorMessage(e)}\n`);
      process.exitCode = 1;
    }
  );
}
