#!/usr/bin/env node
/**
 * CLI entry point for site-harvester
 */
import { fileURLToPath } from 'url';
import { realpathSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import {
  EXPORT_FORMATS,
  loadConfigFile,
  resolveConfig,
  type ExportFormat,
  type ScrapeConfig,
  type ScrapeConfigInput,
} from './config.js';
import { crawl } from './crawl/crawler.js';
import type { PageEvent, RunEvent, RunSummary } from './crawl/types.js';
import { ConfigError } from './errors.js';
import { BundleBuilder } from './export/bundle.js';
import { exportBundle, formatTimestamp } from './export/exporter.js';
import type { ExportBundle } from './export/types.js';
import { closeAllSessions } from './fetch/http-client.js';
import { batch } from './scrape/batch.js';
import { scrapeSingle } from './scrape/single.js';

/** Read version from package.json */
function getVersion(): string {
  const srcDir = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(srcDir, '..', 'package.json');
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
    return 'unknown';
  } catch (error) {
    console.debug('Failed to read version from package.json:', error);
    return 'unknown';
  }
}

export const COMMANDS = ['single', 'crawl', 'batch'] as const;
export type Command = (typeof COMMANDS)[number];

function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

function isExportFormat(value: string): value is ExportFormat {
  return (EXPORT_FORMATS as readonly string[]).includes(value);
}

export interface CliOptions {
  command: Command;
  urls: string[];
  urlsFile?: string;
  configFile?: string;
  /** Config keys set by flags; they win over the config file. */
  overrides: ScrapeConfigInput;
  output?: string;
  outDir: string;
  json: boolean;
  quiet: boolean;
}

export type ParseResult =
  | { kind: 'ok'; opts: CliOptions; warnings: string[] }
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'error'; message: string };

type NumberFlag = { value: number } | { error: string };

function parseNumber(flag: string, raw: string | undefined, integer: boolean): NumberFlag {
  if (raw === undefined) return { error: `${flag} requires a value` };
  const pattern = integer ? /^\d+$/ : /^\d+(\.\d+)?$/;
  if (!pattern.test(raw.trim())) {
    return {
      error: integer
        ? `${flag} must be a non-negative integer`
        : `${flag} must be a non-negative number`,
    };
  }
  return { value: Number(raw.trim()) };
}

function splitList(raw: string): string[] {
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/** Add https:// to input that has no scheme. */
export function withScheme(url: string): string {
  const trimmed = url.trim();
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

export function parseArgs(args: string[]): ParseResult {
  const positional: string[] = [];
  const warnings: string[] = [];
  const overrides: ScrapeConfigInput = {};
  let urlsFile: string | undefined;
  let configFile: string | undefined;
  let output: string | undefined;
  let outDir = '.';
  let json = false;
  let quiet = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--version':
        return { kind: 'version' };
      case '--json':
        json = true;
        break;
      case '-q':
      case '--quiet':
        quiet = true;
        break;
      case '--cross-domain':
        overrides.allowCrossDomain = true;
        break;
      case '--include-subdomains':
        overrides.includeSubdomains = true;
        break;
      case '--ignore-robots':
        overrides.respectRobots = false;
        break;
      case '--delay': {
        const v = parseNumber(arg, args[++i], false);
        if ('error' in v) return { kind: 'error', message: v.error };
        overrides.baseDelay = v.value;
        break;
      }
      case '--timeout': {
        const v = parseNumber(arg, args[++i], false);
        if ('error' in v) return { kind: 'error', message: v.error };
        overrides.timeout = v.value;
        break;
      }
      case '--retries': {
        const v = parseNumber(arg, args[++i], true);
        if ('error' in v) return { kind: 'error', message: v.error };
        overrides.maxRetries = v.value;
        break;
      }
      case '--depth': {
        const v = parseNumber(arg, args[++i], true);
        if ('error' in v) return { kind: 'error', message: v.error };
        overrides.maxDepth = v.value;
        break;
      }
      case '--limit': {
        const v = parseNumber(arg, args[++i], true);
        if ('error' in v) return { kind: 'error', message: v.error };
        overrides.maxPages = v.value;
        break;
      }
      case '--concurrency': {
        const v = parseNumber(arg, args[++i], true);
        if ('error' in v) return { kind: 'error', message: v.error };
        overrides.maxConcurrentFetches = v.value;
        break;
      }
      case '--format': {
        if (i + 1 >= args.length) return { kind: 'error', message: '--format requires a value' };
        const formats: ExportFormat[] = [];
        for (const name of splitList(args[++i].toLowerCase())) {
          if (!isExportFormat(name)) {
            return {
              kind: 'error',
              message: `Unknown format "${name}" (expected ${EXPORT_FORMATS.join(', ')})`,
            };
          }
          formats.push(name);
        }
        if (formats.length === 0) return { kind: 'error', message: '--format requires a value' };
        overrides.exportFormats = formats;
        break;
      }
      case '--include':
        if (i + 1 >= args.length) return { kind: 'error', message: '--include requires a value' };
        overrides.include = splitList(args[++i]);
        break;
      case '--exclude':
        if (i + 1 >= args.length) return { kind: 'error', message: '--exclude requires a value' };
        overrides.exclude = splitList(args[++i]);
        break;
      case '--output':
        if (i + 1 >= args.length) return { kind: 'error', message: '--output requires a value' };
        output = args[++i];
        break;
      case '--out-dir':
        if (i + 1 >= args.length) return { kind: 'error', message: '--out-dir requires a value' };
        outDir = args[++i];
        break;
      case '--config':
        if (i + 1 >= args.length) return { kind: 'error', message: '--config requires a value' };
        configFile = args[++i];
        break;
      case '--urls-file':
        if (i + 1 >= args.length) {
          return { kind: 'error', message: '--urls-file requires a value' };
        }
        urlsFile = args[++i];
        break;
      default:
        if (arg.startsWith('-')) {
          warnings.push(`Unknown option: ${arg}`);
        } else {
          positional.push(arg);
        }
    }
  }

  const [command, ...urls] = positional;
  if (command === undefined) {
    return { kind: 'error', message: `Missing command (${COMMANDS.join(', ')})` };
  }
  if (!isCommand(command)) {
    return { kind: 'error', message: `Unknown command: ${command}` };
  }

  if (command === 'batch') {
    if (urls.length === 0 && !urlsFile) {
      return { kind: 'error', message: 'batch requires at least one <url> or --urls-file' };
    }
  } else {
    if (urls.length === 0) {
      return { kind: 'error', message: `Missing required <url> argument for ${command}` };
    }
    if (urls.length > 1) warnings.push(`Ignoring extra arguments: ${urls.slice(1).join(' ')}`);
    if (urlsFile) warnings.push('--urls-file only applies to batch');
  }

  return {
    kind: 'ok',
    opts: {
      command,
      urls: (command === 'batch' ? urls : urls.slice(0, 1)).map(withScheme),
      urlsFile,
      configFile,
      overrides,
      output,
      outDir,
      json,
      quiet,
    },
    warnings,
  };
}

/**
 * URLs from a text file, one per line. Blank lines and lines starting
 * with # are skipped.
 */
export function readUrlsFile(path: string): string[] {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (e) {
    throw new ConfigError([`cannot read URL file ${path}: ${String(e)}`]);
  }
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'))
    .map(withScheme);
}

/** Flags override the config file; both are validated together. */
export function buildConfig(opts: CliOptions): ScrapeConfig {
  const base = opts.configFile ? loadConfigFile(opts.configFile) : {};
  return resolveConfig({ ...base, ...opts.overrides });
}

/** host + path with separators turned into underscores, for file names. */
function hostPath(url: string): string {
  const parsed = new URL(url);
  return `${parsed.host}${parsed.pathname}`.replace(/[^A-Za-z0-9.-]+/g, '_').replace(/^_+|_+$/g, '');
}

/** Default export name per mode: single_page_<host_path>, full_crawl_<host_path>, batch_scrape_<HHMMSS>. */
export function defaultExportName(command: Command, url: string, now: Date = new Date()): string {
  switch (command) {
    case 'single':
      return `single_page_${hostPath(url)}`;
    case 'crawl':
      return `full_crawl_${hostPath(url)}`;
    case 'batch':
      return `batch_scrape_${formatTimestamp(now).slice(9)}`;
  }
}

function printUsage(): void {
  console.log(`Usage: site-harvester single <url> [options]
       site-harvester crawl <url> [options]
       site-harvester batch <url...> [--urls-file <path>] [options]

URLs without a scheme get https://. Results are exported when the run ends,
including after Ctrl-C.

Options:
  --delay <s>           Seconds between requests to one host (default: 2)
  --retries <n>         Retries after the first attempt (default: 3)
  --timeout <s>         Request timeout in seconds (default: 30)
  --depth <n>           Max link-following depth for crawl (default: 3)
  --limit <n>           Max pages for crawl (default: 50)
  --concurrency <n>     Parallel requests (default: 5)
  --format <list>       Export formats: json,csv,excel (default: json)
  --output <name>       Export file name base (timestamp and extension are added)
  --out-dir <dir>       Directory for export files (default: .)
  --cross-domain        Follow links to other hosts
  --include-subdomains  Treat subdomains of the seed host as in scope
  --ignore-robots       Do not consult robots.txt
  --include <globs>     Path glob patterns to include (comma-separated)
  --exclude <globs>     Path glob patterns to exclude (comma-separated)
  --config <file>       JSON configuration file (flags override it)
  --urls-file <path>    Batch URLs, one per line
  --json                JSONL progress output
  -q, --quiet           No progress output
  -v, --version         Show version number
  -h, --help            Show this help message

Disclaimer:
  Users are responsible for complying with website terms of service,
  robots.txt directives, and applicable laws.`);
}

function renderPage(event: PageEvent): void {
  const { outcome } = event;
  const progress = `[${event.visited}${event.queued > 0 ? ` +${event.queued}` : ''}]`;
  if (outcome.ok) {
    const title = outcome.record.title ? ` ${outcome.record.title}` : '';
    console.error(`${progress} ${outcome.record.status} ${event.url}${title}`);
  } else {
    console.error(`${progress} FAIL ${event.url}: ${outcome.failure.message}`);
  }
}

/** Summary without the bundle, for JSONL output. */
function summaryLine(summary: RunSummary): string {
  const { bundle, ...rest } = summary;
  return JSON.stringify({ ...rest, entries: bundle.entries.size });
}

async function runEvents(
  events: AsyncGenerator<RunEvent, void, undefined>,
  opts: CliOptions
): Promise<ExportBundle> {
  for await (const event of events) {
    if (event.type === 'page') {
      if (opts.json) console.log(JSON.stringify(event));
      else if (!opts.quiet) renderPage(event);
      continue;
    }

    if (opts.json) {
      console.log(summaryLine(event));
    } else if (!opts.quiet) {
      const blocked = event.pagesBlocked > 0 ? `, ${event.pagesBlocked} blocked` : '';
      const cancelled = event.cancelled ? ' (cancelled)' : '';
      console.error(
        `\n${event.mode} complete${cancelled}: ${event.pagesSuccess}/${event.pagesTotal} pages${blocked}, ${event.durationMs}ms`
      );
    }
    return event.bundle;
  }
  throw new Error('Run ended without a summary');
}

async function runSingle(
  url: string,
  config: ScrapeConfig,
  opts: CliOptions,
  signal: AbortSignal
): Promise<ExportBundle> {
  const builder = new BundleBuilder('single');
  const outcome = await scrapeSingle(url, config, { signal });

  if (outcome.ok) builder.addRecord(outcome.record);
  else builder.addError(outcome.failure);

  if (opts.json) {
    console.log(JSON.stringify(outcome));
  } else if (!opts.quiet) {
    if (outcome.ok) {
      const { record } = outcome;
      if (record.title) console.error(`Title: ${record.title}`);
      console.error(`Status: ${record.status}`);
      console.error(
        `Words: ${record.wordCount}, links: ${record.links.length}, images: ${record.images.length}`
      );
    } else {
      console.error(`Error: ${outcome.failure.message}`);
    }
  }

  return builder.build(signal.aborted);
}

function hasSuccess(bundle: ExportBundle): boolean {
  for (const entry of bundle.entries.values()) {
    if (entry.type === 'record') return true;
  }
  return false;
}

/** Run the CLI and resolve to the process exit code. */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const result = parseArgs(argv);

  switch (result.kind) {
    case 'version':
      console.log(`site-harvester ${getVersion()}`);
      return 0;
    case 'help':
      printUsage();
      return 0;
    case 'error':
      console.error(`Error: ${result.message}`);
      printUsage();
      return 1;
  }

  const { opts, warnings } = result;
  for (const warning of warnings) {
    console.error(`Warning: ${warning}`);
  }

  const controller = new AbortController();
  const onSigint = (): void => {
    if (!opts.quiet) console.error('\nCancelling, partial results will be exported...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const config = buildConfig(opts);
    const urls = opts.urlsFile ? [...opts.urls, ...readUrlsFile(opts.urlsFile)] : opts.urls;
    const { signal } = controller;

    let bundle: ExportBundle;
    switch (opts.command) {
      case 'single':
        bundle = await runSingle(urls[0], config, opts, signal);
        break;
      case 'crawl':
        bundle = await runEvents(crawl(urls[0], config, { signal }), opts);
        break;
      case 'batch':
        bundle = await runEvents(batch(urls, config, { signal }), opts);
        break;
    }

    const nameBase = opts.output ?? defaultExportName(opts.command, urls[0]);
    const report = await exportBundle(bundle, config.exportFormats, nameBase, {
      directory: opts.outDir,
    });
    for (const path of report.paths) {
      if (!opts.quiet) console.error(`Exported: ${path}`);
    }
    for (const failure of report.failures) {
      console.error(`Export failed (${failure.format}): ${failure.message}`);
    }

    return hasSuccess(bundle) ? 0 : 1;
  } catch (e) {
    if (e instanceof ConfigError) {
      console.error(`Error: ${e.message}`);
      return 1;
    }
    throw e;
  } finally {
    process.removeListener('SIGINT', onSigint);
    await closeAllSessions();
  }
}

const isDirectRun =
  process.argv[1] && fileURLToPath(import.meta.url) === realpathSync(process.argv[1]);
if (isDirectRun) {
  main()
    .then((code) => {
      // httpcloak's Go shared library (loaded via koffi FFI) holds internal libuv
      // references that prevent the Node.js event loop from exiting naturally.
      process.exit(code);
    })
    .catch((err) => {
      console.error(`Fatal: ${err}`);
      process.exit(1);
    });
}
