/**
 * decision-corpus command line
 *
 *   decision-corpus run [--ids a,b | --manifest file | --listing] [options]
 *   decision-corpus status <ada>
 *   decision-corpus export [--out dir]
 *   decision-corpus init-db
 *
 * Exit codes: 0 clean run, 1 some identifiers failed or the run was
 * interrupted, 2 fatal storage error or bad usage.
 */

import path from 'path';
import { parseArgs } from 'node:util';
import { ulid } from 'ulid';
import {
  config,
  logger,
  runWithContextAsync,
  ValidationError,
  type RunSummary,
} from '@decision-corpus/shared';
import {
  createPipeline,
  createPool,
  exportDataset,
  initSchema,
  ListIdentifierSource,
  ManifestIdentifierSource,
  PortalListingSource,
  WorkerPool,
  type IdentifierSource,
  type Pipeline,
  type PipelineOptions,
  type PoolRunResult,
} from '@decision-corpus/pipeline';

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_FATAL = 2;

export const USAGE = `Usage:
  decision-corpus run (--ids <a,b,...> | --manifest <file> | --listing) [options]
      --from-date <YYYY-MM-DD>   listing lower bound (issue date)
      --to-date <YYYY-MM-DD>     listing upper bound (issue date)
      --org <id>                 listing organization filter
      --concurrency <n>          worker count
      --max-attempts <n>         fetch attempts per request
      --limit <n>                stop after n identifiers
      --resume                   continue from the saved checkpoint
      --retry-failed             resume failed identifiers
      --refresh                  re-fetch identifiers that are complete
  decision-corpus status <ada>
  decision-corpus export [--out <dir>]
  decision-corpus init-db                create the Postgres tables ($DATABASE_URL)

Common options:
      --data-dir <dir>           dataset root (default: $DATA_DIR or ./dataset)
`;

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface CliDeps {
  io?: CliIo;
  signal?: AbortSignal;
  /** Merged into the pipeline options the CLI builds from its flags */
  pipelineOptions?: PipelineOptions;
}

const defaultIo: CliIo = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

const cliOptions = {
  ids: { type: 'string' },
  manifest: { type: 'string' },
  listing: { type: 'boolean' },
  'from-date': { type: 'string' },
  'to-date': { type: 'string' },
  org: { type: 'string' },
  concurrency: { type: 'string' },
  'max-attempts': { type: 'string' },
  limit: { type: 'string' },
  resume: { type: 'boolean' },
  'retry-failed': { type: 'boolean' },
  refresh: { type: 'boolean' },
  'data-dir': { type: 'string' },
  out: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

type ParsedFlags = ReturnType<typeof parseFlags>['values'];

function parseFlags(argv: string[]) {
  return parseArgs({ args: argv, options: cliOptions, allowPositionals: true, strict: true });
}

function positiveInt(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(value) || parseInt(value, 10) < 1) {
    throw new ValidationError(`--${flag} must be a positive integer, got '${value}'`);
  }
  return parseInt(value, 10);
}

function buildSource(flags: ParsedFlags, pipeline: Pipeline, signal: AbortSignal | undefined): IdentifierSource {
  const chosen = [flags.ids !== undefined, flags.manifest !== undefined, flags.listing === true].filter(Boolean);
  if (chosen.length !== 1) {
    throw new ValidationError('run needs exactly one of --ids, --manifest or --listing');
  }
  if (flags.ids !== undefined) {
    return new ListIdentifierSource(flags.ids.split(','));
  }
  if (flags.manifest !== undefined) {
    return new ManifestIdentifierSource(path.resolve(flags.manifest));
  }
  return new PortalListingSource(
    pipeline.portalClient,
    { fromDate: flags['from-date'], toDate: flags['to-date'], organizationId: flags.org },
    undefined,
    { signal }
  );
}

/**
 * Rebuild the source at the checkpointed cursor when --resume is given and
 * the checkpoint belongs to the same source.
 */
async function resumeSource(
  flags: ParsedFlags,
  pipeline: Pipeline,
  fresh: IdentifierSource,
  signal: AbortSignal | undefined
): Promise<IdentifierSource> {
  if (!flags.resume) {
    return fresh;
  }
  const cursor = await pipeline.checkpoints.load(fresh.key);
  if (!cursor) {
    return fresh;
  }
  closeSource(fresh);
  logger.info('Resuming from checkpoint', { source: fresh.key, cursor });
  if (flags.ids !== undefined) {
    return new ListIdentifierSource(flags.ids.split(','), cursor);
  }
  if (flags.manifest !== undefined) {
    return new ManifestIdentifierSource(path.resolve(flags.manifest), cursor);
  }
  return new PortalListingSource(
    pipeline.portalClient,
    { fromDate: flags['from-date'], toDate: flags['to-date'], organizationId: flags.org },
    cursor,
    { signal }
  );
}

function closeSource(source: IdentifierSource): void {
  if (source instanceof ManifestIdentifierSource) {
    source.close();
  }
}

export function formatSummary(summary: RunSummary): string[] {
  const lines = [
    `processed=${summary.processed} complete=${summary.complete} skipped=${summary.skipped} ` +
      `in_flight=${summary.inFlight} cancelled=${summary.cancelled} failed=${summary.failed.length}` +
      (summary.aborted ? ' (aborted)' : ''),
  ];
  for (const failure of summary.failed) {
    lines.push(`FAILED ${failure.ada}: ${failure.reason}`);
  }
  return lines;
}

/** Every identifier pulled either finished or was skipped */
export function isRunClean(summary: RunSummary): boolean {
  return !summary.aborted && summary.failed.length === 0 && summary.inFlight === 0 && summary.cancelled === 0;
}

async function runCommand(flags: ParsedFlags, io: CliIo, deps: CliDeps): Promise<number> {
  const concurrency = positiveInt('concurrency', flags.concurrency);
  const limit = positiveInt('limit', flags.limit);
  const maxAttempts = positiveInt('max-attempts', flags['max-attempts']);

  const pipeline = createPipeline({
    ...deps.pipelineOptions,
    ...(flags['data-dir'] !== undefined ? { dataDir: flags['data-dir'] } : {}),
    ...(maxAttempts !== undefined ? { fetchMaxAttempts: maxAttempts } : {}),
  });

  try {
    await pipeline.assertAvailable();
    const source = await resumeSource(flags, pipeline, buildSource(flags, pipeline, deps.signal), deps.signal);

    const pool = new WorkerPool(pipeline.coordinator, {
      concurrency,
      limit,
      processOptions: { refresh: flags.refresh === true, retryFailed: flags['retry-failed'] === true },
    });

    let result: PoolRunResult;
    try {
      result = await pool.run(source, deps.signal);
    } finally {
      closeSource(source);
    }

    await pipeline.checkpoints.save(source.key, result.cursor, result.summary);

    for (const line of formatSummary(result.summary)) {
      io.out(line);
    }

    if (result.fatal) {
      io.err(`fatal: ${result.fatal.message}`);
      return EXIT_FATAL;
    }
    return isRunClean(result.summary) ? EXIT_OK : EXIT_FAILURES;
  } finally {
    await pipeline.close();
  }
}

async function statusCommand(flags: ParsedFlags, ada: string | undefined, io: CliIo, deps: CliDeps): Promise<number> {
  if (!ada) {
    throw new ValidationError('status needs an <ada> argument');
  }
  const pipeline = createPipeline({
    ...deps.pipelineOptions,
    ...(flags['data-dir'] !== undefined ? { dataDir: flags['data-dir'] } : {}),
  });
  try {
    const state = await pipeline.coordinator.getState(ada.normalize('NFC').trim());
    if (!state) {
      io.err(`unknown identifier: ${ada}`);
      return EXIT_FAILURES;
    }
    const versions = await pipeline.contentStore.listVersions(state.ada);
    const record = await pipeline.recordStore.get(state.ada);
    io.out(
      JSON.stringify(
        {
          ada: state.ada,
          stage: state.stage,
          attempts: state.attempts,
          lastError: state.lastError,
          failure: state.failure,
          lease: state.lease,
          versions: versions.map((version) => ({ version: version.version, hash: version.hash })),
          extractedText: state.extractedText,
          completeness: record?.completeness ?? null,
          updatedAt: state.updatedAt,
        },
        null,
        2
      )
    );
    return EXIT_OK;
  } finally {
    await pipeline.close();
  }
}

async function exportCommand(flags: ParsedFlags, io: CliIo, deps: CliDeps): Promise<number> {
  const pipeline = createPipeline({
    ...deps.pipelineOptions,
    ...(flags['data-dir'] !== undefined ? { dataDir: flags['data-dir'] } : {}),
  });
  try {
    const outDir = path.resolve(flags.out ?? path.join(pipeline.dataDir, 'export'));
    const manifest = await exportDataset(pipeline.recordStore, outDir);
    io.out(
      `exported ${manifest.records} records to ${outDir} ` +
        `(complete=${manifest.completeness.complete} partial=${manifest.completeness.partial} ` +
        `minimal=${manifest.completeness.minimal})`
    );
    return EXIT_OK;
  } finally {
    await pipeline.close();
  }
}

async function initDbCommand(io: CliIo, deps: CliDeps): Promise<number> {
  const pool = createPool(deps.pipelineOptions?.databaseUrl ?? config.databaseUrl);
  try {
    await initSchema(pool);
    io.out('database schema ready');
    return EXIT_OK;
  } finally {
    await pool.end();
  }
}

/**
 * Parse `argv` (without the node and script entries), run the command and
 * return the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const io = deps.io ?? defaultIo;

  let parsed: ReturnType<typeof parseFlags>;
  try {
    parsed = parseFlags(argv);
  } catch (error) {
    io.err(error instanceof Error ? error.message : String(error));
    io.err(USAGE);
    return EXIT_FATAL;
  }

  const [command, ...rest] = parsed.positionals;
  if (parsed.values.help || command === undefined) {
    io.out(USAGE);
    return command === undefined && !parsed.values.help ? EXIT_FATAL : EXIT_OK;
  }

  return runWithContextAsync({ correlationId: ulid() }, async () => {
    try {
      switch (command) {
        case 'run':
          return await runCommand(parsed.values, io, deps);
        case 'status':
          return await statusCommand(parsed.values, rest[0], io, deps);
        case 'export':
          return await exportCommand(parsed.values, io, deps);
        case 'init-db':
          return await initDbCommand(io, deps);
        default:
          io.err(`unknown command: ${command}`);
          io.err(USAGE);
          return EXIT_FATAL;
      }
    } catch (error) {
      if (error instanceof ValidationError) {
        io.err(error.message);
        return EXIT_FATAL;
      }
      logger.error('Command failed', error, { command });
      io.err(`fatal: ${error instanceof Error ? error.message : String(error)}`);
      return EXIT_FATAL;
    }
  });
}
