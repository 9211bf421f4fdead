import { Command, CommanderError } from 'commander';
import type { DestinationStream } from 'pino';
import { GzipShardSink, inspectShard, readShard, ShardEngine, ShardRunError } from '@shardkit/core';
import { SequelizeRecordSourceFactory } from '@shardkit/source-sequelize';
import { ConfigError, parseExtractConfig } from './config.js';
import type { ExtractConfig } from './config.js';
import { createLogger } from './logger.js';
import { attachRunLogger } from './attachRunLogger.js';

export const VERSION = '0.1.0';

/** Process I/O the CLI writes to. */
export interface CliIO {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly env: Readonly<Record<string, string | undefined>>;
  /** Log destination; stdout (pretty on a TTY) when absent. */
  readonly logDestination?: DestinationStream;
}

const SIGNAL_EXIT_CODES = { SIGINT: 130, SIGTERM: 143 } as const;
type HandledSignal = keyof typeof SIGNAL_EXIT_CODES;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function runExtract(options: Record<string, unknown>, io: CliIO): Promise<number> {
  let config: ExtractConfig;
  try {
    config = parseExtractConfig(options, io.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      io.stderr(`${error.message}\n`);
      return 1;
    }
    throw error;
  }

  const logger = createLogger({ level: config.logLevel, destination: io.logDestination });
  const engine = new ShardEngine({
    source: SequelizeRecordSourceFactory.forSqliteFile(config.inputFile),
    sink: new GzipShardSink(config.outputDir, { level: config.compressionLevel }),
    filter: config.filter,
    documentsPerShard: config.documentsPerShard,
    threadCount: config.threadCount,
    zeroPadding: config.zeroPadding,
    onHandlerError: (error, event) => {
      logger.warn({ err: error, event: event.type }, 'Event handler failed');
    },
  });
  const detach = attachRunLogger(engine, logger);

  const interrupted: { signal?: HandledSignal } = {};
  const onSignal = (signal: NodeJS.Signals): void => {
    interrupted.signal = signal === 'SIGTERM' ? 'SIGTERM' : 'SIGINT';
    engine.abort(`Interrupted by ${signal}`).catch((error: unknown) => {
      logger.error({ err: error }, 'Abort failed');
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    await engine.run();
    return 0;
  } catch (error) {
    if (interrupted.signal) {
      return SIGNAL_EXIT_CODES[interrupted.signal];
    }
    if (error instanceof ShardRunError) {
      io.stderr(`shardkit extract: ${describeRunError(error)}\n`);
      return 1;
    }
    throw error;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    detach();
    logger.flush();
  }
}

/** One-line diagnostic naming the failed operation. */
function describeRunError(error: ShardRunError): string {
  return error.message.startsWith(error.operation) ? error.message : `${error.operation}: ${error.message}`;
}

async function runRead(shardPath: string, options: { print?: boolean }, io: CliIO): Promise<number> {
  try {
    if (options.print) {
      for await (const payload of readShard(shardPath)) {
        io.stdout(`${payload.toString('utf-8')}\n`);
      }
      return 0;
    }
    const { documents, payloadBytes } = await inspectShard(shardPath);
    io.stdout(`${String(documents)} documents, ${String(payloadBytes)} payload bytes\n`);
    return 0;
  } catch (error) {
    io.stderr(`shardkit read: ${describeError(error)}\n`);
    return 1;
  }
}

/** Build the `shardkit` command tree. The exit code of the last command is stored in `result.code`. */
export function createProgram(io: CliIO): { program: Command; result: { code: number } } {
  const result = { code: 0 };
  const program = new Command()
    .name('shardkit')
    .description('Split an archive into gzip shard files of length-prefixed documents')
    .version(VERSION)
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });

  program
    .command('extract', { isDefault: true })
    .description('Extract qualifying archive entries into shard files')
    .requiredOption('-i, --input-file <path>', 'archive to read (SQLite)')
    .requiredOption('-o, --output-dir <path>', 'directory receiving the shard files')
    .option('-l, --language <code>', 'archive language, selects the disambiguation marker (en, hu)', 'hu')
    .option('-d, --documents <n>', 'documents per shard', '2500')
    .option('-Z, --zeroes <n>', 'digits of the zero-padded shard number', '4')
    .option('-T, --threads <n>', 'number of concurrent writers', '10')
    .option('--namespace <ns>', 'namespace of the entries to keep', 'A')
    .option('--exclude-pattern <regex>', 'exclude titles matching this regular expression instead of the language marker')
    .option('--compression-level <0-9>', 'gzip compression level')
    .option('--log-level <level>', 'fatal, error, warn, info, debug, trace or silent (default: $LOG_LEVEL or info)')
    .action(async (options: Record<string, unknown>) => {
      result.code = await runExtract(options, io);
    });

  program
    .command('read')
    .description('Count the documents of a shard file, or print them')
    .argument('<shard>', 'shard file to read')
    .option('-p, --print', 'print every document followed by a newline', false)
    .action(async (shard: string, options: { print?: boolean }) => {
      result.code = await runRead(shard, options, io);
    });

  return { program, result };
}

/** Run the CLI with user arguments (without the node and script paths) and return the exit code. */
export async function runCli(args: readonly string[], io: CliIO): Promise<number> {
  const { program, result } = createProgram(io);
  try {
    await program.parseAsync([...args], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return result.code;
}
