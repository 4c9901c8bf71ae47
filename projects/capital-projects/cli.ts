/**
 * Command line parsing and dispatch for the ETL script.
 */

import {
  EtlError,
  dropRawTable,
  dropStageTable,
  listRatioColumns,
  loadRawTable,
  rebuildStageTable,
  selectRawRecord,
  selectStageRecord,
  testConnection,
  type Database,
  type EnvConfig,
  type StageRunSummary,
} from '../../framework/etl/src/index.js';
import { config, findSource } from './project.config.js';
import { runMigrations } from './schemas/migrate.js';

export const USAGE = `Usage: etl <command> [arguments]

Commands:
  migrate                              Create schemas and reference tables
  check                                Test the database connection
  load <file.csv> [...]                Load CSV files into raw tables
  stage <source> [...] | --all         Rebuild stage tables
        [--target-year N]              Price level year (default: latest deflator year)
  drop <source>                        Drop a stage table
  show <source> <project_id> <sample>  Print one staged record
  ratios <source>                      List ratio columns of a stage table
  raw-show <table> <project_id> <sample>
                                       Print one raw record
  raw-drop <table>                     Drop a raw table`;

export type Command =
  | { kind: 'help' }
  | { kind: 'migrate' }
  | { kind: 'check' }
  | { kind: 'load'; files: string[] }
  | { kind: 'stage'; sources: string[]; all: boolean; targetYear?: number }
  | { kind: 'drop'; source: string }
  | { kind: 'show'; source: string; projectId: string; sample: string }
  | { kind: 'ratios'; source: string }
  | { kind: 'raw-show'; table: string; projectId: string; sample: string }
  | { kind: 'raw-drop'; table: string };

export class UsageError extends EtlError {
  constructor(message: string) {
    super(`${message}\n\n${USAGE}`, 'USAGE');
  }
}

function parseTargetYear(args: string[]): number | undefined {
  const flagIndex = args.findIndex(a => a === '--target-year' || a.startsWith('--target-year='));
  if (flagIndex === -1) {
    return undefined;
  }
  const flag = args[flagIndex];
  const value = flag.includes('=') ? flag.split('=')[1] : args[flagIndex + 1];
  const year = Number(value);
  if (value === undefined || !Number.isInteger(year)) {
    throw new UsageError(`--target-year expects a year, got ${JSON.stringify(value ?? '')}`);
  }
  return year;
}

function positionals(args: string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--target-year') {
      i++;
    } else if (!args[i].startsWith('--')) {
      result.push(args[i]);
    }
  }
  return result;
}

export function parseCommand(argv: string[]): Command {
  const name: string | undefined = argv[0];
  const rest = argv.slice(1);
  const args = positionals(rest);

  switch (name) {
    case undefined:
    case 'help':
    case '--help':
      return { kind: 'help' };
    case 'migrate':
    case 'check':
      return { kind: name };
    case 'load':
      if (args.length === 0) {
        throw new UsageError('load needs at least one CSV file');
      }
      return { kind: 'load', files: args };
    case 'stage': {
      const all = rest.includes('--all');
      if (all === (args.length > 0)) {
        throw new UsageError('stage needs either source names or --all');
      }
      return { kind: 'stage', sources: args, all, targetYear: parseTargetYear(rest) };
    }
    case 'drop':
    case 'ratios':
      if (args.length !== 1) {
        throw new UsageError(`${name} needs exactly one source`);
      }
      return { kind: name, source: args[0] };
    case 'show':
      if (args.length !== 3) {
        throw new UsageError('show needs <source> <project_id> <sample>');
      }
      return { kind: 'show', source: args[0], projectId: args[1], sample: args[2] };
    case 'raw-show':
      if (args.length !== 3) {
        throw new UsageError('raw-show needs <table> <project_id> <sample>');
      }
      return { kind: 'raw-show', table: args[0], projectId: args[1], sample: args[2] };
    case 'raw-drop':
      if (args.length !== 1) {
        throw new UsageError('raw-drop needs exactly one table');
      }
      return { kind: 'raw-drop', table: args[0] };
    default:
      throw new UsageError(`Unknown command: ${name}`);
  }
}

export interface CommandContext {
  db: Database;
  env: EnvConfig;
}

/**
 * Run a parsed command. Resolves to the process exit code.
 */
export async function runCommand(command: Command, { db, env }: CommandContext): Promise<number> {
  const { schemas } = config.database;

  switch (command.kind) {
    case 'help':
      console.log(USAGE);
      return 0;

    case 'migrate':
      await runMigrations(db, schemas);
      return 0;

    case 'check': {
      const ok = await testConnection(db);
      console.log(ok ? 'Database connection OK' : 'Database connection failed');
      return ok ? 0 : 1;
    }

    case 'load':
      for (const file of command.files) {
        await loadRawTable(db, file, { schemas, batchSize: env.etl.batchSize ?? config.etl.batchSize });
      }
      return 0;

    case 'stage': {
      const sources = command.all ? config.etl.sources : command.sources.map(findSource);
      const summaries: StageRunSummary[] = [];
      // One at a time: each rebuild holds a transaction for its whole write
      for (const source of sources) {
        summaries.push(await rebuildStageTable(db, source, {
          schemas,
          batchSize: env.etl.batchSize ?? config.etl.batchSize,
          normalization: {
            targetYear: command.targetYear ?? env.etl.targetYear,
            exchangeRateQuote: env.etl.exchangeRateQuote,
          },
        }));
      }
      const total = summaries.reduce((sum, s) => sum + s.rowCount, 0);
      console.log(`Staged ${summaries.length} table(s), ${total} rows`);
      return 0;
    }

    case 'drop':
      await dropStageTable(db, command.source, { schemas });
      return 0;

    case 'show': {
      const source = findSource(command.source);
      const record = await selectStageRecord(db, source.name, command.projectId, command.sample, {
        schemas,
        columns: source.columns,
      });
      return printRecord(record, command, `${schemas.stage}.${command.source}`);
    }

    case 'ratios': {
      const columns = await listRatioColumns(db, command.source, { schemas });
      console.log(columns.join('\n'));
      return 0;
    }

    case 'raw-show': {
      const record = await selectRawRecord(db, command.table, command.projectId, command.sample, {
        schemas,
        columns: findSource(command.table).columns,
      });
      return printRecord(record, command, `${schemas.raw}.${command.table}`);
    }

    case 'raw-drop':
      await dropRawTable(db, command.table, { schemas });
      return 0;
  }
}

function printRecord(
  record: Record<string, unknown> | null,
  key: { projectId: string; sample: string },
  table: string
): number {
  if (record === null) {
    console.error(
      `Project with project_id: ${key.projectId}, and sample: ${key.sample} could not be found in table: ${table}`
    );
    return 1;
  }
  console.log(JSON.stringify(record, null, 2));
  return 0;
}
