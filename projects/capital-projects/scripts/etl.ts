#!/usr/bin/env npx tsx
/**
 * Capital projects ETL
 *
 * Usage:
 *   npx tsx projects/capital-projects/scripts/etl.ts <command> [arguments]
 *
 * Examples:
 *   npx tsx projects/capital-projects/scripts/etl.ts migrate
 *   npx tsx projects/capital-projects/scripts/etl.ts load data/batteries_electrolyzer.csv
 *   npx tsx projects/capital-projects/scripts/etl.ts stage batteries_electrolyzer
 *   npx tsx projects/capital-projects/scripts/etl.ts stage --all --target-year 2022
 */

import 'dotenv/config';
import type { Pool } from 'pg';
import { createPool, describeError, loadConfig } from '../../../framework/etl/src/index.js';
import { parseCommand, runCommand } from '../cli.js';

async function main(): Promise<number> {
  let pool: Pool | undefined;
  try {
    const command = parseCommand(process.argv.slice(2));
    const env = loadConfig();
    pool = createPool(env.database);
    return await runCommand(command, { db: pool, env });
  } catch (error) {
    console.error(describeError(error));
    return 1;
  } finally {
    await pool?.end();
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
