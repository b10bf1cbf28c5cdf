/**
 * Reference data sources: a JSON communes file or the pharmacy SQLite database
 */

import { readFile } from 'node:fs/promises';
import Database from 'better-sqlite3';
import { z } from 'zod';
import { DataUnavailableError } from '../domain/error-handler.js';
import { logger } from '../domain/logger.js';
import { CommuneFileSchema } from './schemas.js';
import type { CommuneInput } from './types.js';

const PharmacyCommuneRowSchema = z.object({
  comuna: z.string(),
  region: z.string(),
  pharmacy_count: z.number().int().nonnegative(),
});

/**
 * Read and validate a communes file
 *
 * @throws DataUnavailableError when the file is missing, is not JSON, or fails validation
 */
export async function loadCommunesFromFile(path: string): Promise<CommuneInput[]> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new DataUnavailableError(`Could not read communes file at ${path}`, {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new DataUnavailableError(`Communes file at ${path} is not valid JSON`, {
      path,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = CommuneFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new DataUnavailableError(`Communes file at ${path} failed validation`, {
      path,
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  logger.info('Communes file loaded', { path, communes: parsed.data.communes.length });

  return parsed.data.communes.map(record => ({
    canonicalName: record.canonical_name,
    region: record.region,
    aliases: record.aliases,
    pharmacyCount: record.pharmacy_count,
  }));
}

/**
 * Read-only access to the pharmacy database. The communes are the distinct
 * commune names of the registered pharmacies, most pharmacies first.
 */
export class CommunesDB {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPathOrDatabase: string | Database.Database = './data/pharmacies.db') {
    if (typeof dbPathOrDatabase !== 'string') {
      this.db = dbPathOrDatabase;
      this.dbPath = dbPathOrDatabase.name;
      return;
    }

    this.dbPath = dbPathOrDatabase;
    try {
      this.db = new Database(dbPathOrDatabase, { readonly: true, fileMustExist: true });
      logger.info('CommunesDB initialized', { dbPath: dbPathOrDatabase });
    } catch (error) {
      logger.error('Failed to open pharmacy database', {
        dbPath: dbPathOrDatabase,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new DataUnavailableError(`Could not open pharmacy database at ${dbPathOrDatabase}`, {
        dbPath: dbPathOrDatabase,
      });
    }
  }

  /**
   * @throws DataUnavailableError when the query fails or returns no communes
   */
  loadCommunes(): CommuneInput[] {
    let rows: unknown[];
    try {
      rows = this.db
        .prepare(
          `
          SELECT
            TRIM(comuna) AS comuna,
            COALESCE(NULLIF(TRIM(region), ''), 'Sin región') AS region,
            COUNT(*) AS pharmacy_count
          FROM pharmacies
          WHERE comuna IS NOT NULL AND TRIM(comuna) <> ''
          GROUP BY 1, 2
          ORDER BY pharmacy_count DESC, comuna
        `
        )
        .all();
    } catch (error) {
      throw new DataUnavailableError('Could not read communes from pharmacy database', {
        dbPath: this.dbPath,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const communes: CommuneInput[] = [];
    for (const row of rows) {
      const parsed = PharmacyCommuneRowSchema.safeParse(row);
      if (!parsed.success) {
        logger.warn('Skipping malformed commune row', { dbPath: this.dbPath, row });
        continue;
      }
      communes.push({
        canonicalName: parsed.data.comuna,
        region: parsed.data.region,
        pharmacyCount: parsed.data.pharmacy_count,
      });
    }

    if (communes.length === 0) {
      throw new DataUnavailableError('Pharmacy database has no communes', { dbPath: this.dbPath });
    }

    logger.info('Communes loaded from pharmacy database', {
      dbPath: this.dbPath,
      communes: communes.length,
    });
    return communes;
  }

  close(): void {
    this.db.close();
    logger.info('CommunesDB connection closed', { dbPath: this.dbPath });
  }
}
