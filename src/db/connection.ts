import path from 'path';
import fs from 'fs';
import { Pool } from 'pg';
import sqlite3 from 'sqlite3';
import { open } from 'sqlite';
import { DatabaseConfig } from '../config';
import { WeatherHubError, WeatherHubErrorType } from '../utils/error-handler';
import { PostgresSqlClient, SqlClient, SqliteSqlClient } from './sql-client';

/**
 * Open a SQL client for the configured dialect
 */
export async function openSqlClient(config: DatabaseConfig): Promise<SqlClient> {
  if (config.client === 'postgres') {
    if (!config.connectionString) {
      throw new WeatherHubError(
        'PostgreSQL persistence needs a connection string',
        WeatherHubErrorType.CONFIGURATION_ERROR,
        'openSqlClient'
      );
    }
    return new PostgresSqlClient(new Pool({ connectionString: toPostgresUrl(config.connectionString) }));
  }

  if (config.filename !== ':memory:') {
    fs.mkdirSync(path.dirname(config.filename), { recursive: true });
  }

  const db = await open({
    filename: config.filename,
    driver: sqlite3.Database
  });
  await db.run('PRAGMA busy_timeout = 5000');
  return new SqliteSqlClient(db);
}

/**
 * pg takes URLs; the app host hands out `Host=...;Port=...;Username=...` strings
 */
export function toPostgresUrl(connectionString: string): string {
  if (/^postgres(ql)?:\/\//i.test(connectionString)) {
    return connectionString;
  }

  const settings = new Map<string, string>();
  for (const part of connectionString.split(';')) {
    const separator = part.indexOf('=');
    if (separator > 0) {
      settings.set(part.slice(0, separator).trim().toLowerCase(), part.slice(separator + 1).trim());
    }
  }

  const host = settings.get('host') ?? settings.get('server') ?? 'localhost';
  const port = settings.get('port') ?? '5432';
  const user = settings.get('username') ?? settings.get('user id') ?? settings.get('user') ?? 'postgres';
  const password = settings.get('password');
  const database = settings.get('database') ?? 'postgres';

  const credentials = password !== undefined
    ? `${encodeURIComponent(user)}:${encodeURIComponent(password)}`
    : encodeURIComponent(user);
  return `postgresql://${credentials}@${host}:${port}/${encodeURIComponent(database)}`;
}
