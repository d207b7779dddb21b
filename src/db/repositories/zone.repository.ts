import { z } from 'zod';
import { Zone } from '../../nws/types';
import { SqlClient, SqlRow, placeholder } from '../sql-client';
import { ensureSchema } from '../schema';

export interface ZoneStore {
  upsertMany(zones: Zone[]): Promise<number>;
  findAll(): Promise<Zone[]>;
  findByKey(key: string): Promise<Zone | null>;
  count(): Promise<number>;
}

const zoneRowSchema = z.object({
  key: z.string(),
  name: z.string(),
  state: z.string(),
  observation_stations: z.string()
});

const stationsSchema = z.array(z.string());

const countRowSchema = z.object({
  total: z.union([z.number(), z.string()])
});

/**
 * Zone mirror table access
 */
export class ZoneRepository implements ZoneStore {
  constructor(
    private readonly client: SqlClient,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async ensureSchema(): Promise<void> {
    await ensureSchema(this.client);
  }

  /**
   * Insert or update every zone by key in one transaction
   */
  async upsertMany(zones: Zone[]): Promise<number> {
    if (zones.length === 0) {
      return 0;
    }

    const dialect = this.client.dialect;
    const p = (index: number) => placeholder(dialect, index);
    const statement = `INSERT INTO zones (key, name, state, observation_stations, updated_at)
      VALUES (${p(1)}, ${p(2)}, ${p(3)}, ${p(4)}, ${p(5)})
      ON CONFLICT (key) DO UPDATE SET
        name = excluded.name,
        state = excluded.state,
        observation_stations = excluded.observation_stations,
        updated_at = excluded.updated_at`;
    const updatedAt = this.clock().toISOString();

    return this.client.transaction(async (tx) => {
      for (const zone of zones) {
        await tx.query(statement, [
          zone.key,
          zone.name,
          zone.state,
          JSON.stringify(zone.observationStations),
          updatedAt
        ]);
      }
      return zones.length;
    });
  }

  async findAll(): Promise<Zone[]> {
    const rows = await this.client.query(
      'SELECT key, name, state, observation_stations FROM zones ORDER BY key'
    );
    return rows.map(mapToZone);
  }

  async findByKey(key: string): Promise<Zone | null> {
    const rows = await this.client.query(
      `SELECT key, name, state, observation_stations FROM zones WHERE key = ${placeholder(this.client.dialect, 1)}`,
      [key]
    );
    return rows.length > 0 ? mapToZone(rows[0]) : null;
  }

  async count(): Promise<number> {
    const rows = await this.client.query('SELECT COUNT(*) AS total FROM zones');
    // pg returns bigint counts as strings
    return rows.length > 0 ? Number(countRowSchema.parse(rows[0]).total) : 0;
  }

  async ping(): Promise<boolean> {
    await this.client.query('SELECT 1');
    return true;
  }

  /** Closes the underlying client */
  async close(): Promise<void> {
    await this.client.close();
  }
}

function mapToZone(row: SqlRow): Zone {
  const parsed = zoneRowSchema.parse(row);
  return {
    key: parsed.key,
    name: parsed.name,
    state: parsed.state,
    observationStations: stationsSchema.parse(JSON.parse(parsed.observation_stations))
  };
}
