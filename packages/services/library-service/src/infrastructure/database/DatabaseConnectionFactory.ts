/**
 * Database Connection Factory for library-service
 * postgres.js connection pool plus the Drizzle instance bound to it.
 * Every connection runs with a statement_timeout below the store timeout.
 */

import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { serializeError } from '@shelfwise/platform-core';
import { getLogger } from '@config/service-config';
import * as schema from './schemas';

const logger = getLogger('database-connection-factory');

export type DatabaseSchema = typeof schema;
export type DatabaseConnection = PostgresJsDatabase<DatabaseSchema>;
export type SQLConnection = ReturnType<typeof postgres>;
export type DatabaseTransaction = Parameters<Parameters<DatabaseConnection['transaction']>[0]>[0];

export interface DatabaseOptions {
  url: string;
  poolMax: number;
  statementTimeoutMs: number;
}

function sslFor(connectionString: string): false | 'require' {
  if (process.env.DATABASE_SSL === 'false') return false;
  try {
    const url = new URL(connectionString);
    if (url.hostname === 'localhost' || url.hostname === '127.0.0.1') return false;
    if (url.searchParams.get('sslmode') === 'disable') return false;
  } catch (error) {
    logger.warn('Could not parse DATABASE_URL for SSL detection', { error: serializeError(error) });
  }
  return 'require';
}

export class DatabaseConnectionFactory {
  private sqlConnection: SQLConnection | null = null;
  private dbConnection: DatabaseConnection | null = null;

  constructor(private readonly options: DatabaseOptions) {}

  getSQLConnection(): SQLConnection {
    if (!this.sqlConnection) {
      this.sqlConnection = postgres(this.options.url, {
        max: this.options.poolMax,
        idle_timeout: 300,
        connect_timeout: 10,
        ssl: sslFor(this.options.url),
        onnotice: () => {},
        connection: {
          statement_timeout: this.options.statementTimeoutMs,
        },
      });
      logger.debug('Database connection pool created', { poolMax: this.options.poolMax });
    }
    return this.sqlConnection;
  }

  getDatabase(): DatabaseConnection {
    if (!this.dbConnection) {
      this.dbConnection = drizzle(this.getSQLConnection(), { schema, logger: false });
      logger.debug('Drizzle ORM initialized');
    }
    return this.dbConnection;
  }

  createDrizzleRepository<T>(RepositoryClass: new (db: DatabaseConnection) => T): T {
    return new RepositoryClass(this.getDatabase());
  }

  async healthCheck(): Promise<{ status: 'healthy' | 'unhealthy'; latencyMs: number }> {
    const startTime = Date.now();
    try {
      await this.getSQLConnection()`SELECT 1`;
      return { status: 'healthy', latencyMs: Date.now() - startTime };
    } catch (error) {
      logger.error('Health check failed', { error: serializeError(error) });
      return { status: 'unhealthy', latencyMs: Date.now() - startTime };
    }
  }

  async close(): Promise<void> {
    if (this.sqlConnection) {
      await this.sqlConnection.end();
    }
    this.sqlConnection = null;
    this.dbConnection = null;
    logger.info('Connections closed');
  }
}
