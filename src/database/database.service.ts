import { Inject, Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { Pool } from 'pg';
import { APP_CONFIG, AppConfig } from '../config/app.config';

/**
 * Owns the PostgreSQL pool when STORAGE_DRIVER=postgres.
 * With the memory driver no pool is created.
 */
@Injectable()
export class DatabaseService implements OnApplicationShutdown {
  private readonly logger = new Logger(DatabaseService.name);
  readonly pool: Pool | null;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.pool = config.storageDriver === 'postgres'
      ? new Pool({ connectionString: config.databaseUrl })
      : null;
  }

  /** Pool for the postgres driver; throws if the memory driver is configured */
  requirePool(): Pool {
    if (!this.pool) {
      throw new Error('PostgreSQL pool requested but STORAGE_DRIVER is not postgres');
    }
    return this.pool;
  }

  async onApplicationShutdown(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.logger.log('PostgreSQL pool closed');
    }
  }
}
