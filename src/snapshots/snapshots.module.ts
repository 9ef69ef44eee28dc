import { Module } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { DatabaseModule } from '../database/database.module';
import { DatabaseService } from '../database/database.service';
import { InMemorySnapshotStore } from './in-memory-snapshot.store';
import { PostgresSnapshotStore } from './postgres-snapshot.store';
import { SNAPSHOT_STORE, SnapshotStore } from './snapshot-store.interface';

@Module({
  imports: [DatabaseModule],
  providers: [
    {
      provide: SNAPSHOT_STORE,
      inject: [APP_CONFIG, DatabaseService],
      useFactory: async (config: AppConfig, database: DatabaseService): Promise<SnapshotStore> => {
        if (config.storageDriver !== 'postgres') {
          return new InMemorySnapshotStore();
        }
        const store = new PostgresSnapshotStore(database.requirePool());
        await store.ensureSchema();
        return store;
      },
    },
  ],
  exports: [SNAPSHOT_STORE],
})
export class SnapshotsModule {}
