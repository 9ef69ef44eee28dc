import { Module } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app.config';
import { DatabaseModule } from '../database/database.module';
import { DatabaseService } from '../database/database.service';
import { ExchangeModule } from '../exchange/exchange.module';
import { SnapshotsModule } from '../snapshots/snapshots.module';
import { CREDENTIAL_STORE, CredentialStore } from './credential-store.interface';
import { CredentialsController } from './credentials.controller';
import { CredentialsService } from './credentials.service';
import { InMemoryCredentialStore } from './in-memory-credential.store';
import { PostgresCredentialStore } from './postgres-credential.store';

@Module({
  imports: [DatabaseModule, ExchangeModule, SnapshotsModule],
  controllers: [CredentialsController],
  providers: [
    {
      provide: CREDENTIAL_STORE,
      inject: [APP_CONFIG, DatabaseService],
      useFactory: async (config: AppConfig, database: DatabaseService): Promise<CredentialStore> => {
        if (config.storageDriver !== 'postgres') {
          return new InMemoryCredentialStore();
        }
        const store = new PostgresCredentialStore(database.requirePool());
        await store.ensureSchema();
        return store;
      },
    },
    CredentialsService,
  ],
  exports: [CREDENTIAL_STORE, CredentialsService],
})
export class CredentialsModule {}
