import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { AppController } from './app.controller';
import { WalletErrorFilter } from './common/filters/wallet-error.filter';
import { ConfigModule } from './config/config.module';
import { CredentialsModule } from './credentials/credentials.module';
import { PortfolioModule } from './portfolio/portfolio.module';

@Module({
  imports: [ConfigModule, CredentialsModule, PortfolioModule],
  controllers: [AppController],
  providers: [{ provide: APP_FILTER, useClass: WalletErrorFilter }],
})
export class AppModule {}
