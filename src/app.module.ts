import { DynamicModule, Module } from '@nestjs/common';
import { CliModule } from './cli/cli.module';
import { CommonModule } from './common/common.module';
import { AppConfig } from './config/app.config';
import { ConfigModule } from './config/config.module';
import { CurrencyModule } from './currency/currency.module';
import { PersistenceModule } from './persistence/persistence.module';
import { PortfolioModule } from './portfolio/portfolio.module';
import { RatesModule } from './rates/rates.module';
import { UsersModule } from './users/users.module';

@Module({})
export class AppModule {
  static forRoot(config: AppConfig): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot(config),
        CommonModule,
        CurrencyModule,
        PersistenceModule,
        RatesModule,
        PortfolioModule,
        UsersModule,
        CliModule,
      ],
    };
  }
}
