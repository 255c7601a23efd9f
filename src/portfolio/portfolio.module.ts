import { Module } from '@nestjs/common';
import { PortfolioService } from './portfolio.service';
import { PortfolioQueryService } from './portfolio-query.service';
import { PortfolioStoreService } from './portfolio-store.service';
import { RatesModule } from '../rates/rates.module';

@Module({
  imports: [RatesModule], // RateManagerService for pricing and valuation
  providers: [
    PortfolioStoreService,
    PortfolioService,      // Mutations: buy, sell, deposit
    PortfolioQueryService, // Queries: getPortfolio
  ],
  exports: [PortfolioStoreService, PortfolioService, PortfolioQueryService],
})
export class PortfolioModule {}
