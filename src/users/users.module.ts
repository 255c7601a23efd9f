import { Module } from '@nestjs/common';
import { PortfolioModule } from '../portfolio/portfolio.module';
import { SessionService } from './session.service';
import { UsersService } from './users.service';

@Module({
  imports: [PortfolioModule], // PortfolioStoreService opens a portfolio on registration
  providers: [UsersService, SessionService],
  exports: [UsersService, SessionService],
})
export class UsersModule {}
