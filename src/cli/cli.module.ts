import { Module } from '@nestjs/common';
import { PortfolioModule } from '../portfolio/portfolio.module';
import { RatesModule } from '../rates/rates.module';
import { UsersModule } from '../users/users.module';
import { CliOutput } from './cli-output';
import { CliService } from './cli.service';

@Module({
  imports: [RatesModule, PortfolioModule, UsersModule],
  providers: [CliOutput, CliService],
  exports: [CliService],
})
export class CliModule {}
