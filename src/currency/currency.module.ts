import { Global, Module } from '@nestjs/common';
import { CurrencyCatalogService } from './currency-catalog.service';

@Global()
@Module({
  providers: [CurrencyCatalogService],
  exports: [CurrencyCatalogService],
})
export class CurrencyModule {}
