import { Global, Module } from '@nestjs/common';
import { ActionLogService } from './logging/action-log.service';
import { Clock } from './utils/clock';

@Global()
@Module({
  providers: [Clock, ActionLogService],
  exports: [Clock, ActionLogService],
})
export class CommonModule {}
