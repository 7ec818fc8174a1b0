import { Module } from '@nestjs/common';
import { NutModule } from '../nut/nut.module';
import { ActionExecutorService } from './action-executor.service';

@Module({
  imports: [NutModule],
  providers: [ActionExecutorService],
  exports: [ActionExecutorService],
})
export class ExecutorModule {}
