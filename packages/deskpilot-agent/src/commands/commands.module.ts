import { Module } from '@nestjs/common';
import { CommandSourceService } from './command-source.service';

@Module({
  providers: [CommandSourceService],
  exports: [CommandSourceService],
})
export class CommandsModule {}
