import { Module } from '@nestjs/common';
import { SafetyGateService } from './safety-gate.service';

@Module({
  providers: [SafetyGateService],
  exports: [SafetyGateService],
})
export class SafetyModule {}
